// Runtime configuration from environment variables

import { isAbsolute, join } from 'path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface AppConfig {
  cifpFiles: string[] // absolute paths
  source: string
  logBufferSize: number
  logLevel: LogLevel
}

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error']

export const DEFAULT_CIFP_FILE = join('data', 'FAACIFP18')
export const DEFAULT_LOG_BUFFER_SIZE = 1000

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const files = (env.CIFP_FILES || DEFAULT_CIFP_FILE)
    .split(',')
    .map(file => file.trim())
    .filter(file => file.length > 0)
    .map(file => (isAbsolute(file) ? file : join(process.cwd(), file)))

  const bufferSize = parseInt(env.LOG_BUFFER_SIZE || '', 10)
  const level = (env.LOG_LEVEL || '').toLowerCase()

  return {
    cifpFiles: files,
    source: env.CIFP_SOURCE || 'FAA',
    logBufferSize: Number.isInteger(bufferSize) && bufferSize > 0 ? bufferSize : DEFAULT_LOG_BUFFER_SIZE,
    logLevel: isLogLevel(level) ? level : 'info',
  }
}

export function shouldLog(threshold: LogLevel, level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold)
}
