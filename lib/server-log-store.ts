// Shared log storage for server-side logging, served by /api/logs
import { loadConfig, type LogLevel } from './config'

export interface ServerLogEntry {
  timestamp: number
  level: LogLevel
  message: string
}

const logs: ServerLogEntry[] = []
const maxLogs = loadConfig().logBufferSize

export function addServerLog(level: LogLevel, message: string) {
  const timestamp = Date.now()
  logs.push({ timestamp, level, message })

  // Keep only recent logs
  if (logs.length > maxLogs) {
    logs.splice(0, logs.length - maxLogs)
  }

  const logMessage = `[${new Date(timestamp).toISOString()}] [${level}] ${message}`
  if (level === 'error') {
    console.error(logMessage)
  } else if (level === 'warn') {
    console.warn(logMessage)
  } else if (level === 'debug') {
    console.debug(logMessage)
  } else {
    console.log(logMessage)
  }
}

export function getLogs(since?: number): ServerLogEntry[] {
  if (since !== undefined) {
    return logs.filter(log => log.timestamp > since)
  }
  return [...logs]
}

export function clearLogs() {
  logs.length = 0
}
