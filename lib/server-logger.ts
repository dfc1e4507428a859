// Server-side logger that also stores logs for client access
import { loadConfig, shouldLog, type LogLevel } from './config'
import { addServerLog } from './server-log-store'

const threshold = loadConfig().logLevel

function format(message: string, args: unknown[]): string {
  return args.length > 0 ? `${message} ${JSON.stringify(args)}` : message
}

function write(level: LogLevel, message: string) {
  if (shouldLog(threshold, level)) {
    addServerLog(level, message)
  }
}

export const serverLogger = {
  debug: (message: string, ...args: unknown[]) => write('debug', format(message, args)),

  info: (message: string, ...args: unknown[]) => write('info', format(message, args)),

  log: (message: string, ...args: unknown[]) => write('info', format(message, args)),

  warn: (message: string, ...args: unknown[]) => write('warn', format(message, args)),

  error: (message: string, error?: unknown) => {
    let fullMessage = message
    if (error instanceof Error) {
      fullMessage = `${message}: ${error.message}\nStack: ${error.stack}`
    } else if (error !== undefined) {
      fullMessage = `${message}: ${JSON.stringify(error)}`
    }
    write('error', fullMessage)
  },
}
