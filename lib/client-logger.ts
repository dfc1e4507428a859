// Client-side logger for the map and upload flow

type LogLevel = 'info' | 'warn' | 'error' | 'debug'

export interface ClientLogEntry {
  timestamp: number
  level: LogLevel
  category: string
  message: string
  data?: unknown
}

export interface ClientLogger {
  info(category: string, message: string, data?: unknown): void
  warn(category: string, message: string, data?: unknown): void
  error(category: string, message: string, error?: unknown): void
  debug(category: string, message: string, data?: unknown): void
  getLogs(): ClientLogEntry[]
  clearLogs(): void
}

class BrowserLogger implements ClientLogger {
  private logs: ClientLogEntry[] = []
  private maxLogs = 500

  private addLog(level: LogLevel, category: string, message: string, data?: unknown) {
    this.logs.push({ timestamp: Date.now(), level, category, message, data })
    if (this.logs.length > this.maxLogs) {
      this.logs.shift()
    }

    const dataStr = data !== undefined ? ` | Data: ${JSON.stringify(data)}` : ''
    const formatted = `[${new Date().toISOString()}] [${category}] ${message}${dataStr}`
    switch (level) {
      case 'error':
        console.error(formatted)
        break
      case 'warn':
        console.warn(formatted)
        break
      case 'debug':
        console.debug(formatted)
        break
      default:
        console.log(formatted)
    }
  }

  info(category: string, message: string, data?: unknown) {
    this.addLog('info', category, message, data)
  }

  warn(category: string, message: string, data?: unknown) {
    this.addLog('warn', category, message, data)
  }

  error(category: string, message: string, error?: unknown) {
    const errorData = error instanceof Error
      ? { message: error.message, stack: error.stack, name: error.name }
      : error
    this.addLog('error', category, message, errorData)
  }

  debug(category: string, message: string, data?: unknown) {
    this.addLog('debug', category, message, data)
  }

  getLogs(): ClientLogEntry[] {
    return [...this.logs]
  }

  clearLogs() {
    this.logs = []
  }
}

const noopLogger: ClientLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
  getLogs: () => [],
  clearLogs: () => {},
}

// Server renders get a silent logger
export const clientLogger: ClientLogger = typeof window !== 'undefined' ? new BrowserLogger() : noopLogger
