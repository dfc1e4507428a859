'use client'

import { useEffect, useState } from 'react'
import type { ServerLogEntry } from '@/lib/server-log-store'

function isLogResponse(value: unknown): value is { logs: ServerLogEntry[] } {
  return typeof value === 'object' && value !== null && 'logs' in value && Array.isArray(value.logs)
}

// Poll /api/logs while mounted
export function useServerLogs(enabled: boolean = true, intervalMs: number = 2000): ServerLogEntry[] {
  const [logs, setLogs] = useState<ServerLogEntry[]>([])

  useEffect(() => {
    if (!enabled) return

    const fetchLogs = async () => {
      try {
        const response = await fetch('/api/logs', { cache: 'no-store' })
        if (!response.ok) return
        const data: unknown = await response.json()
        if (isLogResponse(data)) {
          setLogs(data.logs)
        }
      } catch (e) {
        console.error('Failed to fetch server logs:', e)
      }
    }

    void fetchLogs()
    const interval = setInterval(() => void fetchLogs(), intervalMs)
    return () => clearInterval(interval)
  }, [enabled, intervalMs])

  return logs
}

const LEVEL_COLORS: Record<ServerLogEntry['level'], string> = {
  error: '#ef4444',
  warn: '#fbbf24',
  info: '#f1f5f9',
  debug: '#9ca3af',
}

export default function ServerLogList({ logs }: { logs: ServerLogEntry[] }) {
  if (logs.length === 0) return null

  return (
    <div style={{ marginBottom: '20px', width: '100%' }}>
      <strong style={{ color: '#fbbf24', fontSize: '14px', display: 'block', marginBottom: '8px' }}>
        Server Logs ({logs.length} entries):
      </strong>
      <div style={{
        backgroundColor: '#0f172a',
        padding: '12px',
        borderRadius: '4px',
        border: '1px solid #1e293b',
        maxHeight: '400px',
        overflow: 'auto'
      }}>
        {logs.map((log, index) => (
          <div
            key={`${log.timestamp}-${index}`}
            style={{
              marginBottom: '6px',
              fontSize: '11px',
              fontFamily: 'monospace',
              whiteSpace: 'pre-wrap',
              color: LEVEL_COLORS[log.level]
            }}
          >
            <span style={{ color: '#6b7280' }}>[{new Date(log.timestamp).toLocaleTimeString()}]</span>
            <span style={{ marginLeft: '8px', fontWeight: log.level === 'error' ? 'bold' : 'normal' }}>
              [{log.level.toUpperCase()}]
            </span>
            <span style={{ marginLeft: '8px' }}>{log.message}</span>
          </div>
        ))}
      </div>
    </div>
  )
}
