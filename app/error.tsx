'use client'

import { useEffect } from 'react'
import ServerLogList, { useServerLogs } from './components/ServerLogList'
import { button, codeBlock, colors, fullScreen, heading, panel } from './components/styles'

interface ErrorPageProps {
  error: Error & { digest?: string }
  reset: () => void
}

export default function Error({ error, reset }: ErrorPageProps) {
  const serverLogs = useServerLogs()

  useEffect(() => {
    console.error('Navaid page failed:', error)
    if (error.cause) {
      console.error('Caused by:', error.cause)
    }
  }, [error])

  return (
    <div style={fullScreen(false)}>
      <section style={panel('900px')}>
        <h2 style={{ ...heading, color: colors.danger }}>{error.name}</h2>
        <pre style={codeBlock}>{error.message || 'Unknown error'}</pre>
        {error.digest && <p style={{ fontSize: '12px', color: colors.muted }}>Digest: {error.digest}</p>}
        <p style={{ fontSize: '13px' }}>
          If no CIFP file could be read, point <code>CIFP_FILES</code> at one and restart the server.
        </p>
        <ServerLogList logs={serverLogs} />
        <button onClick={reset} style={button}>Try Again</button>
      </section>
    </div>
  )
}
