'use client'

import React from 'react'
import ServerLogList, { useServerLogs } from './ServerLogList'
import { button, codeBlock, colors, fullScreen, heading, panel } from './styles'

interface ErrorBoundaryState {
  error: Error | null
  errorInfo: React.ErrorInfo | null
}

interface ErrorBoundaryProps {
  children: React.ReactNode
}

function ErrorDetails({ error, errorInfo }: { error: Error; errorInfo: React.ErrorInfo | null }) {
  const logs = useServerLogs()

  return (
    <div style={fullScreen(false)}>
      <section style={panel('900px')}>
        <h2 style={{ ...heading, color: colors.danger }}>Navaid Map Error</h2>
        <pre style={codeBlock}>{error.name}: {error.message}</pre>
        {errorInfo?.componentStack && (
          <pre style={{ ...codeBlock, fontSize: '11px', color: colors.muted, maxHeight: '300px', overflow: 'auto' }}>
            {errorInfo.componentStack}
          </pre>
        )}
        <ServerLogList logs={logs} />
        <button onClick={() => window.location.reload()} style={button}>Reload Page</button>
      </section>
    </div>
  )
}

export default class ErrorBoundary extends React.Component<ErrorBoundaryProps, ErrorBoundaryState> {
  constructor(props: ErrorBoundaryProps) {
    super(props)
    this.state = { error: null, errorInfo: null }
  }

  static getDerivedStateFromError(error: Error): Partial<ErrorBoundaryState> {
    return { error }
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo) {
    console.error('ErrorBoundary caught an error:', error, errorInfo)
    this.setState({ error, errorInfo })
  }

  render() {
    if (this.state.error) {
      return <ErrorDetails error={this.state.error} errorInfo={this.state.errorInfo} />
    }
    return this.props.children
  }
}
