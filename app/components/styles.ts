import type { CSSProperties } from 'react'

// Dark chart-room palette shared by the full-screen panels

export const colors = {
  page: '#111827',
  panel: '#1f2937',
  border: '#374151',
  text: '#f1f5f9',
  muted: '#9ca3af',
  accent: '#3b82f6',
  warning: '#fbbf24',
  danger: '#ef4444',
}

export const serif = "'Times New Roman', Times, serif"

export function fullScreen(centered: boolean): CSSProperties {
  return {
    display: 'flex',
    flexDirection: 'column',
    alignItems: 'center',
    justifyContent: centered ? 'center' : 'flex-start',
    minHeight: '100vh',
    width: '100vw',
    padding: '20px',
    boxSizing: 'border-box',
    overflow: 'auto',
    backgroundColor: colors.page,
    color: 'white',
    fontFamily: serif,
  }
}

export function panel(width: string): CSSProperties {
  return {
    width: '100%',
    maxWidth: width,
    backgroundColor: colors.panel,
    border: `2px solid ${colors.border}`,
    borderRadius: '8px',
    padding: '24px',
    boxShadow: '4px 4px 0px rgba(0, 0, 0, 0.3)',
  }
}

export const heading: CSSProperties = {
  fontSize: '20px',
  fontWeight: 'bold',
  textTransform: 'uppercase',
  letterSpacing: '0.05em',
  margin: '0 0 16px',
}

export const button: CSSProperties = {
  padding: '10px 20px',
  backgroundColor: colors.accent,
  color: 'white',
  border: 'none',
  borderRadius: '6px',
  fontSize: '14px',
  cursor: 'pointer',
}

export const codeBlock: CSSProperties = {
  backgroundColor: '#0f172a',
  padding: '12px',
  borderRadius: '4px',
  fontSize: '13px',
  whiteSpace: 'pre-wrap',
  wordBreak: 'break-word',
  color: colors.text,
}
