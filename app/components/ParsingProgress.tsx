'use client'

import type { ParseProgress } from '@/lib/upload-with-progress'
import { colors, heading, panel, serif } from './styles'

export default function ParsingProgress({ progress, status, currentFile, itemsParsed }: ParseProgress) {
  const percent = Math.round(progress)

  return (
    <div
      role="progressbar"
      aria-valuenow={percent}
      aria-valuemin={0}
      aria-valuemax={100}
      style={{
        position: 'fixed',
        inset: 0,
        zIndex: 2000,
        display: 'grid',
        placeItems: 'center',
        backgroundColor: 'rgba(17, 24, 39, 0.9)',
        fontFamily: serif,
      }}
    >
      <section style={panel('28rem')}>
        <h2 style={heading}>Parsing CIFP Data</h2>
        <p style={{ display: 'flex', justifyContent: 'space-between', fontSize: '14px', color: colors.text }}>
          <span>{status}</span>
          <span>{percent}%</span>
        </p>
        <div style={{ height: '8px', backgroundColor: colors.border, borderRadius: '4px' }}>
          <div style={{ width: `${percent}%`, height: '100%', backgroundColor: colors.accent, borderRadius: '4px' }} />
        </div>
        <p style={{ fontSize: '12px', color: colors.muted }}>
          {currentFile ?? 'All files'}
          {itemsParsed !== undefined && ` · ${itemsParsed.toLocaleString()} navaids`}
        </p>
      </section>
    </div>
  )
}
