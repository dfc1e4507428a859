'use client'

import type { NavaidData } from '@/lib/types'

interface NavaidTableProps {
  navaids: NavaidData[]
  selectedId?: string | null
  onSelect?: (navaid: NavaidData) => void
  maxRows?: number
}

export function formatFrequency(mhz: number | null): string {
  return mhz === null ? '—' : mhz.toFixed(2)
}

export function formatMagVar(degrees: number | null): string {
  if (degrees === null) return '—'
  if (degrees === 0) return '0°'
  return `${Math.abs(degrees).toFixed(1)}°${degrees < 0 ? 'W' : 'E'}`
}

const cellStyle = { padding: '4px 8px', borderBottom: '1px solid #374151', textAlign: 'left' as const }

export default function NavaidTable({ navaids, selectedId, onSelect, maxRows = 200 }: NavaidTableProps) {
  if (navaids.length === 0) {
    return <p style={{ color: '#9ca3af', fontSize: '13px' }}>No navaids to show</p>
  }

  const rows = navaids.slice(0, maxRows)

  return (
    <div>
      <table style={{ width: '100%', borderCollapse: 'collapse', fontSize: '12px', color: '#f1f5f9' }}>
        <thead>
          <tr>
            <th style={cellStyle}>Ident</th>
            <th style={cellStyle}>Name</th>
            <th style={cellStyle}>Type</th>
            <th style={cellStyle}>Freq</th>
            <th style={cellStyle}>Var</th>
            <th style={cellStyle}>Region</th>
          </tr>
        </thead>
        <tbody>
          {rows.map(navaid => (
            <tr
              key={navaid.id}
              onClick={() => onSelect?.(navaid)}
              aria-selected={navaid.id === selectedId}
              style={{
                cursor: onSelect ? 'pointer' : 'default',
                backgroundColor: navaid.id === selectedId ? '#1e3a8a' : 'transparent'
              }}
            >
              <td style={cellStyle}>{navaid.ident}</td>
              <td style={cellStyle}>{navaid.name}</td>
              <td style={cellStyle}>{navaid.type}</td>
              <td style={cellStyle}>{formatFrequency(navaid.frequency)}</td>
              <td style={cellStyle}>{formatMagVar(navaid.magVar)}</td>
              <td style={cellStyle}>{navaid.region ?? '—'}</td>
            </tr>
          ))}
        </tbody>
      </table>
      {navaids.length > rows.length && (
        <p style={{ color: '#9ca3af', fontSize: '12px' }}>
          Showing {rows.length} of {navaids.length.toLocaleString()} navaids
        </p>
      )}
    </div>
  )
}
