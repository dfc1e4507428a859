import Link from 'next/link'
import { colors, fullScreen, heading, panel } from './components/styles'

export default function NotFound() {
  return (
    <div style={fullScreen(true)}>
      <section style={panel('480px')}>
        <h2 style={{ ...heading, color: colors.warning }}>No such page</h2>
        <p style={{ fontSize: '14px' }}>
          The map is at <Link href="/" style={{ color: '#93c5fd' }}>/</Link>. Data is served from{' '}
          <code>/api/navaids</code>, <code>/api/export</code> and <code>/api/logs</code>.
        </p>
      </section>
    </div>
  )
}
