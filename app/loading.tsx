import { colors, fullScreen, heading, panel } from './components/styles'

export default function Loading() {
  return (
    <div style={fullScreen(true)}>
      <section style={{ ...panel('400px'), textAlign: 'center' }}>
        <h2 style={heading}>Loading Navaids</h2>
        <p style={{ fontSize: '12px', color: colors.muted, margin: 0 }}>
          Decoding VHF navaid records from the configured CIFP files
        </p>
      </section>
    </div>
  )
}
