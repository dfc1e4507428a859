import { Suspense } from 'react'
import { loadNavaidData } from '@/lib/load-navaid-data'
import { serverLogger } from '@/lib/server-logger'
import ErrorBoundary from './components/ErrorBoundary'
import NavaidMapLoader from './components/NavaidMapLoader'

export const dynamic = 'force-dynamic'

async function MapWithData() {
  try {
    const navaidData = await loadNavaidData()
    serverLogger.log(`[Server] Rendering map with ${navaidData.length} navaids`)
    return <NavaidMapLoader initialData={navaidData} />
  } catch (error) {
    serverLogger.error('[Server] Failed to load navaid data', error)
    throw new Error(
      `Failed to load navaid data: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { cause: error }
    )
  }
}

export default function Home() {
  return (
    <main style={{ position: 'relative', height: '100vh', width: '100vw', overflow: 'hidden', backgroundColor: '#111827' }}>
      <ErrorBoundary>
        <Suspense fallback={<div style={{ display: 'flex', alignItems: 'center', justifyContent: 'center', height: '100%', color: '#fff' }}>Loading navaids...</div>}>
          <MapWithData />
        </Suspense>
      </ErrorBoundary>
    </main>
  )
}
