import { NextResponse, type NextRequest } from 'next/server'
import { loadNavaidData } from '@/lib/load-navaid-data'
import { findNavaidsNear, searchNavaids } from '@/lib/navaid-processing'
import { serverLogger } from '@/lib/server-logger'
import type { NavaidData } from '@/lib/types'

export const dynamic = 'force-dynamic'

const DEFAULT_RADIUS_NM = 50

function parseNumber(value: string | null): number | null {
  if (value === null || value.trim() === '') return null
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : null
}

export async function GET(request: NextRequest) {
  const startTime = Date.now()
  const requestId = Math.random().toString(36).substring(7)

  try {
    const searchParams = request.nextUrl.searchParams
    const query = searchParams.get('q')
    const latParam = searchParams.get('lat')
    const lonParam = searchParams.get('lon')
    serverLogger.log(`[API] [${requestId}] /api/navaids: Request received`, { search: request.nextUrl.search })

    let navaids: NavaidData[] = await loadNavaidData()

    if (latParam !== null || lonParam !== null) {
      const latitude = parseNumber(latParam)
      const longitude = parseNumber(lonParam)
      const radius = parseNumber(searchParams.get('radius')) ?? DEFAULT_RADIUS_NM
      if (latitude === null || longitude === null || Math.abs(latitude) > 90 || Math.abs(longitude) > 180 || radius <= 0) {
        return NextResponse.json(
          { error: 'Invalid position', message: 'lat, lon and radius must be valid numbers', requestId },
          { status: 400, headers: { 'X-Request-ID': requestId } }
        )
      }
      navaids = findNavaidsNear(navaids, { latitude, longitude }, radius)
    }

    if (query) {
      navaids = searchNavaids(navaids, query)
    }

    const totalTime = Date.now() - startTime
    serverLogger.log(`[API] [${requestId}] Returning ${navaids.length} navaids in ${totalTime}ms`)

    return NextResponse.json(navaids, {
      headers: {
        'Cache-Control': 'no-store, max-age=0',
        'X-Request-ID': requestId,
        'X-Response-Time': `${totalTime}ms`,
        'X-Data-Count': navaids.length.toString(),
      },
    })
  } catch (error) {
    serverLogger.error(`[API] [${requestId}] ERROR`, error)
    return NextResponse.json(
      {
        error: 'Failed to load navaid data',
        message: error instanceof Error ? error.message : 'Unknown error',
        requestId,
      },
      { status: 500, headers: { 'X-Request-ID': requestId } }
    )
  }
}
