import type { NextRequest } from 'next/server'
import { getLogs } from '@/lib/server-log-store'

export const dynamic = 'force-dynamic' // Ensure this route is not cached

export async function GET(request: NextRequest) {
  const since = request.nextUrl.searchParams.get('since')

  if (since) {
    const sinceTimestamp = parseInt(since, 10)
    if (isNaN(sinceTimestamp)) {
      return Response.json({ logs: [], error: 'since must be a timestamp' }, { status: 400 })
    }
    return Response.json({ logs: getLogs(sinceTimestamp) })
  }

  return Response.json({ logs: getLogs() })
}
