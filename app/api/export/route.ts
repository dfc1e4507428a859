import { NextResponse, type NextRequest } from 'next/server'
import { loadNavaids } from '@/lib/load-navaid-data'
import { serverLogger } from '@/lib/server-logger'
import { toSqlScript } from '@/lib/sql-export'

export const dynamic = 'force-dynamic'

export async function GET(request: NextRequest) {
  try {
    const dropExisting = request.nextUrl.searchParams.get('drop') === 'true'

    const { records } = await loadNavaids()
    const script = toSqlScript(records, { dropExisting })
    serverLogger.log(`Exported ${records.length} navaids as SQL`)

    return new NextResponse(script, {
      headers: {
        'Content-Type': 'application/sql; charset=utf-8',
        'Content-Disposition': 'attachment; filename="vhf_navaids.sql"',
        'Cache-Control': 'no-store',
      },
    })
  } catch (error) {
    serverLogger.error('Error exporting navaids', error)
    return NextResponse.json(
      { error: 'Failed to export navaids', message: error instanceof Error ? error.message : 'Unknown error' },
      { status: 500 }
    )
  }
}
