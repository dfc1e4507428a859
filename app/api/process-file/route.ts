import type { NextRequest } from 'next/server'
import { CifpValidationError } from '@/lib/cifp/errors'
import { processUploadedFile } from '@/lib/load-navaid-data'
import { serverLogger } from '@/lib/server-logger'

export const dynamic = 'force-dynamic' // Ensure this route is not cached

export async function POST(request: NextRequest) {
  try {
    const formData = await request.formData()
    const file = formData.get('file')

    if (!(file instanceof File)) {
      return Response.json({ error: 'No file provided' }, { status: 400 })
    }

    const fileNameField = formData.get('fileName')
    const fileName = typeof fileNameField === 'string' && fileNameField ? fileNameField : file.name || 'uploaded.txt'

    const content = await file.text()
    const processedData = await processUploadedFile(content, fileName)
    serverLogger.log(`Processed upload ${fileName}: ${processedData.length} navaids`)

    return Response.json({ data: processedData })
  } catch (error) {
    if (error instanceof CifpValidationError) {
      serverLogger.warn(error.message)
      return Response.json({ error: error.message, errors: error.errors }, { status: 400 })
    }
    serverLogger.error('Error processing file', error)
    return Response.json(
      { error: error instanceof Error ? error.message : 'Failed to process file' },
      { status: 500 }
    )
  }
}
