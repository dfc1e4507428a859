// Map upload flow: check the file in the browser, let /api/process-file
// parse it, report each step

import { CifpValidationError } from './cifp/errors'
import type { NavaidData } from './types'
import { validateCifpFile } from './validate-cifp'

export interface ParseProgress {
  progress: number // 0-100
  status: string
  currentFile?: string
  itemsParsed?: number
}

export type ProgressCallback = (progress: ParseProgress) => void

export type UploadFetch = (url: string, init: RequestInit) => Promise<Response>

export const PROCESS_FILE_URL = '/api/process-file'

// Give the browser a chance to paint between steps
function yieldToUi(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 0))
}

function isDataResponse(value: unknown): value is { data: NavaidData[] } {
  return typeof value === 'object' && value !== null && 'data' in value && Array.isArray(value.data)
}

function errorMessage(value: unknown, fallback: string): string {
  if (typeof value === 'object' && value !== null && 'error' in value && typeof value.error === 'string') {
    return value.error
  }
  return fallback
}

export async function uploadCifpFileWithProgress(
  file: File,
  onProgress?: ProgressCallback,
  post: UploadFetch = fetch
): Promise<NavaidData[]> {
  const currentFile = file.name
  onProgress?.({ progress: 0, status: `Reading ${file.name}...`, currentFile })
  const content = await file.text()

  onProgress?.({ progress: 20, status: `Validating ${file.name}...`, currentFile })
  await yieldToUi()
  const validation = validateCifpFile(content)
  if (!validation.isValid) {
    throw new CifpValidationError(file.name, validation.errors)
  }

  onProgress?.({
    progress: 40,
    status: `Parsing ${file.name} on the server...`,
    currentFile,
    itemsParsed: validation.navaidCount,
  })
  const formData = new FormData()
  formData.append('file', new Blob([content], { type: 'text/plain' }), file.name)
  formData.append('fileName', file.name)

  const response = await post(PROCESS_FILE_URL, { method: 'POST', body: formData })
  const body: unknown = await response.json()
  if (!response.ok) {
    throw new Error(errorMessage(body, `Server error: ${response.status}`))
  }
  if (!isDataResponse(body)) {
    throw new Error(`Unexpected response from ${PROCESS_FILE_URL}`)
  }

  onProgress?.({ progress: 100, status: `Completed ${file.name}`, currentFile, itemsParsed: body.data.length })
  return body.data
}
