import { readFile, stat } from 'fs/promises'
import { basename } from 'path'
import { loadConfig, type AppConfig } from './config'
import { CifpValidationError } from './cifp/errors'
import { convertToApiFormat, parseCifpFile, type VhfNavaid } from './cifp-parser'
import { filterValidNavaids, mergeNavaidSets } from './navaid-processing'
import { serverLogger } from './server-logger'
import type { NavaidData } from './types'
import { validateCifpFile } from './validate-cifp'

export interface NavaidFile {
  content: string
  source: string
  name: string
}

export interface LoadedNavaids {
  records: VhfNavaid[]
  data: NavaidData[]
}

let cache: { key: string; loaded: LoadedNavaids } | null = null

// Read the configured CIFP files. A file that cannot be read is logged and
// left out so one missing edition does not take the map down.
export async function loadNavaidFileContents(config: AppConfig = loadConfig()): Promise<NavaidFile[]> {
  const files: NavaidFile[] = []
  for (const path of config.cifpFiles) {
    try {
      const content = await readFile(path, 'utf-8')
      files.push({ content, source: config.source, name: basename(path) })
    } catch (error) {
      serverLogger.error(`Error reading CIFP file ${path}`, error)
    }
  }
  return files
}

// Parse files in order; a navaid already seen in an earlier file wins
export function buildNavaidData(files: NavaidFile[]): LoadedNavaids {
  let records: VhfNavaid[] = []
  let data: NavaidData[] = []

  for (const file of files) {
    const { navaids, skipped, errors } = parseCifpFile(file.content)
    serverLogger.log(`Parsed ${navaids.length} VHF navaids from ${file.name} (${skipped} other records skipped)`)
    for (const issue of errors) {
      serverLogger.warn(`${file.name} line ${issue.lineNumber}: ${issue.message}`)
    }

    const { merged, skippedKeys } = mergeNavaidSets(records, navaids)
    if (skippedKeys.length > 0) {
      serverLogger.log(`Skipped ${skippedKeys.length} navaids from ${file.name} already loaded`)
    }
    const added = merged.slice(records.length)
    records = merged
    data = data.concat(convertToApiFormat(added, file.source))
  }

  const valid = filterValidNavaids(data)
  if (valid.length < data.length) {
    serverLogger.log(`Dropped ${data.length - valid.length} navaids without usable coordinates`)
  }
  return { records, data: valid }
}

async function cacheKey(paths: string[]): Promise<string> {
  const parts: string[] = []
  for (const path of paths) {
    try {
      const info = await stat(path)
      parts.push(`${path}:${info.mtimeMs}:${info.size}`)
    } catch {
      parts.push(`${path}:missing`)
    }
  }
  return parts.join('|')
}

export async function loadNavaids(config: AppConfig = loadConfig()): Promise<LoadedNavaids> {
  const key = await cacheKey(config.cifpFiles)
  if (cache && cache.key === key) {
    serverLogger.debug(`Using cached navaid data (${cache.loaded.data.length} entries)`)
    return cache.loaded
  }

  const startTime = Date.now()
  const files = await loadNavaidFileContents(config)
  if (files.length === 0) {
    serverLogger.warn(`No CIFP files could be read (${config.cifpFiles.join(', ')})`)
  }
  const loaded = buildNavaidData(files)
  serverLogger.log(`Loaded ${loaded.data.length} navaids in ${Date.now() - startTime}ms`)

  cache = { key, loaded }
  return loaded
}

export async function loadNavaidData(config: AppConfig = loadConfig()): Promise<NavaidData[]> {
  return (await loadNavaids(config)).data
}

export function clearNavaidCache() {
  cache = null
}

export async function processUploadedFile(content: string, fileName: string): Promise<NavaidData[]> {
  const validation = validateCifpFile(content)
  if (!validation.isValid) {
    throw new CifpValidationError(fileName, validation.errors)
  }
  for (const warning of validation.warnings) {
    serverLogger.warn(`${fileName}: ${warning}`)
  }

  const { data } = buildNavaidData([{ content, source: 'USER', name: fileName }])
  return data
}
