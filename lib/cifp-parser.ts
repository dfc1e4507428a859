// CIFP (ARINC 424) file parser for VHF Navaid records
// Primary records and their continuations share columns 1-21; a file lists
// each primary immediately followed by its continuations.

import { CifpFormatError } from './cifp/errors'
import {
  RECORD_KEY_LENGTH,
  type VhfNavaidContinuation,
  type VhfNavaidPrimary,
  decodeNavClass,
  formatVhfNavaidContinuation,
  formatVhfNavaidPrimary,
  isPrimaryContinuationNumber,
  parseVhfNavaidContinuation,
  parseVhfNavaidPrimary,
  readContinuationNumber,
} from './cifp/vhf-navaid'
import { navaidGroupKey } from './navaid-processing'
import type { NavaidData } from './types'

export interface VhfNavaid {
  primary: VhfNavaidPrimary
  continuations: VhfNavaidContinuation[]
}

export interface CifpLine {
  lineNumber: number // 1-based, as numbered in the file
  text: string
}

export interface ParseIssue {
  lineNumber: number
  message: string
}

export interface CifpParseResult {
  navaids: VhfNavaid[]
  skipped: number // lines of other record types
  errors: ParseIssue[]
}

export interface ParseOptions {
  strict?: boolean // throw on the first malformed line
  area?: string
  ident?: string
}

// Lines are never trimmed: trailing spaces belong to the last fields.
// Only the carriage return of CRLF files is dropped.
export function readCifpLines(content: string): CifpLine[] {
  const lines: CifpLine[] = []
  const raw = content.split('\n')
  for (let i = 0; i < raw.length; i++) {
    const text = raw[i].endsWith('\r') ? raw[i].slice(0, -1) : raw[i]
    if (text.trim() === '' || text.startsWith('HDR')) continue
    lines.push({ lineNumber: i + 1, text })
  }
  return lines
}

export function isVhfNavaidLine(line: string): boolean {
  return (line[0] === 'S' || line[0] === 'T') && line[4] === 'D' && line[5] === ' '
}

export function recordKey(line: string): string {
  return line.slice(0, RECORD_KEY_LENGTH).padEnd(RECORD_KEY_LENGTH, ' ')
}

// Group consecutive lines that share the record key
export function partitionRecords(lines: CifpLine[]): CifpLine[][] {
  const groups: CifpLine[][] = []
  let currentKey: string | null = null
  for (const line of lines) {
    const key = recordKey(line.text)
    if (key !== currentKey) {
      groups.push([])
      currentKey = key
    }
    groups[groups.length - 1].push(line)
  }
  return groups
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function parseCifpFile(content: string, options: ParseOptions = {}): CifpParseResult {
  const errors: ParseIssue[] = []
  const navaids: VhfNavaid[] = []
  let skipped = 0

  const report = (line: CifpLine, message: string, cause?: unknown) => {
    if (options.strict) {
      throw new CifpFormatError(message, line.lineNumber, line.text, { cause })
    }
    errors.push({ lineNumber: line.lineNumber, message })
  }

  const navaidLines: CifpLine[] = []
  for (const line of readCifpLines(content)) {
    if (isVhfNavaidLine(line.text)) {
      navaidLines.push(line)
    } else {
      skipped++
    }
  }

  for (const group of partitionRecords(navaidLines)) {
    let primary: VhfNavaidPrimary | null = null
    const continuations: VhfNavaidContinuation[] = []
    let failed = false

    for (const line of group) {
      try {
        if (isPrimaryContinuationNumber(readContinuationNumber(line.text))) {
          if (primary) {
            report(line, `Duplicate primary record for ${primary.vhfId}`)
            continue
          }
          primary = parseVhfNavaidPrimary(line.text)
        } else {
          continuations.push(parseVhfNavaidContinuation(line.text))
        }
      } catch (error) {
        if (error instanceof CifpFormatError) throw error
        failed = true
        report(line, errorMessage(error), error)
      }
    }

    if (!primary) {
      if (!failed) {
        report(group[0], `Continuation without a primary record for "${recordKey(group[0].text).trim()}"`)
      }
      continue
    }

    navaids.push({ primary, continuations })
  }

  const ident = options.ident?.trim().toUpperCase()
  const filtered = navaids.filter(({ primary }) =>
    (!options.area || primary.area === options.area) &&
    (!ident || primary.vhfId === ident)
  )

  return { navaids: filtered, skipped, errors }
}

export function formatCifpNavaids(navaids: VhfNavaid[]): string {
  const lines: string[] = []
  for (const navaid of navaids) {
    lines.push(formatVhfNavaidPrimary(navaid.primary))
    for (const continuation of navaid.continuations) {
      lines.push(formatVhfNavaidContinuation(continuation))
    }
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : ''
}

// Convert parsed records to the format the API and map use. The id is the
// navaid's group key, the same in every file and edition that lists it.
export function convertToApiFormat(navaids: VhfNavaid[], source: string = 'FAA'): NavaidData[] {
  return navaids.map(({ primary, continuations }) => {
    const navaidCoordinates = primary.lat !== null && primary.lon !== null
      ? { latitude: primary.lat, longitude: primary.lon }
      : undefined
    const dmeCoordinates = primary.dmeLat !== null && primary.dmeLon !== null
      ? { latitude: primary.dmeLat, longitude: primary.dmeLon }
      : undefined
    const hasDme = primary.dmeId !== null || dmeCoordinates !== undefined

    return {
      id: navaidGroupKey(primary),
      ident: primary.vhfId,
      name: primary.vhfName ?? primary.vhfId,
      type: decodeNavClass(primary.navClass).type,
      navClass: primary.navClass,
      frequency: primary.frequency,
      // A stand-alone DME only has the DME position
      coordinates: navaidCoordinates ?? dmeCoordinates,
      dme: hasDme
        ? {
            ident: primary.dmeId,
            coordinates: dmeCoordinates,
            elevation: primary.dmeElevation,
            bias: primary.dmeBias,
          }
        : undefined,
      magVar: primary.magVar,
      region: primary.vhfRegion,
      area: primary.area,
      airportId: primary.airportId,
      figureOfMerit: primary.figureOfMerit,
      frequencyProtection: primary.frequencyProtection,
      cycle: primary.cycleData,
      notes: continuations
        .map(c => c.notes)
        .filter((note): note is string => note !== null),
      source,
    }
  })
}
