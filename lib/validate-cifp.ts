// Validate CIFP file contents before parsing

import { LINE_LENGTH } from './cifp/fields'
import { isVhfNavaidLine, parseCifpFile, readCifpLines } from './cifp-parser'

export interface ValidationResult {
  isValid: boolean
  errors: string[]
  warnings: string[]
  navaidCount: number
}

// ARINC 424 records start with S or T, a three letter area and a section code
const RECORD_PATTERN = /^[ST][A-Z0-9 ]{3}[A-Z]/

export function validateCifpFile(content: string): ValidationResult {
  const errors: string[] = []
  const warnings: string[] = []
  const lines = readCifpLines(content)

  if (lines.length === 0) {
    return { isValid: false, errors: ['File is empty'], warnings, navaidCount: 0 }
  }

  const recordLines = lines.filter(line => RECORD_PATTERN.test(line.text))
  if (recordLines.length === 0) {
    errors.push('File does not appear to be in ARINC 424 format')
  }

  const wrongLength = recordLines.filter(line => line.text.length !== LINE_LENGTH)
  if (wrongLength.length > 0) {
    const first = wrongLength[0]
    warnings.push(
      `${wrongLength.length} record(s) are not ${LINE_LENGTH} columns wide (first at line ${first.lineNumber}: ${first.text.length})`
    )
  }

  if (recordLines.length > 0 && !recordLines.some(line => isVhfNavaidLine(line.text))) {
    errors.push('No VHF navaid records found (section D, blank subsection)')
  }

  const { navaids, errors: parseErrors } = parseCifpFile(content)
  for (const issue of parseErrors) {
    warnings.push(`Line ${issue.lineNumber}: ${issue.message}`)
  }

  const seen = new Map<string, number>()
  for (const { primary } of navaids) {
    if (primary.lat === null && primary.dmeLat === null) {
      warnings.push(`Navaid ${primary.vhfId} has no coordinates`)
    }
    const key = `${primary.vhfId}/${primary.vhfRegion ?? ''}`
    seen.set(key, (seen.get(key) ?? 0) + 1)
  }
  for (const [key, count] of seen) {
    if (count > 1) {
      warnings.push(`Navaid ${key} appears ${count} times`)
    }
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
    navaidCount: navaids.length,
  }
}
