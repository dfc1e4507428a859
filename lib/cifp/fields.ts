// ARINC 424 fixed-column field access
//
// Every CIFP record is a 132 column line. Fields are addressed by their
// 1-based start column and width, the way the ARINC 424 tables list them.

import { CifpFieldError } from './errors'
import { formatLatitude, formatLongitude, isNegative, parseLatitude, parseLongitude } from './coordinates'

export const LINE_LENGTH = 132

export interface FieldSpec {
  name: string
  start: number // 1-based column
  length: number
}

export function field(name: string, start: number, length: number): FieldSpec {
  return { name, start, length }
}

// Raw columns of a field. Short lines are padded so that a field sitting
// past the end of the line still comes back at its full width.
export function sliceField(line: string, spec: FieldSpec): string {
  return line.slice(spec.start - 1, spec.start - 1 + spec.length).padEnd(spec.length, ' ')
}

export function readRaw(line: string, spec: FieldSpec): string {
  return sliceField(line, spec)
}

export function readString(line: string, spec: FieldSpec): string | null {
  const value = sliceField(line, spec).trim()
  return value === '' ? null : value
}

export function readInteger(line: string, spec: FieldSpec): number | null {
  const value = sliceField(line, spec).trim()
  if (value === '') return null
  if (!/^[+-]?\d+$/.test(value)) {
    throw new CifpFieldError(spec.name, value, 'expected an integer')
  }
  return parseInt(value, 10)
}

// Numbers stored without a decimal point, e.g. 11370 with two implied
// decimals is 113.70
export function readImpliedDecimal(line: string, spec: FieldSpec, decimals: number): number | null {
  const value = readInteger(line, spec)
  return value === null ? null : value / 10 ** decimals
}

export function readLatitude(line: string, spec: FieldSpec): number | null {
  const value = sliceField(line, spec).trim()
  if (value === '') return null
  const parsed = parseLatitude(value)
  if (parsed === null) {
    throw new CifpFieldError(spec.name, value, 'expected N/S DDMMSSss')
  }
  return parsed
}

export function readLongitude(line: string, spec: FieldSpec): number | null {
  const value = sliceField(line, spec).trim()
  if (value === '') return null
  const parsed = parseLongitude(value)
  if (parsed === null) {
    throw new CifpFieldError(spec.name, value, 'expected E/W DDDMMSSss')
  }
  return parsed
}

// Station declination / magnetic variation: E or W plus tenths of a degree.
// T marks a station aligned to true north, which carries no variation.
export function readMagneticVariation(line: string, spec: FieldSpec): number | null {
  const value = sliceField(line, spec).trim()
  if (value === '') return null
  const match = value.match(/^([EWT])(\d{4})$/)
  if (!match) {
    throw new CifpFieldError(spec.name, value, 'expected E/W/T followed by four digits')
  }
  const [, direction, digits] = match
  if (direction === 'T') return 0
  const magnitude = parseInt(digits, 10) / 10
  return direction === 'W' ? -magnitude : magnitude
}

function blank(spec: FieldSpec): string {
  return ' '.repeat(spec.length)
}

function fit(spec: FieldSpec, text: string): string {
  if (text.length > spec.length) {
    throw new CifpFieldError(spec.name, text, `does not fit in ${spec.length} columns`)
  }
  return text
}

export function writeRaw(value: string, spec: FieldSpec): string {
  return fit(spec, value).padEnd(spec.length, ' ')
}

export function writeString(value: string | null, spec: FieldSpec): string {
  return value === null ? blank(spec) : fit(spec, value).padEnd(spec.length, ' ')
}

export function writeInteger(value: number | null, spec: FieldSpec): string {
  if (value === null) return blank(spec)
  if (!Number.isInteger(value)) {
    throw new CifpFieldError(spec.name, String(value), 'expected an integer')
  }
  const digits = String(Math.abs(value))
  const text = value < 0
    ? `-${digits.padStart(spec.length - 1, '0')}`
    : digits.padStart(spec.length, '0')
  return fit(spec, text)
}

export function writeImpliedDecimal(value: number | null, spec: FieldSpec, decimals: number): string {
  return value === null ? blank(spec) : writeInteger(Math.round(value * 10 ** decimals), spec)
}

export function writeLatitude(value: number | null, spec: FieldSpec): string {
  return value === null ? blank(spec) : fit(spec, formatLatitude(value))
}

export function writeLongitude(value: number | null, spec: FieldSpec): string {
  return value === null ? blank(spec) : fit(spec, formatLongitude(value))
}

export function writeMagneticVariation(value: number | null, spec: FieldSpec): string {
  if (value === null) return blank(spec)
  const tenths = String(Math.round(Math.abs(value) * 10)).padStart(4, '0')
  return fit(spec, `${isNegative(value) ? 'W' : 'E'}${tenths}`)
}

// Lay encoded fields onto a blank line. Columns no field covers stay blank.
export function composeLine(parts: Array<[FieldSpec, string]>): string {
  const columns = Array.from({ length: LINE_LENGTH }, () => ' ')
  for (const [spec, text] of parts) {
    if (text.length !== spec.length) {
      throw new CifpFieldError(spec.name, text, `encoded to ${text.length} columns instead of ${spec.length}`)
    }
    for (let i = 0; i < text.length; i++) {
      columns[spec.start - 1 + i] = text[i]
    }
  }
  return columns.join('')
}
