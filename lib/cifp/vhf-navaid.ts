// VHF Navaid records (ARINC 424 section D, subsection blank)

import { CifpFieldError } from './errors'
import {
  composeLine,
  field,
  readImpliedDecimal,
  readInteger,
  readLatitude,
  readLongitude,
  readMagneticVariation,
  readRaw,
  readString,
  writeImpliedDecimal,
  writeInteger,
  writeLatitude,
  writeLongitude,
  writeMagneticVariation,
  writeRaw,
  writeString,
} from './fields'

export const VHF_NAVAID_FIELDS = {
  st: field('st', 1, 1),
  area: field('area', 2, 3),
  secCode: field('sec_code', 5, 1),
  subCode: field('sub_code', 6, 1),
  airportId: field('airport_id', 7, 4),
  airportRegion: field('airport_region', 11, 2),
  vhfId: field('vhf_id', 14, 4),
  vhfRegion: field('vhf_region', 20, 2),
  contRecNo: field('cont_rec_no', 22, 1),
  frequency: field('frequency', 23, 5),
  navClass: field('nav_class', 28, 5),
  lat: field('lat', 33, 9),
  lon: field('lon', 42, 10),
  dmeId: field('dme_id', 52, 4),
  dmeLat: field('dme_lat', 56, 9),
  dmeLon: field('dme_lon', 65, 10),
  magVar: field('mag_var', 75, 5),
  dmeElevation: field('dme_elevation', 80, 5),
  figureOfMerit: field('figure_of_merit', 85, 1),
  dmeBias: field('dme_bias', 86, 2),
  frequencyProtection: field('frequency_protection', 88, 3),
  datumCode: field('datum_code', 91, 3),
  vhfName: field('vhf_name', 94, 30),
  recordNumber: field('record_number', 124, 5),
  cycleData: field('cycle_data', 129, 4),
} as const

export const CONTINUATION_FIELDS = {
  key: field('key', 1, 21),
  contRecNo: VHF_NAVAID_FIELDS.contRecNo,
  application: field('application', 23, 1),
  notes: field('notes', 24, 69),
  recordNumber: VHF_NAVAID_FIELDS.recordNumber,
  cycleData: VHF_NAVAID_FIELDS.cycleData,
} as const

// Columns shared by a primary record and all of its continuations
export const RECORD_KEY_LENGTH = 21

export type RecordSource = 'standard' | 'tailored'

export interface VhfNavaidPrimary {
  st: RecordSource
  area: string | null
  secCode: string
  subCode: string
  airportId: string | null
  airportRegion: string | null
  vhfId: string
  vhfRegion: string | null
  contRecNo: number
  frequency: number | null // MHz
  // Column based: every one of the five characters is significant
  navClass: string
  lat: number | null
  lon: number | null
  dmeId: string | null
  dmeLat: number | null
  dmeLon: number | null
  magVar: number | null // degrees, east positive
  dmeElevation: number | null // feet
  figureOfMerit: number | null
  dmeBias: number | null // nautical miles
  frequencyProtection: number | null // nautical miles
  datumCode: string | null
  vhfName: string | null
  recordNumber: number | null
  cycleData: string | null
}

export type ContinuationApplication = 'standard' | 'flight-planning' | 'simulation' | 'other'

export interface VhfNavaidContinuation {
  key: string
  contRecNo: number
  applicationCode: string
  application: ContinuationApplication
  notes: string | null
  recordNumber: number | null
  cycleData: string | null
}

const APPLICATION_CODES: Record<string, ContinuationApplication> = {
  A: 'standard',
  P: 'flight-planning',
  S: 'simulation',
}

export function recordSourceCode(source: RecordSource): 'S' | 'T' {
  return source === 'standard' ? 'S' : 'T'
}

function readRecordSource(line: string): RecordSource {
  const code = readRaw(line, VHF_NAVAID_FIELDS.st)
  if (code === 'S') return 'standard'
  if (code === 'T') return 'tailored'
  throw new CifpFieldError('st', code, 'expected S or T')
}

function required<T>(value: T | null, name: string): T {
  if (value === null) {
    throw new CifpFieldError(name, '', 'field is required')
  }
  return value
}

export function readContinuationNumber(line: string): number {
  return required(readInteger(line, VHF_NAVAID_FIELDS.contRecNo), 'cont_rec_no')
}

// Continuation numbers 0 and 1 both mark the primary record
export function isPrimaryContinuationNumber(contRecNo: number): boolean {
  return contRecNo === 0 || contRecNo === 1
}

export function parseVhfNavaidPrimary(line: string): VhfNavaidPrimary {
  const f = VHF_NAVAID_FIELDS
  return {
    st: readRecordSource(line),
    area: readString(line, f.area),
    secCode: readRaw(line, f.secCode),
    subCode: readRaw(line, f.subCode),
    airportId: readString(line, f.airportId),
    airportRegion: readString(line, f.airportRegion),
    vhfId: required(readString(line, f.vhfId), f.vhfId.name),
    vhfRegion: readString(line, f.vhfRegion),
    contRecNo: readContinuationNumber(line),
    frequency: readImpliedDecimal(line, f.frequency, 2),
    navClass: readRaw(line, f.navClass),
    lat: readLatitude(line, f.lat),
    lon: readLongitude(line, f.lon),
    dmeId: readString(line, f.dmeId),
    dmeLat: readLatitude(line, f.dmeLat),
    dmeLon: readLongitude(line, f.dmeLon),
    magVar: readMagneticVariation(line, f.magVar),
    dmeElevation: readInteger(line, f.dmeElevation),
    figureOfMerit: readInteger(line, f.figureOfMerit),
    dmeBias: readImpliedDecimal(line, f.dmeBias, 1),
    frequencyProtection: readInteger(line, f.frequencyProtection),
    datumCode: readString(line, f.datumCode),
    vhfName: readString(line, f.vhfName),
    recordNumber: readInteger(line, f.recordNumber),
    cycleData: readString(line, f.cycleData),
  }
}

export function formatVhfNavaidPrimary(record: VhfNavaidPrimary): string {
  const f = VHF_NAVAID_FIELDS
  return composeLine([
    [f.st, recordSourceCode(record.st)],
    [f.area, writeString(record.area, f.area)],
    [f.secCode, writeRaw(record.secCode, f.secCode)],
    [f.subCode, writeRaw(record.subCode, f.subCode)],
    [f.airportId, writeString(record.airportId, f.airportId)],
    [f.airportRegion, writeString(record.airportRegion, f.airportRegion)],
    [f.vhfId, writeString(record.vhfId, f.vhfId)],
    [f.vhfRegion, writeString(record.vhfRegion, f.vhfRegion)],
    [f.contRecNo, writeInteger(record.contRecNo, f.contRecNo)],
    [f.frequency, writeImpliedDecimal(record.frequency, f.frequency, 2)],
    [f.navClass, writeRaw(record.navClass, f.navClass)],
    [f.lat, writeLatitude(record.lat, f.lat)],
    [f.lon, writeLongitude(record.lon, f.lon)],
    [f.dmeId, writeString(record.dmeId, f.dmeId)],
    [f.dmeLat, writeLatitude(record.dmeLat, f.dmeLat)],
    [f.dmeLon, writeLongitude(record.dmeLon, f.dmeLon)],
    [f.magVar, writeMagneticVariation(record.magVar, f.magVar)],
    [f.dmeElevation, writeInteger(record.dmeElevation, f.dmeElevation)],
    [f.figureOfMerit, writeInteger(record.figureOfMerit, f.figureOfMerit)],
    [f.dmeBias, writeImpliedDecimal(record.dmeBias, f.dmeBias, 1)],
    [f.frequencyProtection, writeInteger(record.frequencyProtection, f.frequencyProtection)],
    [f.datumCode, writeString(record.datumCode, f.datumCode)],
    [f.vhfName, writeString(record.vhfName, f.vhfName)],
    [f.recordNumber, writeInteger(record.recordNumber, f.recordNumber)],
    [f.cycleData, writeString(record.cycleData, f.cycleData)],
  ])
}

export function parseVhfNavaidContinuation(line: string): VhfNavaidContinuation {
  const f = CONTINUATION_FIELDS
  const applicationCode = readRaw(line, f.application)
  return {
    key: readRaw(line, f.key),
    contRecNo: readContinuationNumber(line),
    applicationCode,
    application: APPLICATION_CODES[applicationCode] ?? 'other',
    notes: readString(line, f.notes),
    recordNumber: readInteger(line, f.recordNumber),
    cycleData: readString(line, f.cycleData),
  }
}

export function formatVhfNavaidContinuation(record: VhfNavaidContinuation): string {
  const f = CONTINUATION_FIELDS
  return composeLine([
    [f.key, writeRaw(record.key, f.key)],
    [f.contRecNo, writeInteger(record.contRecNo, f.contRecNo)],
    [f.application, writeRaw(record.applicationCode, f.application)],
    [f.notes, writeString(record.notes, f.notes)],
    [f.recordNumber, writeInteger(record.recordNumber, f.recordNumber)],
    [f.cycleData, writeString(record.cycleData, f.cycleData)],
  ])
}

export type DistanceFacility = 'dme' | 'tacan' | 'mil-tacan' | 'ils-dme' | 'mls-dme-n' | 'mls-dme-p'
export type NavaidCoverage = 'terminal' | 'low' | 'high' | 'undefined' | 'ils-tacan'
export type NavaidVoice = 'voice' | 'no-voice' | 'biased-ils-dme' | 'atwb' | 'scheduled-weather'

export interface NavClassInfo {
  vor: boolean
  distanceFacility: DistanceFacility | null
  coverage: NavaidCoverage | null
  voice: NavaidVoice | null
  collocated: boolean
  type: string
}

const DISTANCE_FACILITIES: Record<string, DistanceFacility> = {
  D: 'dme',
  T: 'tacan',
  M: 'mil-tacan',
  I: 'ils-dme',
  N: 'mls-dme-n',
  P: 'mls-dme-p',
}

const COVERAGE: Record<string, NavaidCoverage> = {
  T: 'terminal',
  L: 'low',
  H: 'high',
  U: 'undefined',
  C: 'ils-tacan',
}

const VOICE: Record<string, NavaidVoice> = {
  ' ': 'voice',
  W: 'no-voice',
  D: 'biased-ils-dme',
  A: 'atwb',
  B: 'scheduled-weather',
}

function navaidType(vor: boolean, distance: DistanceFacility | null): string {
  const tacan = distance === 'tacan' || distance === 'mil-tacan'
  if (vor && tacan) return 'VORTAC'
  if (vor && distance === 'dme') return 'VOR/DME'
  if (vor) return 'VOR'
  if (tacan) return 'TACAN'
  if (distance === 'dme') return 'DME'
  if (distance === 'ils-dme') return 'ILS/DME'
  if (distance === 'mls-dme-n' || distance === 'mls-dme-p') return 'MLS/DME'
  return 'UNKNOWN'
}

// Read by position: ' DU N' is a non-collocated DME, 'DU N' would not be
export function decodeNavClass(navClass: string): NavClassInfo {
  const columns = navClass.padEnd(5, ' ')
  const vor = columns[0] === 'V'
  const distanceFacility = DISTANCE_FACILITIES[columns[1]] ?? null
  return {
    vor,
    distanceFacility,
    coverage: COVERAGE[columns[2]] ?? null,
    voice: VOICE[columns[3]] ?? null,
    collocated: columns[4] !== 'N',
    type: navaidType(vor, distanceFacility),
  }
}
