// SQL dump of parsed navaids (SQLite dialect)

import {
  recordSourceCode,
  type VhfNavaidContinuation,
  type VhfNavaidPrimary,
} from './cifp/vhf-navaid'
import type { VhfNavaid } from './cifp-parser'

type SqlValue = string | number | null
type SqlType = 'TEXT' | 'INTEGER' | 'REAL'

export interface ColumnDef<Row> {
  name: string
  type: SqlType
  constraint?: string
  value: (row: Row) => SqlValue
}

export interface TableDef<Row> {
  name: string
  columns: Array<ColumnDef<Row>>
  primaryKey: string[]
}

export interface ContinuationRow {
  primary: VhfNavaidPrimary
  continuation: VhfNavaidContinuation
}

function column<Row>(name: string, type: SqlType, value: (row: Row) => SqlValue): ColumnDef<Row> {
  return { name, type, value }
}

// SQLite treats NULLs in a primary key as distinct, so INSERT OR IGNORE
// would never match an enroute navaid. Key columns store '' instead.
const KEY_CONSTRAINT = "NOT NULL DEFAULT ''"

function keyColumn<Row>(name: string, value: (row: Row) => string | null): ColumnDef<Row> {
  return { name, type: 'TEXT', constraint: KEY_CONSTRAINT, value: row => value(row) ?? '' }
}

const LEADING_FIELDS = [
  'st', 'area', 'sec_code', 'sub_code', 'airport_id', 'airport_region', 'vhf_id', 'vhf_region',
]

function leadingColumns<Row>(primaryOf: (row: Row) => VhfNavaidPrimary): Array<ColumnDef<Row>> {
  return [
    keyColumn<Row>('st', row => recordSourceCode(primaryOf(row).st)),
    keyColumn<Row>('area', row => primaryOf(row).area),
    keyColumn<Row>('sec_code', row => primaryOf(row).secCode),
    keyColumn<Row>('sub_code', row => primaryOf(row).subCode),
    keyColumn<Row>('airport_id', row => primaryOf(row).airportId),
    keyColumn<Row>('airport_region', row => primaryOf(row).airportRegion),
    keyColumn<Row>('vhf_id', row => primaryOf(row).vhfId),
    keyColumn<Row>('vhf_region', row => primaryOf(row).vhfRegion),
  ]
}

export const VHF_NAVAID_TABLE: TableDef<VhfNavaidPrimary> = {
  name: 'vhf_navaids',
  columns: [
    ...leadingColumns<VhfNavaidPrimary>(row => row),
    column('cont_rec_no', 'INTEGER', row => row.contRecNo),
    column('frequency', 'REAL', row => row.frequency),
    column('nav_class', 'TEXT', row => row.navClass),
    column('lat', 'REAL', row => row.lat),
    column('lon', 'REAL', row => row.lon),
    column('dme_id', 'TEXT', row => row.dmeId),
    column('dme_lat', 'REAL', row => row.dmeLat),
    column('dme_lon', 'REAL', row => row.dmeLon),
    column('mag_var', 'REAL', row => row.magVar),
    column('dme_elevation', 'INTEGER', row => row.dmeElevation),
    column('figure_of_merit', 'INTEGER', row => row.figureOfMerit),
    column('dme_bias', 'REAL', row => row.dmeBias),
    column('frequency_protection', 'INTEGER', row => row.frequencyProtection),
    column('datum_code', 'TEXT', row => row.datumCode),
    column('vhf_name', 'TEXT', row => row.vhfName),
    column('record_number', 'INTEGER', row => row.recordNumber),
    column('cycle_data', 'TEXT', row => row.cycleData),
  ],
  primaryKey: LEADING_FIELDS,
}

export const VHF_NAVAID_CONTINUATION_TABLE: TableDef<ContinuationRow> = {
  name: 'vhf_navaid_continuations',
  columns: [
    ...leadingColumns<ContinuationRow>(row => row.primary),
    { name: 'cont_rec_no', type: 'INTEGER', constraint: 'NOT NULL', value: row => row.continuation.contRecNo },
    column('application', 'TEXT', row => row.continuation.applicationCode),
    column('notes', 'TEXT', row => row.continuation.notes),
    column('record_number', 'INTEGER', row => row.continuation.recordNumber),
    column('cycle_data', 'TEXT', row => row.continuation.cycleData),
  ],
  primaryKey: [...LEADING_FIELDS, 'cont_rec_no'],
}

export function sqlLiteral(value: SqlValue): string {
  if (value === null) return 'NULL'
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : 'NULL'
  }
  return `'${value.replace(/'/g, "''")}'`
}

export function toDropStatement<Row>(table: TableDef<Row>): string {
  return `DROP TABLE IF EXISTS ${table.name};`
}

export function toCreateStatement<Row>(table: TableDef<Row>): string {
  const columns = table.columns
    .map(c => (c.constraint ? `${c.name} ${c.type} ${c.constraint}` : `${c.name} ${c.type}`))
    .join(', ')
  const primaryKey = table.primaryKey.length > 0 ? `, PRIMARY KEY (${table.primaryKey.join(', ')})` : ''
  return `CREATE TABLE IF NOT EXISTS ${table.name} (${columns}${primaryKey});`
}

// INSERT OR IGNORE leaves a row that is already present untouched
export function toInsertStatement<Row>(table: TableDef<Row>, row: Row): string {
  const names = table.columns.map(c => c.name).join(', ')
  const values = table.columns.map(c => sqlLiteral(c.value(row))).join(', ')
  return `INSERT OR IGNORE INTO ${table.name} (${names}) VALUES (${values});`
}

export interface SqlScriptOptions {
  dropExisting?: boolean
}

export function toSqlScript(navaids: VhfNavaid[], options: SqlScriptOptions = {}): string {
  const statements: string[] = ['BEGIN TRANSACTION;']

  if (options.dropExisting) {
    statements.push(toDropStatement(VHF_NAVAID_CONTINUATION_TABLE), toDropStatement(VHF_NAVAID_TABLE))
  }
  statements.push(toCreateStatement(VHF_NAVAID_TABLE), toCreateStatement(VHF_NAVAID_CONTINUATION_TABLE))

  for (const { primary, continuations } of navaids) {
    statements.push(toInsertStatement(VHF_NAVAID_TABLE, primary))
    for (const continuation of continuations) {
      statements.push(toInsertStatement(VHF_NAVAID_CONTINUATION_TABLE, { primary, continuation }))
    }
  }

  statements.push('COMMIT;')
  return `${statements.join('\n')}\n`
}
