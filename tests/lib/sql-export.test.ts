import { describe, it, expect } from 'vitest'
import { parseCifpFile } from '@/lib/cifp-parser'
import {
  VHF_NAVAID_CONTINUATION_TABLE,
  VHF_NAVAID_TABLE,
  sqlLiteral,
  toCreateStatement,
  toInsertStatement,
  toSqlScript,
} from '@/lib/sql-export'
import { SAMPLE_CONTENT } from '../helpers'

const { navaids } = parseCifpFile(SAMPLE_CONTENT)

describe('sqlLiteral', () => {
  it('quotes strings and maps missing values to NULL', () => {
    expect(sqlLiteral(null)).toBe('NULL')
    expect(sqlLiteral(113.7)).toBe('113.7')
    expect(sqlLiteral(NaN)).toBe('NULL')
    expect(sqlLiteral("O'HARE")).toBe("'O''HARE'")
  })
})

describe('table statements', () => {
  it('keys continuations by the navaid fields and continuation number', () => {
    expect(toCreateStatement(VHF_NAVAID_CONTINUATION_TABLE)).toBe(
      'CREATE TABLE IF NOT EXISTS vhf_navaid_continuations (' +
        "st TEXT NOT NULL DEFAULT '', area TEXT NOT NULL DEFAULT '', sec_code TEXT NOT NULL DEFAULT '', " +
        "sub_code TEXT NOT NULL DEFAULT '', airport_id TEXT NOT NULL DEFAULT '', " +
        "airport_region TEXT NOT NULL DEFAULT '', vhf_id TEXT NOT NULL DEFAULT '', " +
        "vhf_region TEXT NOT NULL DEFAULT '', cont_rec_no INTEGER NOT NULL, application TEXT, notes TEXT, " +
        'record_number INTEGER, cycle_data TEXT, ' +
        'PRIMARY KEY (st, area, sec_code, sub_code, airport_id, airport_region, vhf_id, vhf_region, cont_rec_no));'
    )
  })

  it('inserts a primary record with every column', () => {
    expect(toInsertStatement(VHF_NAVAID_TABLE, navaids[1].primary)).toBe(
      'INSERT OR IGNORE INTO vhf_navaids (' +
        'st, area, sec_code, sub_code, airport_id, airport_region, vhf_id, vhf_region, cont_rec_no, ' +
        'frequency, nav_class, lat, lon, dme_id, dme_lat, dme_lon, mag_var, dme_elevation, ' +
        'figure_of_merit, dme_bias, frequency_protection, datum_code, vhf_name, record_number, cycle_data' +
        ') VALUES (' +
        "'S', 'USA', 'D', ' ', 'KDHX', 'K2', 'DHX', 'K2', 0, " +
        "108.9, ' DU N', NULL, NULL, 'DHX', 33.25, -97.5, -12.3, -12, " +
        "1, 0.5, 40, 'NAR', 'DELTA HARBOR', 103, '2413');"
    )
  })

  it('inserts a continuation under its navaid key', () => {
    const row = { primary: navaids[0].primary, continuation: navaids[0].continuations[0] }
    expect(toInsertStatement(VHF_NAVAID_CONTINUATION_TABLE, row)).toBe(
      'INSERT OR IGNORE INTO vhf_navaid_continuations (' +
        'st, area, sec_code, sub_code, airport_id, airport_region, vhf_id, vhf_region, cont_rec_no, ' +
        'application, notes, record_number, cycle_data' +
        ") VALUES ('S', 'USA', 'D', ' ', '', '', 'BVT', 'K2', 2, " +
        "'A', 'VOR UNUSABLE 120-150 BEYOND 25NM', 102, '2413');"
    )
  })
})

describe('key columns', () => {
  const keyValues = (statement: string): string[] => {
    const values = statement.slice(statement.indexOf('VALUES (') + 'VALUES ('.length, -2)
    return values.split(', ').slice(0, 8)
  }

  it('writes an absent airport as an empty string, never NULL', () => {
    const statement = toInsertStatement(VHF_NAVAID_TABLE, navaids[0].primary)
    expect(keyValues(statement)).toEqual(["'S'", "'USA'", "'D'", "' '", "''", "''", "'BVT'", "'K2'"])
  })

  it('never writes NULL into the primary key', () => {
    const inserts = toSqlScript(navaids)
      .split('\n')
      .filter(line => line.startsWith('INSERT'))
    expect(inserts).toHaveLength(3)
    for (const insert of inserts) {
      expect(keyValues(insert)).not.toContain('NULL')
    }
  })

  it('declares every key column NOT NULL', () => {
    for (const table of [VHF_NAVAID_TABLE, VHF_NAVAID_CONTINUATION_TABLE]) {
      const keyed = table.columns.filter(c => table.primaryKey.includes(c.name))
      expect(keyed.every(c => c.constraint?.startsWith('NOT NULL'))).toBe(true)
    }
  })
})

describe('toSqlScript', () => {
  it('wraps the tables and rows in one transaction', () => {
    const lines = toSqlScript(navaids).split('\n')
    expect(lines).toHaveLength(8)
    expect(lines[0]).toBe('BEGIN TRANSACTION;')
    expect(lines[1]).toBe(toCreateStatement(VHF_NAVAID_TABLE))
    expect(lines[2]).toBe(toCreateStatement(VHF_NAVAID_CONTINUATION_TABLE))
    expect(lines[3]).toBe(toInsertStatement(VHF_NAVAID_TABLE, navaids[0].primary))
    expect(lines[5]).toBe(toInsertStatement(VHF_NAVAID_TABLE, navaids[1].primary))
    expect(lines[6]).toBe('COMMIT;')
    expect(lines[7]).toBe('')
  })

  it('drops existing tables when asked', () => {
    const lines = toSqlScript([], { dropExisting: true }).split('\n')
    expect(lines).toEqual([
      'BEGIN TRANSACTION;',
      'DROP TABLE IF EXISTS vhf_navaid_continuations;',
      'DROP TABLE IF EXISTS vhf_navaids;',
      toCreateStatement(VHF_NAVAID_TABLE),
      toCreateStatement(VHF_NAVAID_CONTINUATION_TABLE),
      'COMMIT;',
      '',
    ])
  })
})
