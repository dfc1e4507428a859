import { NextRequest } from 'next/server'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { GET } from '@/app/api/export/route'
import { clearNavaidCache } from '@/lib/load-navaid-data'
import { SAMPLE_PATH } from '../helpers'

describe('GET /api/export', () => {
  beforeEach(() => {
    vi.stubEnv('CIFP_FILES', SAMPLE_PATH)
    vi.spyOn(console, 'log').mockImplementation(() => {})
    clearNavaidCache()
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  it('serves the navaids as a SQL script', async () => {
    const response = await GET(new NextRequest('http://localhost/api/export'))
    expect(response.headers.get('Content-Type')).toBe('application/sql; charset=utf-8')
    expect(response.headers.get('Content-Disposition')).toBe('attachment; filename="vhf_navaids.sql"')

    const lines = (await response.text()).split('\n')
    expect(lines[0]).toBe('BEGIN TRANSACTION;')
    expect(lines.filter(line => line.startsWith('INSERT OR IGNORE INTO vhf_navaids '))).toHaveLength(2)
    expect(lines.filter(line => line.startsWith('INSERT OR IGNORE INTO vhf_navaid_continuations '))).toHaveLength(1)
  })

  it('drops existing tables first when asked', async () => {
    const response = await GET(new NextRequest('http://localhost/api/export?drop=true'))
    const lines = (await response.text()).split('\n')
    expect(lines.slice(1, 3)).toEqual([
      'DROP TABLE IF EXISTS vhf_navaid_continuations;',
      'DROP TABLE IF EXISTS vhf_navaids;',
    ])
  })
})
