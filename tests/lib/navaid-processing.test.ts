import { describe, it, expect } from 'vitest'
import { parseCifpFile } from '@/lib/cifp-parser'
import {
  calculateBounds,
  distanceNM,
  filterValidNavaids,
  findNavaidsNear,
  isValidCoordinate,
  mergeNavaidData,
  mergeNavaidSets,
  navaidGroupKey,
  searchNavaids,
} from '@/lib/navaid-processing'
import type { LatLon, NavaidData } from '@/lib/types'
import { BRAVO_PRIMARY, DELTA_PRIMARY, SAMPLE_CONTENT, joinLines, setColumns } from '../helpers'

function navaid(ident: string, coordinates?: LatLon, name: string = ident): NavaidData {
  return {
    id: `TEST-${ident}`,
    ident,
    name,
    type: 'VOR',
    navClass: 'V LW ',
    frequency: 110,
    coordinates,
    magVar: null,
    region: 'K2',
    area: 'USA',
    airportId: null,
    figureOfMerit: null,
    frequencyProtection: null,
    cycle: null,
    notes: [],
    source: 'TEST',
  }
}

describe('navaidGroupKey', () => {
  it('joins the identifying fields', () => {
    const { navaids } = parseCifpFile(SAMPLE_CONTENT)
    expect(navaidGroupKey(navaids[0].primary)).toBe('S|USA|D| |||BVT|K2')
    expect(navaidGroupKey(navaids[1].primary)).toBe('S|USA|D| |KDHX|K2|DHX|K2')
  })
})

describe('mergeNavaidSets', () => {
  it('skips navaids that are already present', () => {
    const existing = parseCifpFile(SAMPLE_CONTENT).navaids.slice(0, 1)
    const nextEdition = setColumns(BRAVO_PRIMARY, 124, '00999')
    const incoming = parseCifpFile(joinLines(nextEdition, DELTA_PRIMARY)).navaids

    const { merged, skippedKeys } = mergeNavaidSets(existing, incoming)
    expect(merged).toHaveLength(2)
    expect(merged[0]).toBe(existing[0])
    expect(merged[0].continuations).toHaveLength(1)
    expect(merged[1].primary.vhfId).toBe('DHX')
    expect(skippedKeys).toEqual(['S|USA|D| |||BVT|K2'])
  })

  it('skips repeats within the incoming set', () => {
    const incoming = parseCifpFile(joinLines(DELTA_PRIMARY, BRAVO_PRIMARY, DELTA_PRIMARY)).navaids
    const { merged, skippedKeys } = mergeNavaidSets([], incoming)
    expect(merged.map(n => n.primary.vhfId)).toEqual(['DHX', 'BVT'])
    expect(skippedKeys).toEqual(['S|USA|D| |KDHX|K2|DHX|K2'])
  })
})

describe('mergeNavaidData', () => {
  it('drops entries whose id is already shown', () => {
    const shown = [navaid('BVT'), navaid('DHX')]
    const uploaded = [navaid('DHX', { latitude: 1, longitude: 1 }), navaid('ABC'), navaid('ABC')]

    const { merged, skippedIds } = mergeNavaidData(shown, uploaded)
    expect(merged.map(n => n.id)).toEqual(['TEST-BVT', 'TEST-DHX', 'TEST-ABC'])
    expect(merged[1]).toBe(shown[1])
    expect(skippedIds).toEqual(['TEST-DHX', 'TEST-ABC'])
  })
})

describe('coordinates', () => {
  it('validates ranges', () => {
    expect(isValidCoordinate({ latitude: 45, longitude: -120 })).toBe(true)
    expect(isValidCoordinate({ latitude: 95, longitude: 0 })).toBe(false)
    expect(isValidCoordinate({ latitude: NaN, longitude: 0 })).toBe(false)
    expect(isValidCoordinate(undefined)).toBe(false)
  })

  it('drops navaids that cannot be placed', () => {
    const data = [
      navaid('AAA', { latitude: 10, longitude: 10 }),
      navaid('BBB'),
      navaid('CCC', { latitude: 95, longitude: 10 }),
    ]
    expect(filterValidNavaids(data).map(n => n.ident)).toEqual(['AAA'])
  })

  it('measures one degree of latitude as about 60 NM', () => {
    expect(distanceNM({ latitude: 0, longitude: 0 }, { latitude: 1, longitude: 0 })).toBeCloseTo(60.04, 2)
  })
})

describe('findNavaidsNear', () => {
  it('returns navaids within the radius, nearest first', () => {
    const data = [
      navaid('FAR', { latitude: 0, longitude: 2 }),
      navaid('MID', { latitude: 0, longitude: 0.5 }),
      navaid('HERE', { latitude: 0, longitude: 0 }),
      navaid('NONE'),
    ]
    const results = findNavaidsNear(data, { latitude: 0, longitude: 0 }, 60)
    expect(results.map(n => n.ident)).toEqual(['HERE', 'MID'])
    expect(results[0].distanceNM).toBe(0)
    expect(results[1].distanceNM).toBeCloseTo(30.02, 2)
  })
})

describe('searchNavaids', () => {
  const data = [
    navaid('XYZ'),
    navaid('BVTX'),
    navaid('ABC', undefined, 'NEAR BVT'),
    navaid('BVT'),
  ]

  it('ranks exact idents, then prefixes, then names', () => {
    expect(searchNavaids(data, 'bvt').map(n => n.ident)).toEqual(['BVT', 'BVTX', 'ABC'])
  })

  it('returns nothing for a blank query', () => {
    expect(searchNavaids(data, '  ')).toEqual([])
  })
})

describe('calculateBounds', () => {
  it('spans every placed navaid', () => {
    const data = [
      navaid('A', { latitude: 40, longitude: -105 }),
      navaid('B', { latitude: 33, longitude: -97 }),
      navaid('C'),
    ]
    expect(calculateBounds(data)).toEqual({ north: 40, south: 33, east: -97, west: -105 })
  })

  it('is null without coordinates', () => {
    expect(calculateBounds([navaid('A')])).toBeNull()
  })
})
