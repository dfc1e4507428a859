import { recordSourceCode, type VhfNavaidPrimary } from './cifp/vhf-navaid'
import type { VhfNavaid } from './cifp-parser'
import type { Bounds, LatLon, NavaidData } from './types'

const EARTH_RADIUS_NM = 3440.065

// Fields that identify a navaid across files; the record number and cycle
// change from one CIFP edition to the next and are not part of it
export function navaidGroupKey(primary: VhfNavaidPrimary): string {
  return [
    recordSourceCode(primary.st),
    primary.area,
    primary.secCode,
    primary.subCode,
    primary.airportId,
    primary.airportRegion,
    primary.vhfId,
    primary.vhfRegion,
  ].map(value => value ?? '').join('|')
}

export interface MergeResult {
  merged: VhfNavaid[]
  skippedKeys: string[]
}

// Append the incoming navaids whose group is not already present.
// Groups are all-or-nothing: a known navaid keeps its existing continuations.
export function mergeNavaidSets(existing: VhfNavaid[], incoming: VhfNavaid[]): MergeResult {
  const keys = new Set(existing.map(navaid => navaidGroupKey(navaid.primary)))
  const merged = [...existing]
  const skippedKeys: string[] = []

  for (const navaid of incoming) {
    const key = navaidGroupKey(navaid.primary)
    if (keys.has(key)) {
      skippedKeys.push(key)
      continue
    }
    keys.add(key)
    merged.push(navaid)
  }

  return { merged, skippedKeys }
}

export interface DataMergeResult {
  merged: NavaidData[]
  skippedIds: string[]
}

// The same rule for converted entries: ids are group keys, first one wins
export function mergeNavaidData(existing: NavaidData[], incoming: NavaidData[]): DataMergeResult {
  const ids = new Set(existing.map(item => item.id))
  const merged = [...existing]
  const skippedIds: string[] = []

  for (const item of incoming) {
    if (ids.has(item.id)) {
      skippedIds.push(item.id)
      continue
    }
    ids.add(item.id)
    merged.push(item)
  }

  return { merged, skippedIds }
}

export function isValidCoordinate(point: LatLon | undefined): point is LatLon {
  if (!point) return false
  if (isNaN(point.latitude) || isNaN(point.longitude)) return false
  return Math.abs(point.latitude) <= 90 && Math.abs(point.longitude) <= 180
}

// Drop navaids that cannot be placed on the map
export function filterValidNavaids(data: NavaidData[]): NavaidData[] {
  return data.filter(item => isValidCoordinate(item.coordinates))
}

// Great-circle distance in nautical miles (Haversine formula)
export function distanceNM(a: LatLon, b: LatLon): number {
  const dLat = (b.latitude - a.latitude) * Math.PI / 180
  const dLon = (b.longitude - a.longitude) * Math.PI / 180
  const h =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(a.latitude * Math.PI / 180) * Math.cos(b.latitude * Math.PI / 180) *
    Math.sin(dLon / 2) * Math.sin(dLon / 2)
  return EARTH_RADIUS_NM * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h))
}

export type NavaidWithDistance = NavaidData & { distanceNM: number }

export function findNavaidsNear(data: NavaidData[], point: LatLon, radiusNM: number): NavaidWithDistance[] {
  const results: NavaidWithDistance[] = []
  for (const item of data) {
    if (!isValidCoordinate(item.coordinates)) continue
    const distance = distanceNM(point, item.coordinates)
    if (distance <= radiusNM) {
      results.push({ ...item, distanceNM: distance })
    }
  }
  return results.sort((a, b) => a.distanceNM - b.distanceNM)
}

// Exact ident matches first, then ident prefixes, then name matches
export function searchNavaids(data: NavaidData[], query: string): NavaidData[] {
  const q = query.trim().toUpperCase()
  if (!q) return []

  const rank = (item: NavaidData): number => {
    if (item.ident === q) return 0
    if (item.ident.startsWith(q)) return 1
    if (item.name.toUpperCase().includes(q)) return 2
    return -1
  }

  return data
    .map(item => ({ item, score: rank(item) }))
    .filter(({ score }) => score >= 0)
    .sort((a, b) => a.score - b.score || a.item.ident.localeCompare(b.item.ident))
    .map(({ item }) => item)
}

export function calculateBounds(data: NavaidData[]): Bounds | null {
  let north = -90, south = 90, east = -180, west = 180
  let found = false

  for (const item of data) {
    if (!isValidCoordinate(item.coordinates)) continue
    const { latitude, longitude } = item.coordinates
    if (latitude > north) north = latitude
    if (latitude < south) south = latitude
    if (longitude > east) east = longitude
    if (longitude < west) west = longitude
    found = true
  }

  return found ? { north, south, east, west } : null
}
