'use client'

import { MapContainer, TileLayer, CircleMarker, Popup, useMap } from 'react-leaflet'
import type { LatLngExpression } from 'leaflet'
import 'leaflet/dist/leaflet.css'
import { useEffect, useMemo, useState, type ChangeEvent } from 'react'
import { clientLogger } from '@/lib/client-logger'
import { calculateBounds, mergeNavaidData, searchNavaids } from '@/lib/navaid-processing'
import type { NavaidData } from '@/lib/types'
import { uploadCifpFileWithProgress, type ParseProgress } from '@/lib/upload-with-progress'
import NavaidTable, { formatFrequency, formatMagVar } from './NavaidTable'
import ParsingProgress from './ParsingProgress'
import SearchBox from './SearchBox'

const TYPE_COLORS: Record<string, string> = {
  VORTAC: '#2563eb',
  'VOR/DME': '#7c3aed',
  VOR: '#0891b2',
  TACAN: '#b45309',
  DME: '#16a34a',
  'ILS/DME': '#db2777',
}

const DEFAULT_CENTER: LatLngExpression = [39.8283, -98.5795]

function FitToNavaids({ navaids }: { navaids: NavaidData[] }) {
  const map = useMap()

  useEffect(() => {
    const bounds = calculateBounds(navaids)
    if (!bounds) return
    if (bounds.north === bounds.south && bounds.east === bounds.west) {
      map.setView([bounds.north, bounds.east], 10)
      return
    }
    map.fitBounds([[bounds.south, bounds.west], [bounds.north, bounds.east]], { padding: [20, 20] })
  }, [map, navaids])

  return null
}

function FlyToSelected({ navaid }: { navaid: NavaidData | undefined }) {
  const map = useMap()

  useEffect(() => {
    if (navaid?.coordinates) {
      map.setView([navaid.coordinates.latitude, navaid.coordinates.longitude], Math.max(map.getZoom(), 9))
    }
  }, [map, navaid])

  return null
}

export default function NavaidMap({ initialData }: { initialData: NavaidData[] }) {
  const [navaids, setNavaids] = useState<NavaidData[]>(initialData)
  const [query, setQuery] = useState('')
  const [selectedId, setSelectedId] = useState<string | null>(null)
  const [progress, setProgress] = useState<ParseProgress | null>(null)
  const [uploadError, setUploadError] = useState<string | null>(null)

  const visible = useMemo(() => (query ? searchNavaids(navaids, query) : navaids), [navaids, query])
  const selected = useMemo(() => navaids.find(n => n.id === selectedId), [navaids, selectedId])

  useEffect(() => {
    clientLogger.info('NavaidMap', `Showing ${initialData.length} navaids`)
  }, [initialData])

  const handleUpload = async (event: ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0]
    event.target.value = ''
    if (!file) return

    setUploadError(null)
    try {
      const uploaded = await uploadCifpFileWithProgress(file, setProgress)
      clientLogger.info('Upload', `Received ${uploaded.length} navaids from ${file.name}`)
      // Navaids already on the map keep their existing entry
      setNavaids(prev => mergeNavaidData(prev, uploaded).merged)
    } catch (error) {
      clientLogger.error('Upload', `Failed to parse ${file.name}`, error)
      setUploadError(error instanceof Error ? error.message : 'Failed to parse file')
    } finally {
      setProgress(null)
    }
  }

  return (
    <div style={{ display: 'flex', height: '100%', width: '100%' }}>
      <div style={{ flex: 1, position: 'relative' }}>
        <MapContainer
          center={DEFAULT_CENTER}
          zoom={4}
          style={{ height: '100%', width: '100%', zIndex: 1 }}
          scrollWheelZoom={true}
          preferCanvas={true}
        >
          <TileLayer
            attribution='Map data: &copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors | Map style: &copy; <a href="https://opentopomap.org">OpenTopoMap</a>'
            url="https://{s}.tile.opentopomap.org/{z}/{x}/{y}.png"
            maxZoom={17}
          />
          <FitToNavaids navaids={initialData} />
          <FlyToSelected navaid={selected} />
          {visible.map(navaid => navaid.coordinates && (
            <CircleMarker
              key={navaid.id}
              center={[navaid.coordinates.latitude, navaid.coordinates.longitude]}
              radius={navaid.id === selectedId ? 9 : 5}
              pathOptions={{ color: TYPE_COLORS[navaid.type] ?? '#6b7280', weight: 2, fillOpacity: 0.6 }}
              eventHandlers={{ click: () => setSelectedId(navaid.id) }}
            >
              <Popup>
                <strong>{navaid.ident}</strong> {navaid.name}
                <br />
                {navaid.type} {formatFrequency(navaid.frequency)} MHz
                <br />
                Class <code style={{ whiteSpace: 'pre' }}>{`[${navaid.navClass}]`}</code> · Var {formatMagVar(navaid.magVar)}
                {navaid.dme && navaid.dme.elevation !== null && (
                  <>
                    <br />
                    DME elevation {navaid.dme.elevation} ft
                  </>
                )}
                {navaid.notes.map((note, index) => (
                  <div key={index} style={{ fontSize: '11px', color: '#4b5563' }}>{note}</div>
                ))}
              </Popup>
            </CircleMarker>
          ))}
        </MapContainer>
      </div>

      <aside style={{
        width: '420px',
        backgroundColor: '#111827',
        color: 'white',
        padding: '12px',
        overflow: 'auto',
        display: 'flex',
        flexDirection: 'column',
        gap: '12px'
      }}>
        <SearchBox onSearch={setQuery} />
        <label style={{ fontSize: '13px', color: '#d1d5db' }}>
          Add a CIFP file:{' '}
          <input type="file" onChange={(e) => void handleUpload(e)} />
        </label>
        {uploadError && <p style={{ color: '#f87171', fontSize: '13px' }}>{uploadError}</p>}
        <a href="/api/export" style={{ color: '#93c5fd', fontSize: '13px' }}>Download SQL export</a>
        <NavaidTable navaids={visible} selectedId={selectedId} onSelect={n => setSelectedId(n.id)} />
      </aside>

      {progress && <ParsingProgress {...progress} />}
    </div>
  )
}
