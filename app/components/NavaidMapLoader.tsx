'use client'

import dynamic from 'next/dynamic'
import type { NavaidData } from '@/lib/types'

// Leaflet needs window, so the map only renders in the browser
const NavaidMap = dynamic(() => import('./NavaidMap'), {
  ssr: false,
  loading: () => <div style={{ color: '#fff', padding: '20px' }}>Loading map...</div>
})

interface NavaidMapLoaderProps {
  initialData: NavaidData[]
}

export default function NavaidMapLoader({ initialData }: NavaidMapLoaderProps) {
  return <NavaidMap initialData={initialData} />
}
