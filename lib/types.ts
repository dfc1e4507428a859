export interface LatLon {
    latitude: number
    longitude: number
}

export interface NavaidData {
    id: string
    ident: string
    name: string
    type: string // VORTAC, VOR/DME, DME ...
    navClass: string
    frequency: number | null // MHz
    coordinates?: LatLon
    dme?: {
        ident: string | null
        coordinates?: LatLon
        elevation: number | null // feet
        bias: number | null // nautical miles
    }
    magVar: number | null
    region: string | null
    area: string | null
    airportId: string | null
    figureOfMerit: number | null
    frequencyProtection: number | null
    cycle: string | null
    notes: string[]
    source: string
}

export interface Bounds {
    north: number
    south: number
    east: number
    west: number
}
