import type { Db } from '../db'
import { getConfig } from '../config'
import { boundingBox, boundsWithMargin, geometryContains, type BoundingBox, type MapBounds } from './polygon'
import { parseWkt, polygonsOf, toWkt, type Geometry, type PolygonCoordinates } from './wkt'

export type BoundaryRow = {
  id: number
  name: string
  polygon: string
  calculated_at: Date
}

export type BoundaryResponse = {
  id: number
  name: string
  calculated_at: string
  geometry: Geometry
  bounds: MapBounds | null
}

export const CITY_NAME = 'Tarragona'

// Coarse box around the municipality, used when no boundary polygon exists
export const FALLBACK_BOX: BoundingBox = { minLat: 40.5, maxLat: 41.5, minLng: 0.5, maxLng: 2.0 }

export function insideFallbackBox(lat: number, lng: number): boolean {
  const box = FALLBACK_BOX
  return lat >= box.minLat && lat <= box.maxLat && lng >= box.minLng && lng <= box.maxLng
}

/**
 * Merge every section polygon into one MultiPolygon. Used when PostGIS
 * cannot compute a real union; containment answers are the same.
 */
export function mergeSectionPolygons(polygons: string[]): string | null {
  const coordinates: PolygonCoordinates[] = []
  for (const wkt of polygons) {
    try {
      coordinates.push(...polygonsOf(parseWkt(wkt)))
    } catch (error) {
      console.warn('[geo] Skipping invalid section polygon in boundary:', error)
    }
  }
  return coordinates.length ? toWkt({ type: 'MultiPolygon', coordinates }) : null
}

export async function calculateBoundary(db: Db): Promise<string | null> {
  if (getConfig().postgisEnabled) {
    try {
      const rows = await db.query<{ boundary: string | null }>(
        `SELECT ST_AsText(ST_Union(ST_MakeValid(ST_GeomFromText(polygon, 4326)))) AS boundary
         FROM sections WHERE polygon IS NOT NULL`
      )
      if (rows[0]?.boundary) return rows[0].boundary
    } catch (error) {
      console.warn('[geo] PostGIS boundary union failed, merging polygons in process:', error)
    }
  }

  const sections = await db.query<{ polygon: string }>('SELECT polygon FROM sections WHERE polygon IS NOT NULL')
  return mergeSectionPolygons(sections.map(s => s.polygon))
}

export async function getOrCreateBoundary(db: Db): Promise<BoundaryRow | null> {
  const existing = await db.query<BoundaryRow>(
    'SELECT id, name, polygon, calculated_at FROM city_boundary ORDER BY id LIMIT 1'
  )
  if (existing[0]) return existing[0]

  const polygon = await calculateBoundary(db)
  if (!polygon) return null

  const created = await db.query<BoundaryRow>(
    `INSERT INTO city_boundary (name, polygon) VALUES ($1, $2)
     RETURNING id, name, polygon, calculated_at`,
    [CITY_NAME, polygon]
  )
  console.log('[geo] City boundary calculated and stored')
  return created[0] ?? null
}

/** Drop the stored boundary and compute it again from the current sections. */
export async function refreshBoundary(db: Db): Promise<BoundaryRow | null> {
  await db.query('DELETE FROM city_boundary')
  return getOrCreateBoundary(db)
}

/**
 * Whether a point lies inside the city. PostGIS, then in-process geometry,
 * then the coarse bounding box when no boundary is available.
 */
export async function pointIsInside(db: Db, lat: number, lng: number): Promise<boolean> {
  let boundary: BoundaryRow | null
  try {
    boundary = await getOrCreateBoundary(db)
  } catch (error) {
    console.error('[geo] Error loading city boundary:', error)
    return insideFallbackBox(lat, lng)
  }

  if (!boundary) {
    console.warn(`[geo] City boundary not found, using bounding box for (${lat}, ${lng})`)
    return insideFallbackBox(lat, lng)
  }

  if (getConfig().postgisEnabled) {
    try {
      const rows = await db.query<{ inside: boolean }>(
        `SELECT ST_Contains(ST_MakeValid(ST_GeomFromText($1, 4326)), ST_SetSRID(ST_MakePoint($2, $3), 4326)) AS inside`,
        [boundary.polygon, lng, lat]
      )
      if (rows[0]) return Boolean(rows[0].inside)
    } catch (error) {
      console.warn('[geo] PostGIS boundary check failed:', error)
    }
  }

  try {
    return geometryContains(parseWkt(boundary.polygon), lat, lng)
  } catch (error) {
    console.warn('[geo] In-process boundary check failed:', error)
  }

  console.warn(`[geo] Using bounding box fallback for (${lat}, ${lng})`)
  return insideFallbackBox(lat, lng)
}

export async function boundaryWithBounds(db: Db): Promise<BoundaryResponse | null> {
  const boundary = await getOrCreateBoundary(db)
  if (!boundary) return null

  const geometry = parseWkt(boundary.polygon)
  return {
    id: boundary.id,
    name: boundary.name,
    calculated_at: new Date(boundary.calculated_at).toISOString(),
    geometry,
    bounds: geometry.coordinates.length ? boundsWithMargin(boundingBox(geometry)) : null,
  }
}
