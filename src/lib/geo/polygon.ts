import { bbox } from '@turf/bbox'
import { booleanPointInPolygon } from '@turf/boolean-point-in-polygon'
import { distance } from '@turf/distance'
import type { Geometry } from './wkt'

export type BoundingBox = {
  minLng: number
  minLat: number
  maxLng: number
  maxLat: number
}

/** Leaflet-style bounds: [lat, lng] corners. */
export type MapBounds = {
  southwest: [number, number]
  northeast: [number, number]
}

/** Points on an edge count as inside; holes and every MultiPolygon part are honoured. */
export function geometryContains(geometry: Geometry, lat: number, lng: number): boolean {
  return booleanPointInPolygon([lng, lat], geometry)
}

export function boundingBox(geometry: Geometry): BoundingBox {
  const [minLng, minLat, maxLng, maxLat] = bbox(geometry)
  return { minLng, minLat, maxLng, maxLat }
}

/**
 * Expand a bounding box by `margin` of its span on each side so the map
 * can pan slightly past the city edge.
 */
export function boundsWithMargin(box: BoundingBox, margin = 0.2): MapBounds {
  const marginLng = (box.maxLng - box.minLng) * margin
  const marginLat = (box.maxLat - box.minLat) * margin
  return {
    southwest: [box.minLat - marginLat, box.minLng - marginLng],
    northeast: [box.maxLat + marginLat, box.maxLng + marginLng],
  }
}

/** Great-circle distance in kilometres. */
export function haversineKm(lat1: number, lng1: number, lat2: number, lng2: number): number {
  return distance([lng1, lat1], [lng2, lat2], { units: 'kilometers' })
}
