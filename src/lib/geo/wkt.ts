/**
 * WKT for the polygon types stored on sections and the city boundary,
 * read into GeoJSON-shaped geometry. Coordinates are [lng, lat].
 */
import { Geometry as WkxGeometry } from 'wkx'
import { z } from 'zod'

export type Position = [number, number]
export type Ring = Position[]
export type PolygonCoordinates = Ring[]

export type Geometry =
  | { type: 'Polygon'; coordinates: PolygonCoordinates }
  | { type: 'MultiPolygon'; coordinates: PolygonCoordinates[] }

export class WktParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'WktParseError'
  }
}

// Z and M values are dropped
const position = z
  .array(z.number())
  .min(2)
  .transform((p): Position => [p[0], p[1]])

const ring = z.array(position).min(4, 'A ring needs at least 4 positions')
const polygon = z.array(ring).min(1)

export const geometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: polygon }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(polygon) }),
])

export function parseWkt(input: string): Geometry {
  let parsed: WkxGeometry
  try {
    parsed = WkxGeometry.parse(input.trim())
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new WktParseError(`Invalid WKT (${message}): ${input.slice(0, 40)}`)
  }

  const result = geometrySchema.safeParse(parsed.toGeoJSON())
  if (!result.success) {
    throw new WktParseError(result.error.issues[0]?.message ?? 'Unsupported geometry')
  }
  return result.data
}

export function toWkt(geometry: Geometry): string {
  return WkxGeometry.parseGeoJSON(geometry).toWkt()
}

/** Every polygon of a geometry, as a flat list. */
export function polygonsOf(geometry: Geometry): PolygonCoordinates[] {
  return geometry.type === 'Polygon' ? [geometry.coordinates] : geometry.coordinates
}
