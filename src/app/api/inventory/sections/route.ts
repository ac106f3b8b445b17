import { NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { listSectionFeatures } from '@/lib/geo/sections'
import { errorResponse } from '@/lib/errors'

// GET /api/inventory/sections - Sections as a GeoJSON FeatureCollection
export async function GET() {
  try {
    const sections = await listSectionFeatures(db)
    return NextResponse.json({
      type: 'FeatureCollection',
      features: sections.map(({ geometry, ...properties }) => ({
        type: 'Feature',
        geometry,
        properties,
      })),
    })
  } catch (error) {
    return errorResponse(error, 'Failed to fetch sections')
  }
}
