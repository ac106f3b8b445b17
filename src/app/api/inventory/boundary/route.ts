import { NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { boundaryWithBounds } from '@/lib/geo/boundary'
import { errorResponse } from '@/lib/errors'

// GET /api/inventory/boundary - City boundary with map bounds
export async function GET() {
  try {
    const boundary = await boundaryWithBounds(db)
    if (!boundary) {
      return NextResponse.json({ error: 'City boundary not available' }, { status: 404 })
    }
    return NextResponse.json(boundary)
  } catch (error) {
    return errorResponse(error, 'Failed to fetch boundary')
  }
}
