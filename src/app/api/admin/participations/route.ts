import { NextRequest, NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { requireRole } from '@/lib/session'
import { listParticipations } from '@/lib/initiatives'
import { errorResponse } from '@/lib/errors'

// GET /api/admin/participations - Who joined which initiative, newest first
export async function GET(req: NextRequest) {
  try {
    await requireRole('admin')

    const { searchParams } = new URL(req.url)
    const page = Math.max(1, parseInt(searchParams.get('page') || '1') || 1)
    const limit = Math.min(100, Math.max(1, parseInt(searchParams.get('limit') || '50') || 50))

    return NextResponse.json(await listParticipations(db, { page, limit }))
  } catch (error) {
    return errorResponse(error, 'Failed to fetch participations')
  }
}
