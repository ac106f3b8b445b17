import { NextRequest, NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { requireRole } from '@/lib/session'
import { listUsers } from '@/lib/users'
import { errorResponse } from '@/lib/errors'

// GET /api/admin/users - List users with search and pagination
export async function GET(req: NextRequest) {
  try {
    await requireRole('admin')

    const { searchParams } = new URL(req.url)
    const q = searchParams.get('q') || ''
    const page = Math.max(1, parseInt(searchParams.get('page') || '1') || 1)
    const limit = Math.min(100, Math.max(1, parseInt(searchParams.get('limit') || '20') || 20))

    return NextResponse.json(await listUsers(db, { q, page, limit }))
  } catch (error) {
    return errorResponse(error, 'Failed to fetch users')
  }
}
