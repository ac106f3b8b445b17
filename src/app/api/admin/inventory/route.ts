import { NextRequest, NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { requireRole } from '@/lib/session'
import { listItemsByStatus } from '@/lib/inventory/repository'
import { ITEM_STATUSES } from '@/lib/inventory/status'
import { errorResponse } from '@/lib/errors'

// GET /api/admin/inventory - Moderation queue, pending by default
export async function GET(req: NextRequest) {
  try {
    await requireRole('admin', 'moderator')

    const { searchParams } = new URL(req.url)
    const status = ITEM_STATUSES.find(s => s === searchParams.get('status')) ?? 'pending'
    const page = Math.max(1, parseInt(searchParams.get('page') || '1') || 1)
    const perPage = Math.min(100, Math.max(1, parseInt(searchParams.get('per_page') || '20') || 20))

    return NextResponse.json({ status, ...(await listItemsByStatus(db, { status, page, perPage })) })
  } catch (error) {
    return errorResponse(error, 'Failed to fetch inventory')
  }
}
