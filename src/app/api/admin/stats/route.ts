import { NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { requireRole } from '@/lib/session'
import { dashboardStats } from '@/lib/stats'
import { errorResponse } from '@/lib/errors'

// GET /api/admin/stats - Admin dashboard counters
export async function GET() {
  try {
    await requireRole('admin')
    return NextResponse.json(await dashboardStats(db))
  } catch (error) {
    return errorResponse(error, 'Failed to fetch stats')
  }
}
