import { NextRequest, NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { permissions } from '@/lib/admin'
import { requireRole } from '@/lib/session'
import { managedSectionIds } from '@/lib/geo/sections'
import { sectionDashboard } from '@/lib/inventory/repository'
import { ITEM_STATUSES } from '@/lib/inventory/status'
import { errorResponse } from '@/lib/errors'

// GET /api/inventory/section-dashboard - Items in the sections the user manages
export async function GET(req: NextRequest) {
  try {
    const viewer = await requireRole('section_responsible', 'admin')

    const { searchParams } = new URL(req.url)
    const status = ITEM_STATUSES.find(s => s === searchParams.get('status')) ?? null
    const page = Math.max(1, parseInt(searchParams.get('page') || '1') || 1)

    // Admins see every section
    const sectionIds = permissions.canAccessAdmin(viewer.roles) ? null : await managedSectionIds(db, viewer.id)
    const dashboard = await sectionDashboard(db, sectionIds, { status, page })

    return NextResponse.json({ sectionIds, ...dashboard })
  } catch (error) {
    return errorResponse(error, 'Failed to load dashboard')
  }
}
