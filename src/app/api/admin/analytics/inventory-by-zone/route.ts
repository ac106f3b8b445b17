import { NextRequest, NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { requireRole } from '@/lib/session'
import { analyticsItems, csvResponse, inventoryByZone, parseAnalyticsFilters, zoneReportCsv } from '@/lib/analytics'
import { errorResponse } from '@/lib/errors'

// GET /api/admin/analytics/inventory-by-zone - Items by district and section, ?format=csv to export
export async function GET(req: NextRequest) {
  try {
    await requireRole('admin')

    const { searchParams } = new URL(req.url)
    const filters = parseAnalyticsFilters(searchParams)
    const report = inventoryByZone(await analyticsItems(db, filters))

    if (searchParams.get('format') === 'csv') {
      return csvResponse(zoneReportCsv(report), 'inventory-by-zone')
    }
    return NextResponse.json({ filters, ...report })
  } catch (error) {
    return errorResponse(error, 'Failed to build inventory report')
  }
}
