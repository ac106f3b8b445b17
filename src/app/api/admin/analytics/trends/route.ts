import { NextRequest, NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { requireRole } from '@/lib/session'
import { analyticsItems, csvResponse, dailyTrends, parseAnalyticsFilters, trendsCsv } from '@/lib/analytics'
import { errorResponse } from '@/lib/errors'

// GET /api/admin/analytics/trends - Items per day and category
export async function GET(req: NextRequest) {
  try {
    await requireRole('admin')

    const { searchParams } = new URL(req.url)
    const filters = parseAnalyticsFilters(searchParams)
    const report = dailyTrends(await analyticsItems(db, filters))

    if (searchParams.get('format') === 'csv') {
      return csvResponse(trendsCsv(report), 'trends')
    }
    return NextResponse.json({ filters, ...report })
  } catch (error) {
    return errorResponse(error, 'Failed to build trends report')
  }
}
