import { NextRequest, NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { requireRole } from '@/lib/session'
import { analyticsItems, csvResponse, parseAnalyticsFilters, topCategories, topCategoriesCsv } from '@/lib/analytics'
import { errorResponse } from '@/lib/errors'

// GET /api/admin/analytics/top-categories - Most reported categories and the zones they hit
export async function GET(req: NextRequest) {
  try {
    await requireRole('admin')

    const { searchParams } = new URL(req.url)
    const filters = parseAnalyticsFilters(searchParams)
    const categories = topCategories(await analyticsItems(db, filters))

    if (searchParams.get('format') === 'csv') {
      return csvResponse(topCategoriesCsv(categories), 'top-categories')
    }
    return NextResponse.json({ filters, categories })
  } catch (error) {
    return errorResponse(error, 'Failed to build category report')
  }
}
