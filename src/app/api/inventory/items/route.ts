import { NextRequest, NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { getViewer, requireViewer } from '@/lib/session'
import { checkRateLimit } from '@/lib/rate-limit'
import { listVisibleItems } from '@/lib/inventory/repository'
import { reportItem } from '@/lib/inventory/report'
import { errorResponse } from '@/lib/errors'

// GET /api/inventory/items - Approved items for the map
export async function GET(req: NextRequest) {
  try {
    const { searchParams } = new URL(req.url)
    const viewer = await getViewer()

    const items = await listVisibleItems(db, {
      category: searchParams.get('category'),
      subcategory: searchParams.get('subcategory'),
      userId: viewer?.id ?? null,
    })

    return NextResponse.json({ items })
  } catch (error) {
    return errorResponse(error, 'Failed to fetch items')
  }
}

// POST /api/inventory/items - Report a new item (pending review)
export async function POST(req: NextRequest) {
  try {
    const viewer = await requireViewer()

    const limited = await checkRateLimit('report', String(viewer.id))
    if (limited) {
      return NextResponse.json({ error: 'Too many reports. Try again later.' }, { status: 429 })
    }

    const result = await reportItem(db, await req.json(), viewer.id)
    return NextResponse.json(result, { status: 201 })
  } catch (error) {
    return errorResponse(error, 'Failed to report item')
  }
}
