import { NextRequest, NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { permissions } from '@/lib/admin'
import { requireViewer } from '@/lib/session'
import { checkRateLimit } from '@/lib/rate-limit'
import { createInitiative, initiativeInput, listInitiatives, type ListFilter } from '@/lib/initiatives'
import { errorResponse } from '@/lib/errors'

const LIST_FILTERS: ListFilter[] = ['upcoming', 'past', 'all']

// GET /api/initiatives - Public list of approved initiatives
export async function GET(req: NextRequest) {
  try {
    const { searchParams } = new URL(req.url)
    const status = LIST_FILTERS.find(f => f === searchParams.get('status')) ?? 'all'
    const category = searchParams.get('category') || null
    const page = Math.max(1, parseInt(searchParams.get('page') || '1') || 1)

    const result = await listInitiatives(db, { status, category, page })
    return NextResponse.json(result)
  } catch (error) {
    return errorResponse(error, 'Failed to fetch initiatives')
  }
}

// POST /api/initiatives - Propose an initiative (pending until approved)
export async function POST(req: NextRequest) {
  try {
    const viewer = await requireViewer()

    const limited = await checkRateLimit('initiative', String(viewer.id))
    if (limited) {
      return NextResponse.json({ error: 'Too many initiatives. Try again later.' }, { status: 429 })
    }

    const input = initiativeInput.parse(await req.json())
    const status = permissions.canModerate(viewer.roles) ? 'approved' : 'pending'
    const initiative = await createInitiative(db, input, viewer.id, status)

    return NextResponse.json({ initiative }, { status: 201 })
  } catch (error) {
    return errorResponse(error, 'Failed to create initiative')
  }
}
