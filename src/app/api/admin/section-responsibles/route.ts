import { NextRequest, NextResponse } from 'next/server'
import { z } from 'zod'
import { db } from '@/lib/db'
import { requireRole } from '@/lib/session'
import {
  assignSectionResponsible,
  listSectionResponsibles,
  unassignSectionResponsible,
} from '@/lib/geo/sections'
import { errorResponse } from '@/lib/errors'

const assignmentInput = z.object({
  userId: z.coerce.number().int().positive(),
  sectionId: z.coerce.number().int().positive(),
})

// GET /api/admin/section-responsibles
export async function GET() {
  try {
    await requireRole('admin')
    return NextResponse.json({ assignments: await listSectionResponsibles(db) })
  } catch (error) {
    return errorResponse(error, 'Failed to fetch assignments')
  }
}

// POST /api/admin/section-responsibles - Assign a user to a section
export async function POST(req: NextRequest) {
  try {
    const admin = await requireRole('admin')
    const { userId, sectionId } = assignmentInput.parse(await req.json())
    const id = await assignSectionResponsible(db, userId, sectionId, admin.id)
    return NextResponse.json({ success: true, id }, { status: 201 })
  } catch (error) {
    return errorResponse(error, 'Failed to assign section')
  }
}

// DELETE /api/admin/section-responsibles - Remove an assignment
export async function DELETE(req: NextRequest) {
  try {
    await requireRole('admin')
    const { userId, sectionId } = assignmentInput.parse(await req.json())
    await unassignSectionResponsible(db, userId, sectionId)
    return NextResponse.json({ success: true })
  } catch (error) {
    return errorResponse(error, 'Failed to remove assignment')
  }
}
