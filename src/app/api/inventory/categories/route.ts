import { NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { listCategoryTree } from '@/lib/categories'
import { errorResponse } from '@/lib/errors'

// GET /api/inventory/categories - Category tree for the map filters
export async function GET() {
  try {
    const categories = await listCategoryTree(db)
    return NextResponse.json({ categories })
  } catch (error) {
    return errorResponse(error, 'Failed to fetch categories')
  }
}
