import { NextRequest, NextResponse } from 'next/server'
import { z } from 'zod'
import { db } from '@/lib/db'
import { PASSWORD_MIN_LENGTH, resetPassword } from '@/lib/users'
import { errorResponse } from '@/lib/errors'

const resetInput = z.object({
  token: z.string().min(1),
  password: z.string().min(PASSWORD_MIN_LENGTH).max(200),
})

// POST /api/auth/reset-password - Reset password with token
export async function POST(req: NextRequest) {
  try {
    const { token, password } = resetInput.parse(await req.json())

    const ok = await resetPassword(db, token, password)
    if (!ok) {
      return NextResponse.json({ error: 'Invalid or expired reset link' }, { status: 400 })
    }

    return NextResponse.json({ success: true })
  } catch (error) {
    return errorResponse(error, 'Failed to reset password')
  }
}
