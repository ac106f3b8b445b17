import { NextRequest, NextResponse } from 'next/server'
import { z } from 'zod'
import { db } from '@/lib/db'
import { checkRateLimit, clientKey } from '@/lib/rate-limit'
import { createPasswordResetToken, findUserByEmail } from '@/lib/users'
import { sendEmail } from '@/lib/email'
import { passwordResetEmail } from '@/lib/email-templates'
import { errorResponse } from '@/lib/errors'

const forgotInput = z.object({ email: z.string().trim().toLowerCase().email() })

// POST /api/auth/forgot-password - Send password reset email
export async function POST(req: NextRequest) {
  try {
    const limited = await checkRateLimit('forgot_password', clientKey(req.headers))
    if (limited) {
      return NextResponse.json({ error: 'Too many requests. Try again later.' }, { status: 429 })
    }

    const { email } = forgotInput.parse(await req.json())

    // Always return success to prevent email enumeration
    const user = await findUserByEmail(db, email)
    if (!user || !user.active) {
      return NextResponse.json({ success: true })
    }

    const token = await createPasswordResetToken(db, user.id)
    // Sent directly: a queued reset link could arrive after the user gave up
    await sendEmail({ to: user.email, ...passwordResetEmail({ token }) })

    return NextResponse.json({ success: true })
  } catch (error) {
    return errorResponse(error, 'Failed to process request')
  }
}
