import { NextRequest, NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { checkRateLimit, clientKey } from '@/lib/rate-limit'
import { createUser, signupInput } from '@/lib/users'
import { dispatchEmail } from '@/lib/jobs'
import { welcomeEmail } from '@/lib/email-templates'
import { errorResponse } from '@/lib/errors'

// POST /api/auth/signup - Create account with email/password
export async function POST(req: NextRequest) {
  try {
    const limited = await checkRateLimit('signup', clientKey(req.headers))
    if (limited) {
      return NextResponse.json({ error: 'Too many signup attempts. Try again later.' }, { status: 429 })
    }

    const input = signupInput.parse(await req.json())
    const user = await createUser(db, input)

    await dispatchEmail(db, { to: user.email, ...welcomeEmail({ username: user.username }) })

    return NextResponse.json({ success: true, userId: user.id }, { status: 201 })
  } catch (error) {
    return errorResponse(error, 'Failed to create account')
  }
}
