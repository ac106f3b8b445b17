import { NextRequest, NextResponse } from 'next/server'
import { db } from '@/lib/db'
import { getViewer } from '@/lib/session'
import { checkRateLimit, clientKey } from '@/lib/rate-limit'
import { createDonationCheckout, donateInput, toCents } from '@/lib/donations'
import { errorResponse } from '@/lib/errors'

// POST /api/donate - Start a Stripe Checkout session for a one-off donation
export async function POST(req: NextRequest) {
  try {
    const limited = await checkRateLimit('donate', clientKey(req.headers))
    if (limited) {
      return NextResponse.json({ error: 'Too many requests. Try again later.' }, { status: 429 })
    }

    const input = donateInput.parse(await req.json())
    const viewer = await getViewer()

    const checkout = await createDonationCheckout(db, {
      amountCents: toCents(input.amount),
      email: input.email ?? viewer?.email ?? null,
      userId: viewer?.id ?? null,
    })

    return NextResponse.json(checkout)
  } catch (error) {
    return errorResponse(error, 'Failed to create checkout session')
  }
}
