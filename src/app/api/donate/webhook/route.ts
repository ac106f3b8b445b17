import { NextRequest, NextResponse } from 'next/server'
import type Stripe from 'stripe'
import { db } from '@/lib/db'
import { getConfig } from '@/lib/config'
import { verifyWebhookEvent } from '@/lib/stripe'
import { handleStripeEvent } from '@/lib/donations'

// POST /api/donate/webhook - Stripe events, verified by signature
export async function POST(req: NextRequest) {
  const body = await req.text()
  const signature = req.headers.get('stripe-signature')
  const secret = getConfig().stripe.webhookSecret

  if (!signature || !secret) {
    return NextResponse.json({ error: 'Missing signature or webhook secret' }, { status: 400 })
  }

  let event: Stripe.Event
  try {
    event = verifyWebhookEvent(body, signature, secret)
  } catch (err) {
    console.error('[stripe] Webhook signature verification failed:', err)
    return NextResponse.json({ error: 'Invalid signature' }, { status: 400 })
  }

  try {
    await handleStripeEvent(db, event)
  } catch (error) {
    // Non-2xx makes Stripe retry the delivery
    console.error(`[stripe] Error handling ${event.type}:`, error)
    return NextResponse.json({ error: 'Webhook handler failed' }, { status: 500 })
  }

  return NextResponse.json({ received: true })
}
