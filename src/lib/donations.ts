import type Stripe from 'stripe'
import { z } from 'zod'
import type { Db } from './db'
import { getConfig } from './config'
import { getStripe } from './stripe'
import { dispatchEmail } from './jobs'
import { donationConfirmationEmail } from './email-templates'
import { ValidationError } from './errors'

export const MIN_DONATION_CENTS = 100
export const MAX_DONATION_CENTS = 1_000_000
export const DONATION_CURRENCY = 'eur'

export const donateInput = z.object({
  // Euros, as typed in the form
  amount: z.coerce.number().positive(),
  email: z.string().trim().toLowerCase().email().optional(),
})

export type DonationStatus = 'pending' | 'completed' | 'failed' | 'refunded'

export type DonationRow = {
  id: number
  amount: number
  currency: string
  email: string | null
  stripe_session_id: string
  stripe_payment_intent_id: string | null
  status: DonationStatus
  donation_type: string
  user_id: number | null
  created_at: Date
  completed_at: Date | null
}

/** The parts of a Checkout Session the webhook reads. */
export type CheckoutSessionLike = {
  id: string
  amount_total: number | null
  currency: string | null
  payment_intent: string | { id: string } | null
  customer_details: { email: string | null } | null
  metadata: Record<string, string> | null
}

const idOf = (ref: string | { id: string } | null): string | null =>
  ref === null ? null : typeof ref === 'string' ? ref : ref.id

export function toCents(euros: number): number {
  return Math.round(euros * 100)
}

/**
 * Create a one-off Checkout Session and record the donation as pending.
 */
export async function createDonationCheckout(
  db: Db,
  params: { amountCents: number; email?: string | null; userId?: number | null }
): Promise<{ sessionId: string; url: string | null }> {
  const { amountCents } = params
  if (!Number.isInteger(amountCents) || amountCents < MIN_DONATION_CENTS) {
    throw new ValidationError(`Minimum donation is ${(MIN_DONATION_CENTS / 100).toFixed(2)} EUR`)
  }
  if (amountCents > MAX_DONATION_CENTS) {
    throw new ValidationError('Donation amount is too large')
  }

  const appUrl = getConfig().appUrl
  const email = params.email || undefined

  const session = await getStripe().checkout.sessions.create({
    mode: 'payment',
    payment_method_types: ['card'],
    line_items: [
      {
        price_data: {
          currency: DONATION_CURRENCY,
          product_data: { name: 'Donation' },
          unit_amount: amountCents,
        },
        quantity: 1,
      },
    ],
    customer_email: email,
    metadata: {
      donation_type: 'voluntary',
      user_email: email ?? '',
    },
    success_url: `${appUrl}/donate/success?session_id={CHECKOUT_SESSION_ID}`,
    cancel_url: `${appUrl}/donate`,
  })

  await db.query(
    `INSERT INTO donations (amount, currency, email, stripe_session_id, status, donation_type, user_id)
     VALUES ($1, $2, $3, $4, 'pending', 'voluntary', $5)
     ON CONFLICT (stripe_session_id) DO NOTHING`,
    [amountCents, DONATION_CURRENCY, email ?? null, session.id, params.userId ?? null]
  )

  console.log(`[stripe] Checkout session ${session.id} created for ${amountCents} cents`)
  return { sessionId: session.id, url: session.url }
}

/**
 * Mark a donation completed from its Checkout Session, creating the row
 * when the session started elsewhere. Returns the stored donation.
 */
export async function completeCheckoutSession(db: Db, session: CheckoutSessionLike): Promise<DonationRow> {
  const email = session.customer_details?.email || session.metadata?.user_email || null
  const paymentIntent = idOf(session.payment_intent)

  const { donation, newlyCompleted } = await db.transaction(async tx => {
    const userRows = email
      ? await tx.query<{ id: number }>('SELECT id FROM users WHERE lower(email) = lower($1)', [email])
      : []
    const userId = userRows[0]?.id ?? null

    // Stripe redelivers events; a completed or refunded row is left as it is
    const [row] = await tx.query<DonationRow>(
      `INSERT INTO donations
         (amount, currency, email, stripe_session_id, stripe_payment_intent_id, status, donation_type, user_id, completed_at)
       VALUES ($1, $2, $3, $4, $5, 'completed', $6, $7, NOW())
       ON CONFLICT (stripe_session_id) DO UPDATE SET
         amount = EXCLUDED.amount,
         currency = EXCLUDED.currency,
         email = COALESCE(EXCLUDED.email, donations.email),
         stripe_payment_intent_id = EXCLUDED.stripe_payment_intent_id,
         status = 'completed',
         user_id = COALESCE(donations.user_id, EXCLUDED.user_id),
         completed_at = NOW()
       WHERE donations.status NOT IN ('completed', 'refunded')
       RETURNING *`,
      [
        session.amount_total ?? 0,
        session.currency ?? DONATION_CURRENCY,
        email,
        session.id,
        paymentIntent,
        session.metadata?.donation_type || 'voluntary',
        userId,
      ]
    )
    if (row) return { donation: row, newlyCompleted: true }

    const [existing] = await tx.query<DonationRow>(
      'SELECT * FROM donations WHERE stripe_session_id = $1',
      [session.id]
    )
    return { donation: existing, newlyCompleted: false }
  })

  if (!newlyCompleted) {
    console.log(`[stripe] Session ${session.id} already processed (donation ${donation.id}, ${donation.status})`)
    return donation
  }

  if (donation.email) {
    const template = donationConfirmationEmail({ amountCents: donation.amount, currency: donation.currency })
    await dispatchEmail(db, { to: donation.email, ...template })
  }

  console.log(`[stripe] Donation ${donation.id} completed: session=${session.id} amount=${donation.amount}`)
  return donation
}

/** Returns how many donations were marked refunded. */
export async function markDonationRefunded(db: Db, paymentIntentId: string): Promise<number> {
  const rows = await db.query(
    "UPDATE donations SET status = 'refunded' WHERE stripe_payment_intent_id = $1 RETURNING id",
    [paymentIntentId]
  )
  if (rows.length === 0) {
    console.warn(`[stripe] No donation found for refunded payment_intent=${paymentIntentId}`)
  }
  return rows.length
}

export async function handleStripeEvent(db: Db, event: Stripe.Event): Promise<void> {
  switch (event.type) {
    case 'checkout.session.completed':
      await completeCheckoutSession(db, event.data.object)
      break

    case 'payment_intent.succeeded':
      console.log(`[stripe] Payment intent succeeded: ${event.data.object.id}`)
      break

    case 'charge.refunded': {
      const paymentIntentId = idOf(event.data.object.payment_intent)
      if (paymentIntentId) await markDonationRefunded(db, paymentIntentId)
      break
    }

    default:
      console.log(`[stripe] Ignoring event ${event.type}`)
  }
}

export async function donationTotals(db: Db) {
  const [row] = await db.query<{ count: number; total_cents: number }>(
    `SELECT COUNT(*)::int AS count, COALESCE(SUM(amount), 0)::int AS total_cents
     FROM donations WHERE status = 'completed'`
  )
  return row
}
