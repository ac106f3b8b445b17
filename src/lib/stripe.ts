import Stripe from 'stripe'
import { getConfig } from './config'

let _stripe: Stripe | null = null

export function getStripe(): Stripe {
  if (!_stripe) {
    const { secretKey } = getConfig().stripe
    if (!secretKey) {
      throw new Error('STRIPE_SECRET_KEY is not configured')
    }
    _stripe = new Stripe(secretKey)
  }
  return _stripe
}

/**
 * Verify the `stripe-signature` header against the raw body and return
 * the parsed event. Throws on a bad or stale signature.
 */
export function verifyWebhookEvent(body: string, signature: string, secret: string): Stripe.Event {
  return getStripe().webhooks.constructEvent(body, signature, secret)
}
