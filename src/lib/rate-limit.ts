// In-memory sliding window rate limiter
// Stores: key -> array of timestamps
const windows = new Map<string, number[]>()

const HOUR = 3_600_000
const MINUTE = 60_000

const DEFAULT_LIMITS: Record<string, { maxRequests: number; windowMs: number }> = {
  login: { maxRequests: 10, windowMs: HOUR },
  forgot_password: { maxRequests: 5, windowMs: HOUR },
  contact: { maxRequests: 5, windowMs: HOUR },
  signup: { maxRequests: 5, windowMs: HOUR },
  report: { maxRequests: 20, windowMs: HOUR },
  initiative: { maxRequests: 5, windowMs: HOUR },
  donate: { maxRequests: 10, windowMs: HOUR },
  vote: { maxRequests: 30, windowMs: MINUTE },
  comment: { maxRequests: 10, windowMs: MINUTE },
  share: { maxRequests: 30, windowMs: MINUTE },
}

function getLimit(endpoint: string): { maxRequests: number; windowMs: number } {
  return DEFAULT_LIMITS[endpoint] ?? { maxRequests: 10, windowMs: MINUTE }
}

/**
 * Check rate limit for a given endpoint and key.
 * Returns true if rate limited (should block), false if allowed.
 */
export async function checkRateLimit(endpoint: string, key: string, now = Date.now()): Promise<boolean> {
  const config = getLimit(endpoint)
  const rateKey = `${endpoint}:${key}`

  // Drop timestamps outside the window
  const timestamps = (windows.get(rateKey) || []).filter(t => now - t < config.windowMs)

  if (timestamps.length >= config.maxRequests) {
    windows.set(rateKey, timestamps)
    return true
  }

  timestamps.push(now)
  windows.set(rateKey, timestamps)
  return false
}

export function resetRateWindow(endpoint: string, key: string) {
  windows.delete(`${endpoint}:${key}`)
}

/** Client IP as seen through the proxy, for anonymous limits. */
export function clientKey(headers: Headers): string {
  const forwarded = headers.get('x-forwarded-for')
  if (forwarded) return forwarded.split(',')[0].trim()
  return headers.get('x-real-ip') || 'unknown'
}

// Periodic cleanup of stale windows (run every 5 minutes)
if (typeof setInterval !== 'undefined') {
  setInterval(() => {
    const now = Date.now()
    for (const [key, timestamps] of windows) {
      const valid = timestamps.filter(t => now - t < HOUR)
      if (valid.length === 0) {
        windows.delete(key)
      } else {
        windows.set(key, valid)
      }
    }
  }, 5 * MINUTE)
}
