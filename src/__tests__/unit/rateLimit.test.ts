import { describe, it, expect } from 'vitest'
import { checkRateLimit, clientKey, resetRateWindow } from '@/lib/rate-limit'

describe('checkRateLimit', () => {
  it('blocks after the endpoint limit within the window', async () => {
    const now = 1_000_000
    for (let i = 0; i < 5; i++) {
      expect(await checkRateLimit('contact', '10.0.0.1', now + i)).toBe(false)
    }
    expect(await checkRateLimit('contact', '10.0.0.1', now + 5)).toBe(true)
    // Other keys are unaffected
    expect(await checkRateLimit('contact', '10.0.0.2', now + 5)).toBe(false)
  })

  it('allows requests again once the window has passed', async () => {
    const now = 2_000_000
    for (let i = 0; i < 5; i++) await checkRateLimit('signup', '10.0.0.3', now)
    expect(await checkRateLimit('signup', '10.0.0.3', now + 1)).toBe(true)
    expect(await checkRateLimit('signup', '10.0.0.3', now + 3_600_000)).toBe(false)
  })

  it('uses a default limit for unknown endpoints', async () => {
    const now = 3_000_000
    for (let i = 0; i < 10; i++) await checkRateLimit('other', 'user-1', now)
    expect(await checkRateLimit('other', 'user-1', now)).toBe(true)
  })

  it('can be reset', async () => {
    const now = 4_000_000
    for (let i = 0; i < 5; i++) await checkRateLimit('forgot_password', 'a@example.org', now)
    resetRateWindow('forgot_password', 'a@example.org')
    expect(await checkRateLimit('forgot_password', 'a@example.org', now)).toBe(false)
  })
})

describe('clientKey', () => {
  it('takes the first forwarded address', () => {
    expect(clientKey(new Headers({ 'x-forwarded-for': '203.0.113.7, 10.0.0.1' }))).toBe('203.0.113.7')
  })

  it('falls back to x-real-ip, then unknown', () => {
    expect(clientKey(new Headers({ 'x-real-ip': '198.51.100.4' }))).toBe('198.51.100.4')
    expect(clientKey(new Headers())).toBe('unknown')
  })
})
