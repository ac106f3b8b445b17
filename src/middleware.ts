import { NextRequest, NextResponse } from 'next/server'

const MUTATION_METHODS = ['POST', 'PUT', 'PATCH', 'DELETE']

// Stripe and the scheduler send no browser Origin; next-auth checks its own CSRF token
const ORIGIN_EXEMPT_PREFIXES = [
  '/api/donate/webhook',
  '/api/cron/',
  '/api/auth/callback/',
  '/api/auth/signin',
  '/api/auth/signout',
  '/api/auth/session',
  '/api/auth/csrf',
]

/**
 * Reason to reject a state-changing API call from another origin, or null
 * when it may proceed. `publicOrigin` covers deployments behind a proxy
 * where the request URL carries the internal host.
 */
export function originRejection(
  method: string,
  pathname: string,
  origin: string | null,
  requestOrigin: string,
  publicOrigin?: string,
): string | null {
  if (!MUTATION_METHODS.includes(method) || !pathname.startsWith('/api/')) return null
  if (ORIGIN_EXEMPT_PREFIXES.some(prefix => pathname.startsWith(prefix))) return null

  if (!origin) return 'Forbidden: missing origin'
  if (origin === requestOrigin || origin === publicOrigin) return null
  return 'Forbidden: origin mismatch'
}

function publicOrigin(): string | undefined {
  const url = process.env.NEXT_PUBLIC_APP_URL
  if (!url) return undefined
  try {
    return new URL(url).origin
  } catch {
    return undefined
  }
}

export function middleware(req: NextRequest) {
  const rejection = originRejection(
    req.method,
    req.nextUrl.pathname,
    req.headers.get('origin'),
    req.nextUrl.origin,
    publicOrigin(),
  )
  if (rejection) {
    return NextResponse.json({ error: rejection }, { status: 403 })
  }
  return NextResponse.next()
}

export const config = {
  matcher: ['/api/:path*'],
}
