'use client'

import { useEffect } from 'react'
import Link from 'next/link'

export default function Error({
  error,
  reset,
}: {
  error: Error & { digest?: string }
  reset: () => void
}) {
  useEffect(() => {
    console.error('Error:', error)
  }, [error])

  return (
    <div style={{ minHeight: '100vh', display: 'flex', alignItems: 'center', justifyContent: 'center' }}>
      <div style={{ textAlign: 'center', padding: '0 24px' }}>
        <h1 style={{ fontSize: 24, margin: '0 0 8px' }}>Unexpected Error</h1>
        <p style={{ color: '#6b7280', marginBottom: 32 }}>
          We encountered an error while loading this page. Please try again.
        </p>
        <div style={{ display: 'flex', gap: 16, justifyContent: 'center' }}>
          <button
            onClick={reset}
            style={{ background: '#1f7a4d', color: '#fff', padding: '8px 24px', borderRadius: 8, border: 'none', cursor: 'pointer' }}
          >
            Try Again
          </button>
          <Link href="/" style={{ padding: '8px 24px', borderRadius: 8, border: '1px solid #dfe5e2', color: '#111827', textDecoration: 'none' }}>
            Go Home
          </Link>
        </div>
      </div>
    </div>
  )
}
