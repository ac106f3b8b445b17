import Link from 'next/link'

export default function NotFound() {
  return (
    <div style={{ minHeight: '100vh', display: 'flex', alignItems: 'center', justifyContent: 'center' }}>
      <div style={{ textAlign: 'center', padding: '0 24px' }}>
        <div style={{ fontSize: 96, fontWeight: 700, color: '#dfe5e2', marginBottom: 16 }}>404</div>
        <h1 style={{ fontSize: 24, margin: '0 0 8px' }}>Page Not Found</h1>
        <p style={{ color: '#6b7280', marginBottom: 32 }}>
          The page you&apos;re looking for doesn&apos;t exist or has been moved.
        </p>
        <Link href="/" style={{ background: '#1f7a4d', color: '#fff', padding: '8px 24px', borderRadius: 8, textDecoration: 'none' }}>
          Go Home
        </Link>
      </div>
    </div>
  )
}
