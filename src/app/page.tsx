import Link from 'next/link'
import { APP_NAME } from '@/lib/email-templates'

const SECTIONS = [
  { href: '/api/inventory/items', title: 'Inventory map', text: 'Approved reports with their categories and votes.' },
  { href: '/api/initiatives?status=upcoming', title: 'Initiatives', text: 'Upcoming neighbourhood initiatives.' },
  { href: '/api/inventory/boundary', title: 'City boundary', text: 'Boundary polygon and map bounds.' },
]

export default function Home() {
  return (
    <main style={{ maxWidth: 720, margin: '0 auto', padding: '48px 16px' }}>
      <h1 style={{ color: '#1f7a4d', marginBottom: 8 }}>{APP_NAME}</h1>
      <p style={{ color: '#4b5563', marginTop: 0 }}>
        Report issues in your neighbourhood, join local initiatives and support the project.
      </p>
      <ul style={{ listStyle: 'none', padding: 0 }}>
        {SECTIONS.map(section => (
          <li key={section.href} style={{ background: '#fff', border: '1px solid #dfe5e2', borderRadius: 12, padding: 16, marginBottom: 12 }}>
            <Link href={section.href} style={{ fontWeight: 600, color: '#1f7a4d' }}>{section.title}</Link>
            <p style={{ margin: '4px 0 0', color: '#6b7280', fontSize: 14 }}>{section.text}</p>
          </li>
        ))}
      </ul>
    </main>
  )
}
