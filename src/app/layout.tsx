import type { Metadata, Viewport } from 'next'
import { APP_NAME } from '@/lib/email-templates'

export const metadata: Metadata = {
  title: {
    default: `${APP_NAME} - Civic engagement map`,
    template: `%s | ${APP_NAME}`,
  },
  description: 'Report issues in your neighbourhood, join local initiatives and support the project.',
  robots: {
    index: true,
    follow: true,
  },
}

export const viewport: Viewport = {
  width: 'device-width',
  initialScale: 1,
  themeColor: '#1f7a4d',
}

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="ca">
      <body style={{ margin: 0, fontFamily: 'system-ui, sans-serif', background: '#f4f6f5', color: '#111827' }}>
        {children}
      </body>
    </html>
  )
}
