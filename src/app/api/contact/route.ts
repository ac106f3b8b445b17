import { NextRequest, NextResponse } from 'next/server'
import { z } from 'zod'
import { db } from '@/lib/db'
import { getConfig } from '@/lib/config'
import { checkRateLimit, clientKey } from '@/lib/rate-limit'
import { dispatchEmail } from '@/lib/jobs'
import { adminNotificationEmail, contactConfirmationEmail } from '@/lib/email-templates'
import { errorResponse } from '@/lib/errors'

const contactInput = z.object({
  name: z.string().trim().min(1).max(100),
  email: z.string().trim().toLowerCase().email(),
  subject: z.string().trim().max(200).optional(),
  message: z.string().trim().min(1).max(5000),
})

// POST /api/contact - Contact form
export async function POST(req: NextRequest) {
  try {
    const limited = await checkRateLimit('contact', clientKey(req.headers))
    if (limited) {
      return NextResponse.json({ error: 'Too many messages. Try again later.' }, { status: 429 })
    }

    const { name, email, subject, message } = contactInput.parse(await req.json())
    const { adminEmail } = getConfig()

    // The admin testing the form doesn't need a receipt
    if (email !== adminEmail) {
      await dispatchEmail(db, { to: email, ...contactConfirmationEmail({ name, message }) })
    }

    const notification = adminNotificationEmail({
      title: subject ? `Contact form: ${subject}` : 'Contact form',
      fields: { Name: name, Email: email, Subject: subject, Message: message },
    })
    await dispatchEmail(db, { to: adminEmail, ...notification })

    return NextResponse.json({ success: true })
  } catch (error) {
    return errorResponse(error, 'Failed to send message')
  }
}
