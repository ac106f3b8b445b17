import { Resend } from 'resend'
import { getConfig } from './config'

export type EmailMessage = {
  to: string
  subject: string
  html: string
}

let _resend: Resend | null = null

function getResend(apiKey: string): Resend {
  if (!_resend) {
    _resend = new Resend(apiKey)
  }
  return _resend
}

/** Staging mail is tagged so it can't be mistaken for production mail. */
export function subjectFor(subject: string, appEnv = getConfig().appEnv): string {
  return appEnv === 'staging' ? `[STAGING] ${subject}` : subject
}

/**
 * Send a single email. Logs provider errors and never throws.
 */
export async function sendEmail(params: EmailMessage): Promise<boolean> {
  const { email, appEnv } = getConfig()
  const subject = subjectFor(params.subject, appEnv)

  if (email.provider === 'console') {
    console.log('[email] (console)', params.to, '|', subject)
    return true
  }

  if (!email.resendApiKey) {
    console.warn('[email] RESEND_API_KEY not configured, skipping email to', params.to)
    return false
  }

  try {
    const { data, error } = await getResend(email.resendApiKey).emails.send({
      from: email.from,
      to: params.to,
      subject,
      html: params.html,
    })
    if (error) {
      console.error('[email] Resend error sending to', params.to, 'from:', email.from, 'error:', JSON.stringify(error))
      return false
    }
    console.log('[email] Sent to', params.to, 'id:', data?.id)
    return true
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error('[email] Exception sending to', params.to, 'from:', email.from, 'error:', message)
    return false
  }
}
