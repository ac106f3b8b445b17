import { z } from 'zod'
import type { Db } from './db'
import { getConfig } from './config'
import { sendEmail, type EmailMessage } from './email'

export const MAX_RETRIES = 3

const payloadSchema = z.object({
  to: z.string().email(),
  subject: z.string(),
  html: z.string(),
})

type EmailJobRow = {
  id: number
  payload: unknown
  attempts: number
}

export type JobRunResult = { processed: number; sent: number; retried: number; failed: number }

/** Seconds to wait before the next try after `attempts` failures. */
export function retryDelaySeconds(attempts: number): number {
  return 60 * 2 ** attempts
}

export async function enqueueEmail(db: Db, message: EmailMessage): Promise<number> {
  const [row] = await db.query<{ id: number }>(
    'INSERT INTO email_jobs (payload) VALUES ($1) RETURNING id',
    [JSON.stringify(payloadSchema.parse(message))]
  )
  return row.id
}

/**
 * Queue an email, or send it right away when the queue is off or the
 * insert fails. Never throws.
 */
export async function dispatchEmail(db: Db, message: EmailMessage): Promise<boolean> {
  if (getConfig().email.queueEnabled) {
    try {
      const id = await enqueueEmail(db, message)
      console.log(`[jobs] Queued email ${id} to`, message.to)
      return true
    } catch (error) {
      console.warn('[jobs] Enqueue failed, sending synchronously:', error)
    }
  }
  return sendEmail(message)
}

/**
 * Claim up to `limit` due jobs and send them. A failed send is retried
 * with exponential backoff until MAX_RETRIES retries are used.
 */
export async function processEmailJobs(db: Db, limit = 20): Promise<JobRunResult> {
  const result: JobRunResult = { processed: 0, sent: 0, retried: 0, failed: 0 }

  const jobs = await db.transaction(tx =>
    tx.query<EmailJobRow>(
      `UPDATE email_jobs SET run_after = NOW() + INTERVAL '10 minutes'
       WHERE id IN (
         SELECT id FROM email_jobs
         WHERE status = 'pending' AND run_after <= NOW()
         ORDER BY run_after, id
         LIMIT $1
         FOR UPDATE SKIP LOCKED
       )
       RETURNING id, payload, attempts`,
      [limit]
    )
  )

  for (const job of jobs) {
    result.processed++
    const parsed = payloadSchema.safeParse(job.payload)
    const sent = parsed.success ? await sendEmail(parsed.data) : false

    if (sent) {
      await db.query(
        "UPDATE email_jobs SET status = 'sent', sent_at = NOW(), last_error = NULL WHERE id = $1",
        [job.id]
      )
      result.sent++
      continue
    }

    const error = parsed.success ? 'Send failed' : 'Invalid payload'
    if (!parsed.success || job.attempts >= MAX_RETRIES) {
      await db.query(
        "UPDATE email_jobs SET status = 'failed', attempts = attempts + 1, last_error = $2 WHERE id = $1",
        [job.id, error]
      )
      console.error(`[jobs] Email job ${job.id} failed permanently: ${error}`)
      result.failed++
    } else {
      const delay = retryDelaySeconds(job.attempts)
      await db.query(
        `UPDATE email_jobs SET attempts = attempts + 1, last_error = $2,
           run_after = NOW() + make_interval(secs => $3)
         WHERE id = $1`,
        [job.id, error, delay]
      )
      console.warn(`[jobs] Email job ${job.id} failed, retrying in ${delay}s`)
      result.retried++
    }
  }

  if (result.processed > 0) {
    console.log(`[jobs] Processed ${result.processed}: ${result.sent} sent, ${result.retried} retried, ${result.failed} failed`)
  }
  return result
}
