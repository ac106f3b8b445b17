import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { dispatchEmail, processEmailJobs, retryDelaySeconds } from '@/lib/jobs'
import { sendEmail } from '@/lib/email'
import { resetConfig } from '@/lib/config'
import { createMockDb, EMAIL_QUEUE, failingQuery, type QueryHandler } from '../helpers/mock-db'

vi.mock('@/lib/email', () => ({ sendEmail: vi.fn() }))

const message = { to: 'anna@example.org', subject: 'Hola', html: '<p>Hola</p>' }

beforeEach(() => {
  vi.mocked(sendEmail).mockReset()
  vi.mocked(sendEmail).mockResolvedValue(true)
})

afterEach(() => {
  delete process.env.EMAIL_QUEUE_ENABLED
  resetConfig()
})

describe('retryDelaySeconds', () => {
  it('doubles the delay on each attempt', () => {
    expect([0, 1, 2].map(retryDelaySeconds)).toEqual([60, 120, 240])
  })
})

describe('dispatchEmail', () => {
  it('queues the message when the queue is on', async () => {
    const { db, callsMatching } = createMockDb([EMAIL_QUEUE])

    expect(await dispatchEmail(db, message)).toBe(true)

    expect(callsMatching(/INSERT INTO email_jobs/)[0].params).toEqual([JSON.stringify(message)])
    expect(sendEmail).not.toHaveBeenCalled()
  })

  it('sends right away when queueing fails', async () => {
    const { db } = createMockDb([[/INSERT INTO email_jobs/, failingQuery]])

    expect(await dispatchEmail(db, message)).toBe(true)
    expect(sendEmail).toHaveBeenCalledWith(message)
  })

  it('sends right away when the queue is off', async () => {
    process.env.EMAIL_QUEUE_ENABLED = 'false'
    resetConfig()
    const { db, calls } = createMockDb([EMAIL_QUEUE])
    vi.mocked(sendEmail).mockResolvedValue(false)

    expect(await dispatchEmail(db, message)).toBe(false)
    expect(calls).toHaveLength(0)
  })
})

describe('processEmailJobs', () => {
  const jobsDb = (jobs: QueryHandler) => createMockDb([[/FOR UPDATE SKIP LOCKED/, jobs]])

  it('marks delivered jobs as sent', async () => {
    const { db, callsMatching } = jobsDb([{ id: 1, payload: message, attempts: 0 }])

    expect(await processEmailJobs(db)).toEqual({ processed: 1, sent: 1, retried: 0, failed: 0 })
    expect(sendEmail).toHaveBeenCalledWith(message)
    expect(callsMatching(/status = 'sent'/)[0].params).toEqual([1])
  })

  it('passes the batch limit to the claim query', async () => {
    const { db, callsMatching } = jobsDb([])
    await processEmailJobs(db, 5)
    expect(callsMatching(/FOR UPDATE SKIP LOCKED/)[0].params).toEqual([5])
  })

  it('schedules a retry with backoff after a failed send', async () => {
    vi.mocked(sendEmail).mockResolvedValue(false)
    const { db, callsMatching } = jobsDb([{ id: 2, payload: message, attempts: 1 }])

    expect(await processEmailJobs(db)).toEqual({ processed: 1, sent: 0, retried: 1, failed: 0 })
    expect(callsMatching(/make_interval/)[0].params).toEqual([2, 'Send failed', 120])
  })

  it('gives up once the retries are used', async () => {
    vi.mocked(sendEmail).mockResolvedValue(false)
    const { db, callsMatching } = jobsDb([{ id: 3, payload: message, attempts: 3 }])

    expect(await processEmailJobs(db)).toEqual({ processed: 1, sent: 0, retried: 0, failed: 1 })
    expect(callsMatching(/status = 'failed'/)[0].params).toEqual([3, 'Send failed'])
  })

  it('fails invalid payloads without sending', async () => {
    const { db, callsMatching } = jobsDb([{ id: 4, payload: { to: 'not-an-email' }, attempts: 0 }])

    expect(await processEmailJobs(db)).toEqual({ processed: 1, sent: 0, retried: 0, failed: 1 })
    expect(sendEmail).not.toHaveBeenCalled()
    expect(callsMatching(/status = 'failed'/)[0].params).toEqual([4, 'Invalid payload'])
  })
})
