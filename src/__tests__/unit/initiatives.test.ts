import { describe, it, expect } from 'vitest'
import {
  addComment,
  createInitiative,
  deleteInitiative,
  getInitiativeDetail,
  initiativeInput,
  joinInitiative,
  listParticipations,
  sendInitiativeReminders,
  setInitiativeStatus,
  updateInitiative,
} from '@/lib/initiatives'
import { NotFoundError, ValidationError } from '@/lib/errors'
import { createMockDb, EMAIL_QUEUE, queuedEmails, type QueryHandler } from '../helpers/mock-db'

const initiative = (overrides: Record<string, unknown> = {}) => ({
  id: 9,
  title: 'Neteja de la platja',
  slug: 'neteja-de-la-platja',
  description: 'Recollim residus a la platja del Miracle.',
  location: 'Platja del Miracle',
  category: 'limpieza',
  date: '2026-11-01',
  time: '10:00',
  image_path: null,
  status: 'approved',
  view_count: 4,
  creator_id: 1,
  participants_count: 2,
  creator_name: 'admin',
  ...overrides,
})

const BY_SLUG = /FROM initiatives i WHERE i\.slug = \$1/
const SUMMARY_BY_SLUG = /ON u\.id = i\.creator_id WHERE i\.slug = \$1/

const validInput = {
  title: 'Neteja de la platja',
  description: 'Recollim residus a la platja del Miracle.',
  location: 'Platja del Miracle',
  category: 'limpieza',
  date: '2026-11-01',
  time: '10:00',
}

describe('initiativeInput', () => {
  it('accepts a complete initiative', () => {
    expect(initiativeInput.parse(validInput)).toEqual(validInput)
  })

  it('treats an empty time as no time', () => {
    expect(initiativeInput.parse({ ...validInput, time: '' }).time).toBeNull()
  })

  it('rejects bad dates, times and categories', () => {
    expect(initiativeInput.safeParse({ ...validInput, date: '01/11/2026' }).success).toBe(false)
    expect(initiativeInput.safeParse({ ...validInput, date: '2026-13-45' }).success).toBe(false)
    expect(initiativeInput.safeParse({ ...validInput, time: '25:00' }).success).toBe(false)
    expect(initiativeInput.safeParse({ ...validInput, category: 'sports' }).success).toBe(false)
  })

  it('requires a real description', () => {
    expect(initiativeInput.safeParse({ ...validInput, description: 'Too short' }).success).toBe(false)
  })
})

describe('createInitiative', () => {
  const createDb = () =>
    createMockDb([
      [/INSERT INTO initiatives/, params => [initiative({ title: params[0], slug: params[1], status: params[8] })]],
      EMAIL_QUEUE,
    ])

  it('stores a sanitized pending initiative and notifies the admin', async () => {
    const { db, calls, callsMatching } = createDb()

    const created = await createInitiative(
      db,
      initiativeInput.parse({ ...validInput, title: 'Neteja <script>alert(1)</script>de la platja' }),
      3
    )

    expect(created.slug).toBe('neteja-de-la-platja')
    expect(callsMatching(/INSERT INTO initiatives/)[0].params).toEqual([
      'Neteja de la platja',
      'neteja-de-la-platja',
      'Recollim residus a la platja del Miracle.',
      'Platja del Miracle',
      'limpieza',
      '2026-11-01',
      '10:00',
      null,
      'pending',
      3,
    ])
    const [email] = queuedEmails(calls)
    expect(email.to).toBe('admin@example.org')
    expect(email.subject).toBe('[Admin] New initiative pending approval')
    expect(email.html).toContain('http://localhost:3000/admin/initiatives/9')
  })

  it('publishes directly without notifying', async () => {
    const { db, calls } = createDb()
    const created = await createInitiative(db, initiativeInput.parse(validInput), 1, 'approved')
    expect(created.status).toBe('approved')
    expect(queuedEmails(calls)).toEqual([])
  })
})

describe('getInitiativeDetail', () => {
  const detailDb = (status: string) =>
    createMockDb([
      [SUMMARY_BY_SLUG, [initiative({ status })]],
      [/SET view_count = view_count \+ 1/, [{ view_count: 5 }]],
      [/FROM comments c/, [{ id: 1, content: 'Hi aniré', user_id: 2, username: 'anna', created_at: new Date() }]],
      [/FROM initiative_participants WHERE/, [{ exists: 1 }]],
    ])

  it('counts the view and loads comments and participation', async () => {
    const { db } = detailDb('approved')

    const detail = await getInitiativeDetail(db, 'neteja-de-la-platja', { id: 2, roles: ['user'] })

    expect(detail.initiative.view_count).toBe(5)
    expect(detail.comments.map(c => c.username)).toEqual(['anna'])
    expect(detail.isParticipating).toBe(true)
  })

  it('does not check participation for anonymous visitors', async () => {
    const { db, callsMatching } = detailDb('active')

    const detail = await getInitiativeDetail(db, 'neteja-de-la-platja', null)

    expect(detail.isParticipating).toBe(false)
    expect(callsMatching(/FROM initiative_participants WHERE/)).toHaveLength(0)
  })

  it('hides pending initiatives from other users', async () => {
    const { db } = detailDb('pending')
    await expect(getInitiativeDetail(db, 'neteja-de-la-platja', null)).rejects.toBeInstanceOf(NotFoundError)
    await expect(getInitiativeDetail(db, 'neteja-de-la-platja', { id: 2, roles: ['user'] })).rejects.toThrow(
      'Initiative not found'
    )
  })

  it('shows pending initiatives to their creator and moderators', async () => {
    const { db } = detailDb('pending')
    expect((await getInitiativeDetail(db, 'neteja-de-la-platja', { id: 1, roles: ['user'] })).initiative.id).toBe(9)
    expect((await getInitiativeDetail(db, 'neteja-de-la-platja', { id: 5, roles: ['moderator'] })).initiative.id).toBe(9)
  })
})

describe('joinInitiative', () => {
  const joinDb = (inserted: QueryHandler, status = 'approved') =>
    createMockDb([
      [BY_SLUG, [initiative({ status })]],
      [/INSERT INTO initiative_participants/, inserted],
      EMAIL_QUEUE,
    ])

  it('joins and sends a confirmation', async () => {
    const { db, calls } = joinDb([{ user_id: 2 }])

    expect(await joinInitiative(db, 'neteja-de-la-platja', { id: 2, email: 'anna@example.org' })).toBe(true)

    const [email] = queuedEmails(calls)
    expect(email.to).toBe('anna@example.org')
    expect(email.subject).toBe("T'has apuntat a: Neteja de la platja")
    expect(email.html).toContain('2026-11-01 · 10:00')
  })

  it('is idempotent', async () => {
    const { db, calls } = joinDb([])
    expect(await joinInitiative(db, 'neteja-de-la-platja', { id: 2, email: 'anna@example.org' })).toBe(false)
    expect(queuedEmails(calls)).toEqual([])
  })

  it('refuses initiatives that are not public', async () => {
    const { db } = joinDb([{ user_id: 2 }], 'pending')
    await expect(joinInitiative(db, 'neteja-de-la-platja', { id: 2, email: 'anna@example.org' })).rejects.toThrow(
      'Initiative not found'
    )
  })
})

describe('addComment', () => {
  const commentDb = () =>
    createMockDb([
      [BY_SLUG, [initiative()]],
      [/INSERT INTO comments/, params => [{ id: 1, content: params[0], user_id: params[1], username: 'anna', created_at: new Date() }]],
    ])

  it('stores the trimmed comment', async () => {
    const { db } = commentDb()
    const comment = await addComment(db, 'neteja-de-la-platja', 2, '  Hi aniré amb <em>guants</em>  ')
    expect(comment.content).toBe('Hi aniré amb <em>guants</em>')
  })

  it('rejects spam', async () => {
    const { db, callsMatching } = commentDb()
    await expect(addComment(db, 'neteja-de-la-platja', 2, 'aaaaaaaaaaaaaaaa')).rejects.toThrow(
      new ValidationError('Content looks like spam')
    )
    expect(callsMatching(/INSERT INTO comments/)).toHaveLength(0)
  })
})

describe('setInitiativeStatus', () => {
  const statusDb = (status: string) =>
    createMockDb([
      [BY_SLUG, [initiative({ status })]],
      [/UPDATE initiatives AS i SET status/, params => [initiative({ status: params[1] })]],
      [/SELECT email FROM users/, [{ email: 'creator@example.org' }]],
      EMAIL_QUEUE,
    ])

  it('tells the creator when approved', async () => {
    const { db, calls } = statusDb('pending')

    const updated = await setInitiativeStatus(db, 'neteja-de-la-platja', 'approved')

    expect(updated.status).toBe('approved')
    const [email] = queuedEmails(calls)
    expect(email.to).toBe('creator@example.org')
    expect(email.subject).toBe('La teva iniciativa ha estat aprovada: Neteja de la platja')
  })

  it('includes the reason when rejected', async () => {
    const { db, calls } = statusDb('pending')
    await setInitiativeStatus(db, 'neteja-de-la-platja', 'rejected', 'Falta el lloc exacte')
    expect(queuedEmails(calls)[0].html).toContain('Falta el lloc exacte')
  })

  it('does nothing when the status is unchanged', async () => {
    const { db, calls } = statusDb('approved')
    await setInitiativeStatus(db, 'neteja-de-la-platja', 'approved')
    expect(calls).toHaveLength(1)
  })

  it('does not email again when an approved initiative becomes active', async () => {
    const { db, calls } = statusDb('approved')
    await setInitiativeStatus(db, 'neteja-de-la-platja', 'active')
    expect(queuedEmails(calls)).toEqual([])
  })
})

describe('updateInitiative', () => {
  it('gives a renamed initiative a new slug', async () => {
    const { db, callsMatching } = createMockDb([
      [BY_SLUG, [initiative()]],
      [/UPDATE initiatives AS i/, params => [initiative({ title: params[1], slug: params[2] })]],
    ])

    const updated = await updateInitiative(db, 'neteja-de-la-platja', { title: 'Neteja de la Savinosa' })

    expect(updated.slug).toBe('neteja-de-la-savinosa')
    expect(callsMatching(/FROM initiatives WHERE slug = \$1 AND/)[0].params).toEqual(['neteja-de-la-savinosa', 9])
  })

  it('keeps the slug when the title is unchanged', async () => {
    const { db, callsMatching } = createMockDb([
      [BY_SLUG, [initiative()]],
      [/UPDATE initiatives AS i/, params => [initiative({ slug: params[2], location: params[4] })]],
    ])

    const updated = await updateInitiative(db, 'neteja-de-la-platja', { location: 'Platja Llarga' })

    expect(updated.slug).toBe('neteja-de-la-platja')
    expect(updated.location).toBe('Platja Llarga')
    expect(callsMatching(/FROM initiatives WHERE slug = \$1 AND/)).toHaveLength(0)
  })
})

describe('deleteInitiative', () => {
  it('fails for an unknown slug', async () => {
    const { db } = createMockDb()
    await expect(deleteInitiative(db, 'missing')).rejects.toBeInstanceOf(NotFoundError)
  })
})

describe('sendInitiativeReminders', () => {
  it('emails the participants of initiatives happening tomorrow', async () => {
    const { db, calls, callsMatching } = createMockDb([
      [/SET reminder_sent_at = NOW\(\)/, [initiative(), initiative({ id: 10, title: 'Plantada', slug: 'plantada' })]],
      [/FROM initiative_participants p/, params =>
        params[0] === 9 ? [{ email: 'anna@example.org' }, { email: 'pau@example.org' }] : []],
      EMAIL_QUEUE,
    ])

    expect(await sendInitiativeReminders(db)).toEqual({ initiatives: 2, emails: 2 })
    expect(callsMatching(/SET reminder_sent_at/)[0].params).toEqual([1])
    expect(queuedEmails(calls).map(e => [e.to, e.subject])).toEqual([
      ['anna@example.org', 'Recordatori: Neteja de la platja'],
      ['pau@example.org', 'Recordatori: Neteja de la platja'],
    ])
  })
})

describe('listParticipations', () => {
  it('pages through participants, newest first', async () => {
    const entry = {
      user_id: 4,
      username: 'anna.p',
      email: 'anna@example.org',
      initiative_id: 9,
      title: 'Neteja de la platja',
      slug: 'neteja-de-la-platja',
      joined_at: new Date('2026-03-01T09:00:00Z'),
    }
    const { db, callsMatching } = createMockDb([
      [/SELECT COUNT\(\*\)::int AS count FROM initiative_participants/, [{ count: 3 }]],
      [/FROM initiative_participants p/, [entry]],
    ])

    expect(await listParticipations(db, { page: 2, limit: 2 })).toEqual({
      participations: [entry],
      total: 3,
      page: 2,
      pages: 2,
    })
    const [list] = callsMatching(/ORDER BY p\.joined_at DESC/)
    expect(list.params).toEqual([2, 2])
  })
})
