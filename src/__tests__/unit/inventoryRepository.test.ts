import { describe, it, expect } from 'vitest'
import {
  addResolvedReport,
  getItemForViewer,
  shareItem,
  transitionItem,
  voteItem,
} from '@/lib/inventory/repository'
import { ConflictError, ForbiddenError, NotFoundError } from '@/lib/errors'
import { createMockDb, EMAIL_QUEUE, queuedEmails, type QueryHandler } from '../helpers/mock-db'

const moderator = { id: 1, roles: ['moderator' as const] }
const responsible = { id: 2, roles: ['user' as const, 'section_responsible' as const] }
const citizen = { id: 3, roles: ['user' as const] }

describe('voteItem', () => {
  const voteDb = (status: string, inserted: QueryHandler) =>
    createMockDb([
      [/SELECT id, status FROM inventory_items/, [{ id: 5, status }]],
      [/INSERT INTO inventory_votes/, inserted],
      [/importance_count = importance_count \+ 1/, [{ importance_count: 8 }]],
    ])

  it('adds a vote and returns the new count', async () => {
    const { db } = voteDb('approved', [{ id: 1 }])
    expect(await voteItem(db, 5, 3)).toBe(8)
  })

  it('refuses a second vote', async () => {
    const { db } = voteDb('approved', [])
    await expect(voteItem(db, 5, 3)).rejects.toThrow(new ConflictError('You have already voted for this item'))
  })

  it('refuses votes on items that are not on the map', async () => {
    const { db } = voteDb('pending', [{ id: 1 }])
    await expect(voteItem(db, 5, 3)).rejects.toThrow('Only approved items can be voted')
  })

  it('fails for a missing item', async () => {
    const { db } = createMockDb()
    await expect(voteItem(db, 5, 3)).rejects.toBeInstanceOf(NotFoundError)
  })
})

describe('addResolvedReport', () => {
  const reportDb = (flags: { already_reported: boolean; has_voted: boolean }) =>
    createMockDb([
      [/SELECT status, importance_count, resolved_count/, [{ status: 'approved', importance_count: 4, resolved_count: 2 }]],
      [/AS already_reported/, [flags]],
    ])

  it('removes the vote and resolves the item at the threshold', async () => {
    const { db, callsMatching } = reportDb({ already_reported: false, has_voted: true })

    const result = await addResolvedReport(db, 9, 3, 3)

    expect(result).toEqual({
      status: 'resolved',
      importanceCount: 3,
      resolvedCount: 3,
      autoResolved: true,
      message: 'Thanks! The item has been marked as resolved',
    })
    expect(callsMatching(/DELETE FROM inventory_votes/)[0].params).toEqual([9, 3])
    expect(callsMatching(/UPDATE inventory_items/)[0].params).toEqual([9, 3, 3, 'resolved'])
  })

  it('keeps the vote of a user who never voted', async () => {
    const { db, callsMatching } = reportDb({ already_reported: false, has_voted: false })

    const result = await addResolvedReport(db, 9, 3, 5)

    expect(result.autoResolved).toBe(false)
    expect(callsMatching(/DELETE FROM inventory_votes/)).toHaveLength(0)
    expect(callsMatching(/UPDATE inventory_items/)[0].params).toEqual([9, 4, 3, 'approved'])
  })

  it('rejects a repeated report', async () => {
    const { db, callsMatching } = reportDb({ already_reported: true, has_voted: false })

    await expect(addResolvedReport(db, 9, 3, 3)).rejects.toThrow('You have already reported this item as resolved')
    expect(callsMatching(/INSERT INTO inventory_resolved/)).toHaveLength(0)
  })
})

describe('shareItem', () => {
  it('returns the new share count', async () => {
    const { db } = createMockDb([[/share_count = share_count \+ 1/, [{ share_count: 2 }]]])
    expect(await shareItem(db, 4)).toBe(2)
  })

  it('fails for items that are not approved', async () => {
    const { db } = createMockDb()
    await expect(shareItem(db, 4)).rejects.toThrow('Item not found')
  })
})

describe('getItemForViewer', () => {
  const pendingItem = { id: 7, status: 'pending', reporter_id: 3, section_id: 12 }
  const itemDb = (sectionRows: Record<string, unknown>[] = []) =>
    createMockDb([
      [/WHERE i\.id = \$2/, [pendingItem]],
      [/FROM section_responsibles/, sectionRows],
    ])

  it('hides pending items from anonymous users', async () => {
    const { db } = itemDb()
    await expect(getItemForViewer(db, 7, null)).rejects.toBeInstanceOf(NotFoundError)
  })

  it('shows pending items to the reporter and moderators', async () => {
    const { db } = itemDb()
    expect(await getItemForViewer(db, 7, citizen)).toEqual(pendingItem)
    expect(await getItemForViewer(db, 7, moderator)).toEqual(pendingItem)
  })

  it('shows pending items to the responsible of their section', async () => {
    const { db, callsMatching } = itemDb([{ exists: 1 }])
    expect(await getItemForViewer(db, 7, responsible)).toEqual(pendingItem)
    expect(callsMatching(/FROM section_responsibles/)[0].params).toEqual([2, 12])
  })

  it('hides pending items from other users', async () => {
    const { db } = itemDb()
    await expect(getItemForViewer(db, 7, { id: 50, roles: ['user'] })).rejects.toThrow('Item not found')
  })
})

describe('transitionItem', () => {
  const transitionDb = (status: string, extra: [RegExp, QueryHandler][] = []) =>
    createMockDb([
      [/FROM inventory_items i\s+LEFT JOIN users/, [
        { status, section_id: 12, reporter_email: 'reporter@example.org', category_name: 'Coloms' },
      ]],
      [/UPDATE inventory_items SET status/, [{ id: 5 }]],
      EMAIL_QUEUE,
      ...extra,
    ])

  it('approves a pending item and tells the reporter', async () => {
    const { db, calls, callsMatching } = transitionDb('pending')

    const result = await transitionItem(db, 5, 'approve', moderator)

    expect(result).toEqual({ status: 'approved', message: 'Item approved' })
    expect(callsMatching(/UPDATE inventory_items SET status/)[0].params).toEqual([5, 'pending', 'approved'])
    const [email] = queuedEmails(calls)
    expect(email.to).toBe('reporter@example.org')
    expect(email.subject).toBe('El teu report ja és al mapa')
    expect(email.html).toContain('http://localhost:3000/inventory/5')
  })

  it('includes the reason when rejecting', async () => {
    const { db, calls } = transitionDb('pending')

    await transitionItem(db, 5, 'reject', moderator, 'Duplicate <report>')

    const [email] = queuedEmails(calls)
    expect(email.subject).toBe('El teu report no ha estat aprovat')
    expect(email.html).toContain('Duplicate &lt;report&gt;')
  })

  it('lets a section responsible approve items in their section', async () => {
    const { db } = transitionDb('pending', [[/FROM section_responsibles/, [{ exists: 1 }]]])
    expect((await transitionItem(db, 5, 'approve', responsible)).status).toBe('approved')
  })

  it('does not let a section responsible reject', async () => {
    const { db } = transitionDb('pending', [[/FROM section_responsibles/, [{ exists: 1 }]]])
    await expect(transitionItem(db, 5, 'reject', responsible)).rejects.toThrow(
      new ForbiddenError('You cannot reject this item')
    )
  })

  it('does not let regular users moderate', async () => {
    const { db } = transitionDb('pending')
    await expect(transitionItem(db, 5, 'approve', citizen)).rejects.toBeInstanceOf(ForbiddenError)
  })

  it('refuses an invalid transition without writing', async () => {
    const { db, callsMatching } = transitionDb('approved')

    await expect(transitionItem(db, 5, 'approve', moderator)).rejects.toThrow('Cannot approve an item that is approved')
    expect(callsMatching(/UPDATE/)).toHaveLength(0)
  })

  it('sends no email on resolve', async () => {
    const { db, calls } = transitionDb('approved')
    await transitionItem(db, 5, 'resolve', moderator)
    expect(queuedEmails(calls)).toEqual([])
  })

  it('reports a concurrent change', async () => {
    const { db } = createMockDb([
      [/FROM inventory_items i\s+LEFT JOIN users/, [{ status: 'pending', section_id: null, reporter_email: null, category_name: null }]],
    ])
    await expect(transitionItem(db, 5, 'approve', moderator)).rejects.toThrow('Item was modified, please reload')
  })
})
