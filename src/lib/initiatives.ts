import { z } from 'zod'
import type { Db } from './db'
import { permissions, type RoleName } from './admin'
import { getConfig } from './config'
import { ConflictError, NotFoundError, ValidationError } from './errors'
import { dispatchEmail } from './jobs'
import {
  adminNotificationEmail,
  initiativeApprovedEmail,
  initiativeRejectedEmail,
  initiativeReminderEmail,
  participantConfirmationEmail,
} from './email-templates'
import { moderateContent, sanitizeHtml } from './moderation'
import { uniqueSlug } from './slug'

export const INITIATIVE_STATUSES = ['pending', 'approved', 'rejected', 'active', 'cancelled'] as const
export type InitiativeStatus = (typeof INITIATIVE_STATUSES)[number]

export const INITIATIVE_CATEGORIES = [
  'limpieza',
  'reciclaje',
  'espacios_verdes',
  'movilidad',
  'educacion',
  'cultura',
  'social',
] as const
export type InitiativeCategory = (typeof INITIATIVE_CATEGORIES)[number]

export const CATEGORY_LABELS: Record<InitiativeCategory, string> = {
  limpieza: 'Neteja',
  reciclaje: 'Reciclatge',
  espacios_verdes: 'Espais verds',
  movilidad: 'Mobilitat',
  educacion: 'Educació',
  cultura: 'Cultura',
  social: 'Social',
}

export const PER_PAGE = 12
export const COMMENTS_SHOWN = 10
export const RELATED_SHOWN = 3

export const isVisibleInitiative = (status: InitiativeStatus) => status === 'approved' || status === 'active'

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Use YYYY-MM-DD')
  .refine(value => !Number.isNaN(Date.parse(`${value}T00:00:00Z`)), 'Invalid date')

export const initiativeInput = z.object({
  title: z.string().trim().min(5).max(200),
  description: z.string().trim().min(20).max(10000),
  location: z.string().trim().min(1).max(200),
  category: z.enum(INITIATIVE_CATEGORIES),
  date: isoDate,
  time: z
    .string()
    .trim()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Use HH:MM')
    .nullish()
    .or(z.literal('').transform(() => null)),
  imagePath: z.string().trim().max(300).nullish(),
})

export type InitiativeInput = z.infer<typeof initiativeInput>

export const initiativeUpdate = initiativeInput.partial().extend({
  status: z.enum(INITIATIVE_STATUSES).optional(),
  reason: z.string().trim().max(1000).optional(),
})

export type InitiativeRow = {
  id: number
  title: string
  slug: string
  description: string
  location: string
  category: InitiativeCategory
  date: string
  time: string | null
  image_path: string | null
  status: InitiativeStatus
  view_count: number
  creator_id: number
  created_at: Date
  updated_at: Date
}

export type InitiativeSummary = InitiativeRow & { participants_count: number; creator_name: string | null }

export type CommentRow = {
  id: number
  content: string
  user_id: number
  username: string
  created_at: Date
}

export type Viewer = { id: number; roles: RoleName[] }

const INITIATIVE_COLUMNS = `i.id, i.title, i.slug, i.description, i.location, i.category,
  to_char(i.date, 'YYYY-MM-DD') AS date, i.time, i.image_path, i.status, i.view_count,
  i.creator_id, i.created_at, i.updated_at`

const SUMMARY_SELECT = `
  SELECT ${INITIATIVE_COLUMNS},
         (SELECT COUNT(*)::int FROM initiative_participants p WHERE p.initiative_id = i.id) AS participants_count,
         u.username AS creator_name
  FROM initiatives i
  LEFT JOIN users u ON u.id = i.creator_id`

function clean(input: InitiativeInput) {
  return {
    title: sanitizeHtml(input.title),
    description: sanitizeHtml(input.description),
    location: sanitizeHtml(input.location),
    category: input.category,
    date: input.date,
    time: input.time ? sanitizeHtml(input.time) : null,
    imagePath: input.imagePath ?? null,
  }
}

export async function findInitiativeBySlug(db: Db, slug: string): Promise<InitiativeRow | null> {
  const rows = await db.query<InitiativeRow>(`SELECT ${INITIATIVE_COLUMNS} FROM initiatives i WHERE i.slug = $1`, [slug])
  return rows[0] ?? null
}

async function requireInitiative(db: Db, slug: string): Promise<InitiativeRow> {
  const initiative = await findInitiativeBySlug(db, slug)
  if (!initiative) throw new NotFoundError('Initiative not found')
  return initiative
}

/**
 * Create an initiative. Citizens' proposals wait for approval; staff can
 * publish directly.
 */
export async function createInitiative(
  db: Db,
  input: InitiativeInput,
  creatorId: number,
  status: InitiativeStatus = 'pending'
): Promise<InitiativeRow> {
  const data = clean(input)
  const slug = await uniqueSlug(db, data.title)

  const [initiative] = await db.query<InitiativeRow>(
    `INSERT INTO initiatives AS i (title, slug, description, location, category, date, time, image_path, status, creator_id)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
     RETURNING ${INITIATIVE_COLUMNS}`,
    [data.title, slug, data.description, data.location, data.category, data.date, data.time, data.imagePath, status, creatorId]
  )

  if (status === 'pending') {
    const config = getConfig()
    const notification = adminNotificationEmail({
      title: 'New initiative pending approval',
      fields: {
        Title: input.title,
        Category: CATEGORY_LABELS[input.category],
        Date: input.time ? `${input.date} ${input.time}` : input.date,
        Location: input.location,
      },
      link: `${config.appUrl}/admin/initiatives/${initiative.id}`,
    })
    await dispatchEmail(db, { to: config.adminEmail, ...notification })
  }

  console.log(`[initiatives] Created ${initiative.slug} (${status}) by user ${creatorId}`)
  return initiative
}

export type ListFilter = 'upcoming' | 'past' | 'all'

export async function listInitiatives(
  db: Db,
  { status = 'all', category = null, page = 1 }: { status?: ListFilter; category?: string | null; page?: number } = {}
) {
  const dateClause =
    status === 'upcoming' ? 'AND i.date >= CURRENT_DATE' : status === 'past' ? 'AND i.date < CURRENT_DATE' : ''
  const where = `WHERE i.status = 'approved' ${dateClause} AND ($1::text IS NULL OR i.category = $1)`
  const currentPage = Math.max(1, Math.floor(page))

  const [{ count }] = await db.query<{ count: number }>(
    `SELECT COUNT(*)::int AS count FROM initiatives i ${where}`,
    [category]
  )
  const initiatives = await db.query<InitiativeSummary>(
    `${SUMMARY_SELECT} ${where} ORDER BY i.date ASC, i.id ASC LIMIT $2 OFFSET $3`,
    [category, PER_PAGE, (currentPage - 1) * PER_PAGE]
  )
  const [stats] = await db.query<{ total_initiatives: number; total_participants: number; categories: string[] }>(
    `SELECT
       (SELECT COUNT(*)::int FROM initiatives WHERE status = 'approved') AS total_initiatives,
       (SELECT COUNT(DISTINCT user_id)::int FROM initiative_participants) AS total_participants,
       (SELECT COALESCE(array_agg(DISTINCT category ORDER BY category), '{}')
        FROM initiatives WHERE status = 'approved') AS categories`
  )

  return {
    initiatives,
    page: currentPage,
    pages: Math.ceil(count / PER_PAGE),
    total: count,
    stats,
  }
}

export type InitiativeDetail = {
  initiative: InitiativeSummary
  comments: CommentRow[]
  related: InitiativeSummary[]
  isParticipating: boolean
}

/**
 * Detail page data. Initiatives not yet public are only shown to their
 * creator and staff. Counts a view.
 */
export async function getInitiativeDetail(db: Db, slug: string, viewer: Viewer | null): Promise<InitiativeDetail> {
  const [found] = await db.query<InitiativeSummary>(`${SUMMARY_SELECT} WHERE i.slug = $1`, [slug])
  if (!found) throw new NotFoundError('Initiative not found')

  if (!isVisibleInitiative(found.status)) {
    const allowed = viewer !== null && (found.creator_id === viewer.id || permissions.canModerate(viewer.roles))
    if (!allowed) throw new NotFoundError('Initiative not found')
  }

  const [views] = await db.query<{ view_count: number }>(
    'UPDATE initiatives SET view_count = view_count + 1 WHERE id = $1 RETURNING view_count',
    [found.id]
  )
  const initiative = { ...found, view_count: views?.view_count ?? found.view_count + 1 }

  const comments = await db.query<CommentRow>(
    `SELECT c.id, c.content, c.user_id, u.username, c.created_at
     FROM comments c JOIN users u ON u.id = c.user_id
     WHERE c.initiative_id = $1
     ORDER BY c.created_at DESC
     LIMIT $2`,
    [found.id, COMMENTS_SHOWN]
  )

  const related = await db.query<InitiativeSummary>(
    `${SUMMARY_SELECT}
     WHERE i.category = $1 AND i.id <> $2 AND i.status IN ('approved', 'active')
     ORDER BY i.date ASC
     LIMIT $3`,
    [found.category, found.id, RELATED_SHOWN]
  )

  let isParticipating = false
  if (viewer) {
    const rows = await db.query(
      'SELECT 1 FROM initiative_participants WHERE initiative_id = $1 AND user_id = $2',
      [found.id, viewer.id]
    )
    isParticipating = rows.length > 0
  }

  return { initiative, comments, related, isParticipating }
}

/** Idempotent. Returns false when the user had already joined. */
export async function joinInitiative(db: Db, slug: string, user: { id: number; email: string }): Promise<boolean> {
  const initiative = await requireInitiative(db, slug)
  if (!isVisibleInitiative(initiative.status)) throw new NotFoundError('Initiative not found')

  const rows = await db.query(
    `INSERT INTO initiative_participants (user_id, initiative_id) VALUES ($1, $2)
     ON CONFLICT (user_id, initiative_id) DO NOTHING RETURNING user_id`,
    [user.id, initiative.id]
  )
  if (rows.length === 0) return false

  const template = participantConfirmationEmail({
    title: initiative.title,
    slug: initiative.slug,
    date: initiative.date,
    time: initiative.time,
    location: initiative.location,
  })
  await dispatchEmail(db, { to: user.email, ...template })
  return true
}

/** Returns false when the user was not participating. */
export async function leaveInitiative(db: Db, slug: string, userId: number): Promise<boolean> {
  const initiative = await requireInitiative(db, slug)
  const rows = await db.query(
    'DELETE FROM initiative_participants WHERE user_id = $1 AND initiative_id = $2 RETURNING user_id',
    [userId, initiative.id]
  )
  return rows.length > 0
}

export type ParticipationEntry = {
  user_id: number
  username: string
  email: string
  initiative_id: number
  title: string
  slug: string
  joined_at: Date
}

export async function listParticipations(
  db: Db,
  { page = 1, limit = 50 }: { page?: number; limit?: number } = {}
): Promise<{ participations: ParticipationEntry[]; total: number; page: number; pages: number }> {
  const [{ count }] = await db.query<{ count: number }>('SELECT COUNT(*)::int AS count FROM initiative_participants')
  const participations = await db.query<ParticipationEntry>(
    `SELECT p.user_id, u.username, u.email, p.initiative_id, i.title, i.slug, p.joined_at
     FROM initiative_participants p
     JOIN users u ON u.id = p.user_id
     JOIN initiatives i ON i.id = p.initiative_id
     ORDER BY p.joined_at DESC
     LIMIT $1 OFFSET $2`,
    [limit, (page - 1) * limit]
  )
  return { participations, total: count, page, pages: Math.ceil(count / limit) }
}

export const commentInput = z.object({ content: z.string().trim().min(1).max(1000) })

export async function addComment(db: Db, slug: string, userId: number, content: string): Promise<CommentRow> {
  const initiative = await requireInitiative(db, slug)
  if (!isVisibleInitiative(initiative.status)) throw new NotFoundError('Initiative not found')

  const moderation = moderateContent(content, 1000)
  if (!moderation.allowed) {
    throw new ValidationError(moderation.reason ?? 'Comment rejected', { content: [moderation.reason ?? 'Rejected'] })
  }

  const [comment] = await db.query<CommentRow>(
    `WITH inserted AS (
       INSERT INTO comments (content, user_id, initiative_id) VALUES ($1, $2, $3)
       RETURNING id, content, user_id, created_at
     )
     SELECT c.id, c.content, c.user_id, u.username, c.created_at
     FROM inserted c JOIN users u ON u.id = c.user_id`,
    [sanitizeHtml(content.trim()), userId, initiative.id]
  )
  return comment
}

/**
 * Change the moderation status. The creator is told when their
 * initiative is approved or rejected.
 */
export async function setInitiativeStatus(
  db: Db,
  slug: string,
  status: InitiativeStatus,
  reason: string | null = null
): Promise<InitiativeRow> {
  const initiative = await requireInitiative(db, slug)
  if (initiative.status === status) return initiative

  const [updated] = await db.query<InitiativeRow>(
    `UPDATE initiatives AS i SET status = $2, updated_at = NOW() WHERE i.id = $1 RETURNING ${INITIATIVE_COLUMNS}`,
    [initiative.id, status]
  )

  const [creator] = await db.query<{ email: string }>('SELECT email FROM users WHERE id = $1', [initiative.creator_id])
  const wasVisible = isVisibleInitiative(initiative.status)
  if (creator && status === 'approved' && !wasVisible) {
    await dispatchEmail(db, { to: creator.email, ...initiativeApprovedEmail({ title: updated.title, slug: updated.slug }) })
  } else if (creator && status === 'rejected') {
    await dispatchEmail(db, { to: creator.email, ...initiativeRejectedEmail({ title: updated.title, reason }) })
  }

  console.log(`[initiatives] ${slug}: ${initiative.status} -> ${status}`)
  return updated
}

/** Edit fields. A new title gets a new slug. */
export async function updateInitiative(
  db: Db,
  slug: string,
  changes: Partial<InitiativeInput>
): Promise<InitiativeRow> {
  const current = await requireInitiative(db, slug)
  const merged = initiativeInput.parse({
    title: current.title,
    description: current.description,
    location: current.location,
    category: current.category,
    date: current.date,
    time: current.time,
    imagePath: current.image_path,
    ...changes,
  })
  const data = clean(merged)
  const nextSlug = data.title !== current.title ? await uniqueSlug(db, data.title, current.id) : current.slug

  const rows = await db.query<InitiativeRow>(
    `UPDATE initiatives AS i
     SET title = $2, slug = $3, description = $4, location = $5, category = $6, date = $7, time = $8,
         image_path = $9, updated_at = NOW()
     WHERE i.id = $1
     RETURNING ${INITIATIVE_COLUMNS}`,
    [current.id, data.title, nextSlug, data.description, data.location, data.category, data.date, data.time, data.imagePath]
  )
  if (rows.length === 0) throw new ConflictError('Initiative was deleted')
  return rows[0]
}

export async function deleteInitiative(db: Db, slug: string): Promise<void> {
  const rows = await db.query('DELETE FROM initiatives WHERE slug = $1 RETURNING id', [slug])
  if (rows.length === 0) throw new NotFoundError('Initiative not found')
  console.log(`[initiatives] Deleted ${slug}`)
}

/**
 * Email participants of public initiatives happening in `daysAhead` days.
 * Each initiative is reminded once, so calling this every tick is safe.
 */
export async function sendInitiativeReminders(db: Db, daysAhead = 1): Promise<{ initiatives: number; emails: number }> {
  const due = await db.query<InitiativeRow>(
    `UPDATE initiatives AS i SET reminder_sent_at = NOW()
     WHERE i.status IN ('approved', 'active')
       AND i.date = CURRENT_DATE + $1::int
       AND i.reminder_sent_at IS NULL
     RETURNING ${INITIATIVE_COLUMNS}`,
    [daysAhead]
  )

  let emails = 0
  for (const initiative of due) {
    const participants = await db.query<{ email: string }>(
      `SELECT u.email FROM initiative_participants p JOIN users u ON u.id = p.user_id
       WHERE p.initiative_id = $1 AND u.active`,
      [initiative.id]
    )
    const template = initiativeReminderEmail({
      title: initiative.title,
      slug: initiative.slug,
      date: initiative.date,
      time: initiative.time,
      location: initiative.location,
    })
    for (const participant of participants) {
      if (await dispatchEmail(db, { to: participant.email, ...template })) emails++
    }
  }

  if (due.length > 0) {
    console.log(`[initiatives] Reminders: ${emails} emails for ${due.length} initiatives`)
  }
  return { initiatives: due.length, emails }
}
