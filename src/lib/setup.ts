import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import type { Db } from './db'
import { assignRole, ensureRoles } from './admin'
import { runMigrations } from './migrate'
import { hashPassword, verifyPassword } from './users'
import { createInitiative, INITIATIVE_CATEGORIES } from './initiatives'

export const SAMPLE_DATA_FILE = path.resolve(process.cwd(), 'data/sample-initiatives.json')

const sampleInitiatives = z.array(
  z.object({
    title: z.string(),
    description: z.string(),
    location: z.string(),
    category: z.enum(INITIATIVE_CATEGORIES),
    days_from_today: z.number().int(),
    time: z.string().nullable().optional(),
  })
)

/** Username derived from the email's local part. */
export function usernameFromEmail(email: string): string {
  const local = email.split('@')[0].replace(/[^\p{L}\p{N}_.-]/gu, '')
  return local.length >= 3 ? local.slice(0, 50) : 'admin'
}

/**
 * Create the admin account, or repair its password when it no longer
 * matches. Returns the user id.
 */
export async function ensureAdminUser(db: Db, email: string, password: string): Promise<{ id: number; created: boolean; passwordReset: boolean }> {
  const [existing] = await db.query<{ id: number; password_hash: string | null }>(
    'SELECT id, password_hash FROM users WHERE lower(email) = lower($1)',
    [email]
  )

  if (existing) {
    let passwordReset = false
    if (!(await verifyPassword(password, existing.password_hash))) {
      await db.query('UPDATE users SET password_hash = $2 WHERE id = $1', [existing.id, await hashPassword(password)])
      passwordReset = true
    }
    await assignRole(db, existing.id, 'admin')
    return { id: existing.id, created: false, passwordReset }
  }

  const base = usernameFromEmail(email)
  const [taken] = await db.query('SELECT 1 FROM users WHERE lower(username) = lower($1)', [base])
  const username = taken ? `${base}-admin` : base

  const [user] = await db.query<{ id: number }>(
    `INSERT INTO users (email, username, password_hash, active, accept_terms, confirmed_at)
     VALUES (lower($1), $2, $3, TRUE, TRUE, NOW())
     RETURNING id`,
    [email, username, await hashPassword(password)]
  )
  await assignRole(db, user.id, 'admin')
  return { id: user.id, created: true, passwordReset: false }
}

export async function initDb(db: Db, admin: { email: string; password: string | undefined }) {
  const applied = await runMigrations(db)
  const rolesCreated = await ensureRoles(db)

  if (!admin.password) {
    console.warn('[cli] ADMIN_PASSWORD not set, skipping admin user')
    return { applied, rolesCreated, admin: null }
  }
  const adminUser = await ensureAdminUser(db, admin.email, admin.password)
  return { applied, rolesCreated, admin: adminUser }
}

/** YYYY-MM-DD of `today` shifted by `days`, in UTC. */
export function isoDateFromToday(days: number, today = new Date()): string {
  const date = new Date(Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), today.getUTCDate() + days))
  return date.toISOString().slice(0, 10)
}

/**
 * Insert the sample initiatives as approved, skipping titles that are
 * already present.
 */
export async function createSampleData(db: Db, creatorId: number, file = SAMPLE_DATA_FILE, today = new Date()) {
  const samples = sampleInitiatives.parse(JSON.parse(fs.readFileSync(file, 'utf8')))
  let created = 0

  for (const sample of samples) {
    const [existing] = await db.query('SELECT 1 FROM initiatives WHERE title = $1', [sample.title])
    if (existing) continue

    await createInitiative(
      db,
      {
        title: sample.title,
        description: sample.description,
        location: sample.location,
        category: sample.category,
        date: isoDateFromToday(sample.days_from_today, today),
        time: sample.time ?? null,
      },
      creatorId,
      'approved'
    )
    created++
  }
  return { created, total: samples.length }
}
