import crypto from 'crypto'
import bcrypt from 'bcryptjs'
import { z } from 'zod'
import type { Db } from './db'
import { assignRole } from './admin'
import { ConflictError } from './errors'

export type UserRow = {
  id: number
  email: string
  username: string
  password_hash: string | null
  active: boolean
  created_at: Date
}

export const PASSWORD_MIN_LENGTH = 8
const RESET_TOKEN_TTL_MS = 60 * 60 * 1000

export const signupInput = z.object({
  email: z.string().trim().toLowerCase().email(),
  username: z
    .string()
    .trim()
    .min(3)
    .max(50)
    .regex(/^[\p{L}\p{N}_.-]+$/u, 'Only letters, numbers, dots, dashes and underscores'),
  password: z.string().min(PASSWORD_MIN_LENGTH).max(200),
  acceptTerms: z.literal(true, { errorMap: () => ({ message: 'You must accept the terms' }) }),
})

export type SignupInput = z.infer<typeof signupInput>

const USER_COLUMNS = 'id, email, username, password_hash, active, created_at'

export async function findUserByEmail(db: Db, email: string): Promise<UserRow | null> {
  const rows = await db.query<UserRow>(
    `SELECT ${USER_COLUMNS} FROM users WHERE lower(email) = lower($1)`,
    [email]
  )
  return rows[0] ?? null
}

export async function findUserById(db: Db, id: number): Promise<UserRow | null> {
  const rows = await db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id])
  return rows[0] ?? null
}

export const hashPassword = (password: string) => bcrypt.hash(password, 12)

export async function verifyPassword(password: string, hash: string | null): Promise<boolean> {
  if (!hash) return false
  return bcrypt.compare(password, hash)
}

export async function createUser(db: Db, input: SignupInput): Promise<UserRow> {
  const taken = await db.query<{ email: string; username: string }>(
    'SELECT email, username FROM users WHERE lower(email) = lower($1) OR lower(username) = lower($2)',
    [input.email, input.username]
  )
  if (taken.some(u => u.email.toLowerCase() === input.email)) {
    throw new ConflictError('An account with this email already exists')
  }
  if (taken.length > 0) {
    throw new ConflictError('This username is already taken')
  }

  const passwordHash = await hashPassword(input.password)
  return db.transaction(async tx => {
    const [user] = await tx.query<UserRow>(
      `INSERT INTO users (email, username, password_hash, accept_terms, confirmed_at)
       VALUES ($1, $2, $3, TRUE, NOW())
       RETURNING ${USER_COLUMNS}`,
      [input.email, input.username, passwordHash]
    )
    await assignRole(tx, user.id, 'user')
    return user
  })
}

export const hashResetToken = (token: string) =>
  crypto.createHash('sha256').update(token).digest('hex')

/**
 * Store a one-hour reset token for the user and return the raw token.
 * Only its hash is persisted.
 */
export async function createPasswordResetToken(db: Db, userId: number, now = Date.now()): Promise<string> {
  const token = crypto.randomBytes(32).toString('hex')
  await db.query(
    'UPDATE users SET reset_token_hash = $1, reset_token_expires_at = $2 WHERE id = $3',
    [hashResetToken(token), new Date(now + RESET_TOKEN_TTL_MS), userId]
  )
  return token
}

/** Set a new password if the token is valid. Returns false otherwise. */
export async function resetPassword(db: Db, token: string, password: string): Promise<boolean> {
  const passwordHash = await hashPassword(password)
  const rows = await db.query(
    `UPDATE users SET password_hash = $1, reset_token_hash = NULL, reset_token_expires_at = NULL
     WHERE reset_token_hash = $2 AND reset_token_expires_at > NOW()
     RETURNING id`,
    [passwordHash, hashResetToken(token)]
  )
  return rows.length > 0
}

export type UserListEntry = {
  id: number
  email: string
  username: string
  active: boolean
  created_at: Date
  roles: string[]
}

export async function listUsers(
  db: Db,
  { q = '', page = 1, limit = 20 }: { q?: string; page?: number; limit?: number } = {}
): Promise<{ users: UserListEntry[]; total: number; page: number; pages: number }> {
  const search = q.trim() ? `%${q.trim()}%` : null
  const where = 'WHERE ($1::text IS NULL OR u.email ILIKE $1 OR u.username ILIKE $1)'

  const [{ count }] = await db.query<{ count: number }>(`SELECT COUNT(*)::int AS count FROM users u ${where}`, [search])
  const users = await db.query<UserListEntry>(
    `SELECT u.id, u.email, u.username, u.active, u.created_at,
            COALESCE(array_agg(r.name ORDER BY r.name) FILTER (WHERE r.name IS NOT NULL), '{}') AS roles
     FROM users u
     LEFT JOIN roles_users ru ON ru.user_id = u.id
     LEFT JOIN roles r ON r.id = ru.role_id
     ${where}
     GROUP BY u.id
     ORDER BY u.created_at DESC
     LIMIT $2 OFFSET $3`,
    [search, limit, (page - 1) * limit]
  )
  return { users, total: count, page, pages: Math.ceil(count / limit) }
}
