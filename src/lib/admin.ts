/**
 * Role and permission utilities
 */

import type { Db } from './db'
import { getConfig } from './config'

export const ROLE_NAMES = ['admin', 'user', 'moderator', 'section_responsible'] as const
export type RoleName = (typeof ROLE_NAMES)[number]

const ROLE_DESCRIPTIONS: Record<RoleName, string> = {
  admin: 'Administrator',
  user: 'Regular User',
  moderator: 'Moderator',
  section_responsible: 'Section Responsible',
}

const isRoleName = (value: string): value is RoleName =>
  (ROLE_NAMES as readonly string[]).includes(value)

/**
 * Check if email belongs to a configured admin (ADMIN_EMAIL or ADMIN_EMAILS)
 */
export function isAdminEmail(email: string | null | undefined): boolean {
  if (!email) return false
  const config = getConfig()
  const normalized = email.toLowerCase()
  return normalized === config.adminEmail || config.adminEmails.includes(normalized)
}

export async function getUserRoles(db: Db, userId: number): Promise<RoleName[]> {
  const rows = await db.query<{ name: string }>(
    `SELECT r.name FROM roles r JOIN roles_users ru ON ru.role_id = r.id
     WHERE ru.user_id = $1 ORDER BY r.name`,
    [userId]
  )
  return rows.map(r => r.name).filter(isRoleName)
}

/**
 * Permission helpers
 */
export const permissions = {
  canAccessAdmin: (roles: RoleName[]) => roles.includes('admin'),
  canModerate: (roles: RoleName[]) => roles.includes('admin') || roles.includes('moderator'),
}

export async function ensureRoles(db: Db): Promise<number> {
  let created = 0
  for (const name of ROLE_NAMES) {
    const rows = await db.query(
      `INSERT INTO roles (name, description) VALUES ($1, $2)
       ON CONFLICT (name) DO NOTHING RETURNING id`,
      [name, ROLE_DESCRIPTIONS[name]]
    )
    created += rows.length
  }
  return created
}

export async function assignRole(db: Db, userId: number, role: RoleName) {
  await db.query(
    `INSERT INTO roles_users (user_id, role_id)
     SELECT $1, id FROM roles WHERE name = $2
     ON CONFLICT DO NOTHING`,
    [userId, role]
  )
}

export async function removeRole(db: Db, userId: number, role: RoleName) {
  await db.query(
    `DELETE FROM roles_users WHERE user_id = $1
     AND role_id = (SELECT id FROM roles WHERE name = $2)`,
    [userId, role]
  )
}
