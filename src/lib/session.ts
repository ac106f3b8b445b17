import { getServerSession } from 'next-auth'
import { authOptions } from './auth'
import { db } from './db'
import { getUserRoles, isAdminEmail, type RoleName } from './admin'
import { ForbiddenError, UnauthorizedError } from './errors'

export type Viewer = {
  id: number
  email: string
  roles: RoleName[]
}

/**
 * The signed-in user with roles, or null. Addresses in ADMIN_EMAIL(S)
 * always carry the admin role.
 */
export async function getViewer(): Promise<Viewer | null> {
  const session = await getServerSession(authOptions)
  const id = Number(session?.user?.id)
  const email = session?.user?.email
  if (!email || !Number.isInteger(id) || id <= 0) return null

  const roles = await getUserRoles(db, id)
  if (isAdminEmail(email) && !roles.includes('admin')) roles.push('admin')
  return { id, email, roles }
}

export async function requireViewer(): Promise<Viewer> {
  const viewer = await getViewer()
  if (!viewer) throw new UnauthorizedError()
  return viewer
}

export async function requireRole(...allowed: RoleName[]): Promise<Viewer> {
  const viewer = await requireViewer()
  if (!viewer.roles.some(role => allowed.includes(role))) {
    throw new ForbiddenError()
  }
  return viewer
}
