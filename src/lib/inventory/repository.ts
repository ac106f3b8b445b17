import type { Db } from '../db'
import { permissions, type RoleName } from '../admin'
import { getConfig } from '../config'
import { ConflictError, ForbiddenError, NotFoundError } from '../errors'
import { dispatchEmail } from '../jobs'
import { inventoryApprovedEmail, inventoryRejectedEmail } from '../email-templates'
import { isSectionResponsible } from '../geo/sections'
import {
  isVisible,
  resolvedReportPlan,
  transition,
  type ItemAction,
  type ItemStatus,
} from './status'

export type Actor = { id: number; roles: RoleName[] }

export type ItemView = {
  id: number
  latitude: number
  longitude: number
  description: string | null
  address: string | null
  image_path: string | null
  location_source: string | null
  status: ItemStatus
  importance_count: number
  resolved_count: number
  share_count: number
  reporter_id: number | null
  section_id: number | null
  created_at: Date
  category: string | null
  category_name: string | null
  icon: string | null
  subcategory: string | null
  subcategory_name: string | null
  has_voted: boolean
  has_resolved: boolean
}

export type NewItem = {
  categoryCode: string
  subcategoryCode: string | null
  description: string | null
  latitude: number
  longitude: number
  address: string | null
  imagePath: string | null
  imageGpsLatitude: number | null
  imageGpsLongitude: number | null
  locationSource: string
  reporterId: number
}

export type Page<T> = { items: T[]; total: number; page: number; pages: number }

// $1 is the viewing user id (or null)
const ITEM_SELECT = `
  SELECT i.id, i.latitude, i.longitude, i.description, i.address, i.image_path, i.location_source,
         i.status, i.importance_count, i.resolved_count, i.share_count, i.reporter_id, i.section_id,
         i.created_at,
         COALESCE(mc.code, i.category) AS category, mc.name AS category_name, mc.icon,
         COALESCE(sc.code, i.subcategory) AS subcategory, sc.name AS subcategory_name,
         ($1::int IS NOT NULL AND EXISTS (
           SELECT 1 FROM inventory_votes v WHERE v.item_id = i.id AND v.user_id = $1)) AS has_voted,
         ($1::int IS NOT NULL AND EXISTS (
           SELECT 1 FROM inventory_resolved r WHERE r.item_id = i.id AND r.user_id = $1)) AS has_resolved
  FROM inventory_items i
  LEFT JOIN inventory_item_categories mic ON mic.item_id = i.id AND mic.is_primary
  LEFT JOIN inventory_categories mc ON mc.id = mic.category_id
  LEFT JOIN inventory_item_categories sic ON sic.item_id = i.id AND NOT sic.is_primary
  LEFT JOIN inventory_categories sc ON sc.id = sic.category_id`

const pageCount = (total: number, perPage: number) => Math.ceil(total / perPage)

export async function createItem(db: Db, item: NewItem): Promise<number> {
  const [row] = await db.query<{ id: number }>(
    `INSERT INTO inventory_items
       (category, subcategory, description, latitude, longitude, address, image_path,
        image_gps_latitude, image_gps_longitude, location_source, status, reporter_id)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, 'pending', $11)
     RETURNING id`,
    [
      item.categoryCode,
      item.subcategoryCode,
      item.description,
      item.latitude,
      item.longitude,
      item.address,
      item.imagePath,
      item.imageGpsLatitude,
      item.imageGpsLongitude,
      item.locationSource,
      item.reporterId,
    ]
  )
  return row.id
}

export async function setItemSection(db: Db, itemId: number, sectionId: number) {
  await db.query('UPDATE inventory_items SET section_id = $2 WHERE id = $1', [itemId, sectionId])
}

export async function getItem(db: Db, id: number, viewerId: number | null = null): Promise<ItemView | null> {
  const rows = await db.query<ItemView>(`${ITEM_SELECT} WHERE i.id = $2`, [viewerId, id])
  return rows[0] ?? null
}

/**
 * An item as seen by `viewer`. Items that are not on the map are only
 * shown to their reporter, moderators and the section's responsibles.
 */
export async function getItemForViewer(db: Db, id: number, viewer: Actor | null): Promise<ItemView> {
  const item = await getItem(db, id, viewer?.id ?? null)
  if (!item) throw new NotFoundError('Item not found')
  if (isVisible(item.status)) return item

  if (viewer) {
    if (item.reporter_id === viewer.id || permissions.canModerate(viewer.roles)) return item
    if (await isSectionResponsible(db, viewer.id, item.section_id)) return item
  }
  throw new NotFoundError('Item not found')
}

export async function listVisibleItems(
  db: Db,
  filters: { category?: string | null; subcategory?: string | null; userId?: number | null } = {}
): Promise<ItemView[]> {
  return db.query<ItemView>(
    `${ITEM_SELECT}
     WHERE i.status = 'approved'
       AND ($2::text IS NULL OR COALESCE(mc.code, i.category) = $2)
       AND ($3::text IS NULL OR COALESCE(sc.code, i.subcategory) = $3)
     ORDER BY i.importance_count DESC, i.created_at DESC`,
    [filters.userId ?? null, filters.category || null, filters.subcategory || null]
  )
}

/** One vote per user. Returns the new importance count. */
export async function voteItem(db: Db, itemId: number, userId: number): Promise<number> {
  return db.transaction(async tx => {
    const [item] = await tx.query<{ id: number; status: ItemStatus }>(
      'SELECT id, status FROM inventory_items WHERE id = $1 FOR UPDATE',
      [itemId]
    )
    if (!item) throw new NotFoundError('Item not found')
    if (!isVisible(item.status)) throw new ConflictError('Only approved items can be voted')

    const inserted = await tx.query(
      `INSERT INTO inventory_votes (item_id, user_id) VALUES ($1, $2)
       ON CONFLICT (item_id, user_id) DO NOTHING RETURNING id`,
      [itemId, userId]
    )
    if (inserted.length === 0) throw new ConflictError('You have already voted for this item')

    const [updated] = await tx.query<{ importance_count: number }>(
      'UPDATE inventory_items SET importance_count = importance_count + 1 WHERE id = $1 RETURNING importance_count',
      [itemId]
    )
    return updated.importance_count
  })
}

export type ResolvedReportResult = {
  status: ItemStatus
  importanceCount: number
  resolvedCount: number
  autoResolved: boolean
  message: string
}

/**
 * Record that a user saw the issue gone. Removes their vote and resolves
 * the item once enough users agree.
 */
export async function addResolvedReport(
  db: Db,
  itemId: number,
  userId: number,
  threshold = getConfig().inventoryAutoResolveThreshold
): Promise<ResolvedReportResult> {
  const result = await db.transaction(async tx => {
    const [item] = await tx.query<{ status: ItemStatus; importance_count: number; resolved_count: number }>(
      'SELECT status, importance_count, resolved_count FROM inventory_items WHERE id = $1 FOR UPDATE',
      [itemId]
    )
    if (!item) throw new NotFoundError('Item not found')

    const [flags] = await tx.query<{ already_reported: boolean; has_voted: boolean }>(
      `SELECT EXISTS (SELECT 1 FROM inventory_resolved WHERE item_id = $1 AND user_id = $2) AS already_reported,
              EXISTS (SELECT 1 FROM inventory_votes WHERE item_id = $1 AND user_id = $2) AS has_voted`,
      [itemId, userId]
    )

    const plan = resolvedReportPlan(
      {
        status: item.status,
        importanceCount: item.importance_count,
        resolvedCount: item.resolved_count,
        alreadyReported: flags.already_reported,
        hasVoted: flags.has_voted,
      },
      threshold
    )
    if (!plan.ok) throw new ConflictError(plan.message)

    await tx.query('INSERT INTO inventory_resolved (item_id, user_id) VALUES ($1, $2)', [itemId, userId])
    if (plan.removeVote) {
      await tx.query('DELETE FROM inventory_votes WHERE item_id = $1 AND user_id = $2', [itemId, userId])
    }
    await tx.query(
      `UPDATE inventory_items
       SET importance_count = $2, resolved_count = $3, status = $4, updated_at = NOW()
       WHERE id = $1`,
      [itemId, plan.importanceCount, plan.resolvedCount, plan.status]
    )

    return {
      status: plan.status,
      importanceCount: plan.importanceCount,
      resolvedCount: plan.resolvedCount,
      autoResolved: plan.autoResolved,
      message: plan.message,
    }
  })

  if (result.autoResolved) {
    console.log(`[inventory] Item ${itemId} auto-resolved after ${result.resolvedCount} reports`)
  }
  return result
}

export async function shareItem(db: Db, itemId: number): Promise<number> {
  const [row] = await db.query<{ share_count: number }>(
    `UPDATE inventory_items SET share_count = share_count + 1
     WHERE id = $1 AND status = 'approved' RETURNING share_count`,
    [itemId]
  )
  if (!row) throw new NotFoundError('Item not found')
  return row.share_count
}

/**
 * Moderators may apply any action. Section responsibles may approve and
 * resolve items in their own sections.
 */
export async function canActOnItem(db: Db, actor: Actor, action: ItemAction, sectionId: number | null) {
  if (permissions.canModerate(actor.roles)) return true
  if (action !== 'approve' && action !== 'resolve') return false
  if (!actor.roles.includes('section_responsible')) return false
  return isSectionResponsible(db, actor.id, sectionId)
}

export async function transitionItem(
  db: Db,
  itemId: number,
  action: ItemAction,
  actor: Actor,
  reason: string | null = null
): Promise<{ status: ItemStatus; message: string }> {
  const [item] = await db.query<{
    status: ItemStatus
    section_id: number | null
    reporter_email: string | null
    category_name: string | null
  }>(
    `SELECT i.status, i.section_id, u.email AS reporter_email,
            COALESCE(mc.name, i.category) AS category_name
     FROM inventory_items i
     LEFT JOIN users u ON u.id = i.reporter_id
     LEFT JOIN inventory_item_categories mic ON mic.item_id = i.id AND mic.is_primary
     LEFT JOIN inventory_categories mc ON mc.id = mic.category_id
     WHERE i.id = $1`,
    [itemId]
  )
  if (!item) throw new NotFoundError('Item not found')

  if (!(await canActOnItem(db, actor, action, item.section_id))) {
    throw new ForbiddenError(`You cannot ${action} this item`)
  }

  const next = transition(item.status, action)
  if (!next.ok) throw new ConflictError(next.message)

  // Guard on the old status so concurrent moderators can't both win
  const updated = await db.query(
    'UPDATE inventory_items SET status = $3, updated_at = NOW() WHERE id = $1 AND status = $2 RETURNING id',
    [itemId, item.status, next.status]
  )
  if (updated.length === 0) throw new ConflictError('Item was modified, please reload')

  console.log(`[inventory] Item ${itemId}: ${item.status} -> ${next.status} by user ${actor.id}`)

  if (item.reporter_email && (action === 'approve' || action === 'reject')) {
    const categoryName = item.category_name ?? 'incidència'
    const template = action === 'approve'
      ? inventoryApprovedEmail({ itemId, categoryName })
      : inventoryRejectedEmail({ itemId, categoryName, reason })
    await dispatchEmail(db, { to: item.reporter_email, ...template })
  }

  return { status: next.status, message: next.message }
}

export type DashboardStats = { total: number; pending: number; approved: number; resolved: number }

/**
 * Items in the given sections, newest first. `sectionIds` null means
 * every section.
 */
export async function sectionDashboard(
  db: Db,
  sectionIds: number[] | null,
  { status = null, page = 1, perPage = 20 }: { status?: ItemStatus | null; page?: number; perPage?: number } = {}
): Promise<Page<ItemView> & { stats: DashboardStats }> {
  if (sectionIds !== null && sectionIds.length === 0) {
    return { items: [], total: 0, page, pages: 0, stats: { total: 0, pending: 0, approved: 0, resolved: 0 } }
  }

  const [stats] = await db.query<DashboardStats>(
    `SELECT COUNT(*)::int AS total,
            COUNT(*) FILTER (WHERE status = 'pending')::int AS pending,
            COUNT(*) FILTER (WHERE status = 'approved')::int AS approved,
            COUNT(*) FILTER (WHERE status = 'resolved')::int AS resolved
     FROM inventory_items
     WHERE ($1::int[] IS NULL OR section_id = ANY($1))`,
    [sectionIds]
  )

  const [{ count }] = await db.query<{ count: number }>(
    `SELECT COUNT(*)::int AS count FROM inventory_items
     WHERE ($1::int[] IS NULL OR section_id = ANY($1)) AND ($2::text IS NULL OR status = $2)`,
    [sectionIds, status]
  )

  const items = await db.query<ItemView>(
    `${ITEM_SELECT}
     WHERE ($2::int[] IS NULL OR i.section_id = ANY($2)) AND ($3::text IS NULL OR i.status = $3)
     ORDER BY i.created_at DESC
     LIMIT $4 OFFSET $5`,
    [null, sectionIds, status, perPage, (page - 1) * perPage]
  )

  return { items, total: count, page, pages: pageCount(count, perPage), stats }
}

/** Moderation queue. Pending items unless another status is asked for. */
export async function listItemsByStatus(
  db: Db,
  { status = 'pending', page = 1, perPage = 20 }: { status?: ItemStatus; page?: number; perPage?: number } = {}
): Promise<Page<ItemView>> {
  const [{ count }] = await db.query<{ count: number }>(
    'SELECT COUNT(*)::int AS count FROM inventory_items WHERE status = $1',
    [status]
  )
  const items = await db.query<ItemView>(
    `${ITEM_SELECT} WHERE i.status = $2 ORDER BY i.created_at DESC LIMIT $3 OFFSET $4`,
    [null, status, perPage, (page - 1) * perPage]
  )
  return { items, total: count, page, pages: pageCount(count, perPage) }
}

export async function itemCountsByStatus(db: Db): Promise<Record<ItemStatus, number>> {
  const rows = await db.query<{ status: ItemStatus; count: number }>(
    'SELECT status, COUNT(*)::int AS count FROM inventory_items GROUP BY status'
  )
  const counts: Record<ItemStatus, number> = { pending: 0, approved: 0, rejected: 0, resolved: 0, removed: 0 }
  for (const row of rows) counts[row.status] = row.count
  return counts
}
