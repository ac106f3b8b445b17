import type { Db } from './db'
import { donationTotals } from './donations'
import { itemCountsByStatus } from './inventory/repository'

export async function dashboardStats(db: Db) {
  const [counts] = await db.query<{ initiatives: number; pending_initiatives: number; users: number; participations: number }>(
    `SELECT
       (SELECT COUNT(*)::int FROM initiatives) AS initiatives,
       (SELECT COUNT(*)::int FROM initiatives WHERE status = 'pending') AS pending_initiatives,
       (SELECT COUNT(*)::int FROM users) AS users,
       (SELECT COUNT(*)::int FROM initiative_participants) AS participations`
  )
  const [inventory, donations] = await Promise.all([itemCountsByStatus(db), donationTotals(db)])

  return {
    initiatives: counts.initiatives,
    pendingInitiatives: counts.pending_initiatives,
    users: counts.users,
    participations: counts.participations,
    inventory,
    donations: { count: donations.count, totalCents: donations.total_cents },
  }
}
