export const ITEM_STATUSES = ['pending', 'approved', 'rejected', 'resolved', 'removed'] as const
export type ItemStatus = (typeof ITEM_STATUSES)[number]

export const ITEM_ACTIONS = ['approve', 'reject', 'resolve', 'remove'] as const
export type ItemAction = (typeof ITEM_ACTIONS)[number]

export type TransitionResult = { ok: boolean; status: ItemStatus; message: string }

const TARGET: Record<ItemAction, ItemStatus> = {
  approve: 'approved',
  reject: 'rejected',
  resolve: 'resolved',
  remove: 'removed',
}

/** Only approved items are shown on the public map. */
export const isVisible = (status: ItemStatus) => status === 'approved'

export const canApprove = (status: ItemStatus) => status === 'pending'
export const canReject = (status: ItemStatus) => status === 'pending'
export const canResolve = (status: ItemStatus) => status === 'approved'

export function canApply(action: ItemAction, status: ItemStatus): boolean {
  switch (action) {
    case 'approve':
      return canApprove(status)
    case 'reject':
      return canReject(status)
    case 'resolve':
      return canResolve(status)
    case 'remove':
      return true
  }
}

export function transition(status: ItemStatus, action: ItemAction): TransitionResult {
  if (!canApply(action, status)) {
    return { ok: false, status, message: `Cannot ${action} an item that is ${status}` }
  }
  return { ok: true, status: TARGET[action], message: `Item ${TARGET[action]}` }
}

export type ResolvedReportState = {
  status: ItemStatus
  importanceCount: number
  resolvedCount: number
  alreadyReported: boolean
  hasVoted: boolean
}

export type ResolvedReportPlan =
  | { ok: false; message: string }
  | {
      ok: true
      removeVote: boolean
      importanceCount: number
      resolvedCount: number
      autoResolved: boolean
      status: ItemStatus
      message: string
    }

/**
 * Decide the outcome of a user saying "it's gone". A user who voted the
 * item up loses that vote. Reaching `threshold` reports resolves an
 * approved item.
 */
export function resolvedReportPlan(state: ResolvedReportState, threshold: number): ResolvedReportPlan {
  if (state.alreadyReported) {
    return { ok: false, message: 'You have already reported this item as resolved' }
  }
  if (state.status === 'resolved') {
    return { ok: false, message: 'This item is already resolved' }
  }

  const importanceCount = state.hasVoted ? Math.max(0, state.importanceCount - 1) : state.importanceCount
  const resolvedCount = state.resolvedCount + 1
  const autoResolved = resolvedCount >= threshold && canResolve(state.status)

  return {
    ok: true,
    removeVote: state.hasVoted,
    importanceCount,
    resolvedCount,
    autoResolved,
    status: autoResolved ? 'resolved' : state.status,
    message: autoResolved
      ? 'Thanks! The item has been marked as resolved'
      : 'Thanks! Your report has been recorded',
  }
}
