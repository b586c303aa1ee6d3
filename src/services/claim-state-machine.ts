import { ClaimStatus } from '../types/listing.types';

/** Events that move a claim between states. */
export type ClaimEvent =
  | 'approve'
  | 'reject'
  | 'propose_reschedule'
  | 'accept_reschedule'
  | 'decline_reschedule'
  | 'cancel';

/** Terminal states never accept a transition. */
export const TERMINAL_CLAIM_STATUSES: ReadonlySet<ClaimStatus> = new Set([
  ClaimStatus.APPROVED,
  ClaimStatus.REJECTED,
  ClaimStatus.RESCHEDULE_ACCEPTED,
  ClaimStatus.RESCHEDULE_DECLINED,
  ClaimStatus.CANCELLED,
]);

/** Statuses whose quantity counts as committed stock. */
export const COMMITTING_CLAIM_STATUSES: ReadonlySet<ClaimStatus> = new Set([
  ClaimStatus.APPROVED,
  ClaimStatus.RESCHEDULE_ACCEPTED,
]);

/** Statuses still waiting on the owner or the claimant. */
export const OPEN_CLAIM_STATUSES: ReadonlySet<ClaimStatus> = new Set([
  ClaimStatus.PENDING,
  ClaimStatus.RESCHEDULE_PENDING,
]);

/**
 * Valid claim transitions.
 * Key: current status → event → next status.
 */
const TRANSITIONS: Partial<Record<ClaimStatus, Partial<Record<ClaimEvent, ClaimStatus>>>> = {
  [ClaimStatus.PENDING]: {
    approve: ClaimStatus.APPROVED,
    reject: ClaimStatus.REJECTED,
    propose_reschedule: ClaimStatus.RESCHEDULE_PENDING,
    cancel: ClaimStatus.CANCELLED,
  },
  [ClaimStatus.RESCHEDULE_PENDING]: {
    accept_reschedule: ClaimStatus.RESCHEDULE_ACCEPTED,
    decline_reschedule: ClaimStatus.RESCHEDULE_DECLINED,
    cancel: ClaimStatus.CANCELLED,
  },
};

/**
 * Attempt a claim transition. Returns the next status, or null when the event
 * is not allowed from `current`.
 */
export function transitionClaim(current: ClaimStatus, event: ClaimEvent): ClaimStatus | null {
  if (TERMINAL_CLAIM_STATUSES.has(current)) {
    return null;
  }
  return TRANSITIONS[current]?.[event] ?? null;
}

/**
 * Statuses from which `event` is allowed (used in error details).
 */
export function sourceStatusesFor(event: ClaimEvent): ClaimStatus[] {
  return Object.values(ClaimStatus).filter((status) => transitionClaim(status, event) !== null);
}
