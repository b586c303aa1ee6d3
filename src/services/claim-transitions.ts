import { DomainError } from '../types/error.types';
import { Claim, Listing, ListingStatus } from '../types/listing.types';
import { Result, err, ok } from '../utils/result';
import { ClaimEvent, sourceStatusesFor, transitionClaim } from './claim-state-machine';
import { committedQty } from './listing-accounting';

export interface AppliedTransition {
  next: Listing;
  claim: Claim;
}

// Fields a transition may change besides status and history
type ClaimPatch = Partial<Pick<Claim, 'requestedPickup' | 'proposedTime' | 'originalPickup'>>;

/**
 * Apply a guarded status transition to one claim of a listing snapshot.
 *
 * Returns the next listing (claims log copied, entry re-statused in place,
 * history appended) or `InvalidState` when the claim is not in a source state
 * for `event`. Never mutates `listing`.
 */
export function applyClaimTransition(
  listing: Listing,
  claimId: string,
  event: ClaimEvent,
  now: string,
  patch: ClaimPatch = {}
): Result<AppliedTransition, DomainError> {
  const index = listing.claims.findIndex((claim) => claim.id === claimId);
  const current = listing.claims[index];
  if (!current) {
    return err({ kind: 'NotFound', entity: 'claim', id: claimId });
  }

  const nextStatus = transitionClaim(current.status, event);
  if (nextStatus === null) {
    return err({
      kind: 'InvalidState',
      message: `Claim ${claimId} is ${current.status}; cannot ${event.replace(/_/g, ' ')}`,
      current: current.status,
      expected: sourceStatusesFor(event),
    });
  }

  const claim: Claim = {
    ...current,
    ...patch,
    status: nextStatus,
    history: [...current.history, { status: nextStatus, at: now }],
  };

  const claims = listing.claims.slice();
  claims[index] = claim;

  return ok({ next: { ...listing, claims }, claim });
}

/**
 * Apply a transition that commits stock (approve, accept reschedule).
 *
 * Re-derives committed quantity from the snapshot, excluding the target claim,
 * and refuses when adding it would exceed the total.
 */
export function applyCommittingTransition(
  listing: Listing,
  claimId: string,
  event: Extract<ClaimEvent, 'approve' | 'accept_reschedule'>,
  now: string,
  patch: ClaimPatch = {}
): Result<AppliedTransition, DomainError> {
  const applied = applyClaimTransition(listing, claimId, event, now, patch);
  if (!applied.ok) return applied;

  if (listing.status === ListingStatus.EXPIRED) {
    return err({ kind: 'NotAvailable', listingId: listing.id, status: listing.status });
  }

  const remaining = listing.totalQty - committedQty(listing, claimId);
  if (applied.value.claim.qty > remaining) {
    return err({ kind: 'InsufficientStock', requested: applied.value.claim.qty, remaining });
  }

  return applied;
}
