import { Claim, Listing, ListingAvailability, ListingStatus } from '../types/listing.types';
import { COMMITTING_CLAIM_STATUSES, OPEN_CLAIM_STATUSES } from './claim-state-machine';

const sumQty = (claims: Claim[]): number => claims.reduce((sum, claim) => sum + claim.qty, 0);

/**
 * Quantity committed to approved (or reschedule-accepted) claims
 */
export function committedQty(listing: Listing, excludeClaimId?: string): number {
  return sumQty(
    listing.claims.filter(
      (claim) => claim.id !== excludeClaimId && COMMITTING_CLAIM_STATUSES.has(claim.status)
    )
  );
}

export function remainingQty(listing: Listing): number {
  return listing.totalQty - committedQty(listing);
}

export function availabilityOf(listing: Listing): ListingAvailability {
  const committed = committedQty(listing);
  return {
    totalQuantity: listing.totalQty,
    committedQuantity: committed,
    pendingQuantity: sumQty(listing.claims.filter((claim) => OPEN_CLAIM_STATUSES.has(claim.status))),
    remainingQuantity: listing.totalQty - committed,
  };
}

/**
 * Derive listing status from its claims and expiry mark.
 * Commitment wins over expiry.
 */
export function deriveStatus(listing: Listing): ListingStatus {
  if (committedQty(listing) >= listing.totalQty) return ListingStatus.FULLY_COMMITTED;
  if (listing.expiredAt) return ListingStatus.EXPIRED;
  return ListingStatus.OPEN;
}

export function withDerivedStatus(listing: Listing, now: string): Listing {
  return { ...listing, status: deriveStatus(listing), updatedAt: now };
}
