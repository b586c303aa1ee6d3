/**
 * Listing and claim domain types
 */

// Listing status enum (derived from claims, never set by callers)
export enum ListingStatus {
  OPEN = 'OPEN',
  FULLY_COMMITTED = 'FULLY_COMMITTED',
  EXPIRED = 'EXPIRED',
}

// Claim status enum
export enum ClaimStatus {
  PENDING = 'PENDING',
  APPROVED = 'APPROVED',
  REJECTED = 'REJECTED',
  RESCHEDULE_PENDING = 'RESCHEDULE_PENDING',
  RESCHEDULE_ACCEPTED = 'RESCHEDULE_ACCEPTED',
  RESCHEDULE_DECLINED = 'RESCHEDULE_DECLINED',
  CANCELLED = 'CANCELLED',
}

export interface ClaimHistoryEntry {
  status: ClaimStatus;
  at: string;
}

export interface Claim {
  id: string;
  claimantId: string;
  claimantName: string | null;
  qty: number;
  requestedPickup: string;
  // Set while a reschedule is proposed; kept afterwards for audit
  proposedTime: string | null;
  // Pickup time the claimant originally asked for, once replaced by an accepted reschedule
  originalPickup: string | null;
  status: ClaimStatus;
  history: ClaimHistoryEntry[];
  createdAt: string;
}

/**
 * Persisted listing record.
 *
 * `claims` is an append-only log in arrival order; entries are re-statused, never removed.
 * Timestamps are ISO strings so the record serializes as-is.
 */
export interface Listing {
  id: string;
  ownerId: string;
  ownerName: string | null;
  itemName: string;
  qtyLabel: string;
  sizeLabel: string;
  expiryLabel: string;
  locationLabel: string;
  photoRef: string | null;
  totalQty: number;
  claims: Claim[];
  status: ListingStatus;
  externalRef: string | null;
  createdAt: string;
  updatedAt: string;
  expiredAt: string | null;
}

// Create listing input (complete intake draft)
export interface ListingDraft {
  ownerId: string;
  ownerName?: string | null;
  itemName: string;
  totalQty: number;
  qtyLabel?: string;
  sizeLabel: string;
  expiryLabel: string;
  locationLabel: string;
  photoRef?: string | null;
}

// Listing availability breakdown
export interface ListingAvailability {
  totalQuantity: number;
  committedQuantity: number;
  pendingQuantity: number;
  remainingQuantity: number;
}

export interface ListingWithAvailability extends Listing {
  availability: ListingAvailability;
}

// Submit claim input
export interface SubmitClaimInput {
  listingId: string;
  claimantId: string;
  claimantName?: string | null;
  qty: number;
  pickupTime: string;
}

// Result of a claim transition: the committed listing and the claim as stored in it
export interface ClaimTransition {
  listing: Listing;
  claim: Claim;
}

// One row of the yearly export
export interface ListingExportRow {
  listingId: string;
  itemName: string;
  status: ListingStatus;
  ownerId: string;
  // Claimants of committed claims, in arrival order
  claimedBy: string[];
  createdAt: string;
  // Most recent commitment, or null when nothing is committed
  claimedAt: string | null;
  totalQty: number;
  remaining: number;
  committed: number;
  location: string;
  expiry: string;
}
