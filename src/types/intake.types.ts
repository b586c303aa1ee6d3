/**
 * Conversation session types (listing intake and claim requests)
 */
import { Claim, Listing } from './listing.types';

// Intake steps, strictly in this order
export enum IntakeStep {
  ITEM = 'ITEM',
  QUANTITY = 'QUANTITY',
  SIZE = 'SIZE',
  EXPIRY = 'EXPIRY',
  LOCATION = 'LOCATION',
  PHOTO = 'PHOTO',
  CONFIRM = 'CONFIRM',
}

export interface IntakeDraft {
  itemName?: string;
  totalQty?: number;
  qtyLabel?: string;
  sizeLabel?: string;
  expiryLabel?: string;
  locationLabel?: string;
  // null once the photo step was skipped
  photoRef?: string | null;
}

export interface IntakeSession {
  userId: string;
  ownerName: string | null;
  step: IntakeStep;
  draft: IntakeDraft;
  startedAt: string;
}

// A single answer from the chat transport
export type IntakeInput = { kind: 'text'; text: string } | { kind: 'photo'; ref: string };

// Claim request steps
export enum ClaimRequestStep {
  QUANTITY = 'QUANTITY',
  PICKUP = 'PICKUP',
}

export interface ClaimRequestSession {
  userId: string;
  claimantName: string | null;
  listingId: string;
  // Remaining stock shown to the user when the request started
  maxQty: number;
  step: ClaimRequestStep;
  qty: number | null;
  startedAt: string;
}

export type ClaimRequestOutcome =
  | { status: 'awaiting'; session: ClaimRequestSession }
  | { status: 'submitted'; claim: Claim; listing: Listing };
