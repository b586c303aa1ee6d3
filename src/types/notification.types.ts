/**
 * Outbound notification contract implemented by the chat transport
 */
import { Claim, Listing } from './listing.types';

export type ClaimDecision = 'approved' | 'rejected';

export interface NotificationPort {
  notifyOwnerNewClaim(listing: Listing, claim: Claim): Promise<void>;
  notifyClaimantDecision(listing: Listing, claim: Claim, decision: ClaimDecision): Promise<void>;
  notifyClaimantRescheduleProposed(listing: Listing, claim: Claim, proposedTime: string): Promise<void>;
  notifyOwnerRescheduleResponse(listing: Listing, claim: Claim, accepted: boolean): Promise<void>;
  notifyOwnerClaimCancelled(listing: Listing, claim: Claim): Promise<void>;
  /**
   * Create or refresh the public post for a listing.
   * Returns the transport's handle for the post.
   */
  publishOrUpdateListingPost(listing: Listing): Promise<string>;
  // Re-announce a still-open listing that already has a post
  bumpListingPost(listing: Listing): Promise<void>;
}

// Webhook event envelope
export type NotificationEvent =
  | { event: 'owner.new_claim'; listing: Listing; claim: Claim }
  | { event: 'claimant.decision'; listing: Listing; claim: Claim; decision: ClaimDecision }
  | { event: 'claimant.reschedule_proposed'; listing: Listing; claim: Claim; proposedTime: string }
  | { event: 'owner.reschedule_response'; listing: Listing; claim: Claim; accepted: boolean }
  | { event: 'owner.claim_cancelled'; listing: Listing; claim: Claim }
  | { event: 'listing.publish'; listing: Listing }
  | { event: 'listing.bump'; listing: Listing };
