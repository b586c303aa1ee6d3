import { Claim, Listing } from '../types/listing.types';
import { ClaimDecision, NotificationPort } from '../types/notification.types';
import { logger } from '../config/logger';

/**
 * NotificationPort that only logs
 *
 * Used when no chat transport webhook is configured. The post handle is
 * derived from the listing id so it stays stable across republishes.
 */
export class LoggingNotificationPort implements NotificationPort {
  async notifyOwnerNewClaim(listing: Listing, claim: Claim): Promise<void> {
    logger.info('Notify owner: new claim', {
      ownerId: listing.ownerId,
      listingId: listing.id,
      claimId: claim.id,
      qty: claim.qty,
      pickup: claim.requestedPickup,
    });
  }

  async notifyClaimantDecision(listing: Listing, claim: Claim, decision: ClaimDecision): Promise<void> {
    logger.info('Notify claimant: decision', {
      claimantId: claim.claimantId,
      listingId: listing.id,
      claimId: claim.id,
      decision,
    });
  }

  async notifyClaimantRescheduleProposed(listing: Listing, claim: Claim, proposedTime: string): Promise<void> {
    logger.info('Notify claimant: reschedule proposed', {
      claimantId: claim.claimantId,
      listingId: listing.id,
      claimId: claim.id,
      originalTime: claim.requestedPickup,
      proposedTime,
    });
  }

  async notifyOwnerRescheduleResponse(listing: Listing, claim: Claim, accepted: boolean): Promise<void> {
    logger.info('Notify owner: reschedule response', {
      ownerId: listing.ownerId,
      listingId: listing.id,
      claimId: claim.id,
      accepted,
    });
  }

  async notifyOwnerClaimCancelled(listing: Listing, claim: Claim): Promise<void> {
    logger.info('Notify owner: claim cancelled', {
      ownerId: listing.ownerId,
      listingId: listing.id,
      claimId: claim.id,
    });
  }

  async publishOrUpdateListingPost(listing: Listing): Promise<string> {
    logger.info('Publish listing post', {
      listingId: listing.id,
      status: listing.status,
    });
    return listing.externalRef ?? `post:${listing.id}`;
  }

  async bumpListingPost(listing: Listing): Promise<void> {
    logger.info('Bump listing post', {
      listingId: listing.id,
      externalRef: listing.externalRef,
    });
  }
}
