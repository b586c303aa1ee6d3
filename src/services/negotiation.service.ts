import { DomainError } from '../types/error.types';
import { ClaimTransition } from '../types/listing.types';
import { NotificationPort } from '../types/notification.types';
import { ListingTransactor } from '../repositories/listing.transactor';
import { Result, err, ok } from '../utils/result';
import { describeDomainError } from '../utils/domain-error';
import { applyClaimTransition, applyCommittingTransition } from './claim-transitions';
import { ListingPublisher, notifySafely } from './listing-publisher';
import { logger } from '../config/logger';

/**
 * Negotiation Service
 *
 * Pickup-time renegotiation between owner and claimant:
 * PENDING → (owner proposes) → RESCHEDULE_PENDING → (claimant answers) →
 * RESCHEDULE_ACCEPTED | RESCHEDULE_DECLINED.
 *
 * Both steps are guarded on the claim's source state, so a stale button press
 * against a claim resolved in the meantime fails with InvalidState.
 */
export class NegotiationService {
  constructor(
    private transactor: ListingTransactor,
    private notifier: NotificationPort,
    private publisher: ListingPublisher
  ) {}

  /**
   * Owner counter-proposes a pickup time
   */
  async proposeNewTime(
    listingId: string,
    claimId: string,
    newTime: string
  ): Promise<Result<ClaimTransition, DomainError>> {
    logger.info('Proposing new pickup time', { listingId, claimId });

    const proposedTime = newTime.trim();
    if (!proposedTime) {
      return err({ kind: 'ValidationError', issues: ['newTime: New time is required'] });
    }

    const result = await this.transactor.run(listingId, (listing, now) => {
      const applied = applyClaimTransition(listing, claimId, 'propose_reschedule', now, { proposedTime });
      if (!applied.ok) return applied;
      return ok({ next: applied.value.next, out: applied.value.claim });
    });

    if (!result.ok) {
      logger.debug('Reschedule not proposed', { listingId, claimId, reason: describeDomainError(result.error) });
      return result;
    }

    const { listing, out: claim } = result.value;
    logger.info('Reschedule proposed', {
      listingId,
      claimId,
      originalTime: claim.requestedPickup,
      proposedTime,
    });

    await notifySafely('reschedule proposed', { listingId, claimId }, () =>
      this.notifier.notifyClaimantRescheduleProposed(listing, claim, proposedTime)
    );

    return ok({ listing, claim });
  }

  /**
   * Claimant accepts or declines the proposed time
   *
   * Accepting runs the same stock check as approval and replaces the requested
   * pickup with the proposed one. Declining commits nothing, so the quantity
   * stays free for any new claim (including one from the same claimant).
   */
  async respondToReschedule(
    listingId: string,
    claimId: string,
    accept: boolean
  ): Promise<Result<ClaimTransition, DomainError>> {
    logger.info('Responding to reschedule', { listingId, claimId, accept });

    const result = await this.transactor.run(listingId, (listing, now) => {
      if (!accept) {
        const declined = applyClaimTransition(listing, claimId, 'decline_reschedule', now);
        if (!declined.ok) return declined;
        return ok({ next: declined.value.next, out: declined.value.claim });
      }

      const target = listing.claims.find((claim) => claim.id === claimId);
      const patch = target?.proposedTime
        ? { requestedPickup: target.proposedTime, originalPickup: target.requestedPickup }
        : {};

      const accepted = applyCommittingTransition(listing, claimId, 'accept_reschedule', now, patch);
      if (!accepted.ok) return accepted;
      return ok({ next: accepted.value.next, out: accepted.value.claim });
    });

    if (!result.ok) {
      logger.debug('Reschedule response not applied', {
        listingId,
        claimId,
        reason: describeDomainError(result.error),
      });
      return result;
    }

    const { out: claim } = result.value;
    let { listing } = result.value;

    logger.info(accept ? 'Reschedule accepted' : 'Reschedule declined', {
      listingId,
      claimId,
      pickup: claim.requestedPickup,
    });

    await notifySafely('reschedule response', { listingId, claimId }, () =>
      this.notifier.notifyOwnerRescheduleResponse(listing, claim, accept)
    );

    if (accept) {
      listing = await this.publisher.publish(listing);
    }

    return ok({ listing, claim });
  }
}
