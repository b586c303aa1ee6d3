import { randomUUID } from 'crypto';
import { DomainError } from '../types/error.types';
import { Claim, ClaimStatus, ClaimTransition, ListingStatus, SubmitClaimInput } from '../types/listing.types';
import { NotificationPort } from '../types/notification.types';
import { ListingRegistry } from '../repositories/listing.registry';
import { ListingTransactor } from '../repositories/listing.transactor';
import { Result, err, ok } from '../utils/result';
import { describeDomainError } from '../utils/domain-error';
import { applyClaimTransition, applyCommittingTransition } from './claim-transitions';
import { remainingQty } from './listing-accounting';
import { ListingPublisher, notifySafely } from './listing-publisher';
import { logger } from '../config/logger';

/**
 * Claim Engine
 *
 * Submits claims against listings and applies the owner's decisions.
 *
 * Concurrency approach:
 * Every operation is a single ListingTransactor run. The stock check happens
 * inside the mutation, so when two requests race on one listing the loser is
 * recomputed against the winner's committed state:
 *
 * Example: listing with 5 units, concurrent claims for 3 and 4, both approved:
 * - Both read committed = 0; the first commit wins
 * - The second commit conflicts, re-reads committed = 3, and fails with
 *   InsufficientStock(remaining = 2)
 *
 * Approval is owner-driven: any pending claim may be approved in any order.
 * The engine guarantees committed ≤ total, not first-come-first-served.
 */
export class ClaimEngine {
  constructor(
    private registry: ListingRegistry,
    private transactor: ListingTransactor,
    private notifier: NotificationPort,
    private publisher: ListingPublisher
  ) {}

  /**
   * Submit a claim (status PENDING)
   *
   * Pending claims do not hold stock; the stock check is repeated on approval.
   */
  async submitClaim(input: SubmitClaimInput): Promise<Result<ClaimTransition, DomainError>> {
    logger.info('Submitting claim', {
      listingId: input.listingId,
      claimantId: input.claimantId,
      qty: input.qty,
    });

    const pickupTime = input.pickupTime.trim();
    if (!pickupTime) {
      return err({ kind: 'ValidationError', issues: ['pickupTime: Pickup time is required'] });
    }

    const result = await this.transactor.run(input.listingId, (listing, now) => {
      if (listing.status !== ListingStatus.OPEN) {
        return err({ kind: 'NotAvailable', listingId: listing.id, status: listing.status });
      }

      if (!Number.isInteger(input.qty) || input.qty < 1) {
        return err({ kind: 'InvalidQuantity', message: 'Quantity must be a positive whole number.' });
      }

      const remaining = remainingQty(listing);
      if (input.qty > remaining) {
        return err({ kind: 'InsufficientStock', requested: input.qty, remaining });
      }

      const claim: Claim = {
        id: randomUUID(),
        claimantId: input.claimantId,
        claimantName: input.claimantName ?? null,
        qty: input.qty,
        requestedPickup: pickupTime,
        proposedTime: null,
        originalPickup: null,
        status: ClaimStatus.PENDING,
        history: [{ status: ClaimStatus.PENDING, at: now }],
        createdAt: now,
      };

      return ok({ next: { ...listing, claims: [...listing.claims, claim] }, out: claim });
    });

    if (!result.ok) {
      logger.debug('Claim not submitted', {
        listingId: input.listingId,
        reason: describeDomainError(result.error),
      });
      return result;
    }

    const { listing, out: claim } = result.value;

    logger.info('Claim submitted', {
      listingId: listing.id,
      claimId: claim.id,
      qty: claim.qty,
    });

    await notifySafely('new claim', { listingId: listing.id, claimId: claim.id }, () =>
      this.notifier.notifyOwnerNewClaim(listing, claim)
    );

    return ok({ listing, claim });
  }

  /**
   * Approve a pending claim
   *
   * Not idempotent at the API level: approving twice returns InvalidState so a
   * duplicate button press cannot produce a second effect.
   */
  async approve(listingId: string, claimId: string): Promise<Result<ClaimTransition, DomainError>> {
    logger.info('Approving claim', { listingId, claimId });

    const result = await this.transactor.run(listingId, (listing, now) => {
      const applied = applyCommittingTransition(listing, claimId, 'approve', now);
      if (!applied.ok) return applied;
      return ok({ next: applied.value.next, out: applied.value.claim });
    });

    if (!result.ok) {
      logger.debug('Claim not approved', { listingId, claimId, reason: describeDomainError(result.error) });
      return result;
    }

    const { out: claim } = result.value;
    let { listing } = result.value;

    logger.info('Claim approved', {
      listingId,
      claimId,
      qty: claim.qty,
      remaining: remainingQty(listing),
      status: listing.status,
    });

    await notifySafely('claim approved', { listingId, claimId }, () =>
      this.notifier.notifyClaimantDecision(listing, claim, 'approved')
    );
    listing = await this.publisher.publish(listing);

    return ok({ listing, claim });
  }

  /**
   * Reject a pending claim (already-decided claims are immutable)
   */
  async reject(listingId: string, claimId: string): Promise<Result<ClaimTransition, DomainError>> {
    logger.info('Rejecting claim', { listingId, claimId });

    const result = await this.transactor.run(listingId, (listing, now) => {
      const applied = applyClaimTransition(listing, claimId, 'reject', now);
      if (!applied.ok) return applied;
      return ok({ next: applied.value.next, out: applied.value.claim });
    });

    if (!result.ok) {
      logger.debug('Claim not rejected', { listingId, claimId, reason: describeDomainError(result.error) });
      return result;
    }

    const { listing, out: claim } = result.value;
    logger.info('Claim rejected', { listingId, claimId });

    await notifySafely('claim rejected', { listingId, claimId }, () =>
      this.notifier.notifyClaimantDecision(listing, claim, 'rejected')
    );

    return ok({ listing, claim });
  }

  /**
   * Withdraw a claim (claimant only, while PENDING or RESCHEDULE_PENDING)
   */
  async cancelByClaimant(
    listingId: string,
    claimId: string,
    claimantId: string
  ): Promise<Result<ClaimTransition, DomainError>> {
    logger.info('Cancelling claim', { listingId, claimId, claimantId });

    const result = await this.transactor.run(listingId, (listing, now) => {
      const target = listing.claims.find((claim) => claim.id === claimId);
      if (target && target.claimantId !== claimantId) {
        return err({ kind: 'Forbidden', message: 'Only the claimant can cancel this claim' });
      }

      const applied = applyClaimTransition(listing, claimId, 'cancel', now);
      if (!applied.ok) return applied;
      return ok({ next: applied.value.next, out: applied.value.claim });
    });

    if (!result.ok) {
      logger.debug('Claim not cancelled', { listingId, claimId, reason: describeDomainError(result.error) });
      return result;
    }

    const { listing, out: claim } = result.value;
    logger.info('Claim cancelled', { listingId, claimId });

    await notifySafely('claim cancelled', { listingId, claimId }, () =>
      this.notifier.notifyOwnerClaimCancelled(listing, claim)
    );

    return ok({ listing, claim });
  }

  /**
   * Get one claim of a listing
   */
  async getClaim(listingId: string, claimId: string): Promise<Result<ClaimTransition, DomainError>> {
    const listing = await this.registry.get(listingId);
    if (!listing) {
      return err({ kind: 'NotFound', entity: 'listing', id: listingId });
    }

    const claim = listing.claims.find((candidate) => candidate.id === claimId);
    if (!claim) {
      return err({ kind: 'NotFound', entity: 'claim', id: claimId });
    }

    return ok({ listing, claim });
  }
}
