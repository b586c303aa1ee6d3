import { DomainError } from '../types/error.types';
import { ListingStatus } from '../types/listing.types';
import { ClaimRequestOutcome, ClaimRequestSession, ClaimRequestStep } from '../types/intake.types';
import { ListingRegistry } from '../repositories/listing.registry';
import { SessionStore } from '../repositories/session.store';
import { Result, err, ok } from '../utils/result';
import { extractQuantity } from '../utils/parsers';
import { remainingQty } from './listing-accounting';
import { ClaimEngine } from './claim.service';
import { logger } from '../config/logger';

/**
 * Claim Request Service
 *
 * Per-user conversation in front of ClaimEngine.submitClaim:
 * QUANTITY (checked against the remaining stock shown at start) → PICKUP.
 * The stock is checked again, transactionally, when the claim is submitted.
 */
export class ClaimRequestService {
  constructor(
    private sessions: SessionStore<ClaimRequestSession>,
    private registry: ListingRegistry,
    private claimEngine: ClaimEngine
  ) {}

  async start(
    userId: string,
    listingId: string,
    claimantName: string | null = null
  ): Promise<Result<ClaimRequestSession, DomainError>> {
    const listing = await this.registry.get(listingId);
    if (!listing) {
      return err({ kind: 'NotFound', entity: 'listing', id: listingId });
    }

    const remaining = remainingQty(listing);
    if (listing.status !== ListingStatus.OPEN || remaining <= 0) {
      return err({ kind: 'NotAvailable', listingId, status: listing.status });
    }

    const session: ClaimRequestSession = {
      userId,
      claimantName,
      listingId,
      maxQty: remaining,
      step: ClaimRequestStep.QUANTITY,
      qty: null,
      startedAt: new Date().toISOString(),
    };
    this.sessions.set(userId, session);

    logger.info('Claim request started', { userId, listingId, maxQty: remaining });
    return ok(session);
  }

  getSession(userId: string): Result<ClaimRequestSession, DomainError> {
    const session = this.sessions.get(userId);
    return session ? ok(session) : err({ kind: 'NotFound', entity: 'session', id: userId });
  }

  async answer(userId: string, text: string): Promise<Result<ClaimRequestOutcome, DomainError>> {
    const current = this.getSession(userId);
    if (!current.ok) return current;

    const session = current.value;

    if (session.step === ClaimRequestStep.QUANTITY) {
      const qty = extractQuantity(text);
      if (!qty.ok) return qty;

      if (qty.value > session.maxQty) {
        return err({ kind: 'InsufficientStock', requested: qty.value, remaining: session.maxQty });
      }

      const next: ClaimRequestSession = { ...session, step: ClaimRequestStep.PICKUP, qty: qty.value };
      this.sessions.set(userId, next);
      return ok({ status: 'awaiting', session: next });
    }

    const pickupTime = text.trim();
    if (!pickupTime) {
      return err({ kind: 'ValidationError', issues: ['pickupTime: Pickup time is required'] });
    }
    if (session.qty === null) {
      return err({ kind: 'InvalidState', message: 'Claim request has no quantity yet' });
    }

    // The conversation ends here whatever the outcome; a retry starts over
    this.sessions.delete(userId);

    const submitted = await this.claimEngine.submitClaim({
      listingId: session.listingId,
      claimantId: userId,
      claimantName: session.claimantName,
      qty: session.qty,
      pickupTime,
    });
    if (!submitted.ok) return submitted;

    return ok({ status: 'submitted', claim: submitted.value.claim, listing: submitted.value.listing });
  }

  cancel(userId: string): boolean {
    const existed = this.sessions.delete(userId);
    logger.info('Claim request cancelled', { userId, existed });
    return existed;
  }
}
