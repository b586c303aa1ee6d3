import { Claim, Listing, ListingDraft } from '../src/types/listing.types';
import { ClaimDecision, NotificationPort } from '../src/types/notification.types';
import { InMemoryAtomicStore } from '../src/repositories/memory.store';
import { createServices, ServiceOverrides, Services } from '../src/container';
import { Result } from '../src/utils/result';

export type RecordedNotification =
  | { type: 'owner.new_claim'; listingId: string; claimId: string }
  | { type: 'claimant.decision'; listingId: string; claimId: string; decision: ClaimDecision }
  | { type: 'claimant.reschedule_proposed'; listingId: string; claimId: string; proposedTime: string }
  | { type: 'owner.reschedule_response'; listingId: string; claimId: string; accepted: boolean }
  | { type: 'owner.claim_cancelled'; listingId: string; claimId: string }
  | { type: 'listing.publish'; listingId: string; status: string }
  | { type: 'listing.bump'; listingId: string };

/**
 * NotificationPort fake that records every call
 */
export class RecordingNotificationPort implements NotificationPort {
  calls: RecordedNotification[] = [];
  failWith: Error | null = null;

  async notifyOwnerNewClaim(listing: Listing, claim: Claim): Promise<void> {
    this.record({ type: 'owner.new_claim', listingId: listing.id, claimId: claim.id });
  }

  async notifyClaimantDecision(listing: Listing, claim: Claim, decision: ClaimDecision): Promise<void> {
    this.record({ type: 'claimant.decision', listingId: listing.id, claimId: claim.id, decision });
  }

  async notifyClaimantRescheduleProposed(listing: Listing, claim: Claim, proposedTime: string): Promise<void> {
    this.record({ type: 'claimant.reschedule_proposed', listingId: listing.id, claimId: claim.id, proposedTime });
  }

  async notifyOwnerRescheduleResponse(listing: Listing, claim: Claim, accepted: boolean): Promise<void> {
    this.record({ type: 'owner.reschedule_response', listingId: listing.id, claimId: claim.id, accepted });
  }

  async notifyOwnerClaimCancelled(listing: Listing, claim: Claim): Promise<void> {
    this.record({ type: 'owner.claim_cancelled', listingId: listing.id, claimId: claim.id });
  }

  async publishOrUpdateListingPost(listing: Listing): Promise<string> {
    this.record({ type: 'listing.publish', listingId: listing.id, status: listing.status });
    return `post-${listing.id}`;
  }

  async bumpListingPost(listing: Listing): Promise<void> {
    this.record({ type: 'listing.bump', listingId: listing.id });
  }

  ofType<K extends RecordedNotification['type']>(type: K): Extract<RecordedNotification, { type: K }>[] {
    return this.calls.filter((call): call is Extract<RecordedNotification, { type: K }> => call.type === type);
  }

  private record(call: RecordedNotification): void {
    if (this.failWith) throw this.failWith;
    this.calls.push(call);
  }
}

export interface TestContext extends Services {
  store: InMemoryAtomicStore<Listing>;
  notifier: RecordingNotificationPort;
}

/**
 * Service graph over an in-memory store, recording notifier and no retry backoff
 */
export function createTestContext(overrides: ServiceOverrides = {}): TestContext {
  const store = new InMemoryAtomicStore<Listing>();
  const notifier = new RecordingNotificationPort();
  const services = createServices({ store, notifier, backoffMs: 0, ...overrides });
  return { ...services, store, notifier };
}

export function buildDraft(overrides: Partial<ListingDraft> = {}): ListingDraft {
  return {
    ownerId: 'owner-1',
    ownerName: 'Owner One',
    itemName: 'Rice',
    totalQty: 10,
    sizeLabel: '5kg bags',
    expiryLabel: '31/12/26',
    locationLabel: 'Block 12 lobby',
    ...overrides,
  };
}

/**
 * Unwrap an ok Result or fail the test with the error
 */
export function expectOk<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`Expected ok result, got ${JSON.stringify(result.error)}`);
  }
  return result.value;
}

export function expectErr<T, E>(result: Result<T, E>): E {
  if (result.ok) {
    throw new Error(`Expected error result, got ${JSON.stringify(result.value)}`);
  }
  return result.error;
}
