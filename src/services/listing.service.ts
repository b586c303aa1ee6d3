import { DomainError } from '../types/error.types';
import {
  Claim,
  Listing,
  ListingDraft,
  ListingExportRow,
  ListingStatus,
  ListingWithAvailability,
} from '../types/listing.types';
import { NotificationPort } from '../types/notification.types';
import { ListingRegistry } from '../repositories/listing.registry';
import { Result, err, ok } from '../utils/result';
import { toCsv } from '../utils/csv';
import { availabilityOf } from './listing-accounting';
import { COMMITTING_CLAIM_STATUSES } from './claim-state-machine';
import { ListingPublisher } from './listing-publisher';
import { logger } from '../config/logger';

const EXPORT_HEADER = [
  'listing_id',
  'item_name',
  'status',
  'owner_id',
  'claimed_by',
  'created_at',
  'claimed_at',
  'total_qty',
  'remaining',
  'committed',
  'location',
  'expiry',
];

const committedClaims = (listing: Listing): Claim[] =>
  listing.claims.filter((claim) => COMMITTING_CLAIM_STATUSES.has(claim.status));

// Latest history entry that moved a claim into a committing status
const lastCommittedAt = (claims: Claim[]): string | null =>
  claims
    .flatMap((claim) => claim.history)
    .filter((entry) => COMMITTING_CLAIM_STATUSES.has(entry.status))
    .reduce<string | null>((latest, entry) => (latest === null || entry.at > latest ? entry.at : latest), null);

/**
 * Listing Service
 *
 * Business logic around listings that is not claim reconciliation:
 * creation and first publish, availability views, expiry and reporting.
 */
export class ListingService {
  constructor(
    private registry: ListingRegistry,
    private publisher: ListingPublisher,
    private notifier: NotificationPort
  ) {}

  /**
   * Create a listing and publish its post
   */
  async createListing(draft: ListingDraft): Promise<Result<Listing, DomainError>> {
    logger.info('Creating listing', { ownerId: draft.ownerId, itemName: draft.itemName });

    const created = await this.registry.create(draft);
    if (!created.ok) return created;

    const listing = await this.publisher.publish(created.value);
    return ok(listing);
  }

  /**
   * Get listing by ID with availability breakdown
   *
   * Returns:
   * - totalQuantity
   * - committedQuantity (approved and reschedule-accepted claims)
   * - pendingQuantity (claims awaiting a decision; not held)
   * - remainingQuantity (total - committed)
   */
  async getListingWithAvailability(id: string): Promise<Result<ListingWithAvailability, DomainError>> {
    logger.debug('Getting listing with availability', { id });

    const listing = await this.registry.get(id);
    if (!listing) {
      return err({ kind: 'NotFound', entity: 'listing', id });
    }

    return ok({ ...listing, availability: availabilityOf(listing) });
  }

  /**
   * Listings still open for claims, oldest first (for re-posting)
   */
  async listOpen(): Promise<ListingWithAvailability[]> {
    const listings = await this.registry.list();

    return listings
      .filter((listing) => listing.status === ListingStatus.OPEN)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((listing) => ({ ...listing, availability: availabilityOf(listing) }));
  }

  /**
   * Re-announce every open listing that has stock left and a post.
   * Returns how many announcements went out; a failed one is logged and skipped.
   */
  async bumpOpen(): Promise<number> {
    const open = await this.listOpen();
    const bumpable = open.filter(
      (listing) => listing.externalRef !== null && listing.availability.remainingQuantity > 0
    );

    let bumped = 0;
    for (const listing of bumpable) {
      try {
        await this.notifier.bumpListingPost(listing);
        bumped += 1;
      } catch (error) {
        logger.error('Failed to bump listing post', {
          listingId: listing.id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logger.info('Open listings bumped', { bumped, eligible: bumpable.length });
    return bumped;
  }

  /**
   * Mark a listing expired and refresh its post when that changed anything
   */
  async expireListing(id: string): Promise<Result<Listing, DomainError>> {
    logger.info('Expiring listing', { id });

    const expired = await this.registry.markExpired(id);
    if (!expired.ok) return expired;

    const { listing, changed } = expired.value;
    if (!changed) return ok(listing);

    return ok(await this.publisher.publish(listing));
  }

  /**
   * Listings created in `year` (UTC), as export rows
   */
  async exportYear(year: number): Promise<ListingExportRow[]> {
    const listings = await this.registry.list();

    const rows = listings
      .filter((listing) => new Date(listing.createdAt).getUTCFullYear() === year)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((listing): ListingExportRow => {
        const availability = availabilityOf(listing);
        const committed = committedClaims(listing);
        return {
          listingId: listing.id,
          itemName: listing.itemName,
          status: listing.status,
          ownerId: listing.ownerId,
          claimedBy: committed.map((claim) => claim.claimantId),
          createdAt: listing.createdAt,
          claimedAt: lastCommittedAt(committed),
          totalQty: listing.totalQty,
          remaining: availability.remainingQuantity,
          committed: availability.committedQuantity,
          location: listing.locationLabel,
          expiry: listing.expiryLabel,
        };
      });

    logger.info('Listings exported', { year, count: rows.length });
    return rows;
  }

  async exportYearCsv(year: number): Promise<string> {
    const rows = await this.exportYear(year);
    return toCsv(
      EXPORT_HEADER,
      rows.map((row) => [
        row.listingId,
        row.itemName,
        row.status,
        row.ownerId,
        row.claimedBy.join(';'),
        row.createdAt,
        row.claimedAt ?? '',
        row.totalQty,
        row.remaining,
        row.committed,
        row.location,
        row.expiry,
      ])
    );
  }
}
