import { randomUUID } from 'crypto';
import { AtomicStore } from '../types/store.types';
import { DomainError } from '../types/error.types';
import { Listing, ListingDraft, ListingStatus } from '../types/listing.types';
import { listingDraftSchema } from '../validators/listing.validator';
import { Result, err, ok } from '../utils/result';
import { ListingTransactor } from './listing.transactor';
import { logger } from '../config/logger';

/**
 * Listing Registry
 *
 * CRUD over listing records in the AtomicStore. Owns id generation; status is
 * always derived (see listing-accounting), never taken from callers.
 */
export class ListingRegistry {
  constructor(
    private store: AtomicStore<Listing>,
    private transactor: ListingTransactor
  ) {}

  /**
   * Create a listing from a complete draft
   *
   * Plain put: nobody can race on a listing before its id is handed out.
   */
  async create(draft: ListingDraft): Promise<Result<Listing, DomainError>> {
    const parsed = listingDraftSchema.safeParse(draft);
    if (!parsed.success) {
      return err({
        kind: 'ValidationError',
        issues: parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const input = parsed.data;
    const now = new Date().toISOString();
    const listing: Listing = {
      id: randomUUID(),
      ownerId: input.ownerId,
      ownerName: input.ownerName ?? null,
      itemName: input.itemName,
      qtyLabel: input.qtyLabel || String(input.totalQty),
      sizeLabel: input.sizeLabel,
      expiryLabel: input.expiryLabel,
      locationLabel: input.locationLabel,
      photoRef: input.photoRef ?? null,
      totalQty: input.totalQty,
      claims: [],
      status: ListingStatus.OPEN,
      externalRef: null,
      createdAt: now,
      updatedAt: now,
      expiredAt: null,
    };

    await this.store.put(listing.id, listing);

    logger.info('Listing created', {
      listingId: listing.id,
      ownerId: listing.ownerId,
      totalQty: listing.totalQty,
    });

    return ok(listing);
  }

  /**
   * Find listing by ID
   */
  async get(id: string): Promise<Listing | null> {
    return this.store.get(id);
  }

  /**
   * All listings (arrival order of claims preserved inside each record)
   */
  async list(): Promise<Listing[]> {
    return this.store.list();
  }

  /**
   * Record the outward post handle, only if none is set yet (idempotent)
   */
  async attachExternalRef(id: string, externalRef: string): Promise<Result<Listing, DomainError>> {
    const result = await this.transactor.run(id, (listing, now) => {
      if (listing.externalRef !== null) {
        return ok({ next: null, out: undefined });
      }
      return ok({ next: { ...listing, externalRef, updatedAt: now }, out: undefined });
    });

    if (!result.ok) return result;

    if (result.value.written) {
      logger.debug('External reference attached', { listingId: id, externalRef });
    }
    return ok(result.value.listing);
  }

  /**
   * Mark a listing stale: Open → Expired
   *
   * No-op when already expired, or when fully committed (commitment wins).
   */
  async markExpired(id: string): Promise<Result<{ listing: Listing; changed: boolean }, DomainError>> {
    const result = await this.transactor.run(id, (listing, now) => {
      if (listing.status !== ListingStatus.OPEN) {
        return ok({ next: null, out: undefined });
      }
      return ok({ next: { ...listing, expiredAt: now }, out: undefined });
    });

    if (!result.ok) return result;

    const { listing, written } = result.value;
    if (written) {
      logger.info('Listing expired', { listingId: id });
    } else {
      logger.debug('Listing not expired - not open', { listingId: id, status: listing.status });
    }
    return ok({ listing, changed: written });
  }
}
