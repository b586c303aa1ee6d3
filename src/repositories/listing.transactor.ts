import { setTimeout as sleep } from 'timers/promises';
import { AtomicStore } from '../types/store.types';
import { DomainError } from '../types/error.types';
import { Listing } from '../types/listing.types';
import { Result, err, ok } from '../utils/result';
import { withDerivedStatus } from '../services/listing-accounting';
import { logger } from '../config/logger';

/**
 * Outcome of a mutation computed against one snapshot of a listing.
 * `next: null` means "nothing to write" (the operation is already satisfied).
 */
export interface ListingMutationStep<TOut> {
  next: Listing | null;
  out: TOut;
}

/**
 * Pure function of the snapshot; rerun from scratch after every conflict.
 */
export type ListingMutation<TOut> = (
  listing: Listing,
  now: string
) => Result<ListingMutationStep<TOut>, DomainError>;

export interface ListingTransactionResult<TOut> {
  listing: Listing;
  out: TOut;
  written: boolean;
}

export interface ListingTransactorOptions {
  maxAttempts: number;
  backoffMs: number;
}

/**
 * Listing Transactor
 *
 * The only path that mutates an existing listing. Runs a mutation as
 * read → compute → commit-iff-unchanged, and on conflict re-reads and
 * recomputes the whole mutation, so precondition checks (stock, claim
 * status) always run against the committed state.
 *
 * Retries are bounded; exhaustion returns `Contention` instead of looping.
 * Status is re-derived on every write.
 */
export class ListingTransactor {
  constructor(
    private store: AtomicStore<Listing>,
    private options: ListingTransactorOptions
  ) {}

  async run<TOut>(
    listingId: string,
    mutate: ListingMutation<TOut>
  ): Promise<Result<ListingTransactionResult<TOut>, DomainError>> {
    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt += 1) {
      // Filled by the store callback; read after the store returns
      const observed: {
        current: Listing | null;
        outcome: Result<ListingMutationStep<TOut>, DomainError> | null;
      } = { current: null, outcome: null };

      const result = await this.store.transact(listingId, (current) => {
        observed.current = current;
        if (!current) {
          observed.outcome = null;
          return null;
        }

        const now = new Date().toISOString();
        const outcome = mutate(current, now);
        observed.outcome = outcome;

        if (!outcome.ok || outcome.value.next === null) {
          return null;
        }
        return withDerivedStatus(outcome.value.next, now);
      });

      const { current, outcome } = observed;

      if (result.status === 'conflict') {
        logger.debug('Listing transaction conflict, retrying', { listingId, attempt });
        if (attempt < this.options.maxAttempts && this.options.backoffMs > 0) {
          await sleep(this.options.backoffMs * attempt);
        }
        continue;
      }

      if (!current || !outcome) {
        return err({ kind: 'NotFound', entity: 'listing', id: listingId });
      }

      if (!outcome.ok) {
        return outcome;
      }

      if (result.status === 'committed') {
        return ok({ listing: result.value, out: outcome.value.out, written: true });
      }

      // Aborted without error: nothing needed writing
      return ok({ listing: current, out: outcome.value.out, written: false });
    }

    logger.warn('Listing transaction retries exhausted', {
      listingId,
      attempts: this.options.maxAttempts,
    });
    return err({ kind: 'Contention', listingId, attempts: this.options.maxAttempts });
  }
}
