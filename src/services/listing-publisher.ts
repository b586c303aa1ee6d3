import { Listing } from '../types/listing.types';
import { NotificationPort } from '../types/notification.types';
import { ListingRegistry } from '../repositories/listing.registry';
import { describeDomainError } from '../utils/domain-error';
import { logger } from '../config/logger';

/**
 * Run a notification after a committed transition.
 *
 * The transition already happened; a failed delivery is logged and does not
 * change the operation's result.
 */
export async function notifySafely(
  description: string,
  context: Record<string, unknown>,
  send: () => Promise<void>
): Promise<void> {
  try {
    await send();
  } catch (error) {
    logger.error(`Notification failed: ${description}`, {
      ...context,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Listing Publisher
 *
 * Refreshes the public post whenever remaining quantity or status changes and
 * stores the returned handle the first time one comes back.
 *
 * Publishes for one listing run one at a time, and each sends the listing as
 * currently stored, so the last post out always shows the latest state.
 */
export class ListingPublisher {
  private queues = new Map<string, Promise<void>>();

  constructor(
    private notifier: NotificationPort,
    private registry: ListingRegistry
  ) {}

  /**
   * Publish the post for `listing` and return it with any newly attached handle
   */
  async publish(listing: Listing): Promise<Listing> {
    const previous = this.queues.get(listing.id) ?? Promise.resolve();
    const run = previous.then(() => this.publishLatest(listing));
    // Queue tail only orders later publishes; the caller still sees a rejection
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(listing.id, tail);

    try {
      return await run;
    } finally {
      if (this.queues.get(listing.id) === tail) {
        this.queues.delete(listing.id);
      }
    }
  }

  private async publishLatest(listing: Listing): Promise<Listing> {
    const latest = (await this.registry.get(listing.id)) ?? listing;

    let externalRef: string;
    try {
      externalRef = await this.notifier.publishOrUpdateListingPost(latest);
    } catch (error) {
      logger.error('Failed to publish listing post', {
        listingId: listing.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return listing;
    }

    if (latest.externalRef !== null) {
      return { ...listing, externalRef: latest.externalRef };
    }

    const attached = await this.registry.attachExternalRef(listing.id, externalRef);
    if (!attached.ok) {
      logger.warn('Failed to attach external reference', {
        listingId: listing.id,
        reason: describeDomainError(attached.error),
      });
      return listing;
    }

    return { ...listing, externalRef: attached.value.externalRef, updatedAt: attached.value.updatedAt };
  }
}
