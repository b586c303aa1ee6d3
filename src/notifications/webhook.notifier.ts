import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { Claim, Listing } from '../types/listing.types';
import { ClaimDecision, NotificationEvent, NotificationPort } from '../types/notification.types';
import { logger } from '../config/logger';

// Transport reply to a publish event
const publishResponseSchema = z.object({
  data: z.object({
    externalRef: z.string().min(1),
  }),
});

export interface WebhookNotificationPortOptions {
  url: string;
  timeoutMs: number;
}

/**
 * NotificationPort that POSTs typed events to the chat transport
 *
 * Every event goes to the same URL as `{ event, ...payload }`; the transport
 * formats and delivers the message. Non-2xx replies reject.
 */
export class WebhookNotificationPort implements NotificationPort {
  private http: AxiosInstance;

  constructor(options: WebhookNotificationPortOptions) {
    this.http = axios.create({
      baseURL: options.url,
      timeout: options.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  async notifyOwnerNewClaim(listing: Listing, claim: Claim): Promise<void> {
    await this.send({ event: 'owner.new_claim', listing, claim });
  }

  async notifyClaimantDecision(listing: Listing, claim: Claim, decision: ClaimDecision): Promise<void> {
    await this.send({ event: 'claimant.decision', listing, claim, decision });
  }

  async notifyClaimantRescheduleProposed(listing: Listing, claim: Claim, proposedTime: string): Promise<void> {
    await this.send({ event: 'claimant.reschedule_proposed', listing, claim, proposedTime });
  }

  async notifyOwnerRescheduleResponse(listing: Listing, claim: Claim, accepted: boolean): Promise<void> {
    await this.send({ event: 'owner.reschedule_response', listing, claim, accepted });
  }

  async notifyOwnerClaimCancelled(listing: Listing, claim: Claim): Promise<void> {
    await this.send({ event: 'owner.claim_cancelled', listing, claim });
  }

  async publishOrUpdateListingPost(listing: Listing): Promise<string> {
    const body = await this.send({ event: 'listing.publish', listing });
    return publishResponseSchema.parse(body).data.externalRef;
  }

  async bumpListingPost(listing: Listing): Promise<void> {
    await this.send({ event: 'listing.bump', listing });
  }

  private async send(event: NotificationEvent): Promise<unknown> {
    logger.debug('Sending notification event', { event: event.event, listingId: event.listing.id });
    const response = await this.http.post<unknown>('', event);
    return response.data;
  }
}
