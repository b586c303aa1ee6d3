import { AtomicStore } from './types/store.types';
import { Listing } from './types/listing.types';
import { ClaimRequestSession, IntakeSession } from './types/intake.types';
import { NotificationPort } from './types/notification.types';
import { InMemoryAtomicStore } from './repositories/memory.store';
import { SupabaseAtomicStore } from './repositories/supabase.store';
import { InMemorySessionStore, SessionStore } from './repositories/session.store';
import { ListingRegistry } from './repositories/listing.registry';
import { ListingTransactor } from './repositories/listing.transactor';
import { ListingPublisher } from './services/listing-publisher';
import { ListingService } from './services/listing.service';
import { ClaimEngine } from './services/claim.service';
import { NegotiationService } from './services/negotiation.service';
import { IntakeService } from './services/intake.service';
import { ClaimRequestService } from './services/claim-request.service';
import { CommandDispatcher } from './services/command.dispatcher';
import { LoggingNotificationPort } from './notifications/logging.notifier';
import { WebhookNotificationPort } from './notifications/webhook.notifier';
import { parseListingRecord } from './validators/listing.validator';
import { getSupabaseClient } from './config/database';
import { env, SESSION_TTL_MS } from './config/environment';
import { logger } from './config/logger';

export interface ServiceOverrides {
  store?: AtomicStore<Listing>;
  notifier?: NotificationPort;
  intakeSessions?: SessionStore<IntakeSession>;
  claimRequestSessions?: SessionStore<ClaimRequestSession>;
  maxAttempts?: number;
  backoffMs?: number;
}

export interface Services {
  store: AtomicStore<Listing>;
  registry: ListingRegistry;
  listingService: ListingService;
  claimEngine: ClaimEngine;
  negotiation: NegotiationService;
  intake: IntakeService;
  claimRequests: ClaimRequestService;
  dispatcher: CommandDispatcher;
}

const createStore = (): AtomicStore<Listing> => {
  if (env.STORE_DRIVER === 'supabase') {
    return new SupabaseAtomicStore(getSupabaseClient(), env.SUPABASE_LISTINGS_TABLE, parseListingRecord);
  }
  return new InMemoryAtomicStore<Listing>();
};

const createNotifier = (): NotificationPort => {
  if (env.NOTIFY_WEBHOOK_URL) {
    return new WebhookNotificationPort({ url: env.NOTIFY_WEBHOOK_URL, timeoutMs: env.NOTIFY_TIMEOUT_MS });
  }
  return new LoggingNotificationPort();
};

/**
 * Wire the service graph. Anything not overridden comes from the environment.
 */
export function createServices(overrides: ServiceOverrides = {}): Services {
  const store = overrides.store ?? createStore();
  const notifier = overrides.notifier ?? createNotifier();

  const transactor = new ListingTransactor(store, {
    maxAttempts: overrides.maxAttempts ?? env.TRANSACTION_MAX_ATTEMPTS,
    backoffMs: overrides.backoffMs ?? env.TRANSACTION_BACKOFF_MS,
  });
  const registry = new ListingRegistry(store, transactor);
  const publisher = new ListingPublisher(notifier, registry);

  const listingService = new ListingService(registry, publisher, notifier);
  const claimEngine = new ClaimEngine(registry, transactor, notifier, publisher);
  const negotiation = new NegotiationService(transactor, notifier, publisher);

  const intake = new IntakeService(
    overrides.intakeSessions ?? new InMemorySessionStore<IntakeSession>({ ttlMs: SESSION_TTL_MS }),
    listingService
  );
  const claimRequests = new ClaimRequestService(
    overrides.claimRequestSessions ?? new InMemorySessionStore<ClaimRequestSession>({ ttlMs: SESSION_TTL_MS }),
    registry,
    claimEngine
  );
  const dispatcher = new CommandDispatcher(claimEngine, negotiation, listingService);

  logger.debug('Services wired', {
    store: store.constructor.name,
    notifier: notifier.constructor.name,
  });

  return { store, registry, listingService, claimEngine, negotiation, intake, claimRequests, dispatcher };
}
