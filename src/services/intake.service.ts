import { DomainError } from '../types/error.types';
import { Listing, ListingDraft } from '../types/listing.types';
import { IntakeDraft, IntakeInput, IntakeSession, IntakeStep } from '../types/intake.types';
import { SessionStore } from '../repositories/session.store';
import { Result, err, ok } from '../utils/result';
import { extractQuantity, parseExpiry } from '../utils/parsers';
import { ListingService } from './listing.service';
import { logger } from '../config/logger';

// Answer order; each step accepts exactly one answer
const NEXT_STEP: Record<Exclude<IntakeStep, IntakeStep.CONFIRM>, IntakeStep> = {
  [IntakeStep.ITEM]: IntakeStep.QUANTITY,
  [IntakeStep.QUANTITY]: IntakeStep.SIZE,
  [IntakeStep.SIZE]: IntakeStep.EXPIRY,
  [IntakeStep.EXPIRY]: IntakeStep.LOCATION,
  [IntakeStep.LOCATION]: IntakeStep.PHOTO,
  [IntakeStep.PHOTO]: IntakeStep.CONFIRM,
};

const SKIP_PHOTO = 'skip';
const SIZE_NOT_APPLICABLE = 'Not applicable';
const NOT_APPLICABLE_ANSWERS = new Set(['na', 'n/a']);

const requireText = (input: IntakeInput, field: string): Result<string, DomainError> => {
  if (input.kind !== 'text') {
    return err({ kind: 'ValidationError', issues: [`${field}: expected a text answer`] });
  }
  const text = input.text.trim();
  if (!text) {
    return err({ kind: 'ValidationError', issues: [`${field}: answer cannot be empty`] });
  }
  return ok(text);
};

/**
 * Apply one answer to the draft for the current step
 */
function applyAnswer(
  step: Exclude<IntakeStep, IntakeStep.CONFIRM>,
  draft: IntakeDraft,
  input: IntakeInput
): Result<IntakeDraft, DomainError> {
  switch (step) {
    case IntakeStep.ITEM: {
      const text = requireText(input, 'item');
      return text.ok ? ok({ ...draft, itemName: text.value }) : text;
    }
    case IntakeStep.QUANTITY: {
      const text = requireText(input, 'quantity');
      if (!text.ok) return text;
      const qty = extractQuantity(text.value);
      if (!qty.ok) return qty;
      return ok({ ...draft, totalQty: qty.value, qtyLabel: text.value });
    }
    case IntakeStep.SIZE: {
      const text = requireText(input, 'size');
      if (!text.ok) return text;
      const sizeLabel = NOT_APPLICABLE_ANSWERS.has(text.value.toLowerCase()) ? SIZE_NOT_APPLICABLE : text.value;
      return ok({ ...draft, sizeLabel });
    }
    case IntakeStep.EXPIRY: {
      const text = requireText(input, 'expiry');
      if (!text.ok) return text;
      const expiry = parseExpiry(text.value);
      return expiry.ok ? ok({ ...draft, expiryLabel: expiry.value }) : expiry;
    }
    case IntakeStep.LOCATION: {
      const text = requireText(input, 'location');
      return text.ok ? ok({ ...draft, locationLabel: text.value }) : text;
    }
    case IntakeStep.PHOTO: {
      if (input.kind === 'photo') {
        return ok({ ...draft, photoRef: input.ref });
      }
      if (input.text.trim().toLowerCase() === SKIP_PHOTO) {
        return ok({ ...draft, photoRef: null });
      }
      return err({ kind: 'ValidationError', issues: ['photo: send a photo or "skip"'] });
    }
  }
}

/**
 * Intake Service
 *
 * Per-user linear conversation that collects a new listing:
 * ITEM → QUANTITY → SIZE → EXPIRY → LOCATION → PHOTO → CONFIRM.
 * No step can be revisited; starting again discards the draft. The session
 * is destroyed on confirm, cancel, or idle timeout (session store policy).
 */
export class IntakeService {
  constructor(
    private sessions: SessionStore<IntakeSession>,
    private listingService: ListingService
  ) {}

  /**
   * Start (or restart) an intake for `userId`
   */
  start(userId: string, ownerName: string | null = null): IntakeSession {
    const session: IntakeSession = {
      userId,
      ownerName,
      step: IntakeStep.ITEM,
      draft: {},
      startedAt: new Date().toISOString(),
    };
    this.sessions.set(userId, session);

    logger.info('Intake started', { userId });
    return session;
  }

  getSession(userId: string): Result<IntakeSession, DomainError> {
    const session = this.sessions.get(userId);
    return session ? ok(session) : err({ kind: 'NotFound', entity: 'session', id: userId });
  }

  /**
   * Answer the current step and advance
   *
   * A rejected answer leaves the session on the same step.
   */
  answer(userId: string, input: IntakeInput): Result<IntakeSession, DomainError> {
    const current = this.getSession(userId);
    if (!current.ok) return current;

    const session = current.value;
    const { step } = session;
    if (step === IntakeStep.CONFIRM) {
      return err({ kind: 'InvalidState', message: 'Intake is waiting for confirm or cancel' });
    }

    const draft = applyAnswer(step, session.draft, input);
    if (!draft.ok) {
      logger.debug('Intake answer rejected', { userId, step, reason: draft.error.kind });
      return draft;
    }

    const next: IntakeSession = { ...session, step: NEXT_STEP[step], draft: draft.value };
    this.sessions.set(userId, next);

    logger.debug('Intake advanced', { userId, from: step, to: next.step });
    return ok(next);
  }

  /**
   * Commit the draft as a listing and end the session
   */
  async confirm(userId: string): Promise<Result<Listing, DomainError>> {
    const current = this.getSession(userId);
    if (!current.ok) return current;

    const session = current.value;
    if (session.step !== IntakeStep.CONFIRM) {
      return err({ kind: 'InvalidState', message: `Intake is at step ${session.step}, not CONFIRM` });
    }

    const draft = toListingDraft(session);
    if (!draft.ok) return draft;

    const created = await this.listingService.createListing(draft.value);
    if (!created.ok) return created;

    this.sessions.delete(userId);
    logger.info('Intake committed', { userId, listingId: created.value.id });
    return created;
  }

  /**
   * Discard the draft; nothing is persisted
   */
  cancel(userId: string): boolean {
    const existed = this.sessions.delete(userId);
    logger.info('Intake cancelled', { userId, existed });
    return existed;
  }
}

function toListingDraft(session: IntakeSession): Result<ListingDraft, DomainError> {
  const { itemName, totalQty, qtyLabel, sizeLabel, expiryLabel, locationLabel, photoRef } = session.draft;

  if (
    itemName === undefined ||
    totalQty === undefined ||
    sizeLabel === undefined ||
    expiryLabel === undefined ||
    locationLabel === undefined
  ) {
    return err({ kind: 'InvalidState', message: 'Intake draft is incomplete' });
  }

  return ok({
    ownerId: session.userId,
    ownerName: session.ownerName,
    itemName,
    totalQty,
    qtyLabel: qtyLabel ?? String(totalQty),
    sizeLabel,
    expiryLabel,
    locationLabel,
    photoRef: photoRef ?? null,
  });
}
