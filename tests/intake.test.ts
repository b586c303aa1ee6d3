import { describe, it, expect, beforeEach } from 'vitest';
import { IntakeStep } from '../src/types/intake.types';
import { EXPIRY_NOT_APPLICABLE } from '../src/utils/parsers';
import { createTestContext, expectErr, expectOk, TestContext } from './helpers';

const text = (value: string) => ({ kind: 'text' as const, text: value });

describe('IntakeService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it('walks every step and commits the listing', async () => {
    ctx.intake.start('owner-9', 'Bea');

    const answers = ['Gloves', '3 big boxes', 'na', 'na', 'Ward 5', 'skip'];
    const steps = answers.map((answer) => expectOk(ctx.intake.answer('owner-9', text(answer))).step);
    expect(steps).toEqual([
      IntakeStep.QUANTITY,
      IntakeStep.SIZE,
      IntakeStep.EXPIRY,
      IntakeStep.LOCATION,
      IntakeStep.PHOTO,
      IntakeStep.CONFIRM,
    ]);

    const listing = expectOk(await ctx.intake.confirm('owner-9'));

    expect(listing).toMatchObject({
      ownerId: 'owner-9',
      ownerName: 'Bea',
      itemName: 'Gloves',
      totalQty: 3,
      qtyLabel: '3 big boxes',
      sizeLabel: 'Not applicable',
      expiryLabel: EXPIRY_NOT_APPLICABLE,
      locationLabel: 'Ward 5',
      photoRef: null,
      externalRef: `post-${listing.id}`,
    });
    expect(expectErr(ctx.intake.getSession('owner-9'))).toEqual({
      kind: 'NotFound',
      entity: 'session',
      id: 'owner-9',
    });
  });

  it('keeps the session on the same step after a rejected answer', () => {
    ctx.intake.start('owner-9');
    expectOk(ctx.intake.answer('owner-9', text('Gloves')));

    const bad = ctx.intake.answer('owner-9', text('some'));
    expect(expectErr(bad)).toEqual({
      kind: 'InvalidQuantity',
      message: 'Please include a positive number for the quantity.',
    });
    expect(expectOk(ctx.intake.getSession('owner-9')).step).toBe(IntakeStep.QUANTITY);

    expect(expectOk(ctx.intake.answer('owner-9', text('12 pairs'))).draft).toEqual({
      itemName: 'Gloves',
      totalQty: 12,
      qtyLabel: '12 pairs',
    });
  });

  it.each([
    ['N/A', 'Not applicable'],
    ['na', 'Not applicable'],
    ['  n/a ', 'Not applicable'],
    ['500 g', '500 g'],
  ])('records size answer %j as %j', (answer, expected) => {
    ctx.intake.start('owner-9');
    for (const step of ['Milk', '6']) {
      expectOk(ctx.intake.answer('owner-9', text(step)));
    }

    expect(expectOk(ctx.intake.answer('owner-9', text(answer))).draft.sizeLabel).toBe(expected);
  });

  it('normalizes the expiry date', () => {
    ctx.intake.start('owner-9');
    for (const answer of ['Milk', '6', '1L']) {
      expectOk(ctx.intake.answer('owner-9', text(answer)));
    }

    expect(expectErr(ctx.intake.answer('owner-9', text('soon')))).toEqual({ kind: 'InvalidDate', input: 'soon' });

    const session = expectOk(ctx.intake.answer('owner-9', text('2027-01-05')));
    expect(session.draft.expiryLabel).toBe('05/01/27');
  });

  it('takes a photo reference at the photo step', () => {
    ctx.intake.start('owner-9');
    for (const answer of ['Milk', '6', '1L', 'na', 'Lobby']) {
      expectOk(ctx.intake.answer('owner-9', text(answer)));
    }

    expect(expectErr(ctx.intake.answer('owner-9', text('later')))).toEqual({
      kind: 'ValidationError',
      issues: ['photo: send a photo or "skip"'],
    });

    const session = expectOk(ctx.intake.answer('owner-9', { kind: 'photo', ref: 'file-123' }));
    expect(session.step).toBe(IntakeStep.CONFIRM);
    expect(session.draft.photoRef).toBe('file-123');
  });

  it('rejects a photo where text is expected and empty answers', () => {
    ctx.intake.start('owner-9');

    expect(expectErr(ctx.intake.answer('owner-9', { kind: 'photo', ref: 'file-1' }))).toEqual({
      kind: 'ValidationError',
      issues: ['item: expected a text answer'],
    });
    expect(expectErr(ctx.intake.answer('owner-9', text('  ')))).toEqual({
      kind: 'ValidationError',
      issues: ['item: answer cannot be empty'],
    });
  });

  it('only confirms at the confirm step', async () => {
    ctx.intake.start('owner-9');

    const result = await ctx.intake.confirm('owner-9');

    expect(expectErr(result)).toEqual({ kind: 'InvalidState', message: 'Intake is at step ITEM, not CONFIRM' });
    expect(await ctx.registry.list()).toEqual([]);
  });

  it('refuses further answers once the draft is complete', () => {
    ctx.intake.start('owner-9');
    for (const answer of ['Milk', '6', '1L', 'na', 'Lobby', 'skip']) {
      expectOk(ctx.intake.answer('owner-9', text(answer)));
    }

    expect(expectErr(ctx.intake.answer('owner-9', text('more')))).toEqual({
      kind: 'InvalidState',
      message: 'Intake is waiting for confirm or cancel',
    });
  });

  it('restarting discards the draft and cancel persists nothing', async () => {
    ctx.intake.start('owner-9');
    expectOk(ctx.intake.answer('owner-9', text('Milk')));

    const restarted = ctx.intake.start('owner-9');
    expect(restarted.step).toBe(IntakeStep.ITEM);
    expect(restarted.draft).toEqual({});

    expect(ctx.intake.cancel('owner-9')).toBe(true);
    expect(ctx.intake.cancel('owner-9')).toBe(false);
    expect(await ctx.registry.list()).toEqual([]);
  });

  it('answers without a session are NotFound', () => {
    expect(expectErr(ctx.intake.answer('nobody', text('Milk')))).toEqual({
      kind: 'NotFound',
      entity: 'session',
      id: 'nobody',
    });
  });
});
