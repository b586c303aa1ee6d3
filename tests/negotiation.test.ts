import { describe, it, expect, beforeEach } from 'vitest';
import { Claim, ClaimStatus, Listing, ListingStatus } from '../src/types/listing.types';
import { availabilityOf } from '../src/services/listing-accounting';
import { buildDraft, createTestContext, expectErr, expectOk, TestContext } from './helpers';

async function submit(
  ctx: TestContext,
  listingId: string,
  claimantId: string,
  qty: number,
  pickupTime = 'Sat 10am'
): Promise<Claim> {
  return expectOk(await ctx.claimEngine.submitClaim({ listingId, claimantId, qty, pickupTime })).claim;
}

describe('NegotiationService', () => {
  let ctx: TestContext;
  let listing: Listing;

  beforeEach(async () => {
    ctx = createTestContext();
    listing = expectOk(await ctx.listingService.createListing(buildDraft({ totalQty: 5 })));
  });

  it('accepting a proposal replaces the pickup time and commits the quantity', async () => {
    const claim = await submit(ctx, listing.id, 'claimant-1', 2);

    const proposed = expectOk(await ctx.negotiation.proposeNewTime(listing.id, claim.id, ' Sun 2pm '));
    expect(proposed.claim).toMatchObject({
      status: ClaimStatus.RESCHEDULE_PENDING,
      proposedTime: 'Sun 2pm',
      requestedPickup: 'Sat 10am',
    });
    expect(ctx.notifier.ofType('claimant.reschedule_proposed')).toEqual([
      {
        type: 'claimant.reschedule_proposed',
        listingId: listing.id,
        claimId: claim.id,
        proposedTime: 'Sun 2pm',
      },
    ]);

    const accepted = expectOk(await ctx.negotiation.respondToReschedule(listing.id, claim.id, true));
    expect(accepted.claim).toMatchObject({
      status: ClaimStatus.RESCHEDULE_ACCEPTED,
      requestedPickup: 'Sun 2pm',
      originalPickup: 'Sat 10am',
    });
    expect(accepted.claim.history.map((entry) => entry.status)).toEqual([
      ClaimStatus.PENDING,
      ClaimStatus.RESCHEDULE_PENDING,
      ClaimStatus.RESCHEDULE_ACCEPTED,
    ]);
    expect(availabilityOf(accepted.listing).committedQuantity).toBe(2);
    expect(ctx.notifier.ofType('owner.reschedule_response')).toEqual([
      { type: 'owner.reschedule_response', listingId: listing.id, claimId: claim.id, accepted: true },
    ]);
  });

  it('declining a proposal commits nothing', async () => {
    const claim = await submit(ctx, listing.id, 'claimant-1', 2);
    expectOk(await ctx.negotiation.proposeNewTime(listing.id, claim.id, 'Sun 2pm'));

    const declined = expectOk(await ctx.negotiation.respondToReschedule(listing.id, claim.id, false));

    expect(declined.claim).toMatchObject({
      status: ClaimStatus.RESCHEDULE_DECLINED,
      requestedPickup: 'Sat 10am',
      originalPickup: null,
    });
    expect(availabilityOf(declined.listing).remainingQuantity).toBe(5);
    expect(ctx.notifier.ofType('owner.reschedule_response')).toEqual([
      { type: 'owner.reschedule_response', listingId: listing.id, claimId: claim.id, accepted: false },
    ]);

    const again = await ctx.negotiation.respondToReschedule(listing.id, claim.id, true);
    expect(expectErr(again)).toMatchObject({ kind: 'InvalidState', current: ClaimStatus.RESCHEDULE_DECLINED });
  });

  it('accepting re-checks stock against approvals made in the meantime', async () => {
    const first = await submit(ctx, listing.id, 'claimant-1', 3);
    const second = await submit(ctx, listing.id, 'claimant-2', 4);
    expectOk(await ctx.negotiation.proposeNewTime(listing.id, second.id, 'Sun 2pm'));
    expectOk(await ctx.claimEngine.approve(listing.id, first.id));

    const result = await ctx.negotiation.respondToReschedule(listing.id, second.id, true);

    expect(expectErr(result)).toEqual({ kind: 'InsufficientStock', requested: 4, remaining: 2 });
    const stored = await ctx.registry.get(listing.id);
    expect(stored?.claims.find((claim) => claim.id === second.id)?.status).toBe(ClaimStatus.RESCHEDULE_PENDING);
  });

  it('only proposes on pending claims', async () => {
    const claim = await submit(ctx, listing.id, 'claimant-1', 2);
    expectOk(await ctx.claimEngine.approve(listing.id, claim.id));

    const result = await ctx.negotiation.proposeNewTime(listing.id, claim.id, 'Sun 2pm');

    expect(expectErr(result)).toEqual({
      kind: 'InvalidState',
      message: `Claim ${claim.id} is APPROVED; cannot propose reschedule`,
      current: ClaimStatus.APPROVED,
      expected: [ClaimStatus.PENDING],
    });
  });

  it('requires a proposed time', async () => {
    const claim = await submit(ctx, listing.id, 'claimant-1', 2);

    const result = await ctx.negotiation.proposeNewTime(listing.id, claim.id, '');

    expect(expectErr(result)).toEqual({ kind: 'ValidationError', issues: ['newTime: New time is required'] });
  });

  it('cannot answer a proposal that was never made', async () => {
    const claim = await submit(ctx, listing.id, 'claimant-1', 2);

    const result = await ctx.negotiation.respondToReschedule(listing.id, claim.id, true);

    expect(expectErr(result)).toMatchObject({ kind: 'InvalidState', current: ClaimStatus.PENDING });
  });
});

describe('claim lifecycle walkthrough', () => {
  it('approve, refuse an oversized claim, renegotiate the rest to full commitment', async () => {
    const ctx = createTestContext();
    const listing = expectOk(await ctx.listingService.createListing(buildDraft({ totalQty: 10 })));

    const claimA = await submit(ctx, listing.id, 'claimant-a', 6);
    expectOk(await ctx.claimEngine.approve(listing.id, claimA.id));

    const tooMany = await ctx.claimEngine.submitClaim({
      listingId: listing.id,
      claimantId: 'claimant-b',
      qty: 5,
      pickupTime: 'Sat 10am',
    });
    expect(expectErr(tooMany)).toEqual({ kind: 'InsufficientStock', requested: 5, remaining: 4 });

    const claimB = await submit(ctx, listing.id, 'claimant-b', 4);
    expectOk(await ctx.negotiation.proposeNewTime(listing.id, claimB.id, 'Mon 6pm'));
    const accepted = expectOk(await ctx.negotiation.respondToReschedule(listing.id, claimB.id, true));

    expect(accepted.claim.requestedPickup).toBe('Mon 6pm');
    expect(accepted.listing.status).toBe(ListingStatus.FULLY_COMMITTED);
    expect(availabilityOf(accepted.listing)).toEqual({
      totalQuantity: 10,
      committedQuantity: 10,
      pendingQuantity: 0,
      remainingQuantity: 0,
    });
  });
});
