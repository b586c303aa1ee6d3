import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { Server } from 'http';
import axios, { AxiosInstance } from 'axios';
import { createApp } from '../src/app';
import { ApiErrorResponse, ApiSuccessResponse, HealthCheckResponse } from '../src/types/api.types';
import { Claim, Listing, ListingWithAvailability } from '../src/types/listing.types';
import { CommandOutcome } from '../src/types/command.types';
import { IntakeSession } from '../src/types/intake.types';
import { buildDraft, createTestContext, TestContext } from './helpers';

/**
 * API Tests
 *
 * Drives the express app over HTTP on an ephemeral port with an in-memory store.
 */

let ctx: TestContext;
let server: Server;
let http: AxiosInstance;

beforeAll(async () => {
  ctx = createTestContext();
  const app = createApp(ctx);

  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });

  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : 0;

  http = axios.create({
    baseURL: `http://127.0.0.1:${port}`,
    validateStatus: () => true,
  });
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
});

async function createListing(totalQty: number): Promise<Listing> {
  const response = await http.post<ApiSuccessResponse<Listing>>('/v1/listings', buildDraft({ totalQty }));
  expect(response.status).toBe(201);
  return response.data.data;
}

async function submitClaim(listingId: string, claimantId: string, qty: number): Promise<Claim> {
  const response = await http.post<ApiSuccessResponse<CommandOutcome>>('/v1/commands', {
    type: 'SubmitClaim',
    listingId,
    claimantId,
    qty,
    pickupTime: 'Sat 10am',
  });
  expect(response.status).toBe(201);
  const { claim } = response.data.data;
  if (!claim) throw new Error('expected a claim');
  return claim;
}

describe('service endpoints', () => {
  it('GET /health reports the store driver', async () => {
    const response = await http.get<HealthCheckResponse>('/health');

    expect(response.status).toBe(200);
    expect(response.data).toMatchObject({ status: 'healthy', store: 'memory' });
  });

  it('GET /v1 reports the API version', async () => {
    const response = await http.get('/v1');

    expect(response.data).toEqual({ version: '1.0.0', api: 'Donation Claims API' });
  });

  it('serves the OpenAPI document', async () => {
    const response = await http.get<{ info: { title: string } }>('/openapi.json');

    expect(response.status).toBe(200);
    expect(response.data.info.title).toBe('Donation Claims API');
  });

  it('answers unknown routes with 404', async () => {
    const response = await http.get<ApiErrorResponse>('/v1/nothing-here');

    expect(response.status).toBe(404);
    expect(response.data.error).toEqual({ code: 'NOT_FOUND', message: 'Route GET /v1/nothing-here not found' });
  });
});

describe('listings', () => {
  it('creates a listing and reads it back with availability', async () => {
    const listing = await createListing(6);
    expect(listing.externalRef).toBe(`post-${listing.id}`);

    const response = await http.get<ApiSuccessResponse<ListingWithAvailability>>(`/v1/listings/${listing.id}`);

    expect(response.status).toBe(200);
    expect(response.data.data.availability).toEqual({
      totalQuantity: 6,
      committedQuantity: 0,
      pendingQuantity: 0,
      remainingQuantity: 6,
    });
  });

  it('rejects an invalid draft', async () => {
    const response = await http.post<ApiErrorResponse>('/v1/listings', { ...buildDraft(), totalQty: -1 });

    expect(response.status).toBe(400);
    expect(response.data.error.code).toBe('VALIDATION_ERROR');
    expect(response.data.error.details).toEqual({
      errors: [{ field: 'body.totalQty', message: 'Total quantity must be positive' }],
    });
  });

  it('returns 404 for an unknown listing', async () => {
    const response = await http.get<ApiErrorResponse>('/v1/listings/missing');

    expect(response.status).toBe(404);
    expect(response.data.error).toMatchObject({ code: 'LISTING_NOT_FOUND', details: { id: 'missing' } });
  });

  it('lists open listings and drops expired ones', async () => {
    const listing = await createListing(2);

    const expire = await http.post<ApiSuccessResponse<Listing>>(`/v1/listings/${listing.id}/expire`);
    expect(expire.status).toBe(200);
    expect(expire.data.data.status).toBe('EXPIRED');

    const response = await http.get<ApiSuccessResponse<ListingWithAvailability[]>>('/v1/listings');
    expect(response.status).toBe(200);
    expect(response.data.data.map((entry) => entry.id)).not.toContain(listing.id);
    expect(response.data.meta).toEqual({ count: response.data.data.length });
  });
});

describe('commands', () => {
  let listing: Listing;

  beforeEach(async () => {
    listing = await createListing(5);
  });

  it('submits, approves and refuses a second approval', async () => {
    const claim = await submitClaim(listing.id, 'claimant-1', 3);

    const approve = () =>
      http.post<ApiSuccessResponse<CommandOutcome> & ApiErrorResponse>('/v1/commands', {
        type: 'Approve',
        listingId: listing.id,
        claimId: claim.id,
      });

    const first = await approve();
    expect(first.status).toBe(200);
    expect(first.data.data.claim?.status).toBe('APPROVED');

    const second = await approve();
    expect(second.status).toBe(409);
    expect(second.data.error).toMatchObject({
      code: 'INVALID_STATE',
      details: { currentStatus: 'APPROVED', expectedStatus: ['PENDING'] },
    });

    const stored = await http.get<ApiSuccessResponse<Claim>>(`/v1/listings/${listing.id}/claims/${claim.id}`);
    expect(stored.status).toBe(200);
    expect(stored.data.data.status).toBe('APPROVED');
  });

  it('answers 409 when the quantity exceeds the remaining stock', async () => {
    const response = await http.post<ApiErrorResponse>('/v1/commands', {
      type: 'SubmitClaim',
      listingId: listing.id,
      claimantId: 'claimant-1',
      qty: 9,
      pickupTime: 'Sat 10am',
    });

    expect(response.status).toBe(409);
    expect(response.data.error).toEqual({
      code: 'INSUFFICIENT_STOCK',
      message: 'Cannot claim 9 units. Only 5 remaining.',
      details: { requested: 9, remaining: 5 },
    });
  });

  it('answers 403 when someone else cancels a claim', async () => {
    const claim = await submitClaim(listing.id, 'claimant-1', 1);

    const response = await http.post<ApiErrorResponse>('/v1/commands', {
      type: 'CancelClaim',
      listingId: listing.id,
      claimId: claim.id,
      claimantId: 'claimant-2',
    });

    expect(response.status).toBe(403);
    expect(response.data.error.code).toBe('FORBIDDEN');
  });

  it('rejects an unknown command type', async () => {
    const response = await http.post<ApiErrorResponse>('/v1/commands', { type: 'Teleport', listingId: listing.id });

    expect(response.status).toBe(400);
    expect(response.data.error.code).toBe('VALIDATION_ERROR');
  });
});

describe('conversations', () => {
  it('runs a listing intake to completion', async () => {
    const start = await http.post<ApiSuccessResponse<IntakeSession>>('/v1/intake/owner-7/start', { ownerName: 'Dee' });
    expect(start.status).toBe(201);

    for (const text of ['Diapers', '4 packs', 'size 3', '01/06/2027', 'Ward 2', 'skip']) {
      const answer = await http.post('/v1/intake/owner-7/answer', { kind: 'text', text });
      expect(answer.status).toBe(200);
    }

    const session = await http.get<ApiSuccessResponse<IntakeSession>>('/v1/intake/owner-7');
    expect(session.data.data.step).toBe('CONFIRM');

    const confirm = await http.post<ApiSuccessResponse<Listing>>('/v1/intake/owner-7/confirm');
    expect(confirm.status).toBe(201);
    expect(confirm.data.data).toMatchObject({
      ownerId: 'owner-7',
      itemName: 'Diapers',
      totalQty: 4,
      qtyLabel: '4 packs',
      expiryLabel: '01/06/27',
    });

    const gone = await http.get<ApiErrorResponse>('/v1/intake/owner-7');
    expect(gone.status).toBe(404);
    expect(gone.data.error.code).toBe('SESSION_NOT_FOUND');
  });

  it('answers 400 for a bad intake answer', async () => {
    await http.post('/v1/intake/owner-8/start', {});
    await http.post('/v1/intake/owner-8/answer', { kind: 'text', text: 'Soap' });

    const response = await http.post<ApiErrorResponse>('/v1/intake/owner-8/answer', { kind: 'text', text: 'lots' });

    expect(response.status).toBe(400);
    expect(response.data.error.code).toBe('INVALID_QUANTITY');
  });

  it('runs a claim request to a submitted claim', async () => {
    const listing = await createListing(3);

    const start = await http.post('/v1/claim-requests/claimant-5/start', { listingId: listing.id });
    expect(start.status).toBe(201);

    const quantity = await http.post('/v1/claim-requests/claimant-5/answer', { text: '2' });
    expect(quantity.status).toBe(200);

    const pickup = await http.post<ApiSuccessResponse<{ status: string; claim: Claim }>>(
      '/v1/claim-requests/claimant-5/answer',
      { text: 'Sun noon' }
    );
    expect(pickup.status).toBe(201);
    expect(pickup.data.message).toBe('Claim submitted');
    expect(pickup.data.data.claim).toMatchObject({ qty: 2, requestedPickup: 'Sun noon', status: 'PENDING' });
  });

  it('cancels a claim request', async () => {
    const listing = await createListing(3);
    await http.post('/v1/claim-requests/claimant-6/start', { listingId: listing.id });

    const response = await http.post<ApiSuccessResponse<{ cancelled: boolean }>>(
      '/v1/claim-requests/claimant-6/cancel'
    );

    expect(response.data.data).toEqual({ cancelled: true });
  });
});

describe('maintenance export', () => {
  it('returns the yearly CSV', async () => {
    const response = await http.get<string>('/v1/maintenance/export', {
      params: { year: '2019' },
      responseType: 'text',
    });

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(response.headers['content-disposition']).toBe('attachment; filename="listings-2019.csv"');
    expect(response.data).toBe(
      'listing_id,item_name,status,owner_id,claimed_by,created_at,claimed_at,total_qty,remaining,committed,location,expiry\n'
    );
  });

  it('POST /v1/maintenance/bump re-announces open listings with a post', async () => {
    const listing = await createListing(3);
    const eligible = (await ctx.listingService.listOpen()).filter(
      (open) => open.externalRef !== null && open.availability.remainingQuantity > 0
    );
    const before = ctx.notifier.ofType('listing.bump').length;

    const response = await http.post<ApiSuccessResponse<{ bumped: number }>>('/v1/maintenance/bump');

    expect(response.status).toBe(200);
    expect(response.data.data).toEqual({ bumped: eligible.length });
    expect(response.data.message).toBe(`Bumped ${eligible.length} open listing(s)`);
    const bumpedIds = ctx.notifier.ofType('listing.bump').slice(before).map((call) => call.listingId);
    expect(bumpedIds).toContain(listing.id);
    expect(bumpedIds).toHaveLength(eligible.length);
  });

  it('rejects a malformed year', async () => {
    const response = await http.get<ApiErrorResponse>('/v1/maintenance/export', { params: { year: '19' } });

    expect(response.status).toBe(400);
    expect(response.data.error.details).toEqual({
      errors: [{ field: 'query.year', message: 'Year must have four digits' }],
    });
  });
});
