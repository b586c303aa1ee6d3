import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';

const nullableString = { type: 'string', nullable: true };

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates OpenAPI 3.0 specification from JSDoc comments in route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Donation Claims API',
      version: '1.0.0',
      description: `
Listing and claim reconciliation for donated items.

## Features
- Post listings through a step-by-step intake or in one request
- Claim a quantity with a pickup time; the owner approves or rejects
- Owner and claimant negotiate a new pickup time
- Listings close when fully committed or expired
- Yearly CSV export

## Concurrency Guarantees
For every listing: \`sum(qty of APPROVED and RESCHEDULE_ACCEPTED claims) ≤ totalQty\`

Every read-check-write on a listing runs as an optimistic compare-and-swap on a versioned
record, retried up to ${env.TRANSACTION_MAX_ATTEMPTS} times before answering 503.

## Claim Lifecycle
1. **PENDING**: submitted, waiting for the owner (does not hold stock)
2. **APPROVED**: committed
3. **REJECTED**: declined by the owner
4. **RESCHEDULE_PENDING**: owner proposed another pickup time
5. **RESCHEDULE_ACCEPTED** / **RESCHEDULE_DECLINED**: claimant answered the proposal
6. **CANCELLED**: withdrawn by the claimant before a decision
      `.trim(),
      contact: {
        name: 'API Support',
      },
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    tags: [
      {
        name: 'Listings',
        description: 'Listing registry and availability',
      },
      {
        name: 'Commands',
        description: 'Claim lifecycle and negotiation commands',
      },
      {
        name: 'Intake',
        description: 'Step-by-step listing intake',
      },
      {
        name: 'ClaimRequests',
        description: 'Claim conversation (quantity, then pickup time)',
      },
      {
        name: 'Maintenance',
        description: 'Reporting',
      },
    ],
    components: {
      schemas: {
        ListingDraft: {
          type: 'object',
          required: ['ownerId', 'itemName', 'totalQty', 'sizeLabel', 'expiryLabel', 'locationLabel'],
          properties: {
            ownerId: { type: 'string' },
            ownerName: nullableString,
            itemName: { type: 'string', maxLength: 255 },
            totalQty: { type: 'integer', minimum: 1 },
            qtyLabel: { type: 'string', description: 'Quantity as the owner typed it' },
            sizeLabel: { type: 'string' },
            expiryLabel: { type: 'string', example: '01/01/26' },
            locationLabel: { type: 'string' },
            photoRef: nullableString,
          },
        },
        Claim: {
          type: 'object',
          properties: {
            id: { type: 'string', format: 'uuid' },
            claimantId: { type: 'string' },
            claimantName: nullableString,
            qty: { type: 'integer', minimum: 1 },
            requestedPickup: { type: 'string' },
            proposedTime: nullableString,
            originalPickup: nullableString,
            status: {
              type: 'string',
              enum: [
                'PENDING',
                'APPROVED',
                'REJECTED',
                'RESCHEDULE_PENDING',
                'RESCHEDULE_ACCEPTED',
                'RESCHEDULE_DECLINED',
                'CANCELLED',
              ],
            },
            createdAt: { type: 'string', format: 'date-time' },
          },
        },
        Listing: {
          type: 'object',
          properties: {
            id: { type: 'string', format: 'uuid' },
            ownerId: { type: 'string' },
            itemName: { type: 'string' },
            totalQty: { type: 'integer' },
            status: { type: 'string', enum: ['OPEN', 'FULLY_COMMITTED', 'EXPIRED'] },
            claims: { type: 'array', items: { $ref: '#/components/schemas/Claim' } },
            externalRef: nullableString,
            availability: {
              type: 'object',
              properties: {
                totalQuantity: { type: 'integer' },
                committedQuantity: { type: 'integer' },
                pendingQuantity: { type: 'integer' },
                remainingQuantity: { type: 'integer' },
              },
            },
          },
        },
        Command: {
          type: 'object',
          required: ['type', 'listingId'],
          properties: {
            type: {
              type: 'string',
              enum: [
                'SubmitClaim',
                'Approve',
                'Reject',
                'ProposeReschedule',
                'RespondReschedule',
                'CancelClaim',
                'ExpireListing',
              ],
            },
            listingId: { type: 'string' },
            claimId: { type: 'string' },
            claimantId: { type: 'string' },
            claimantName: nullableString,
            qty: { type: 'integer', minimum: 1 },
            pickupTime: { type: 'string' },
            newTime: { type: 'string' },
            accept: { type: 'boolean' },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: {
                  type: 'string',
                  description: 'Error code',
                },
                message: {
                  type: 'string',
                  description: 'Human-readable error message',
                },
                details: {
                  type: 'object',
                  description: 'Additional error details',
                },
              },
            },
          },
        },
      },
    },
  },
  apis: ['./src/routes/**/*.ts'], // Path to route files with JSDoc comments
};

export const swaggerSpec = swaggerJsdoc(options);
