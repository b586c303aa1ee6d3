import { z } from 'zod';

/**
 * Command validation schemas
 */

const id = (label: string) => z.string().trim().min(1, `${label} is required`);
const text = (label: string) => z.string().trim().min(1, `${label} is required`).max(500);

export const commandSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('SubmitClaim'),
    listingId: id('Listing ID'),
    claimantId: id('Claimant ID'),
    claimantName: z.string().trim().nullable().optional(),
    qty: z
      .number({ required_error: 'Quantity is required', invalid_type_error: 'Quantity must be a number' })
      .int('Quantity must be an integer'),
    pickupTime: text('Pickup time'),
  }),
  z.object({
    type: z.literal('Approve'),
    listingId: id('Listing ID'),
    claimId: id('Claim ID'),
  }),
  z.object({
    type: z.literal('Reject'),
    listingId: id('Listing ID'),
    claimId: id('Claim ID'),
  }),
  z.object({
    type: z.literal('ProposeReschedule'),
    listingId: id('Listing ID'),
    claimId: id('Claim ID'),
    newTime: text('New time'),
  }),
  z.object({
    type: z.literal('RespondReschedule'),
    listingId: id('Listing ID'),
    claimId: id('Claim ID'),
    accept: z.boolean({ required_error: 'accept is required' }),
  }),
  z.object({
    type: z.literal('CancelClaim'),
    listingId: id('Listing ID'),
    claimId: id('Claim ID'),
    claimantId: id('Claimant ID'),
  }),
  z.object({
    type: z.literal('ExpireListing'),
    listingId: id('Listing ID'),
  }),
]);

// Dispatch command request schema
export const dispatchCommandSchema = z.object({
  body: commandSchema,
});
