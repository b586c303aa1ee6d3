import { z } from 'zod';

/**
 * Conversation session validation schemas (intake and claim requests)
 */

export const userParamsSchema = z.object({
  userId: z.string().trim().min(1, 'User ID is required'),
});

// Start intake
export const startIntakeBodySchema = z.object({
  ownerName: z.string().trim().nullable().optional(),
});

// One answer: free text, or a photo reference at the photo step
export const intakeAnswerBodySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('text'), text: z.string().max(1000) }),
  z.object({ kind: z.literal('photo'), ref: z.string().trim().min(1, 'Photo reference is required') }),
]);

// Start claim request
export const startClaimRequestBodySchema = z.object({
  listingId: z.string().trim().min(1, 'Listing ID is required'),
  claimantName: z.string().trim().nullable().optional(),
});

export const claimRequestAnswerBodySchema = z.object({
  text: z.string().max(1000),
});

export const sessionSchema = z.object({
  params: userParamsSchema,
});

export const startIntakeSchema = z.object({
  params: userParamsSchema,
  body: startIntakeBodySchema,
});

export const intakeAnswerSchema = z.object({
  params: userParamsSchema,
  body: intakeAnswerBodySchema,
});

export const startClaimRequestSchema = z.object({
  params: userParamsSchema,
  body: startClaimRequestBodySchema,
});

export const claimRequestAnswerSchema = z.object({
  params: userParamsSchema,
  body: claimRequestAnswerBodySchema,
});
