import { z } from 'zod';
import { ClaimStatus, Listing, ListingStatus } from '../types/listing.types';

/**
 * Listing validation schemas
 */

const requiredText = (label: string) =>
  z.string({ required_error: `${label} is required` }).trim().min(1, `${label} is required`);

// Complete listing draft (ListingRegistry.create input)
export const listingDraftSchema = z.object({
  ownerId: requiredText('Owner ID'),
  ownerName: z.string().trim().nullable().optional(),
  itemName: requiredText('Item name').max(255, 'Item name must be at most 255 characters'),
  totalQty: z
    .number({
      required_error: 'Total quantity is required',
      invalid_type_error: 'Total quantity must be a number',
    })
    .int('Total quantity must be an integer')
    .positive('Total quantity must be positive')
    .safe('Total quantity is too large'),
  qtyLabel: z.string().trim().optional(),
  sizeLabel: requiredText('Size'),
  expiryLabel: requiredText('Expiry'),
  locationLabel: requiredText('Location'),
  photoRef: z.string().min(1).nullable().optional(),
});

// Persisted claim record
const claimRecordSchema = z.object({
  id: z.string(),
  claimantId: z.string(),
  claimantName: z.string().nullable(),
  qty: z.number().int().positive().safe(),
  requestedPickup: z.string(),
  proposedTime: z.string().nullable(),
  originalPickup: z.string().nullable(),
  status: z.nativeEnum(ClaimStatus),
  history: z.array(z.object({ status: z.nativeEnum(ClaimStatus), at: z.string() })),
  createdAt: z.string(),
});

// Persisted listing record (claims keep arrival order)
export const listingRecordSchema = z.object({
  id: z.string(),
  ownerId: z.string(),
  ownerName: z.string().nullable(),
  itemName: z.string(),
  qtyLabel: z.string(),
  sizeLabel: z.string(),
  expiryLabel: z.string(),
  locationLabel: z.string(),
  photoRef: z.string().nullable(),
  totalQty: z.number().int().positive().safe(),
  claims: z.array(claimRecordSchema),
  status: z.nativeEnum(ListingStatus),
  externalRef: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  expiredAt: z.string().nullable(),
});

export const parseListingRecord = (raw: unknown): Listing => listingRecordSchema.parse(raw);

// Route params
export const listingParamsSchema = z.object({
  id: z.string().min(1, 'Listing ID is required'),
});

export const claimParamsSchema = z.object({
  id: z.string().min(1, 'Listing ID is required'),
  claimId: z.string().min(1, 'Claim ID is required'),
});

// Create listing request schema
export const createListingSchema = z.object({
  body: listingDraftSchema,
});

// Get listing by ID schema
export const getListingSchema = z.object({
  params: listingParamsSchema,
});

// Get claim schema
export const getClaimSchema = z.object({
  params: claimParamsSchema,
});

// Export query
export const exportQuerySchema = z.object({
  year: z
    .string()
    .regex(/^\d{4}$/, 'Year must have four digits')
    .transform(Number)
    .optional(),
});

export const exportListingsSchema = z.object({
  query: exportQuerySchema,
});
