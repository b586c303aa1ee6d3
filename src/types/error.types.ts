/**
 * Error types and codes
 */
import { ClaimStatus, ListingStatus } from './listing.types';

// Standard error codes
export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_QUANTITY = 'INVALID_QUANTITY',
  INVALID_DATE = 'INVALID_DATE',

  // Authorization errors (403)
  FORBIDDEN = 'FORBIDDEN',

  // Not found errors (404)
  LISTING_NOT_FOUND = 'LISTING_NOT_FOUND',
  CLAIM_NOT_FOUND = 'CLAIM_NOT_FOUND',
  SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',

  // Conflict errors (409)
  NOT_AVAILABLE = 'NOT_AVAILABLE',
  INVALID_STATE = 'INVALID_STATE',
  INSUFFICIENT_STOCK = 'INSUFFICIENT_STOCK',

  // Transient errors (503)
  CONTENTION = 'CONTENTION',

  // Server errors (500)
  DATABASE_ERROR = 'DATABASE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Domain error taxonomy returned (never thrown) by the core services
 */
export type DomainError =
  | { kind: 'NotFound'; entity: 'listing' | 'claim' | 'session'; id: string }
  | { kind: 'NotAvailable'; listingId: string; status: ListingStatus }
  | { kind: 'InvalidState'; message: string; current?: ClaimStatus; expected?: ClaimStatus[] }
  | { kind: 'InsufficientStock'; requested: number; remaining: number }
  | { kind: 'InvalidQuantity'; message: string }
  | { kind: 'InvalidDate'; input: string }
  | { kind: 'ValidationError'; issues: string[] }
  | { kind: 'Forbidden'; message: string }
  | { kind: 'Contention'; listingId: string; attempts: number };

// Custom application error class
export class AppError extends Error {
  constructor(
    public code: ErrorCode | string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}
