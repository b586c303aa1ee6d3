import { AppError, DomainError, ErrorCode } from '../types/error.types';

const NOT_FOUND_CODES: Record<Extract<DomainError, { kind: 'NotFound' }>['entity'], ErrorCode> = {
  listing: ErrorCode.LISTING_NOT_FOUND,
  claim: ErrorCode.CLAIM_NOT_FOUND,
  session: ErrorCode.SESSION_NOT_FOUND,
};

/**
 * Short human-readable description of a domain error (for logs and API messages)
 */
export function describeDomainError(error: DomainError): string {
  switch (error.kind) {
    case 'NotFound':
      return `${error.entity} ${error.id} not found`;
    case 'NotAvailable':
      return `Listing ${error.listingId} is not open for claims (status ${error.status})`;
    case 'InvalidState':
      return error.message;
    case 'InsufficientStock':
      return `Cannot claim ${error.requested} units. Only ${error.remaining} remaining.`;
    case 'InvalidQuantity':
      return error.message;
    case 'InvalidDate':
      return `Invalid date "${error.input}". Use DD/MM/YYYY, DD/MM/YY, YYYY-MM-DD or "na".`;
    case 'ValidationError':
      return error.issues.join('; ');
    case 'Forbidden':
      return error.message;
    case 'Contention':
      return `Listing ${error.listingId} is busy, gave up after ${error.attempts} attempts`;
  }
}

/**
 * Map a domain error onto the HTTP error the API responds with
 */
export function toAppError(error: DomainError): AppError {
  const message = describeDomainError(error);

  switch (error.kind) {
    case 'NotFound':
      return new AppError(NOT_FOUND_CODES[error.entity], message, 404, { id: error.id });
    case 'NotAvailable':
      return new AppError(ErrorCode.NOT_AVAILABLE, message, 409, { status: error.status });
    case 'InvalidState':
      return new AppError(ErrorCode.INVALID_STATE, message, 409, {
        ...(error.current && { currentStatus: error.current }),
        ...(error.expected && { expectedStatus: error.expected }),
      });
    case 'InsufficientStock':
      return new AppError(ErrorCode.INSUFFICIENT_STOCK, message, 409, {
        requested: error.requested,
        remaining: error.remaining,
      });
    case 'InvalidQuantity':
      return new AppError(ErrorCode.INVALID_QUANTITY, message, 400);
    case 'InvalidDate':
      return new AppError(ErrorCode.INVALID_DATE, message, 400, { input: error.input });
    case 'ValidationError':
      return new AppError(ErrorCode.VALIDATION_ERROR, 'Validation failed', 400, {
        errors: error.issues,
      });
    case 'Forbidden':
      return new AppError(ErrorCode.FORBIDDEN, message, 403);
    case 'Contention':
      return new AppError(ErrorCode.CONTENTION, message, 503, { attempts: error.attempts });
  }
}
