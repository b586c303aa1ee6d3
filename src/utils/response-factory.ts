import { ApiSuccessResponse, ApiErrorResponse } from '../types/api.types';

/**
 * Create a standardized success response
 */
export function createSuccessResponse<T>(
  data: T,
  message?: string,
  meta?: Record<string, unknown>
): ApiSuccessResponse<T> {
  const response: ApiSuccessResponse<T> = { data };

  if (message) {
    response.message = message;
  }
  if (meta) {
    response.meta = meta;
  }

  return response;
}

/**
 * Create a standardized error response
 */
export function createErrorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return {
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}
