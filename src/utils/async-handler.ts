import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Async handler wrapper
 *
 * Wraps async route handlers and passes rejections (AppError, ZodError, store
 * failures) to the Express error middleware.
 *
 * Usage:
 * ```typescript
 * getListing = asyncHandler(async (req, res) => {
 *   const result = await this.listingService.getListingWithAvailability(req.params.id);
 *   if (!result.ok) throw toAppError(result.error);
 *   res.json(createSuccessResponse(result.value));
 * });
 * ```
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
};
