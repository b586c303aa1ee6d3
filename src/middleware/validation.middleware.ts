import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AnyZodObject } from 'zod';

/**
 * Validation middleware factory
 *
 * Validates request data (body, params, query) against a Zod schema. Failures
 * are forwarded to the error handler, which renders them as VALIDATION_ERROR.
 *
 * Usage:
 * ```typescript
 * router.post('/listings', validate(createListingSchema), listingController.createListing);
 * ```
 */
export const validate = (schema: AnyZodObject): RequestHandler => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    const result = await schema.safeParseAsync({
      body: req.body,
      params: req.params,
      query: req.query,
    });

    if (!result.success) {
      next(result.error);
      return;
    }
    next();
  };
};
