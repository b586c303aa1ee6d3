import { Request, Response } from 'express';
import { ListingService } from '../services/listing.service';
import { ClaimEngine } from '../services/claim.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { toAppError } from '../utils/domain-error';
import { claimParamsSchema, listingDraftSchema, listingParamsSchema } from '../validators/listing.validator';

/**
 * Listing Controller
 *
 * HTTP request handlers for listing endpoints
 */
export class ListingController {
  constructor(
    private listingService: ListingService,
    private claimEngine: ClaimEngine
  ) {}

  /**
   * POST /v1/listings
   * Create a listing from a complete draft
   */
  createListing = asyncHandler(async (req: Request, res: Response) => {
    const draft = listingDraftSchema.parse(req.body);

    const result = await this.listingService.createListing(draft);
    if (!result.ok) throw toAppError(result.error);

    res.status(201).json(createSuccessResponse(result.value));
  });

  /**
   * GET /v1/listings
   * Open listings with their availability
   */
  listOpen = asyncHandler(async (_req: Request, res: Response) => {
    const listings = await this.listingService.listOpen();

    res.status(200).json(createSuccessResponse(listings, undefined, { count: listings.length }));
  });

  /**
   * GET /v1/listings/:id
   * Get listing with availability breakdown
   */
  getListing = asyncHandler(async (req: Request, res: Response) => {
    const { id } = listingParamsSchema.parse(req.params);

    const result = await this.listingService.getListingWithAvailability(id);
    if (!result.ok) throw toAppError(result.error);

    res.status(200).json(createSuccessResponse(result.value));
  });

  /**
   * POST /v1/listings/:id/expire
   * Close a listing to new claims
   */
  expireListing = asyncHandler(async (req: Request, res: Response) => {
    const { id } = listingParamsSchema.parse(req.params);

    const result = await this.listingService.expireListing(id);
    if (!result.ok) throw toAppError(result.error);

    res.status(200).json(createSuccessResponse(result.value, `Listing is ${result.value.status}`));
  });

  /**
   * GET /v1/listings/:id/claims/:claimId
   */
  getClaim = asyncHandler(async (req: Request, res: Response) => {
    const { id, claimId } = claimParamsSchema.parse(req.params);

    const result = await this.claimEngine.getClaim(id, claimId);
    if (!result.ok) throw toAppError(result.error);

    res.status(200).json(createSuccessResponse(result.value.claim));
  });
}
