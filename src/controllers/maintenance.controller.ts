import { Request, Response } from 'express';
import { ListingService } from '../services/listing.service';
import { asyncHandler } from '../utils/async-handler';
import { createSuccessResponse } from '../utils/response-factory';
import { exportQuerySchema } from '../validators/listing.validator';

/**
 * Maintenance Controller
 *
 * HTTP request handlers for maintenance endpoints
 */
export class MaintenanceController {
  constructor(private listingService: ListingService) {}

  /**
   * POST /v1/maintenance/bump
   * Re-announce open listings that still have stock
   */
  bumpListings = asyncHandler(async (_req: Request, res: Response) => {
    const bumped = await this.listingService.bumpOpen();

    res.status(200).json(createSuccessResponse({ bumped }, `Bumped ${bumped} open listing(s)`));
  });

  /**
   * GET /v1/maintenance/export?year=YYYY
   * Yearly CSV report of listings (defaults to the current year)
   */
  exportListings = asyncHandler(async (req: Request, res: Response) => {
    const { year = new Date().getUTCFullYear() } = exportQuerySchema.parse(req.query);

    const csv = await this.listingService.exportYearCsv(year);

    res
      .status(200)
      .type('text/csv')
      .attachment(`listings-${year}.csv`)
      .send(csv);
  });
}
