import { Router } from 'express';
import { ListingController } from '../../controllers/listing.controller';
import { validate } from '../../middleware/validation.middleware';
import {
  createListingSchema,
  getClaimSchema,
  getListingSchema,
} from '../../validators/listing.validator';
import { Services } from '../../container';

/**
 * Listing routes (v1)
 */
export function createListingsRouter(services: Services): Router {
  const router = Router();
  const listingController = new ListingController(services.listingService, services.claimEngine);

  /**
   * @swagger
   * /v1/listings:
   *   post:
   *     summary: Create a listing from a complete draft
   *     tags: [Listings]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/ListingDraft'
   *     responses:
   *       201:
   *         description: Listing created and published
   *       400:
   *         description: Validation failed
   */
  router.post('/', validate(createListingSchema), listingController.createListing);

  /**
   * @swagger
   * /v1/listings:
   *   get:
   *     summary: Open listings with remaining stock
   *     tags: [Listings]
   *     responses:
   *       200:
   *         description: Open listings, oldest first
   */
  router.get('/', listingController.listOpen);

  /**
   * @swagger
   * /v1/listings/{id}:
   *   get:
   *     summary: Get listing with availability breakdown
   *     tags: [Listings]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Listing retrieved successfully
   *       404:
   *         description: Listing not found
   */
  router.get('/:id', validate(getListingSchema), listingController.getListing);

  /**
   * @swagger
   * /v1/listings/{id}/expire:
   *   post:
   *     summary: Close a listing to new claims
   *     description: No-op unless the listing is OPEN. Committed claims are kept.
   *     tags: [Listings]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Listing after expiry
   *       404:
   *         description: Listing not found
   */
  router.post('/:id/expire', validate(getListingSchema), listingController.expireListing);

  /**
   * @swagger
   * /v1/listings/{id}/claims/{claimId}:
   *   get:
   *     summary: Get one claim on a listing
   *     tags: [Listings]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *       - in: path
   *         name: claimId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Claim retrieved successfully
   *       404:
   *         description: Listing or claim not found
   */
  router.get('/:id/claims/:claimId', validate(getClaimSchema), listingController.getClaim);

  return router;
}
