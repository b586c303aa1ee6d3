import { Router } from 'express';
import { ClaimRequestController } from '../../controllers/claim-request.controller';
import { validate } from '../../middleware/validation.middleware';
import {
  claimRequestAnswerSchema,
  sessionSchema,
  startClaimRequestSchema,
} from '../../validators/session.validator';
import { Services } from '../../container';

/**
 * Claim request routes (v1)
 */
export function createClaimRequestsRouter(services: Services): Router {
  const router = Router();
  const claimRequestController = new ClaimRequestController(services.claimRequests);

  /**
   * @swagger
   * /v1/claim-requests/{userId}:
   *   get:
   *     summary: Current claim request session
   *     tags: [ClaimRequests]
   *     parameters:
   *       - in: path
   *         name: userId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Session with current step
   *       404:
   *         description: No active session
   */
  router.get('/:userId', validate(sessionSchema), claimRequestController.getSession);

  /**
   * @swagger
   * /v1/claim-requests/{userId}/start:
   *   post:
   *     summary: Start a claim on a listing
   *     tags: [ClaimRequests]
   *     parameters:
   *       - in: path
   *         name: userId
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - listingId
   *             properties:
   *               listingId:
   *                 type: string
   *               claimantName:
   *                 type: string
   *     responses:
   *       201:
   *         description: Session at the QUANTITY step
   *       404:
   *         description: Listing not found
   *       409:
   *         description: Listing is not open for claims
   */
  router.post('/:userId/start', validate(startClaimRequestSchema), claimRequestController.start);

  /**
   * @swagger
   * /v1/claim-requests/{userId}/answer:
   *   post:
   *     summary: Answer the quantity or pickup time question
   *     tags: [ClaimRequests]
   *     parameters:
   *       - in: path
   *         name: userId
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - text
   *             properties:
   *               text:
   *                 type: string
   *     responses:
   *       200:
   *         description: Quantity accepted, awaiting pickup time
   *       201:
   *         description: Claim submitted
   *       400:
   *         description: Invalid quantity or empty pickup time
   *       409:
   *         description: Quantity exceeds the remaining stock
   */
  router.post('/:userId/answer', validate(claimRequestAnswerSchema), claimRequestController.answer);

  /**
   * @swagger
   * /v1/claim-requests/{userId}/cancel:
   *   post:
   *     summary: Abandon the claim request
   *     tags: [ClaimRequests]
   *     parameters:
   *       - in: path
   *         name: userId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Whether a session existed
   */
  router.post('/:userId/cancel', validate(sessionSchema), claimRequestController.cancel);

  return router;
}
