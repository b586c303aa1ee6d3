import { Router } from 'express';
import { IntakeController } from '../../controllers/intake.controller';
import { validate } from '../../middleware/validation.middleware';
import { intakeAnswerSchema, sessionSchema, startIntakeSchema } from '../../validators/session.validator';
import { Services } from '../../container';

/**
 * Listing intake routes (v1)
 */
export function createIntakeRouter(services: Services): Router {
  const router = Router();
  const intakeController = new IntakeController(services.intake);

  /**
   * @swagger
   * /v1/intake/{userId}:
   *   get:
   *     summary: Current intake session
   *     tags: [Intake]
   *     parameters:
   *       - in: path
   *         name: userId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Session with current step and draft
   *       404:
   *         description: No active session
   */
  router.get('/:userId', validate(sessionSchema), intakeController.getSession);

  /**
   * @swagger
   * /v1/intake/{userId}/start:
   *   post:
   *     summary: Start (or restart) a listing intake
   *     tags: [Intake]
   *     parameters:
   *       - in: path
   *         name: userId
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               ownerName:
   *                 type: string
   *     responses:
   *       201:
   *         description: Session at the ITEM step
   */
  router.post('/:userId/start', validate(startIntakeSchema), intakeController.start);

  /**
   * @swagger
   * /v1/intake/{userId}/answer:
   *   post:
   *     summary: Answer the current intake step
   *     description: |
   *       Text answers use `{ "kind": "text", "text": "..." }`.
   *       At the photo step send `{ "kind": "photo", "ref": "..." }` or the text "skip".
   *     tags: [Intake]
   *     parameters:
   *       - in: path
   *         name: userId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Session advanced to the next step
   *       400:
   *         description: Answer rejected, session stays on the same step
   */
  router.post('/:userId/answer', validate(intakeAnswerSchema), intakeController.answer);

  /**
   * @swagger
   * /v1/intake/{userId}/confirm:
   *   post:
   *     summary: Commit the draft as a listing
   *     tags: [Intake]
   *     parameters:
   *       - in: path
   *         name: userId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       201:
   *         description: Listing created
   *       409:
   *         description: Intake has not reached the confirm step
   */
  router.post('/:userId/confirm', validate(sessionSchema), intakeController.confirm);

  /**
   * @swagger
   * /v1/intake/{userId}/cancel:
   *   post:
   *     summary: Discard the intake draft
   *     tags: [Intake]
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
  router.post('/:userId/cancel', validate(sessionSchema), intakeController.cancel);

  return router;
}
