import { Router } from 'express';
import { CommandController } from '../../controllers/command.controller';
import { validate } from '../../middleware/validation.middleware';
import { dispatchCommandSchema } from '../../validators/command.validator';
import { Services } from '../../container';

/**
 * Command routes (v1)
 */
export function createCommandsRouter(services: Services): Router {
  const router = Router();
  const commandController = new CommandController(services.dispatcher);

  /**
   * @swagger
   * /v1/commands:
   *   post:
   *     summary: Dispatch a claim or listing command
   *     description: |
   *       Commands are discriminated by `type`:
   *       SubmitClaim, Approve, Reject, ProposeReschedule, RespondReschedule, CancelClaim, ExpireListing.
   *     tags: [Commands]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/Command'
   *     responses:
   *       200:
   *         description: Command applied
   *       201:
   *         description: Claim submitted
   *       400:
   *         description: Validation failed
   *       403:
   *         description: Actor may not perform this command
   *       404:
   *         description: Listing or claim not found
   *       409:
   *         description: Listing closed, claim in the wrong state, or insufficient stock
   *       503:
   *         description: Listing too contended, retry later
   */
  router.post('/', validate(dispatchCommandSchema), commandController.dispatch);

  return router;
}
