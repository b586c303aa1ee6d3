import { Request, Response } from 'express';
import { IntakeService } from '../services/intake.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { toAppError } from '../utils/domain-error';
import {
  intakeAnswerBodySchema,
  startIntakeBodySchema,
  userParamsSchema,
} from '../validators/session.validator';

/**
 * Intake Controller
 *
 * HTTP request handlers for the step-by-step listing intake
 */
export class IntakeController {
  constructor(private intake: IntakeService) {}

  /**
   * GET /v1/intake/:userId
   */
  getSession = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = userParamsSchema.parse(req.params);

    const result = this.intake.getSession(userId);
    if (!result.ok) throw toAppError(result.error);

    res.status(200).json(createSuccessResponse(result.value));
  });

  /**
   * POST /v1/intake/:userId/start
   */
  start = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = userParamsSchema.parse(req.params);
    const { ownerName } = startIntakeBodySchema.parse(req.body);

    const session = this.intake.start(userId, ownerName ?? null);

    res.status(201).json(createSuccessResponse(session));
  });

  /**
   * POST /v1/intake/:userId/answer
   */
  answer = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = userParamsSchema.parse(req.params);
    const input = intakeAnswerBodySchema.parse(req.body);

    const result = this.intake.answer(userId, input);
    if (!result.ok) throw toAppError(result.error);

    res.status(200).json(createSuccessResponse(result.value));
  });

  /**
   * POST /v1/intake/:userId/confirm
   * Commit the draft as a listing
   */
  confirm = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = userParamsSchema.parse(req.params);

    const result = await this.intake.confirm(userId);
    if (!result.ok) throw toAppError(result.error);

    res.status(201).json(createSuccessResponse(result.value, 'Listing created'));
  });

  /**
   * POST /v1/intake/:userId/cancel
   */
  cancel = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = userParamsSchema.parse(req.params);

    const cancelled = this.intake.cancel(userId);

    res.status(200).json(createSuccessResponse({ cancelled }));
  });
}
