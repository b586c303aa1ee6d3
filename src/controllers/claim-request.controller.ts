import { Request, Response } from 'express';
import { ClaimRequestService } from '../services/claim-request.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { toAppError } from '../utils/domain-error';
import {
  claimRequestAnswerBodySchema,
  startClaimRequestBodySchema,
  userParamsSchema,
} from '../validators/session.validator';

/**
 * Claim Request Controller
 *
 * HTTP request handlers for the claim conversation (quantity, then pickup time)
 */
export class ClaimRequestController {
  constructor(private claimRequests: ClaimRequestService) {}

  /**
   * GET /v1/claim-requests/:userId
   */
  getSession = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = userParamsSchema.parse(req.params);

    const result = this.claimRequests.getSession(userId);
    if (!result.ok) throw toAppError(result.error);

    res.status(200).json(createSuccessResponse(result.value));
  });

  /**
   * POST /v1/claim-requests/:userId/start
   */
  start = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = userParamsSchema.parse(req.params);
    const { listingId, claimantName } = startClaimRequestBodySchema.parse(req.body);

    const result = await this.claimRequests.start(userId, listingId, claimantName ?? null);
    if (!result.ok) throw toAppError(result.error);

    res.status(201).json(createSuccessResponse(result.value));
  });

  /**
   * POST /v1/claim-requests/:userId/answer
   */
  answer = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = userParamsSchema.parse(req.params);
    const { text } = claimRequestAnswerBodySchema.parse(req.body);

    const result = await this.claimRequests.answer(userId, text);
    if (!result.ok) throw toAppError(result.error);

    const outcome = result.value;
    res
      .status(outcome.status === 'submitted' ? 201 : 200)
      .json(createSuccessResponse(outcome, outcome.status === 'submitted' ? 'Claim submitted' : undefined));
  });

  /**
   * POST /v1/claim-requests/:userId/cancel
   */
  cancel = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = userParamsSchema.parse(req.params);

    const cancelled = this.claimRequests.cancel(userId);

    res.status(200).json(createSuccessResponse({ cancelled }));
  });
}
