import { Request, Response } from 'express';
import { CommandDispatcher } from '../services/command.dispatcher';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { toAppError } from '../utils/domain-error';
import { commandSchema } from '../validators/command.validator';

/**
 * Command Controller
 *
 * Accepts typed commands from the chat transport
 */
export class CommandController {
  constructor(private dispatcher: CommandDispatcher) {}

  /**
   * POST /v1/commands
   */
  dispatch = asyncHandler(async (req: Request, res: Response) => {
    const command = commandSchema.parse(req.body);

    const result = await this.dispatcher.dispatch(command);
    if (!result.ok) throw toAppError(result.error);

    res.status(command.type === 'SubmitClaim' ? 201 : 200).json(createSuccessResponse(result.value));
  });
}
