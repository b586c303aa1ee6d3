import { DomainError } from '../types/error.types';
import { ClaimTransition } from '../types/listing.types';
import { Command, CommandOutcome } from '../types/command.types';
import { Result, ok } from '../utils/result';
import { ClaimEngine } from './claim.service';
import { NegotiationService } from './negotiation.service';
import { ListingService } from './listing.service';
import { logger } from '../config/logger';

const fromTransition = (
  type: Command['type'],
  result: Result<ClaimTransition, DomainError>
): Result<CommandOutcome, DomainError> =>
  result.ok ? ok({ type, listing: result.value.listing, claim: result.value.claim }) : result;

/**
 * Command Dispatcher
 *
 * Single entry point for actions coming from the chat transport (button presses,
 * replies). Each typed command is routed to the state machine that owns it.
 */
export class CommandDispatcher {
  constructor(
    private claimEngine: ClaimEngine,
    private negotiation: NegotiationService,
    private listingService: ListingService
  ) {}

  async dispatch(command: Command): Promise<Result<CommandOutcome, DomainError>> {
    logger.debug('Dispatching command', { type: command.type, listingId: command.listingId });

    switch (command.type) {
      case 'SubmitClaim':
        return fromTransition(
          command.type,
          await this.claimEngine.submitClaim({
            listingId: command.listingId,
            claimantId: command.claimantId,
            claimantName: command.claimantName ?? null,
            qty: command.qty,
            pickupTime: command.pickupTime,
          })
        );

      case 'Approve':
        return fromTransition(command.type, await this.claimEngine.approve(command.listingId, command.claimId));

      case 'Reject':
        return fromTransition(command.type, await this.claimEngine.reject(command.listingId, command.claimId));

      case 'ProposeReschedule':
        return fromTransition(
          command.type,
          await this.negotiation.proposeNewTime(command.listingId, command.claimId, command.newTime)
        );

      case 'RespondReschedule':
        return fromTransition(
          command.type,
          await this.negotiation.respondToReschedule(command.listingId, command.claimId, command.accept)
        );

      case 'CancelClaim':
        return fromTransition(
          command.type,
          await this.claimEngine.cancelByClaimant(command.listingId, command.claimId, command.claimantId)
        );

      case 'ExpireListing': {
        const expired = await this.listingService.expireListing(command.listingId);
        return expired.ok ? ok({ type: command.type, listing: expired.value, claim: null }) : expired;
      }
    }
  }
}
