/**
 * Typed commands issued by the chat transport (button presses and replies)
 */
import { Claim, Listing } from './listing.types';

export interface SubmitClaimCommand {
  type: 'SubmitClaim';
  listingId: string;
  claimantId: string;
  claimantName?: string | null;
  qty: number;
  pickupTime: string;
}

export interface ApproveCommand {
  type: 'Approve';
  listingId: string;
  claimId: string;
}

export interface RejectCommand {
  type: 'Reject';
  listingId: string;
  claimId: string;
}

export interface ProposeRescheduleCommand {
  type: 'ProposeReschedule';
  listingId: string;
  claimId: string;
  newTime: string;
}

export interface RespondRescheduleCommand {
  type: 'RespondReschedule';
  listingId: string;
  claimId: string;
  accept: boolean;
}

export interface CancelClaimCommand {
  type: 'CancelClaim';
  listingId: string;
  claimId: string;
  claimantId: string;
}

export interface ExpireListingCommand {
  type: 'ExpireListing';
  listingId: string;
}

export type Command =
  | SubmitClaimCommand
  | ApproveCommand
  | RejectCommand
  | ProposeRescheduleCommand
  | RespondRescheduleCommand
  | CancelClaimCommand
  | ExpireListingCommand;

export type CommandType = Command['type'];

export interface CommandOutcome {
  type: CommandType;
  listing: Listing;
  claim: Claim | null;
}
