import { describe, it, expect } from 'vitest';
import { ClaimStatus } from '../src/types/listing.types';
import {
  ClaimEvent,
  TERMINAL_CLAIM_STATUSES,
  sourceStatusesFor,
  transitionClaim,
} from '../src/services/claim-state-machine';

const ALL_EVENTS: ClaimEvent[] = [
  'approve',
  'reject',
  'propose_reschedule',
  'accept_reschedule',
  'decline_reschedule',
  'cancel',
];

describe('claim state machine: valid transitions', () => {
  const validCases: [ClaimStatus, ClaimEvent, ClaimStatus][] = [
    [ClaimStatus.PENDING, 'approve', ClaimStatus.APPROVED],
    [ClaimStatus.PENDING, 'reject', ClaimStatus.REJECTED],
    [ClaimStatus.PENDING, 'propose_reschedule', ClaimStatus.RESCHEDULE_PENDING],
    [ClaimStatus.PENDING, 'cancel', ClaimStatus.CANCELLED],
    [ClaimStatus.RESCHEDULE_PENDING, 'accept_reschedule', ClaimStatus.RESCHEDULE_ACCEPTED],
    [ClaimStatus.RESCHEDULE_PENDING, 'decline_reschedule', ClaimStatus.RESCHEDULE_DECLINED],
    [ClaimStatus.RESCHEDULE_PENDING, 'cancel', ClaimStatus.CANCELLED],
  ];

  it.each(validCases)('%s + %s → %s', (current, event, expected) => {
    expect(transitionClaim(current, event)).toBe(expected);
  });
});

describe('claim state machine: invalid transitions', () => {
  const invalidCases: [ClaimStatus, ClaimEvent][] = [
    [ClaimStatus.PENDING, 'accept_reschedule'],
    [ClaimStatus.PENDING, 'decline_reschedule'],
    [ClaimStatus.RESCHEDULE_PENDING, 'approve'],
    [ClaimStatus.RESCHEDULE_PENDING, 'reject'],
    [ClaimStatus.RESCHEDULE_PENDING, 'propose_reschedule'],
  ];

  it.each(invalidCases)('%s + %s → null', (current, event) => {
    expect(transitionClaim(current, event)).toBeNull();
  });

  for (const status of TERMINAL_CLAIM_STATUSES) {
    it(`${status} rejects every event`, () => {
      for (const event of ALL_EVENTS) {
        expect(transitionClaim(status, event)).toBeNull();
      }
    });
  }
});

describe('sourceStatusesFor', () => {
  it('lists the statuses an event is allowed from', () => {
    expect(sourceStatusesFor('approve')).toEqual([ClaimStatus.PENDING]);
    expect(sourceStatusesFor('cancel')).toEqual([ClaimStatus.PENDING, ClaimStatus.RESCHEDULE_PENDING]);
    expect(sourceStatusesFor('accept_reschedule')).toEqual([ClaimStatus.RESCHEDULE_PENDING]);
  });
});
