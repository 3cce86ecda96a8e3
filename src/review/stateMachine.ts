// src/review/stateMachine.ts
// Review: allowed status transitions for merged records.
//
//   pending            -> accepted | flagged_for_review | corrected | rejected
//   flagged_for_review -> accepted | corrected | rejected
//   accepted           -> corrected | rejected
//   corrected, rejected: final
//
// Nothing ever returns to pending.

import { InvalidTransitionError } from '../errors';
import type { ReviewStatus } from '../merge/types';

const TRANSITIONS: Readonly<Record<ReviewStatus, readonly ReviewStatus[]>> = {
  pending: ['accepted', 'flagged_for_review', 'corrected', 'rejected'],
  flagged_for_review: ['accepted', 'corrected', 'rejected'],
  accepted: ['corrected', 'rejected'],
  corrected: [],
  rejected: [],
};

export function canTransition(from: ReviewStatus, to: ReviewStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: ReviewStatus, to: ReviewStatus): void {
  if (!canTransition(from, to)) throw new InvalidTransitionError(from, to);
}

export function isFinalStatus(status: ReviewStatus): boolean {
  return TRANSITIONS[status].length === 0;
}
