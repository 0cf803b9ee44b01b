/**
 * Match status transitions
 * Every change to a detection's match state is built here so the
 * status/candidate invariant holds no matter who made the decision.
 */

import {
  DetectedComponent,
  DetectionMatchUpdate,
  MatchMethod,
  MatchStatus,
  RejectionReason
} from '../../types';
import { ValidationError } from '../../errors';

const ALLOWED_TRANSITIONS: Readonly<Record<MatchStatus, readonly MatchStatus[]>> = {
  new: ['matched', 'review', 'new', 'rejected'],
  review: ['matched', 'review', 'new', 'rejected'],
  matched: ['matched', 'review', 'new', 'rejected'],
  // a rejected detection has to be reopened before anything else happens to it
  rejected: ['new']
};

export interface MatchDecision {
  match_status: MatchStatus;
  matched_component_id: string | null;
  match_score: number | null;
  match_method: MatchMethod | null;
  rejection_reason?: RejectionReason | null;
}

export function canTransition(from: MatchStatus, to: MatchStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function buildMatchUpdate(
  detection: DetectedComponent,
  decision: MatchDecision,
  now: string = new Date().toISOString()
): DetectionMatchUpdate {
  const { match_status, matched_component_id } = decision;

  if (!canTransition(detection.match_status, match_status)) {
    throw new ValidationError(
      `Detection ${detection.detection_id} cannot move from '${detection.match_status}' to '${match_status}'`,
      'INVALID_TRANSITION',
      'match_status'
    );
  }
  if (match_status === 'matched' && !matched_component_id) {
    throw new ValidationError('A matched detection needs a catalog component', 'INVALID_TRANSITION', 'matched_component_id');
  }
  if ((match_status === 'new' || match_status === 'rejected') && matched_component_id) {
    throw new ValidationError(`A '${match_status}' detection cannot carry a catalog component`, 'INVALID_TRANSITION', 'matched_component_id');
  }

  return {
    detection_id: detection.detection_id,
    matched_component_id,
    match_status,
    match_score: decision.match_score,
    match_method: decision.match_method,
    rejection_reason: match_status === 'rejected' ? (decision.rejection_reason ?? 'override') : null,
    matched_date: matched_component_id ? now : null
  };
}
