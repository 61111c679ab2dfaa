/**
 * Ambiguity Resolution for Order Matching
 *
 * When several orders share the transaction's amount and pass the date
 * window, the one placed closest to the transaction date wins. An exact tie
 * is not broken arbitrarily: it is reported so the user can choose.
 *
 * Outcomes:
 * - 0 candidates: none
 * - 1 closest candidate: single (assigned)
 * - 2+ candidates at the same closest distance: tie (ambiguous)
 */

import type { CandidateScore, CandidateSelection } from './types';

/**
 * Selects the closest candidate by absolute day distance.
 *
 * @param candidates - Amount matches inside the date window
 * @returns Selection outcome; a tie lists every candidate at the closest distance
 *
 * @example
 * // Orders 1 and 3 days before the transaction
 * selectClosestCandidate([{ distance: 1, ... }, { distance: 3, ... }]) // { kind: 'single', ... }
 *
 * // Orders 2 days before and 2 days after
 * selectClosestCandidate([{ distance: 2, ... }, { distance: 2, ... }]) // { kind: 'tie', ... }
 */
export function selectClosestCandidate(candidates: CandidateScore[]): CandidateSelection {
  if (candidates.length === 0) {
    return { kind: 'none' };
  }

  const closestDistance = Math.min(...candidates.map((candidate) => candidate.distance));
  const closest = candidates.filter((candidate) => candidate.distance === closestDistance);

  if (closest.length === 1) {
    return { kind: 'single', candidate: closest[0] };
  }

  return { kind: 'tie', candidates: closest };
}

export default selectClosestCandidate;
