/**
 * Order ↔ Transaction Matching Engine
 *
 * This module provides pure, deterministic functions for pairing budget
 * transactions with parsed vendor orders based on:
 * - Exact amount (integer cents)
 * - An asymmetric date window
 * - Closest-date tie-break, with exact ties reported as ambiguous
 *
 * Usage:
 * ```typescript
 * import { matchTransactions } from './matching';
 *
 * const results = matchTransactions(orders, transactions);
 * console.log(results[0].status); // 'MATCHED' | 'AMBIGUOUS' | 'UNMATCHED'
 * ```
 */

// Main functions
export { matchTransactions, matchTransaction, resolveMatchOptions } from './matchTransactions';

// Individual steps (for testing/debugging)
export { dayOffset, daysBetween, isWithinWindow, describeOffset } from './dateWindow';
export { selectClosestCandidate } from './ambiguity';
export { explainMatch } from './explanation';

// Constants
export {
  AMOUNT_TOLERANCE_CENTS,
  DATE_WINDOW,
  DEFAULT_DATE_WINDOW,
  DEFAULT_MATCH_OPTIONS,
} from './constants';

// Types
export type {
  TransactionRecord,
  DateWindow,
  MatchOptions,
  MatchStatus,
  MatchReason,
  MatchResult,
  CandidateScore,
  CandidateSelection,
} from './types';
