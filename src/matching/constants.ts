/**
 * Constants for the Order ↔ Transaction Matching Engine
 *
 * These values define the behavior of the matching algorithm. Every one of
 * them can be overridden per call through MatchOptions.
 */

import type { DateWindow, MatchOptions } from './types';

// ============================================
// AMOUNT
// ============================================

/**
 * Allowed difference between an order total and a transaction amount, in cents.
 *
 * Both sides are integers after normalization, so 0 means "equal to the cent".
 */
export const AMOUNT_TOLERANCE_CENTS = 0;

// ============================================
// DATE WINDOW (in days)
// ============================================

/**
 * Days an order may be dated before / after the transaction it pays for.
 *
 * Examples (transaction posted 2025-08-02):
 * - order 2025-07-31 → 2 days before → inside
 * - order 2025-07-26 → 7 days before → inside
 * - order 2025-07-25 → 8 days before → outside
 * - order 2025-08-04 → 2 days after  → inside
 * - order 2025-08-05 → 3 days after  → outside
 */
export const DATE_WINDOW = {
  DAYS_BEFORE: 7,
  DAYS_AFTER: 2,
} as const;

export const DEFAULT_DATE_WINDOW: DateWindow = {
  maxDaysOrderBeforeTransaction: DATE_WINDOW.DAYS_BEFORE,
  maxDaysOrderAfterTransaction: DATE_WINDOW.DAYS_AFTER,
};

export const DEFAULT_MATCH_OPTIONS: MatchOptions = {
  amountToleranceCents: AMOUNT_TOLERANCE_CENTS,
  dateWindow: DEFAULT_DATE_WINDOW,
};

export const MS_PER_DAY = 1000 * 60 * 60 * 24;
