/**
 * Type Definitions for the Order ↔ Transaction Matching Engine
 *
 * The engine is pure and deterministic - no database or external dependencies.
 */

import type { OrderRecord } from '../parsing/types';

// ============================================
// INPUT TYPES
// ============================================

/**
 * A transaction from the budgeting service. Read only; the engine never
 * changes it and only returns suggested updates.
 */
export interface TransactionRecord {
  id: string;
  /** Amount in milliunits (1/1000 of a currency unit). Outflows are negative. */
  amount: number;
  /** Posted date (UTC midnight) */
  date: Date;
  payee: string;
  /** Existing memo, possibly empty */
  memo: string;
  /** Existing category, empty when uncategorized */
  category?: string | null;
}

/**
 * Allowed offset between an order date and a transaction's posted date.
 *
 * Charges post after the order is placed, often several days later, so the
 * window reaches further back than forward.
 */
export interface DateWindow {
  /** How many days the order may precede the transaction */
  maxDaysOrderBeforeTransaction: number;
  /** How many days the order may follow the transaction */
  maxDaysOrderAfterTransaction: number;
}

export interface MatchOptions {
  /** Allowed difference between order total and transaction amount, in cents */
  amountToleranceCents: number;
  /** null disables the date filter (amount-only matching) */
  dateWindow: DateWindow | null;
}

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * MATCHED: one order assigned
 * AMBIGUOUS: several equally good orders; the caller must ask the user
 * UNMATCHED: no order qualifies
 */
export type MatchStatus = 'MATCHED' | 'AMBIGUOUS' | 'UNMATCHED';

/**
 * Why a result has its status.
 */
export type MatchReason =
  | 'exact-amount'
  | 'exact-amount+date-window'
  | 'ambiguous-multiple'
  | 'no-amount-match'
  | 'outside-date-window';

/**
 * Result of matching one transaction.
 */
export interface MatchResult {
  transaction: TransactionRecord;
  /** Assigned order (MATCHED only) */
  order?: OrderRecord;
  status: MatchStatus;
  reason: MatchReason;
  /** Tied orders when AMBIGUOUS, otherwise empty */
  candidates: OrderRecord[];
  matchDetails: {
    /** Transaction amount normalized to absolute cents */
    amountCents: number;
    /** Orders whose total matched the amount */
    amountCandidateCount: number;
    /** Amount matches that also passed the date window */
    windowCandidateCount: number;
    /** Days from order date to transaction date (MATCHED only) */
    dayOffset?: number;
    /** Human-readable explanation of the decision */
    explanation: string;
  };
}

// ============================================
// INTERNAL TYPES
// ============================================

/**
 * An amount-matching order with its position relative to the transaction.
 */
export interface CandidateScore {
  order: OrderRecord;
  /** transaction date - order date, in days */
  dayOffset: number;
  /** |dayOffset| */
  distance: number;
}

export type CandidateSelection =
  | { kind: 'none' }
  | { kind: 'single'; candidate: CandidateScore }
  | { kind: 'tie'; candidates: CandidateScore[] };
