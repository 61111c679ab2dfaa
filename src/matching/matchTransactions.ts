/**
 * Order ↔ Transaction Matching
 *
 * This is the entry point for the matching engine.
 *
 * Flow for each transaction:
 * 1. Normalize the amount to absolute cents
 * 2. Keep orders whose total equals the amount (within tolerance)
 * 3. Keep those inside the date window (unless the window is disabled)
 * 4. Pick the closest order by date; an exact tie is AMBIGUOUS
 * 5. Remove an assigned order from the pool for later transactions
 */

import { toAbsoluteCents } from '../utils/money';
import type { OrderRecord } from '../parsing/types';
import { selectClosestCandidate } from './ambiguity';
import { DEFAULT_MATCH_OPTIONS } from './constants';
import { dayOffset, isWithinWindow } from './dateWindow';
import { explainMatch } from './explanation';
import type {
  CandidateScore,
  MatchOptions,
  MatchReason,
  MatchResult,
  MatchStatus,
  TransactionRecord,
} from './types';

/**
 * Fills unset options with defaults. An explicit `dateWindow: null` is kept.
 */
export function resolveMatchOptions(options: Partial<MatchOptions> = {}): MatchOptions {
  return {
    amountToleranceCents: options.amountToleranceCents ?? DEFAULT_MATCH_OPTIONS.amountToleranceCents,
    dateWindow: options.dateWindow === undefined ? DEFAULT_MATCH_OPTIONS.dateWindow : options.dateWindow,
  };
}

/**
 * Scores a single candidate order against the transaction date.
 */
function scoreCandidate(order: OrderRecord, transactionDate: Date): CandidateScore {
  const offset = dayOffset(order.orderDate, transactionDate);
  return { order, dayOffset: offset, distance: Math.abs(offset) };
}

/**
 * Matches one transaction against the orders still available.
 *
 * This function is pure and deterministic - given the same inputs,
 * it will always return the same output.
 *
 * @param transaction - Transaction to match
 * @param availableOrders - Orders not yet assigned in this run
 * @param options - Amount tolerance and date window
 * @returns Match result; `order` is one of `availableOrders` when MATCHED
 *
 * @example
 * const result = matchTransaction(
 *   { id: 't1', amount: -57570, date: new Date('2025-08-02'), payee: 'Amazon', memo: '' },
 *   orders
 * );
 * // result.status === 'MATCHED', result.reason === 'exact-amount+date-window'
 */
export function matchTransaction(
  transaction: TransactionRecord,
  availableOrders: readonly OrderRecord[],
  options: Partial<MatchOptions> = {}
): MatchResult {
  const { amountToleranceCents, dateWindow } = resolveMatchOptions(options);
  const amountCents = toAbsoluteCents(transaction.amount);

  const build = (
    status: MatchStatus,
    reason: MatchReason,
    extra: {
      order?: OrderRecord;
      candidates?: OrderRecord[];
      amountCandidateCount: number;
      windowCandidateCount: number;
      dayOffset?: number;
    }
  ): MatchResult => ({
    transaction,
    order: extra.order,
    status,
    reason,
    candidates: extra.candidates ?? [],
    matchDetails: {
      amountCents,
      amountCandidateCount: extra.amountCandidateCount,
      windowCandidateCount: extra.windowCandidateCount,
      dayOffset: extra.dayOffset,
      explanation: explainMatch({
        reason,
        amountCents,
        amountCandidateCount: extra.amountCandidateCount,
        windowCandidateCount: extra.windowCandidateCount,
        dateWindow,
        orderId: extra.order?.orderId,
        dayOffset: extra.dayOffset,
        tiedOrderIds: extra.candidates?.map((order) => order.orderId),
      }),
    },
  });

  // ============================================
  // Step 1: amount
  // ============================================
  const amountMatches = availableOrders
    .filter((order) => Math.abs(order.totalAmount - amountCents) <= amountToleranceCents)
    .map((order) => scoreCandidate(order, transaction.date));

  if (amountMatches.length === 0) {
    return build('UNMATCHED', 'no-amount-match', {
      amountCandidateCount: 0,
      windowCandidateCount: 0,
    });
  }

  // ============================================
  // Step 2: date window
  // ============================================
  const windowMatches = dateWindow
    ? amountMatches.filter((candidate) => isWithinWindow(candidate.dayOffset, dateWindow))
    : amountMatches;

  const counts = {
    amountCandidateCount: amountMatches.length,
    windowCandidateCount: windowMatches.length,
  };

  // ============================================
  // Step 3: closest date, ties are ambiguous
  // ============================================
  const selection = selectClosestCandidate(windowMatches);

  switch (selection.kind) {
    case 'none':
      return build('UNMATCHED', 'outside-date-window', counts);

    case 'tie':
      return build('AMBIGUOUS', 'ambiguous-multiple', {
        ...counts,
        candidates: selection.candidates.map((candidate) => candidate.order),
      });

    case 'single':
      return build('MATCHED', dateWindow ? 'exact-amount+date-window' : 'exact-amount', {
        ...counts,
        order: selection.candidate.order,
        dayOffset: selection.candidate.dayOffset,
      });
  }
}

/**
 * Matches a batch of transactions in the order supplied.
 *
 * An order assigned to one transaction is not offered to any later
 * transaction in the same run. Ambiguous and unmatched results consume
 * nothing. Orders repeating an earlier order id are ignored.
 *
 * @param orders - Parsed orders
 * @param transactions - Transactions to label, processed first to last
 * @returns Exactly one result per transaction, in input order
 */
export function matchTransactions(
  orders: readonly OrderRecord[],
  transactions: readonly TransactionRecord[],
  options: Partial<MatchOptions> = {}
): MatchResult[] {
  if (!Array.isArray(orders) || !Array.isArray(transactions)) {
    throw new TypeError('matchTransactions expects arrays of orders and transactions');
  }

  const settings = resolveMatchOptions(options);
  // Keyed by order id; the first record for an id wins
  const available = new Map<string, OrderRecord>();
  for (const order of orders) {
    if (!available.has(order.orderId)) {
      available.set(order.orderId, order);
    }
  }
  const results: MatchResult[] = [];

  for (const transaction of transactions) {
    const result = matchTransaction(transaction, [...available.values()], settings);

    if (result.order) {
      available.delete(result.order.orderId);
    }

    results.push(result);
  }

  return results;
}

export default matchTransactions;
