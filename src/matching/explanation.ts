/**
 * Human-readable explanations for match decisions.
 */

import { formatCents } from '../utils/money';
import { describeOffset } from './dateWindow';
import type { DateWindow, MatchReason } from './types';

export interface ExplanationInput {
  reason: MatchReason;
  amountCents: number;
  amountCandidateCount: number;
  windowCandidateCount: number;
  dateWindow: DateWindow | null;
  /** Assigned order (exact-amount reasons) */
  orderId?: string;
  dayOffset?: number;
  /** Tied orders (ambiguous-multiple) */
  tiedOrderIds?: string[];
}

const orders = (count: number): string => `${count} order${count === 1 ? '' : 's'}`;

const total = (count: number): string => (count === 1 ? 'totals' : 'total');

/**
 * Generates the explanation attached to a MatchResult.
 *
 * @example
 * explainMatch({
 *   reason: 'exact-amount+date-window',
 *   amountCents: 5757,
 *   amountCandidateCount: 1,
 *   windowCandidateCount: 1,
 *   dateWindow: DEFAULT_DATE_WINDOW,
 *   orderId: '702-8237239-1234567',
 *   dayOffset: 2,
 * })
 * // 'Order 702-8237239-1234567 totals 57.57. Placed 2 days before the transaction'
 */
export function explainMatch(input: ExplanationInput): string {
  const amount = formatCents(input.amountCents);
  const parts: string[] = [];

  switch (input.reason) {
    case 'no-amount-match':
      parts.push(`No order totals ${amount}`);
      break;

    case 'outside-date-window':
      parts.push(`${orders(input.amountCandidateCount)} ${total(input.amountCandidateCount)} ${amount}`);
      if (input.dateWindow) {
        parts.push(
          `None placed within ${input.dateWindow.maxDaysOrderBeforeTransaction} days before or ${input.dateWindow.maxDaysOrderAfterTransaction} days after the transaction`
        );
      }
      break;

    case 'ambiguous-multiple':
      parts.push(
        `${orders(input.tiedOrderIds?.length ?? 0)} total ${amount} and are equally close to the transaction date`
      );
      parts.push(`Candidates: ${(input.tiedOrderIds ?? []).join(', ')}`);
      break;

    case 'exact-amount':
    case 'exact-amount+date-window':
      parts.push(`Order ${input.orderId ?? 'unknown'} totals ${amount}`);
      if (input.dayOffset !== undefined) {
        parts.push(`Placed ${describeOffset(input.dayOffset)}`);
      }
      if (input.windowCandidateCount > 1) {
        parts.push(`Closest of ${orders(input.windowCandidateCount)}`);
      }
      break;
  }

  return parts.join('. ');
}

export default explainMatch;
