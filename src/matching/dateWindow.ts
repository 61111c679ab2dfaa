/**
 * Date Window for Order Matching
 *
 * Date is a refinement, not the primary signal: it filters amount matches to
 * a plausible posting window and ranks the survivors.
 */

import { MS_PER_DAY } from './constants';
import type { DateWindow } from './types';

/**
 * Whole days from `from` to `to` (positive when `to` is later).
 *
 * Calendar parts are read in UTC; order and transaction dates are both
 * stored as UTC midnight.
 *
 * @example
 * dayOffset(new Date('2025-07-31'), new Date('2025-08-02')) // 2
 * dayOffset(new Date('2025-08-02'), new Date('2025-07-31')) // -2
 */
export function dayOffset(from: Date, to: Date): number {
  const utcFrom = Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate());
  const utcTo = Date.UTC(to.getUTCFullYear(), to.getUTCMonth(), to.getUTCDate());

  return Math.round((utcTo - utcFrom) / MS_PER_DAY);
}

/**
 * Absolute number of days between two dates.
 */
export function daysBetween(date1: Date, date2: Date): number {
  return Math.abs(dayOffset(date1, date2));
}

/**
 * Whether an order placed `offset` days before the transaction
 * (negative = after) falls inside the window.
 *
 * @example
 * isWithinWindow(7, { maxDaysOrderBeforeTransaction: 7, maxDaysOrderAfterTransaction: 2 })  // true
 * isWithinWindow(-3, { maxDaysOrderBeforeTransaction: 7, maxDaysOrderAfterTransaction: 2 }) // false
 */
export function isWithinWindow(offset: number, window: DateWindow): boolean {
  return offset <= window.maxDaysOrderBeforeTransaction && offset >= -window.maxDaysOrderAfterTransaction;
}

/**
 * "2 days before the transaction", "on the transaction date", ...
 */
export function describeOffset(offset: number): string {
  if (offset === 0) {
    return 'on the transaction date';
  }
  const days = Math.abs(offset);
  const unit = days === 1 ? 'day' : 'days';
  return offset > 0 ? `${days} ${unit} before the transaction` : `${days} ${unit} after the transaction`;
}

export default isWithinWindow;
