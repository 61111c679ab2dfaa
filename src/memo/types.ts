/**
 * Type Definitions for Memo Generation
 */

export interface MemoOptions {
  /** Host field limit; every generated memo fits within it */
  maxLength: number;
  truncationMarker: string;
  itemSeparator: string;
  fallbackTitle: string;
}

/**
 * A generated memo.
 */
export interface MemoText {
  text: string;
  /** Item text was shortened to fit */
  truncated: boolean;
  /** No item text fit next to the link; `text` is the link alone */
  itemsDropped: boolean;
}

/**
 * Outcome of memo generation for one match.
 *
 * skipped: no order assigned; the existing memo stays untouched
 * single: one memo for the whole transaction
 * split: a summary for the parent plus one memo per item line
 */
export type MemoGeneration =
  | { kind: 'skipped'; reason: 'no-match' | 'ambiguous-match' }
  | { kind: 'single'; memo: MemoText }
  | { kind: 'split'; summary: MemoText; lines: MemoText[] };

/**
 * Item details typed in by hand when no order matched.
 * `price` is in cents.
 */
export interface ManualItemDetails {
  title?: string;
  quantity?: number;
  price?: number;
}
