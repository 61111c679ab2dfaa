/**
 * Memo Generation
 *
 * Builds the memo text written back to a transaction once it is matched to
 * an order:
 *
 *   Unsplit:  "Item A, Item B\n<order link>"
 *   Split:    summary "2 Items:\n- Item A\n- Item B\n<order link>"
 *             plus one "Item A\n<order link>" per split line
 *
 * Every memo is fitted to the field limit on its own. The summary keeps its
 * link only while some item text still fits beside it; otherwise the link is
 * left out (each split line carries it).
 */

import { formatCents } from '../utils/money';
import type { OrderItem, OrderRecord } from '../parsing/types';
import type { MatchResult } from '../matching/types';
import { DEFAULT_MEMO_OPTIONS } from './constants';
import { fitMemo, stripControlCharacters, truncateText } from './truncate';
import type { ManualItemDetails, MemoGeneration, MemoOptions, MemoText } from './types';

/**
 * Item text as it appears in a memo: the name, with "x3" for multiples.
 */
export function describeItem(item: OrderItem): string {
  return item.quantity !== undefined && item.quantity > 1 ? `${item.name} x${item.quantity}` : item.name;
}

/**
 * Summary for a split parent transaction, without the link.
 *
 * @example
 * buildSplitSummary(['Tuna Feast 24-pack', 'Salmon Feast 24-pack'])
 * // '2 Items:\n- Tuna Feast 24-pack\n- Salmon Feast 24-pack'
 */
export function buildSplitSummary(itemTexts: string[]): string {
  return [`${itemTexts.length} Items:`, ...itemTexts.map((text) => `- ${text}`)].join('\n');
}

/**
 * Fits the split summary. With the link kept, the summary must still show
 * the count line and the start of the first item; if it cannot, the summary
 * is truncated without the link.
 */
export function fitSplitSummary(itemTexts: string[], link: string, settings: MemoOptions): MemoText {
  const body = buildSplitSummary(itemTexts);
  const withLink = fitMemo(body, link, settings.maxLength, settings.truncationMarker);
  if (!withLink.truncated) {
    return withLink;
  }

  const itemPrefix = `${itemTexts.length} Items:\n- `;
  const keptBody = withLink.text.slice(0, withLink.text.length - link.length - 1);
  const itemTextKept = keptBody.length - settings.truncationMarker.length - itemPrefix.length;
  if (!withLink.itemsDropped && keptBody.startsWith(itemPrefix) && itemTextKept > 0) {
    return withLink;
  }

  const text = truncateText(stripControlCharacters(body).trim(), settings.maxLength, settings.truncationMarker);
  return text === '' ? withLink : { text, truncated: true, itemsDropped: false };
}

/**
 * Generates memo text for a specific order.
 *
 * A split is only produced for two or more items; with fewer there is
 * nothing to divide, so the unsplit memo is returned.
 */
export function generateOrderMemo(
  order: OrderRecord,
  split: boolean,
  options: Partial<MemoOptions> = {}
): Exclude<MemoGeneration, { kind: 'skipped' }> {
  const settings: MemoOptions = { ...DEFAULT_MEMO_OPTIONS, ...options };
  const fit = (body: string) =>
    fitMemo(body, order.orderLink, settings.maxLength, settings.truncationMarker);

  const itemTexts = order.items.map(describeItem);

  if (split && itemTexts.length >= 2) {
    return {
      kind: 'split',
      summary: fitSplitSummary(itemTexts, order.orderLink, settings),
      lines: itemTexts.map((text) => fit(text)),
    };
  }

  const body = itemTexts.length > 0 ? itemTexts.join(settings.itemSeparator) : settings.fallbackTitle;
  return { kind: 'single', memo: fit(body) };
}

/**
 * Generates the memo(s) for a match result.
 *
 * Unmatched and ambiguous results are skipped: the transaction keeps its
 * existing memo and the caller decides what to ask the user.
 *
 * @param match - Result from the matching engine
 * @param split - Whether the user chose to split the transaction per item
 * @param options - Field limit, marker, separator and fallback title
 *
 * @example
 * const generation = generateMemo(result, true);
 * if (generation.kind === 'split') {
 *   console.log(generation.summary.text); // '2 Items:\n- ...'
 * }
 */
export function generateMemo(
  match: MatchResult,
  split = false,
  options: Partial<MemoOptions> = {}
): MemoGeneration {
  if (match.status !== 'MATCHED' || !match.order) {
    return {
      kind: 'skipped',
      reason: match.status === 'AMBIGUOUS' ? 'ambiguous-match' : 'no-match',
    };
  }

  return generateOrderMemo(match.order, split, options);
}

/**
 * Memo from an existing memo plus hand-entered item details and an optional
 * order link. The link goes on its own last line without a label, as in
 * every other memo.
 *
 * @example
 * generateEnhancedMemo('', link, { title: 'USB Cable', quantity: 2, price: 999 })
 * // 'USB Cable x2 $9.99\n' + link
 */
export function generateEnhancedMemo(
  originalMemo: string,
  orderLink: string | null,
  details: ManualItemDetails = {},
  options: Partial<MemoOptions> = {}
): string {
  const settings: MemoOptions = { ...DEFAULT_MEMO_OPTIONS, ...options };

  const detailLine = [
    details.title?.trim(),
    details.quantity !== undefined && details.quantity > 1 ? `x${details.quantity}` : undefined,
    details.price !== undefined ? `$${formatCents(details.price)}` : undefined,
  ]
    .filter((part): part is string => part !== undefined && part !== '')
    .join(' ');

  const body = [originalMemo.trim(), detailLine].filter((part) => part !== '').join('\n');

  return fitMemo(body, orderLink ?? undefined, settings.maxLength, settings.truncationMarker).text;
}
