/**
 * Line Classification for Order Text Parsing
 *
 * Turns one raw line into a tagged token for the parser state machine.
 * Classification is context free; the state machine decides what a token
 * means for the current block (e.g. a bare amount after "Total").
 *
 * Precedence (first match wins):
 * 1. Blank
 * 2. Order start ("Order placed ...")
 * 3. Order id ("Order # 702-...")
 * 4. Quantity ("Qty: 2")
 * 5. Labelled total, then other labelled amounts (subtotal, shipping, tax)
 * 6. Bare currency amount
 * 7. Date-only line
 * 8. Page end (pagination, footer links, copyright)
 * 9. Metadata (shipping status, return windows, page chrome)
 * 10. Text (item candidate)
 */

import { parseAmountToCents } from '../utils/money';
import {
  ALL_CAPS_LINE,
  INLINE_HEADER_BREAK,
  METADATA_PATTERNS,
  ORDER_ID_LINE,
  ORDER_ID_TOKEN,
  ORDER_START_LINE,
  OTHER_AMOUNT_LABEL,
  PAGE_END_PATTERNS,
  QUANTITY_LINE,
  TOTAL_LABELS,
} from './constants';
import { parseDateLine } from './dates';
import type { ClassifiedLine } from './types';

/**
 * Splits pasted text into trimmed lines.
 *
 * A header copied as a single line ("Order placed July 31, 2025 Total $57.57
 * Ship to Sam Order # 702-...") is broken apart so each field gets its own
 * line, exactly as the multi-line layout would produce.
 */
export function splitLines(text: string): string[] {
  const lines: string[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/\s+/g, ' ').trim();

    if (ORDER_START_LINE.test(line) && ORDER_ID_TOKEN.test(line)) {
      const expanded = line
        .replace(INLINE_HEADER_BREAK, '\n')
        .replace(ORDER_ID_TOKEN, '$1\n')
        .split('\n')
        .map((part) => part.trim());
      lines.push(...expanded);
      continue;
    }

    lines.push(line);
  }

  return lines;
}

/**
 * Matches "<label> [amount]". Returns undefined when the label does not
 * match or when the remainder is text rather than an amount, so that item
 * names starting with a label word ("Total Wireless SIM Kit") stay text.
 */
function matchLabelledAmount(
  line: string,
  pattern: RegExp
): { amount?: number } | undefined {
  const match = line.match(pattern);
  if (!match) {
    return undefined;
  }

  const remainder = (match[1] ?? '').trim();
  if (remainder === '') {
    return {};
  }

  const amount = parseAmountToCents(remainder);
  return amount === null ? undefined : { amount: Math.abs(amount) };
}

/**
 * Whether a text line is page chrome rather than an item.
 */
export function isMetadataLine(line: string): boolean {
  return ALL_CAPS_LINE.test(line) || METADATA_PATTERNS.some((pattern) => pattern.test(line));
}

/**
 * Classifies a single trimmed line.
 *
 * @example
 * classifyLine('Order # 702-8237239-1234567') // { kind: 'ORDER_ID', orderId: '702-8237239-1234567' }
 * classifyLine('Total $57.57')                // { kind: 'TOTAL', rank: 1, amount: 5757 }
 * classifyLine('Buy it again')                // { kind: 'METADATA' }
 */
export function classifyLine(line: string): ClassifiedLine {
  if (line === '') {
    return { kind: 'BLANK' };
  }

  const orderStart = line.match(ORDER_START_LINE);
  if (orderStart) {
    const date = parseDateLine(orderStart[1] ?? '');
    return date ? { kind: 'ORDER_START', date } : { kind: 'ORDER_START' };
  }

  const orderId = line.match(ORDER_ID_LINE);
  if (orderId) {
    return { kind: 'ORDER_ID', orderId: orderId[1].toUpperCase() };
  }

  const quantity = line.match(QUANTITY_LINE);
  if (quantity) {
    return { kind: 'QUANTITY', quantity: Number(quantity[1]) };
  }

  // Other labels first: "Total before tax" must not read as "Total"
  const other = matchLabelledAmount(line, OTHER_AMOUNT_LABEL);
  if (other) {
    return { kind: 'OTHER_AMOUNT', ...other };
  }

  for (const { pattern, rank } of TOTAL_LABELS) {
    const total = matchLabelledAmount(line, pattern);
    if (total) {
      return { kind: 'TOTAL', rank, ...total };
    }
  }

  const amount = parseAmountToCents(line, true);
  if (amount !== null) {
    return { kind: 'AMOUNT', amount: Math.abs(amount) };
  }

  const date = parseDateLine(line);
  if (date) {
    return { kind: 'DATE', date };
  }

  if (PAGE_END_PATTERNS.some((pattern) => pattern.test(line))) {
    return { kind: 'PAGE_END' };
  }

  if (isMetadataLine(line)) {
    return { kind: 'METADATA' };
  }

  return { kind: 'TEXT', text: line };
}
