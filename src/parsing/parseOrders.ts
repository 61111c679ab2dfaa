/**
 * Order Text Parser
 *
 * Converts a paste of a vendor order-history page into order records.
 *
 * The parser is a line-oriented state machine:
 *
 *   OUTSIDE_BLOCK --"Order placed"--> IN_BLOCK_HEADER --order id--> IN_ITEMS
 *   OUTSIDE_BLOCK --order id--------------------------------------> IN_ITEMS
 *   IN_ITEMS --"Order placed" / new order id--> (close block) --> next block
 *   any block --pagination / footer--> (close block) --> OUTSIDE_BLOCK
 *
 * The order id line is the block's anchor. Date and total are resolved when a
 * block closes, choosing the candidates nearest the anchor. A block that never
 * yields an id, a date and a total is dropped and counted; the parse itself
 * never fails on malformed text.
 */

import { buildOrderLink } from './orderLink';
import { classifyLine, splitLines } from './classifyLine';
import { DEFAULT_PARSE_OPTIONS, LEADING_BULLET, QUANTITY_PREFIX } from './constants';
import type {
  ClassifiedLine,
  OrderItem,
  OrderParseOptions,
  OrderParseResult,
  ParserState,
  TotalRank,
} from './types';

// ============================================
// Block drafts
// ============================================

interface Positioned<T> {
  line: number;
  value: T;
}

interface ItemDraft {
  name: string;
  unitPrice?: number;
  quantity?: number;
}

interface BlockDraft {
  orderId?: string;
  anchorLine?: number;
  dates: Positioned<Date>[];
  totals: Positioned<{ amount: number; rank: TotalRank }>[];
  /** Unlabelled amounts seen before the anchor, or after it before any item */
  looseAmounts: Positioned<number>[];
  items: ItemDraft[];
}

/**
 * What the previous non-blank line announced for the amount that follows it
 */
type PendingLabel = { kind: 'TOTAL'; rank: TotalRank } | { kind: 'OTHER' } | null;

const newDraft = (): BlockDraft => ({
  dates: [],
  totals: [],
  looseAmounts: [],
  items: [],
});

/**
 * Picks the candidate closest to the anchor line; ties go to the earlier line.
 */
function nearest<T>(candidates: Positioned<T>[], anchorLine: number): Positioned<T> | undefined {
  return candidates.reduce<Positioned<T> | undefined>((best, current) => {
    if (!best) return current;
    const bestDistance = Math.abs(best.line - anchorLine);
    const currentDistance = Math.abs(current.line - anchorLine);
    if (currentDistance < bestDistance) return current;
    if (currentDistance === bestDistance && current.line < best.line) return current;
    return best;
  }, undefined);
}

/**
 * Resolves the order total: labelled totals beat loose amounts, a lower rank
 * ("Order total") beats a higher one ("Total"), then nearest to the anchor.
 */
function resolveTotal(draft: BlockDraft, anchorLine: number): number | undefined {
  if (draft.totals.length > 0) {
    const bestRank = Math.min(...draft.totals.map((total) => total.value.rank));
    const ranked = draft.totals.filter((total) => total.value.rank === bestRank);
    return nearest(ranked, anchorLine)?.value.amount;
  }
  return nearest(draft.looseAmounts, anchorLine)?.value;
}

/**
 * Builds an item from a text line, or returns null for noise.
 */
export function parseItemLine(line: string, minNameLength: number): ItemDraft | null {
  let name = line.replace(LEADING_BULLET, '').trim();
  let quantity: number | undefined;

  const prefixed = name.match(QUANTITY_PREFIX);
  if (prefixed) {
    quantity = Number(prefixed[1]);
    name = prefixed[2].trim();
  }

  if (!/\p{L}/u.test(name) || Array.from(name).length < minNameLength) {
    return null;
  }

  return quantity === undefined ? { name } : { name, quantity };
}

function finalizeItems(items: ItemDraft[], maxItems: number): OrderItem[] {
  const seen = new Set<string>();
  const unique: OrderItem[] = [];

  for (const item of items) {
    if (seen.has(item.name)) continue;
    seen.add(item.name);
    unique.push({ ...item });
    if (unique.length >= maxItems) break;
  }

  return unique;
}

// ============================================
// State machine
// ============================================

/**
 * One parse pass. Feed classified lines in order, then call finish().
 */
export class OrderBlockMachine {
  private state: ParserState = 'OUTSIDE_BLOCK';
  private draft: BlockDraft = newDraft();
  private pending: PendingLabel = null;
  private readonly emittedIds = new Set<string>();
  private readonly result: OrderParseResult = {
    orders: [],
    droppedBlockCount: 0,
    duplicateOrderCount: 0,
  };

  constructor(private readonly options: OrderParseOptions) {}

  get currentState(): ParserState {
    return this.state;
  }

  feed(token: ClassifiedLine, lineNumber: number): void {
    if (token.kind === 'BLANK') {
      return;
    }

    if (this.state === 'OUTSIDE_BLOCK') {
      if (token.kind === 'ORDER_START' || token.kind === 'ORDER_ID') {
        this.openBlock(token, lineNumber);
      }
      return;
    }

    switch (token.kind) {
      case 'ORDER_START':
        this.closeBlock();
        this.openBlock(token, lineNumber);
        return;

      case 'ORDER_ID':
        if (this.state === 'IN_BLOCK_HEADER') {
          this.anchor(token.orderId, lineNumber);
        } else if (token.orderId !== this.draft.orderId) {
          this.closeBlock();
          this.openBlock(token, lineNumber);
        }
        return;

      case 'DATE':
        this.draft.dates.push({ line: lineNumber, value: token.date });
        break;

      case 'TOTAL':
        if (token.amount === undefined) {
          this.pending = { kind: 'TOTAL', rank: token.rank };
          return;
        }
        this.draft.totals.push({
          line: lineNumber,
          value: { amount: token.amount, rank: token.rank },
        });
        break;

      case 'OTHER_AMOUNT':
        if (token.amount === undefined) {
          this.pending = { kind: 'OTHER' };
          return;
        }
        break;

      case 'AMOUNT':
        this.takeAmount(token.amount, lineNumber);
        break;

      case 'QUANTITY': {
        const lastItem = this.lastItem();
        if (this.state === 'IN_ITEMS' && lastItem) {
          lastItem.quantity = token.quantity;
        }
        break;
      }

      case 'TEXT':
        if (this.state === 'IN_ITEMS') {
          const item = parseItemLine(token.text, this.options.minItemNameLength);
          if (item) this.draft.items.push(item);
        }
        break;

      case 'PAGE_END':
        this.closeBlock();
        this.state = 'OUTSIDE_BLOCK';
        return;

      case 'METADATA':
        break;
    }

    this.pending = null;
  }

  finish(): OrderParseResult {
    if (this.state !== 'OUTSIDE_BLOCK') {
      this.closeBlock();
      this.state = 'OUTSIDE_BLOCK';
    }
    return this.result;
  }

  private openBlock(token: ClassifiedLine, lineNumber: number): void {
    this.draft = newDraft();
    this.pending = null;

    if (token.kind === 'ORDER_START') {
      if (token.date) this.draft.dates.push({ line: lineNumber, value: token.date });
      this.state = 'IN_BLOCK_HEADER';
    } else if (token.kind === 'ORDER_ID') {
      this.anchor(token.orderId, lineNumber);
    }
  }

  private anchor(orderId: string, lineNumber: number): void {
    this.draft.orderId = orderId;
    this.draft.anchorLine = lineNumber;
    this.pending = null;
    this.state = 'IN_ITEMS';
  }

  private lastItem(): ItemDraft | undefined {
    return this.draft.items[this.draft.items.length - 1];
  }

  private takeAmount(amount: number, lineNumber: number): void {
    if (this.pending?.kind === 'TOTAL') {
      this.draft.totals.push({ line: lineNumber, value: { amount, rank: this.pending.rank } });
      return;
    }
    if (this.pending?.kind === 'OTHER') {
      return;
    }
    if (this.state === 'IN_BLOCK_HEADER') {
      this.draft.looseAmounts.push({ line: lineNumber, value: amount });
      return;
    }

    // Inside the item list a bare amount is the price of the item above it
    const lastItem = this.lastItem();
    if (!lastItem) {
      this.draft.looseAmounts.push({ line: lineNumber, value: amount });
    } else if (lastItem.unitPrice === undefined) {
      lastItem.unitPrice = amount;
    }
  }

  private closeBlock(): void {
    const { orderId, anchorLine } = this.draft;
    const orderDate =
      anchorLine === undefined ? undefined : nearest(this.draft.dates, anchorLine)?.value;
    const totalAmount = anchorLine === undefined ? undefined : resolveTotal(this.draft, anchorLine);

    if (orderId === undefined || orderDate === undefined || totalAmount === undefined) {
      this.result.droppedBlockCount++;
      return;
    }

    if (this.emittedIds.has(orderId)) {
      this.result.duplicateOrderCount++;
      return;
    }

    this.emittedIds.add(orderId);
    this.result.orders.push({
      orderId,
      orderDate,
      totalAmount,
      items: finalizeItems(this.draft.items, this.options.maxItemsPerOrder),
      orderLink: buildOrderLink(orderId, this.options.vendorDomain),
    });
  }
}

// ============================================
// Parser
// ============================================

/**
 * Parses pasted order-history text.
 *
 * Duplicate order ids keep the first complete occurrence; later ones are
 * only counted.
 *
 * @param text - Raw pasted text
 * @param options - Vendor domain and item limits
 * @returns Orders in page order plus drop/duplicate counts
 *
 * @example
 * const { orders } = parseOrders(`
 *   Order placed July 31, 2025
 *   Total $57.57
 *   Order # 702-8237239-1234567
 *   Tuna Feast 24-pack
 * `);
 * // orders[0].totalAmount === 5757
 */
export function parseOrders(
  text: string,
  options: Partial<OrderParseOptions> = {}
): OrderParseResult {
  if (typeof text !== 'string') {
    throw new TypeError('parseOrders expects the pasted text as a string');
  }

  const machine = new OrderBlockMachine({ ...DEFAULT_PARSE_OPTIONS, ...options });

  splitLines(text).forEach((line, lineNumber) => {
    machine.feed(classifyLine(line), lineNumber);
  });

  return machine.finish();
}

export default parseOrders;
