/**
 * Type Definitions for Order Text Parsing
 *
 * Orders come from a human paste of a vendor order-history page, so nothing
 * here assumes a schema beyond the line shapes recognised by the classifier.
 */

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * A single purchased item. Prices are integer minor units (cents).
 */
export interface OrderItem {
  readonly name: string;
  readonly unitPrice?: number;
  readonly quantity?: number;
}

/**
 * A parsed vendor order. Every field except `items` is guaranteed present.
 */
export interface OrderRecord {
  /** Vendor-assigned identifier (e.g. "702-8237239-1234567") */
  readonly orderId: string;
  /** Calendar date the order was placed (UTC midnight) */
  readonly orderDate: Date;
  /** Absolute amount charged, in cents */
  readonly totalAmount: number;
  readonly items: readonly OrderItem[];
  /** Order details URL derived from orderId */
  readonly orderLink: string;
}

/**
 * Result of one parse pass over pasted text.
 */
export interface OrderParseResult {
  orders: OrderRecord[];
  /** Blocks that were started but lacked an order id, date or total */
  droppedBlockCount: number;
  /** Complete blocks skipped because their order id was already emitted */
  duplicateOrderCount: number;
}

export interface OrderParseOptions {
  /** Vendor domain used to build order links (e.g. "amazon.ca") */
  vendorDomain: string;
  /** Minimum characters for an item line (shorter lines are UI noise) */
  minItemNameLength: number;
  maxItemsPerOrder: number;
}

// ============================================
// STATE MACHINE TYPES
// ============================================

/**
 * Named parser states.
 *
 * OUTSIDE_BLOCK: before the first order, or between pages of noise
 * IN_BLOCK_HEADER: after "Order placed", collecting date/total until the order id
 * IN_ITEMS: after the order id anchor, collecting item lines
 */
export type ParserState = 'OUTSIDE_BLOCK' | 'IN_BLOCK_HEADER' | 'IN_ITEMS';

/**
 * Rank of a labelled total. Lower wins.
 * 0 = "Order total" / "Grand total", 1 = plain "Total"
 */
export type TotalRank = 0 | 1;

/**
 * A single input line after classification.
 */
export type ClassifiedLine =
  | { kind: 'BLANK' }
  | { kind: 'ORDER_START'; date?: Date }
  | { kind: 'ORDER_ID'; orderId: string }
  | { kind: 'DATE'; date: Date }
  | { kind: 'TOTAL'; rank: TotalRank; amount?: number }
  | { kind: 'OTHER_AMOUNT'; amount?: number }
  | { kind: 'AMOUNT'; amount: number }
  | { kind: 'QUANTITY'; quantity: number }
  | { kind: 'METADATA' }
  | { kind: 'PAGE_END' }
  | { kind: 'TEXT'; text: string };

export type LineKind = ClassifiedLine['kind'];
