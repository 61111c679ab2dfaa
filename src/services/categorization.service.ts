/**
 * Categorization Service
 *
 * Orchestrates one preview run: parse pasted order history, match the
 * supplied transactions against it, and draft memos plus suggested
 * transaction updates. Nothing is persisted; each call is independent.
 */

import { pipelineSettingsFromEnv, env } from '../config';
import type { PipelineSettings } from '../config';
import { parseOrders, toIsoDate } from '../parsing';
import type { OrderItem, OrderParseResult, OrderRecord } from '../parsing';
import { matchTransactions } from '../matching';
import type { MatchReason, MatchResult, MatchStatus, TransactionRecord } from '../matching';
import { generateMemo } from '../memo';
import type { MemoGeneration } from '../memo';
import { Logging, formatCents } from '../utils';

// ============================================
// Types
// ============================================

export interface OrderSummary {
  orderId: string;
  orderDate: string;
  totalAmount: number;
  total: string;
  items: readonly OrderItem[];
  orderLink: string;
}

export interface ParseSummary {
  orders: OrderSummary[];
  orderCount: number;
  droppedBlockCount: number;
  duplicateOrderCount: number;
}

export interface SuggestedSubtransaction {
  /** Milliunits with the parent's sign; null when it cannot be derived from item prices */
  amount: number | null;
  memo: string;
}

export interface SuggestedUpdate {
  id: string;
  memo: string;
  approved: true;
  subtransactions?: SuggestedSubtransaction[];
}

export interface TransactionPreview {
  transactionId: string;
  status: MatchStatus;
  reason: MatchReason;
  explanation: string;
  orderId: string | null;
  orderLink: string | null;
  ambiguousOrderIds: string[];
  memo: MemoGeneration;
  suggestedUpdate: SuggestedUpdate | null;
}

export interface PreviewRequest {
  text: string;
  transactions: TransactionRecord[];
  split?: boolean;
  vendorOnly?: boolean;
}

export interface PreviewResult {
  parse: Omit<ParseSummary, 'orders'>;
  skippedTransactionCount: number;
  previews: TransactionPreview[];
  counts: Record<MatchStatus, number>;
}

// ============================================
// Helpers
// ============================================

export function summarizeOrder(order: OrderRecord): OrderSummary {
  return {
    orderId: order.orderId,
    orderDate: toIsoDate(order.orderDate),
    totalAmount: order.totalAmount,
    total: formatCents(order.totalAmount),
    items: order.items,
    orderLink: order.orderLink,
  };
}

/**
 * Derives per-item split amounts (milliunits) from item prices.
 *
 * Every item needs a unit price and the priced sum may not exceed the
 * charge; whatever is left over (tax, shipping, sub-cent milliunits) is added
 * to the last line so the lines sum to the parent amount. Otherwise every
 * amount is null.
 */
export function allocateSplitAmounts(items: readonly OrderItem[], transactionAmount: number): (number | null)[] {
  const chargedMilliunits = Math.abs(transactionAmount);
  const itemMilliunits: number[] = [];

  for (const item of items) {
    if (item.unitPrice === undefined) {
      return items.map(() => null);
    }
    itemMilliunits.push(item.unitPrice * (item.quantity ?? 1) * 10);
  }

  const pricedMilliunits = itemMilliunits.reduce((sum, milliunits) => sum + milliunits, 0);
  if (itemMilliunits.length === 0 || pricedMilliunits > chargedMilliunits) {
    return items.map(() => null);
  }

  itemMilliunits[itemMilliunits.length - 1] += chargedMilliunits - pricedMilliunits;

  const sign = transactionAmount < 0 ? -1 : 1;
  return itemMilliunits.map((milliunits) => sign * milliunits);
}

function buildSuggestedUpdate(result: MatchResult, memo: MemoGeneration): SuggestedUpdate | null {
  const { transaction, order } = result;

  switch (memo.kind) {
    case 'skipped':
      return null;

    case 'single':
      return { id: transaction.id, memo: memo.memo.text, approved: true };

    case 'split': {
      const amounts = allocateSplitAmounts(order?.items ?? [], transaction.amount);
      return {
        id: transaction.id,
        memo: memo.summary.text,
        approved: true,
        subtransactions: memo.lines.map((line, index) => ({
          amount: amounts[index] ?? null,
          memo: line.text,
        })),
      };
    }
  }
}

// ============================================
// Service
// ============================================

export class CategorizationService {
  constructor(private readonly settings: PipelineSettings) {}

  /**
   * Parses pasted order history. Dropped blocks are logged, never thrown.
   */
  parse(text: string): OrderParseResult {
    const result = parseOrders(text, this.settings.parse);

    Logging.debug(
      `Parsed ${result.orders.length} order(s) from ${text.length} characters of pasted text`
    );

    if (result.droppedBlockCount > 0) {
      Logging.warn(
        `Dropped ${result.droppedBlockCount} order block(s) missing an order id, date or total`
      );
    }
    if (result.duplicateOrderCount > 0) {
      Logging.warn(`Ignored ${result.duplicateOrderCount} repeated order block(s)`);
    }

    return result;
  }

  parseSummary(text: string): ParseSummary {
    const { orders, droppedBlockCount, duplicateOrderCount } = this.parse(text);
    return {
      orders: orders.map(summarizeOrder),
      orderCount: orders.length,
      droppedBlockCount,
      duplicateOrderCount,
    };
  }

  /**
   * Transactions worth labelling: payee mentions the vendor, no category
   * yet, and a non-zero amount.
   */
  selectVendorTransactions(transactions: readonly TransactionRecord[]): TransactionRecord[] {
    return transactions.filter((transaction) => {
      const payee = transaction.payee.toLowerCase();
      const isVendor = this.settings.payeeKeywords.some((keyword) => payee.includes(keyword));
      const isUncategorized = !transaction.category;
      return isVendor && isUncategorized && transaction.amount !== 0;
    });
  }

  preview(request: PreviewRequest): PreviewResult {
    const { orders, droppedBlockCount, duplicateOrderCount } = this.parse(request.text);

    const candidates = request.vendorOnly
      ? this.selectVendorTransactions(request.transactions)
      : request.transactions;

    const results = matchTransactions(orders, candidates, this.settings.match);
    const counts: Record<MatchStatus, number> = { MATCHED: 0, AMBIGUOUS: 0, UNMATCHED: 0 };

    const previews = results.map((result): TransactionPreview => {
      counts[result.status] += 1;
      const memo = generateMemo(result, request.split ?? false, this.settings.memo);

      const linkOnly =
        memo.kind === 'single' ? memo.memo.itemsDropped : memo.kind === 'split' && memo.summary.itemsDropped;
      if (linkOnly) {
        Logging.warn(`Memo for transaction ${result.transaction.id} holds only the order link`);
      }

      return {
        transactionId: result.transaction.id,
        status: result.status,
        reason: result.reason,
        explanation: result.matchDetails.explanation,
        orderId: result.order?.orderId ?? null,
        orderLink: result.order?.orderLink ?? null,
        ambiguousOrderIds: result.candidates.map((order) => order.orderId),
        memo,
        suggestedUpdate: buildSuggestedUpdate(result, memo),
      };
    });

    Logging.info(
      `Preview: ${counts.MATCHED} matched, ${counts.AMBIGUOUS} ambiguous, ${counts.UNMATCHED} unmatched of ${results.length} transaction(s)`
    );

    return {
      parse: { orderCount: orders.length, droppedBlockCount, duplicateOrderCount },
      skippedTransactionCount: request.transactions.length - candidates.length,
      previews,
      counts,
    };
  }
}

// Singleton instance
export const categorizationService = new CategorizationService(pipelineSettingsFromEnv(env));

export default categorizationService;
