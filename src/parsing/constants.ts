/**
 * Constants for Order Text Parsing
 *
 * Patterns are tuned to the text a browser produces when an order-history
 * page is selected and copied. Each line is matched on its own.
 */

import type { OrderParseOptions } from './types';

// ============================================
// DEFAULTS
// ============================================

/**
 * Maximum items kept per order
 */
export const MAX_ITEMS_PER_ORDER = 10;

/**
 * Item lines shorter than this (in characters) are treated as UI noise.
 */
export const MIN_ITEM_NAME_LENGTH = 8;

export const DEFAULT_VENDOR_DOMAIN = 'amazon.ca';

export const DEFAULT_PARSE_OPTIONS: OrderParseOptions = {
  vendorDomain: DEFAULT_VENDOR_DOMAIN,
  minItemNameLength: MIN_ITEM_NAME_LENGTH,
  maxItemsPerOrder: MAX_ITEMS_PER_ORDER,
};

// ============================================
// ANCHORS
// ============================================

/**
 * Vendor order number: three alphanumerics, seven digits, seven digits.
 * Physical orders start with digits ("702-..."), digital ones with "D01-...".
 */
export const ORDER_ID_TOKEN = /\b([A-Z0-9]\d{2}-\d{7}-\d{7})\b/;

/** "Order # 702-...", "Order number: 702-...", or the bare token */
export const ORDER_ID_LINE = /^(?:order\s*(?:#|number|no\.?|id)\s*:?\s*)?([A-Z0-9]\d{2}-\d{7}-\d{7})\b/i;

/** Start of an order block header, optionally followed by the date */
export const ORDER_START_LINE = /^order\s+placed\b\s*:?\s*(.*)$/i;

/** Lines matching this are expanded before classification (single-line headers) */
export const INLINE_HEADER_BREAK = /\s+(?=total\b|ship\s+to\b|order\s*#)/gi;

// ============================================
// AMOUNTS
// ============================================

export const TOTAL_LABELS: ReadonlyArray<{ pattern: RegExp; rank: 0 | 1 }> = [
  { pattern: /^(?:order|grand)\s+total\b\s*:?\s*(.*)$/i, rank: 0 },
  { pattern: /^total\b\s*:?\s*(.*)$/i, rank: 1 },
];

/**
 * Amount labels that must never be taken as the order total.
 */
export const OTHER_AMOUNT_LABEL =
  /^(?:item\(s\)\s+subtotal|subtotal|shipping(?:\s*&\s*handling)?|estimated\s+tax(?:\s+to\s+be\s+collected)?|tax|gst\/hst|pst\/rst\/qst|total\s+before\s+tax|discount|promotion\s+applied|gift\s+card\s+amount|refund\s+total|import\s+fees\s+deposit)\b\s*:?\s*(.*)$/i;

/** "Qty: 2", "Quantity 3" */
export const QUANTITY_LINE = /^(?:qty|quantity)\s*:?\s*(\d+)$/i;

/** "2 of: Wireless Mouse" */
export const QUANTITY_PREFIX = /^(\d+)\s+of:\s*(.+)$/i;

// ============================================
// DATES
// ============================================

export const MONTHS: Readonly<Record<string, number>> = {
  jan: 0,
  feb: 1,
  mar: 2,
  apr: 3,
  may: 4,
  jun: 5,
  jul: 6,
  aug: 7,
  sep: 8,
  oct: 9,
  nov: 10,
  dec: 11,
};

const MONTH_NAME =
  '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\\.?';

/** Labels allowed in front of a date on a date-only line */
const DATE_LABEL = '(?:(?:ordered\\s+on|order\\s+date|placed\\s+on|date)\\s*:?\\s*)?';

/** "July 31, 2025", "Jul 31 2025" */
export const MONTH_DAY_YEAR = new RegExp(`^${DATE_LABEL}${MONTH_NAME}\\s+(\\d{1,2}),?\\s+(\\d{4})$`, 'i');

/** "31 July 2025" */
export const DAY_MONTH_YEAR = new RegExp(`^${DATE_LABEL}(\\d{1,2})\\s+${MONTH_NAME},?\\s+(\\d{4})$`, 'i');

/** "2025-07-31" */
export const ISO_DATE = new RegExp(`^${DATE_LABEL}(\\d{4})-(\\d{2})-(\\d{2})$`, 'i');

// ============================================
// METADATA (non-item lines)
// ============================================

/**
 * Lines that look like text but belong to the page chrome, shipping status
 * or return windows.
 */
export const METADATA_PATTERNS: readonly RegExp[] = [
  /^(?:buy it again|track package|view|return|write|get|share|leave|ask|archive|cancel|problem with order)\b/i,
  /^(?:delivered|arriving|auto-delivered|package was|shipped|not yet shipped|out for delivery|your package|refunded|replacement)\b/i,
  /^(?:not )?eligible for return\b/i,
  /^\d+(?:\.\d+)? out of \d+ stars/i,
  /^(?:free\s+(?:delivery|shipping|returns)\b|today by|list:|was:|limited-time deal)/i,
  /^(?:ship to|invoice|sold by|supplied by|condition)\b/i,
  /^\d+ sustainability features?$/i,
  /\b(?:your account|your orders|sign in|browsing history|shopping cart)\b|^hello,/i,
  // Short navigation labels ("Prime Video", "Browse all"); longer lines may be product names
  /^(?:account|orders|cart|search|browse|prime|shipping)\b(?:\s+\S+){0,2}$/i,
];

/**
 * Pagination and footer lines. Nothing after them belongs to an order.
 */
export const PAGE_END_PATTERNS: readonly RegExp[] = [
  /^←?\s*previous\s*→?$/i,
  /^←?\s*next\s*→?$/i,
  /^back to top$/i,
  /^(?:conditions of use|privacy notice|interest-based ads|your ads privacy choices)\b/i,
  /^(?:©|\(c\)\s*\d{4})/i,
  /^\d+ orders? placed in\b/i,
];

/** All-caps ASCII lines are buttons and section titles */
export const ALL_CAPS_LINE = /^[A-Z\s]+$/;

/** Bullet characters removed from the start of item lines */
export const LEADING_BULLET = /^[-•*·–]\s*/;
