/**
 * Order Text Parsing
 *
 * Usage:
 * ```typescript
 * import { parseOrders } from './parsing';
 *
 * const { orders, droppedBlockCount } = parseOrders(pastedText, { vendorDomain: 'amazon.com' });
 * ```
 */

// Main function
export { parseOrders, OrderBlockMachine, parseItemLine } from './parseOrders';

// Building blocks
export { classifyLine, splitLines, isMetadataLine } from './classifyLine';
export { parseDateLine, calendarDate, toIsoDate } from './dates';
export { buildOrderLink } from './orderLink';

// Constants
export {
  DEFAULT_PARSE_OPTIONS,
  DEFAULT_VENDOR_DOMAIN,
  MAX_ITEMS_PER_ORDER,
  MIN_ITEM_NAME_LENGTH,
} from './constants';

// Types
export type {
  OrderItem,
  OrderRecord,
  OrderParseOptions,
  OrderParseResult,
  ParserState,
  ClassifiedLine,
  LineKind,
} from './types';
