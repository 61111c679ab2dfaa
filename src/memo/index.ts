/**
 * Memo Generation
 *
 * Usage:
 * ```typescript
 * import { generateMemo } from './memo';
 *
 * const generation = generateMemo(matchResult, false, { maxLength: 200 });
 * ```
 */

export { generateMemo, generateOrderMemo, generateEnhancedMemo, describeItem, buildSplitSummary } from './generateMemo';
export { fitMemo, sanitizeMemo, truncateText, stripControlCharacters } from './truncate';
export { buildOrderLink } from '../parsing/orderLink';

export {
  MEMO_MAX_LENGTH,
  TRUNCATION_MARKER,
  ITEM_SEPARATOR,
  FALLBACK_TITLE,
  DEFAULT_MEMO_OPTIONS,
} from './constants';

export type { MemoOptions, MemoText, MemoGeneration, ManualItemDetails } from './types';
