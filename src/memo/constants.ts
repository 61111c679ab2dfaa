/**
 * Constants for Memo Generation
 */

import type { MemoOptions } from './types';

/**
 * Memo field limit of the budgeting service, in characters.
 */
export const MEMO_MAX_LENGTH = 200;

/** Appended where item text was cut */
export const TRUNCATION_MARKER = '...';

/** Joins item names in an unsplit memo */
export const ITEM_SEPARATOR = ', ';

/** Memo title for a matched order whose items could not be read */
export const FALLBACK_TITLE = 'Amazon Purchase';

export const DEFAULT_MEMO_OPTIONS: MemoOptions = {
  maxLength: MEMO_MAX_LENGTH,
  truncationMarker: TRUNCATION_MARKER,
  itemSeparator: ITEM_SEPARATOR,
  fallbackTitle: FALLBACK_TITLE,
};

/** A link on the last line of a memo */
export const TRAILING_LINK = /\n[ \t]*(https?:\/\/\S+)\s*$/;

/** C0 controls and DEL, except line feed */
export const CONTROL_CHARACTERS = /[\u0000-\u0009\u000B-\u001F\u007F]/g;
