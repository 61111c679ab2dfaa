/**
 * Memo Truncation
 *
 * When a memo is too long the item text is shortened; the order link is
 * always kept whole.
 *
 * Lengths are JavaScript string lengths (UTF-16 code units); a cut never
 * lands inside a surrogate pair, so emoji survive intact or not at all.
 */

import { CONTROL_CHARACTERS, MEMO_MAX_LENGTH, TRAILING_LINK, TRUNCATION_MARKER } from './constants';
import type { MemoText } from './types';

/**
 * Removes control characters except newlines. Tabs become spaces.
 */
export function stripControlCharacters(text: string): string {
  return text.replace(/\t/g, ' ').replace(CONTROL_CHARACTERS, '');
}

/**
 * Shortens text to at most `limit` code units, ending with the marker.
 * Returns '' when nothing of the text fits next to the marker.
 *
 * @example
 * truncateText('Wireless Mouse', 10, '...') // 'Wireles...'
 */
export function truncateText(text: string, limit: number, marker: string = TRUNCATION_MARKER): string {
  if (text.length <= limit) {
    return text;
  }

  const budget = limit - marker.length;
  if (budget <= 0) {
    return '';
  }

  let kept = '';
  for (const character of text) {
    if (kept.length + character.length > budget) break;
    kept += character;
  }

  kept = kept.trimEnd();
  return kept === '' ? '' : `${kept}${marker}`;
}

/**
 * Combines item text with an optional link on its own line, fitting the limit.
 *
 * - Everything fits: `body\nlink`
 * - Too long: body truncated, link intact
 * - Not even one character of body fits: the link alone, `itemsDropped`
 *
 * A link longer than the limit on its own is still returned whole.
 */
export function fitMemo(
  body: string,
  link: string | undefined,
  maxLength: number = MEMO_MAX_LENGTH,
  marker: string = TRUNCATION_MARKER
): MemoText {
  const cleanBody = stripControlCharacters(body).trim();

  if (!link) {
    const text = truncateText(cleanBody, maxLength, marker);
    return {
      text,
      truncated: text !== cleanBody,
      itemsDropped: text === '' && cleanBody !== '',
    };
  }

  const full = cleanBody === '' ? link : `${cleanBody}\n${link}`;
  if (full.length <= maxLength) {
    return { text: full, truncated: false, itemsDropped: false };
  }

  // room for the body once the link and its line break are reserved
  const room = maxLength - link.length - 1;
  const head = room > 0 ? truncateText(cleanBody, room, marker) : '';

  if (head === '') {
    return { text: link, truncated: true, itemsDropped: true };
  }

  return { text: `${head}\n${link}`, truncated: true, itemsDropped: false };
}

/**
 * Cleans any memo text before it is sent: strips control characters and
 * enforces the limit, keeping a link on the last line intact.
 *
 * @example
 * sanitizeMemo('A'.repeat(300)).length // 200, ending in '...'
 */
export function sanitizeMemo(
  text: string,
  maxLength: number = MEMO_MAX_LENGTH,
  marker: string = TRUNCATION_MARKER
): string {
  const cleaned = stripControlCharacters(text);
  if (cleaned.length <= maxLength) {
    return cleaned;
  }

  const trailingLink = cleaned.match(TRAILING_LINK);
  if (trailingLink && trailingLink.index !== undefined) {
    return fitMemo(cleaned.slice(0, trailingLink.index), trailingLink[1], maxLength, marker).text;
  }

  return truncateText(cleaned, maxLength, marker);
}
