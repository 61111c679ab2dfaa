/**
 * Money Utilities
 *
 * Amounts are handled as integers in minor units (cents) so comparisons are
 * exact. The budgeting service reports milliunits (1/1000 of a currency unit).
 */

const CURRENCY_AMOUNT =
  /^(-)?\s*(CDN\$|CA\$|US\$|C\$|\$|£|€)?\s*(-)?(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d{1,2}))?(?:\s*(?:CAD|USD|GBP|EUR))?$/i;

/**
 * Parses a currency string into integer cents.
 * Handles: "57.57", "$1,234.56", "CDN$ 12.00", "-$5", "£3.5"
 *
 * @param value - Raw text
 * @param requireCurrencyShape - Only accept values carrying a currency symbol
 *   or a two-digit fraction, so that bare integers ("2") are not read as money
 * @returns Cents, or null when the text is not an amount
 *
 * @example
 * parseAmountToCents('$1,234.56') // 123456
 * parseAmountToCents('12', true)  // null
 */
export function parseAmountToCents(value: string, requireCurrencyShape = false): number | null {
  const match = value.trim().match(CURRENCY_AMOUNT);
  if (!match) {
    return null;
  }

  const [, leadingSign, symbol, innerSign, whole, fraction] = match;

  if (requireCurrencyShape && !symbol && (fraction === undefined || fraction.length !== 2)) {
    return null;
  }

  const wholeUnits = Number(whole.replace(/,/g, ''));
  const minorUnits = fraction === undefined ? 0 : Number(fraction.padEnd(2, '0'));
  const cents = wholeUnits * 100 + minorUnits;

  return leadingSign || innerSign ? -cents : cents;
}

/**
 * Converts budgeting-service milliunits to absolute cents.
 * Half a cent rounds away from zero.
 *
 * @example
 * toAbsoluteCents(-57570) // 5757
 */
export function toAbsoluteCents(milliunits: number): number {
  return Math.round(Math.abs(milliunits) / 10);
}

/**
 * Formats cents as a plain decimal string ("57.57").
 */
export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const absolute = Math.abs(cents);
  const whole = Math.floor(absolute / 100);
  const fraction = String(absolute % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}
