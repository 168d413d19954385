/**
 * Amount helpers.
 *
 * Amounts are stored exactly as the processor reports them: integers in the
 * currency's minor unit (cents for usd, whole yen for jpy). Conversion only
 * happens at the edges, when a caller supplies a major-unit price or when a
 * report is formatted for display.
 */

export const ZERO_DECIMAL_CURRENCIES: ReadonlySet<string> = new Set([
  'bif',
  'clp',
  'djf',
  'gnf',
  'jpy',
  'kmf',
  'krw',
  'mga',
  'pyg',
  'rwf',
  'ugx',
  'vnd',
  'vuv',
  'xaf',
  'xof',
  'xpf',
]);

export function isZeroDecimal(currency: string | null | undefined): boolean {
  return ZERO_DECIMAL_CURRENCIES.has((currency ?? '').toLowerCase());
}

/** Processor amount → stored amount. Both are minor units. */
export function convertAmountForDb(amount: number, _currency?: string | null): number;
export function convertAmountForDb(amount: null | undefined, _currency?: string | null): null;
export function convertAmountForDb(
  amount: number | null | undefined,
  _currency?: string | null,
): number | null;
export function convertAmountForDb(
  amount: number | null | undefined,
  _currency?: string | null,
): number | null {
  if (amount === null || amount === undefined) return null;
  return Math.trunc(amount);
}

/** Major-unit price (e.g. 9.99 usd) → processor minor units (999). */
export function convertAmountForApi(amount: number, currency = 'usd'): number {
  return isZeroDecimal(currency) ? Math.round(amount) : Math.round(amount * 100);
}

/** Minor units → fixed decimal string, e.g. `formatAmount(1910, 'usd') === '19.10'`. */
export function formatAmount(amount: number, currency = 'usd'): string {
  if (isZeroDecimal(currency)) return amount.toFixed(0);
  const sign = amount < 0 ? '-' : '';
  const abs = Math.abs(amount);
  const major = Math.trunc(abs / 100);
  const minor = abs % 100;
  return `${sign}${major}.${minor.toString().padStart(2, '0')}`;
}

/** Unix seconds as a `Date`; null when the processor left the field out. */
export function fromUnix(seconds: number | null | undefined): Date | null {
  return seconds === null || seconds === undefined ? null : new Date(seconds * 1000);
}
