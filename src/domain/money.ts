/**
 * Money helpers. The API speaks integer minor units (piastres, cents);
 * forms speak decimal strings.
 */

const DECIMAL = /^\d+(\.\d{1,2})?$/;

/** "12.5" → 1250. Returns null for anything that isn't a non-negative amount with at most two decimals. */
export function toMinorUnits(input: string): number | null {
  const text = input.trim().replace(/,/g, '');
  if (!DECIMAL.test(text)) return null;

  const [whole, fraction = ''] = text.split('.');
  const minor = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  return Number.isSafeInteger(minor) ? minor : null;
}

/** 1250 → "12.50" */
export function formatAmount(minor: number): string {
  const sign = minor < 0 ? '-' : '';
  const abs = Math.abs(minor);
  const whole = Math.floor(abs / 100).toLocaleString('en-US');
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

/** 1250, "EGP" → "EGP 12.50" */
export function formatMoney(minor: number, currency: string): string {
  return `${currency} ${formatAmount(minor)}`;
}
