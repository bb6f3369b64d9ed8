/**
 * Small text and time helpers shared by the ledger, bulk and export code.
 */

/** Trim and capitalise: first character upper case, the rest lower case. */
export function normalizeName(value: string): string {
  const trimmed = value.trim();
  if (trimmed === '') return '';
  return trimmed.charAt(0).toUpperCase() + trimmed.slice(1).toLowerCase();
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as YYYY-MM-DD HH:MM:SS */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function isRealDate(year: number, month: number, day: number): boolean {
  const d = new Date(year, month - 1, day);
  return d.getFullYear() === year && d.getMonth() === month - 1 && d.getDate() === day;
}

/** True for a calendar-valid YYYY-MM-DD string. */
export function isDateOnly(value: string): boolean {
  const m = DATE_ONLY.exec(value);
  return m !== null && isRealDate(Number(m[1]), Number(m[2]), Number(m[3]));
}

/**
 * Resolve a user-supplied date into a stored timestamp.
 * - missing → now
 * - YYYY-MM-DD → that day at the current clock time
 * - YYYY-MM-DD HH:MM:SS → as given
 * Returns null when the value is neither form.
 */
export function resolveTimestamp(value: string | null | undefined, now: Date): string | null {
  if (value === null || value === undefined || value.trim() === '') {
    return formatTimestamp(now);
  }
  const trimmed = value.trim();
  if (isDateOnly(trimmed)) {
    return `${trimmed} ${formatTimestamp(now).slice(11)}`;
  }
  const m = DATE_TIME.exec(trimmed);
  if (m === null) return null;
  const [hours, minutes, seconds] = [Number(m[4]), Number(m[5]), Number(m[6])];
  if (!isRealDate(Number(m[1]), Number(m[2]), Number(m[3])) || hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  return trimmed;
}

/** Minor units → "12.50" */
export function formatMinor(amount: number): string {
  return (amount / 100).toFixed(2);
}

/** Largest balance or amount, in minor units, that stays an exact integer */
export const MAX_MINOR = Number.MAX_SAFE_INTEGER;

/** Whether crediting `amount` keeps `balance` within MAX_MINOR */
export function fitsBalance(balance: number, amount: number): boolean {
  return amount <= MAX_MINOR - balance;
}
