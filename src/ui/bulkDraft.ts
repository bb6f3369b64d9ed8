import { toMinorUnits, formatAmount } from '../domain/money';
import { emptyBulkRow, type BulkResult, type BulkRow } from '../domain/types';

/** A grid line as typed; converted to a BulkRow when the batch is sent. */
export interface DraftRow {
  rowNumber: number;
  type: string;
  vault: string;
  amount: string;
  category: string;
  description: string;
  quantity: string;
  unit: string;
  toUser: string;
  toVault: string;
  date: string;
}

export type TextField = Exclude<keyof DraftRow, 'rowNumber'>;

export const BULK_TYPES = ['deposit', 'withdraw', 'transfer'] as const;

export function draftOf(row: BulkRow): DraftRow {
  return {
    rowNumber: row.rowNumber,
    type: row.type,
    vault: row.vault,
    amount: row.amount === null ? '' : formatAmount(row.amount).replace(/,/g, ''),
    category: row.category ?? '',
    description: row.description,
    quantity: row.quantity === null ? '' : String(row.quantity),
    unit: row.unit ?? '',
    toUser: row.toUser ?? '',
    toVault: row.toVault ?? '',
    date: row.date ?? '',
  };
}

export function blankDraft(rowNumber: number): DraftRow {
  return draftOf(emptyBulkRow(rowNumber));
}

export function isBlank(row: DraftRow): boolean {
  return !row.type && !row.vault && !row.amount && !row.description;
}

function orNull(value: string): string | null {
  return value.trim() === '' ? null : value;
}

/** An amount that doesn't parse goes out as null and comes back as a row error. */
export function toBulkRow(draft: DraftRow): BulkRow {
  const quantity = draft.quantity.trim() === '' ? null : Number(draft.quantity);
  return {
    rowNumber: draft.rowNumber,
    type: draft.type,
    vault: draft.vault,
    amount: draft.amount.trim() === '' ? null : toMinorUnits(draft.amount),
    category: orNull(draft.category),
    description: draft.description,
    quantity: quantity === null || Number.isNaN(quantity) ? null : quantity,
    unit: orNull(draft.unit),
    toUser: orNull(draft.toUser),
    toVault: orNull(draft.toVault),
    date: orNull(draft.date),
  };
}

export function numbered(rows: DraftRow[]): DraftRow[] {
  return rows.map((row, i) => ({ ...row, rowNumber: i + 1 }));
}

export interface SubmitOutcome {
  kind: 'success' | 'error';
  text: string;
  /** false while some rows still need another look */
  clearGrid: boolean;
}

/** How a committed batch is reported back on the grid. */
export function describeSubmit(result: BulkResult): SubmitOutcome {
  if (result.failed === 0) {
    return { kind: 'success', text: `Saved ${result.successful} transactions`, clearGrid: true };
  }
  return {
    kind: 'error',
    text: `Saved ${result.successful} transactions, ${result.failed} failed. The rows are kept so you can check them.`,
    clearGrid: false,
  };
}
