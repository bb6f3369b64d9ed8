import { toMinorUnits } from '../domain/money';
import { emptyBulkRow, type BulkRow } from '../domain/types';

export const CSV_COLUMNS = [
  'type',
  'vault',
  'amount',
  'category',
  'description',
  'quantity',
  'unit',
  'to_user',
  'to_vault',
  'date',
] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];

const REQUIRED_COLUMNS: CsvColumn[] = ['type', 'vault', 'amount', 'description'];

export interface CsvParseResult {
  rows: BulkRow[];
  /** Lines that could not be read, e.g. an amount that isn't a number */
  errors: string[];
  error?: string;
}

/**
 * Parse CSV text into rows (handles quoted fields)
 */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

  for (const line of lines) {
    if (line.trim() === '') continue;

    const row: string[] = [];
    let current = '';
    let inQuotes = false;

    for (let i = 0; i < line.length; i++) {
      const char = line[i];

      if (char === '"') {
        if (inQuotes && line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = !inQuotes;
        }
      } else if (char === ',' && !inQuotes) {
        row.push(current.trim());
        current = '';
      } else {
        current += char;
      }
    }
    row.push(current.trim());
    rows.push(row);
  }

  return rows;
}

function isColumn(name: string): name is CsvColumn {
  return CSV_COLUMNS.some((c) => c === name);
}

function orNull(value: string): string | null {
  return value === '' ? null : value;
}

/**
 * Parse a bulk transaction CSV. The header names the columns (any order);
 * amounts are decimal major units and come back as minor units.
 */
export function parseBulkCsv(text: string): CsvParseResult {
  const rows = parseCsvRows(text);
  if (rows.length < 2) {
    return { rows: [], errors: [], error: 'CSV must have a header row and at least one transaction' };
  }

  const index = new Map<CsvColumn, number>();
  rows[0].forEach((name, i) => {
    const key = name.toLowerCase().trim();
    if (isColumn(key)) index.set(key, i);
  });

  const missing = REQUIRED_COLUMNS.filter((c) => !index.has(c));
  if (missing.length > 0) {
    return { rows: [], errors: [], error: `Missing columns: ${missing.join(', ')}` };
  }

  const cell = (row: string[], column: CsvColumn): string => {
    const i = index.get(column);
    return i === undefined ? '' : (row[i] ?? '').trim();
  };

  const parsed: BulkRow[] = [];
  const errors: string[] = [];

  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    const line = i + 1;

    const amountText = cell(row, 'amount');
    const amount = amountText === '' ? null : toMinorUnits(amountText);
    if (amountText !== '' && amount === null) {
      errors.push(`Line ${line}: amount "${amountText}" is not a valid number`);
      continue;
    }

    const quantityText = cell(row, 'quantity');
    const quantity = quantityText === '' ? null : Number(quantityText);
    if (quantity !== null && Number.isNaN(quantity)) {
      errors.push(`Line ${line}: quantity "${quantityText}" is not a valid number`);
      continue;
    }

    parsed.push({
      ...emptyBulkRow(parsed.length + 1),
      type: cell(row, 'type').toLowerCase(),
      vault: cell(row, 'vault'),
      amount,
      category: orNull(cell(row, 'category')),
      description: cell(row, 'description'),
      quantity,
      unit: orNull(cell(row, 'unit')),
      toUser: orNull(cell(row, 'to_user')),
      toVault: orNull(cell(row, 'to_vault')),
      date: orNull(cell(row, 'date')),
    });
  }

  if (parsed.length === 0) {
    return { rows: [], errors, error: 'No valid transactions found in CSV' };
  }

  return { rows: parsed, errors };
}

/** Render rows back to CSV, e.g. for a template download. */
export function toCsv(rows: BulkRow[]): string {
  const quote = (value: string): string => (/[",]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value);
  const money = (minor: number | null): string => (minor === null ? '' : (minor / 100).toFixed(2));

  const lines = rows.map((r) =>
    [
      r.type,
      r.vault,
      money(r.amount),
      r.category ?? '',
      r.description,
      r.quantity === null ? '' : String(r.quantity),
      r.unit ?? '',
      r.toUser ?? '',
      r.toVault ?? '',
      r.date ?? '',
    ]
      .map(quote)
      .join(','),
  );
  return [CSV_COLUMNS.join(','), ...lines].join('\n');
}
