import { describe, it, expect } from 'vitest';
import ExcelJS from 'exceljs';
import { buildWorkbook, exportFilename } from '../src/export.js';
import type { ExportData } from '../src/ledger.js';

const data: ExportData = {
  username: 'Alice',
  transactions: [
    {
      id: 2,
      vault: 'Main',
      type: 'withdraw',
      amount: -2500,
      category: 'Food',
      description: 'rice',
      quantity: 2,
      unit: 'kg',
      date: '2024-01-03 09:03:07',
      counterpartyUser: null,
      counterpartyVault: null,
    },
  ],
  vaults: [
    { name: 'Main', balance: 7500 },
    { name: 'Savings', balance: 1250 },
  ],
  loans: [{ fromUser: 'Alice', toUser: 'Carol', amount: 2000 }],
};

function rowValues(sheet: ExcelJS.Worksheet, rowNumber: number): ExcelJS.CellValue[] {
  const row = sheet.getRow(rowNumber);
  return Array.from({ length: sheet.columnCount }, (_, i) => row.getCell(i + 1).value);
}

function sheet(workbook: ExcelJS.Workbook, name: string): ExcelJS.Worksheet {
  const found = workbook.getWorksheet(name);
  if (!found) throw new Error(`missing sheet ${name}`);
  return found;
}

describe('buildWorkbook', () => {
  const workbook = buildWorkbook(data, 'EGP');

  it('creates the three sheets in order', () => {
    expect(workbook.worksheets.map((w) => w.name)).toEqual(['Transactions', 'Vaults', 'Loans']);
    expect(workbook.subject).toBe('Vaultbook ledger (EGP)');
  });

  it('writes transactions in major units', () => {
    const transactions = sheet(workbook, 'Transactions');
    expect(rowValues(transactions, 1)).toEqual([
      'Date',
      'Vault',
      'Type',
      'Amount',
      'Category Name',
      'Description',
      'Quantity',
      'Unit',
    ]);
    expect(rowValues(transactions, 2)).toEqual(['2024-01-03 09:03:07', 'Main', 'withdraw', -25, 'Food', 'rice', 2, 'kg']);
    expect(transactions.getColumn('amount').numFmt).toBe('0.00');
  });

  it('ends the vault sheet with a bold total', () => {
    const vaults = sheet(workbook, 'Vaults');
    expect(rowValues(vaults, 1)).toEqual(['Vault', 'Balance']);
    expect(rowValues(vaults, 2)).toEqual(['Main', 75]);
    expect(rowValues(vaults, 3)).toEqual(['Savings', 12.5]);
    expect(rowValues(vaults, 4)).toEqual(['Total', 87.5]);
    expect(vaults.getRow(4).font?.bold).toBe(true);
  });

  it('lists loans per user pair', () => {
    const loans = sheet(workbook, 'Loans');
    expect(rowValues(loans, 1)).toEqual(['From User', 'To User', 'Total Loan Amount']);
    expect(rowValues(loans, 2)).toEqual(['Alice', 'Carol', 20]);
  });

  it('serialises to an xlsx file that loads back', async () => {
    const buffer = await workbook.xlsx.writeBuffer();
    const loaded = new ExcelJS.Workbook();
    await loaded.xlsx.load(buffer);

    expect(loaded.worksheets.map((w) => w.name)).toEqual(['Transactions', 'Vaults', 'Loans']);
    expect(sheet(loaded, 'Vaults').getRow(4).getCell(2).value).toBe(87.5);
  });
});

describe('exportFilename', () => {
  it('names the file after the user and the day', () => {
    expect(exportFilename('Alice', new Date(2024, 0, 5, 23, 59))).toBe('vaultbook-Alice-2024-01-05.xlsx');
  });
});
