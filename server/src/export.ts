/**
 * Excel export of a user's ledger (transactions, vaults, loans).
 */
import ExcelJS from 'exceljs';
import type { ExportData } from './ledger.js';

const MONEY_FORMAT = '0.00';

function major(amount: number): number {
  return amount / 100;
}

function styleHeader(sheet: ExcelJS.Worksheet): void {
  const header = sheet.getRow(1);
  header.font = { bold: true };
}

export function buildWorkbook(data: ExportData, currency: string): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = data.username;
  workbook.subject = `Vaultbook ledger (${currency})`;

  const transactions = workbook.addWorksheet('Transactions');
  transactions.columns = [
    { header: 'Date', key: 'date', width: 20 },
    { header: 'Vault', key: 'vault', width: 16 },
    { header: 'Type', key: 'type', width: 10 },
    { header: 'Amount', key: 'amount', width: 14, style: { numFmt: MONEY_FORMAT } },
    { header: 'Category Name', key: 'category', width: 16 },
    { header: 'Description', key: 'description', width: 30 },
    { header: 'Quantity', key: 'quantity', width: 10 },
    { header: 'Unit', key: 'unit', width: 8 },
  ];
  for (const t of data.transactions) {
    transactions.addRow({
      date: t.date,
      vault: t.vault,
      type: t.type,
      amount: major(t.amount),
      category: t.category ?? '',
      description: t.description,
      quantity: t.quantity ?? '',
      unit: t.unit ?? '',
    });
  }
  styleHeader(transactions);

  const vaults = workbook.addWorksheet('Vaults');
  vaults.columns = [
    { header: 'Vault', key: 'vault', width: 16 },
    { header: 'Balance', key: 'balance', width: 16, style: { numFmt: MONEY_FORMAT } },
  ];
  for (const v of data.vaults) {
    vaults.addRow({ vault: v.name, balance: major(v.balance) });
  }
  const total = vaults.addRow({
    vault: 'Total',
    balance: major(data.vaults.reduce((sum, v) => sum + v.balance, 0)),
  });
  total.font = { bold: true };
  styleHeader(vaults);

  const loans = workbook.addWorksheet('Loans');
  loans.columns = [
    { header: 'From User', key: 'fromUser', width: 16 },
    { header: 'To User', key: 'toUser', width: 16 },
    { header: 'Total Loan Amount', key: 'amount', width: 18, style: { numFmt: MONEY_FORMAT } },
  ];
  for (const loan of data.loans) {
    loans.addRow({ fromUser: loan.fromUser, toUser: loan.toUser, amount: major(loan.amount) });
  }
  styleHeader(loans);

  return workbook;
}

/** vaultbook-<username>-<YYYY-MM-DD>.xlsx */
export function exportFilename(username: string, now: Date): string {
  const day = [
    now.getFullYear(),
    String(now.getMonth() + 1).padStart(2, '0'),
    String(now.getDate()).padStart(2, '0'),
  ].join('-');
  return `vaultbook-${username}-${day}.xlsx`;
}
