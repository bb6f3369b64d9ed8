/**
 * Domain types shared by the screens.
 * Pure data, mirroring what the API returns. Amounts are minor units.
 */

export type TransactionType = 'deposit' | 'withdraw' | 'transfer' | 'loan';

export interface Vault {
  name: string;
  balance: number;
}

export interface Transaction {
  id: number;
  vault: string;
  type: TransactionType;
  amount: number;              // signed: positive credits the vault
  category: string | null;
  description: string;
  quantity: number | null;
  unit: string | null;
  date: string;                // YYYY-MM-DD HH:MM:SS
  counterpartyUser: string | null;
  counterpartyVault: string | null;
}

export interface Loan {
  fromUser: string;
  toUser: string;
  amount: number;
}

export interface CategoryTotal {
  category: string;
  deposited: number;
  withdrawn: number;
}

export interface MoneyFlow {
  vault: string;
  category: string;
  direction: 'in' | 'out';
  amount: number;
}

export interface Summary {
  username: string;
  currency: string;
  totalBalance: number;
  vaults: Vault[];
  categoryTotals: CategoryTotal[];
  flows: MoneyFlow[];
  loans: Loan[];
}

/** YYYY-MM string */
export type Month = string;

export interface Session {
  token: string;
  username: string;
  currency: string;
  /** The vault that can't be removed and takes over removed vaults */
  defaultVault: string;
}

/** One line of the bulk entry grid */
export interface BulkRow {
  rowNumber: number;
  type: string;
  vault: string;
  amount: number | null;       // minor units
  category: string | null;
  description: string;
  quantity: number | null;
  unit: string | null;
  toUser: string | null;
  toVault: string | null;
  date: string | null;         // YYYY-MM-DD
}

export interface BulkRowError {
  rowNumber: number;
  field: string;
  code: string;
  message: string;
}

export interface BulkValidation {
  valid: boolean;
  errors: BulkRowError[];
  validCount: number;
  totalCount: number;
  summary: string;
}

export interface BulkResult {
  successful: number;
  failed: number;
}

export function emptyBulkRow(rowNumber: number): BulkRow {
  return {
    rowNumber,
    type: '',
    vault: '',
    amount: null,
    category: null,
    description: '',
    quantity: null,
    unit: null,
    toUser: null,
    toVault: null,
    date: null,
  };
}
