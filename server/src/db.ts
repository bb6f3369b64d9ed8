import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export type Db = Database.Database;

export const DEFAULT_CATEGORIES = [
  'Food',
  'Transport',
  'Bills',
  'Shopping',
  'Health',
  'Entertainment',
  'Salary',
  'Gifts',
  'Others',
] as const;

export const DEFAULT_UNITS = ['pcs', 'kg', 'g', 'liters', 'ml'] as const;

/**
 * Open (or create) the ledger database and bring its schema up to date.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): Db {
  const inMemory = dbPath === ':memory:';
  if (!inMemory) {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = new Database(dbPath);

  // Enable WAL mode for better performance
  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  // A null password_hash marks a party that only exists as a loan counterpart
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      user_id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT UNIQUE NOT NULL,
      password_hash TEXT,
      created_at TEXT DEFAULT (datetime('now'))
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS vaults (
      vault_id INTEGER PRIMARY KEY AUTOINCREMENT,
      vault_name TEXT NOT NULL,
      user_id INTEGER NOT NULL,
      balance INTEGER NOT NULL DEFAULT 0 CHECK (balance >= 0),
      FOREIGN KEY (user_id) REFERENCES users (user_id) ON DELETE CASCADE,
      UNIQUE (vault_name, user_id)
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS categories (
      category_id INTEGER PRIMARY KEY AUTOINCREMENT,
      category_name TEXT NOT NULL UNIQUE
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS units (
      unit_id INTEGER PRIMARY KEY AUTOINCREMENT,
      unit_name TEXT NOT NULL UNIQUE
    )
  `);

  // amount is signed minor units: positive credits the vault, negative debits it
  db.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      transaction_id INTEGER PRIMARY KEY AUTOINCREMENT,
      vault_id INTEGER NOT NULL,
      transaction_type TEXT NOT NULL CHECK (transaction_type IN ('deposit', 'withdraw', 'transfer', 'loan')),
      amount INTEGER NOT NULL,
      category_id INTEGER,
      description TEXT NOT NULL,
      quantity REAL,
      unit_id INTEGER,
      date TEXT NOT NULL,
      FOREIGN KEY (vault_id) REFERENCES vaults (vault_id) ON DELETE CASCADE,
      FOREIGN KEY (category_id) REFERENCES categories (category_id) ON DELETE SET NULL,
      FOREIGN KEY (unit_id) REFERENCES units (unit_id) ON DELETE SET NULL
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_transactions_vault_date ON transactions(vault_id, date)
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS loans (
      from_vault_id INTEGER NOT NULL,
      to_vault_id INTEGER NOT NULL,
      amount INTEGER NOT NULL,
      PRIMARY KEY (from_vault_id, to_vault_id),
      FOREIGN KEY (from_vault_id) REFERENCES vaults (vault_id) ON DELETE CASCADE,
      FOREIGN KEY (to_vault_id) REFERENCES vaults (vault_id) ON DELETE CASCADE
    )
  `);

  // --- Migrations: add new columns safely ---

  // Transfer and loan legs remember the vault on the other side
  const txnColumns = db.pragma('table_info(transactions)') as { name: string }[];
  const txnColNames = new Set(txnColumns.map((c) => c.name));
  if (!txnColNames.has('counterparty_vault_id')) {
    db.exec(`
      ALTER TABLE transactions ADD COLUMN counterparty_vault_id INTEGER DEFAULT NULL
        REFERENCES vaults (vault_id) ON DELETE SET NULL
    `);
  }

  // --- Seed lookup tables ---
  const seedCategory = db.prepare('INSERT OR IGNORE INTO categories (category_name) VALUES (?)');
  const seedUnit = db.prepare('INSERT OR IGNORE INTO units (unit_name) VALUES (?)');
  db.transaction(() => {
    for (const name of DEFAULT_CATEGORIES) seedCategory.run(name);
    for (const name of DEFAULT_UNITS) seedUnit.run(name);
  })();

  return db;
}

// Row types

export const TRANSACTION_TYPES = ['deposit', 'withdraw', 'transfer', 'loan'] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export interface UserRow {
  user_id: number;
  username: string;
  password_hash: string | null;
  created_at: string;
}

export interface VaultRow {
  vault_id: number;
  vault_name: string;
  user_id: number;
  balance: number;
}

export interface TransactionInsert {
  vaultId: number;
  type: TransactionType;
  amount: number;
  categoryId: number | null;
  description: string;
  quantity: number | null;
  unitId: number | null;
  date: string;
  counterpartyVaultId: number | null;
}

/** Transaction joined with its vault, category and unit names */
export interface TransactionView {
  id: number;
  vault: string;
  type: TransactionType;
  amount: number;
  category: string | null;
  description: string;
  quantity: number | null;
  unit: string | null;
  date: string;
  counterpartyUser: string | null;
  counterpartyVault: string | null;
}

export interface LoanView {
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
