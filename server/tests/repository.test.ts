import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DEFAULT_CATEGORIES, DEFAULT_UNITS, openDatabase, type Db } from '../src/db.js';
import { LedgerRepository } from '../src/repository.js';

describe('openDatabase', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vaultbook-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates the parent directory and seeds lookups once', () => {
    const file = path.join(dir, 'nested', 'ledger.db');

    openDatabase(file).close();
    const db = openDatabase(file);
    const repo = new LedgerRepository(db);

    expect(fs.existsSync(file)).toBe(true);
    expect(repo.listCategoryNames()).toEqual([...DEFAULT_CATEGORIES]);
    expect(repo.listUnitNames()).toEqual([...DEFAULT_UNITS]);
    db.close();
  });

  it('adds the counterparty column to an older transactions table', () => {
    const file = path.join(dir, 'old.db');
    const old = openDatabase(file);
    old.exec('DROP TABLE transactions');
    old.exec(`
      CREATE TABLE transactions (
        transaction_id INTEGER PRIMARY KEY AUTOINCREMENT,
        vault_id INTEGER NOT NULL,
        transaction_type TEXT NOT NULL,
        amount INTEGER NOT NULL,
        category_id INTEGER,
        description TEXT NOT NULL,
        quantity REAL,
        unit_id INTEGER,
        date TEXT NOT NULL
      )
    `);
    old.close();

    const db = openDatabase(file);
    const columns = db.pragma('table_info(transactions)') as { name: string }[];
    expect(columns.map((c) => c.name)).toContain('counterparty_vault_id');
    db.close();
  });
});

describe('LedgerRepository', () => {
  let db: Db;
  let repo: LedgerRepository;

  beforeEach(() => {
    db = openDatabase(':memory:');
    repo = new LedgerRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('creates a default vault with every user', () => {
    const userId = repo.insertUser('Alice', null, 'Main');

    expect(repo.findUser('Alice')?.password_hash).toBeNull();
    expect(repo.listVaults(userId).map((v) => [v.vault_name, v.balance])).toEqual([['Main', 0]]);
  });

  it('lists usernames alphabetically', () => {
    repo.insertUser('Carol', null, 'Main');
    repo.insertUser('Alice', null, 'Main');

    expect(repo.listUsernames()).toEqual(['Alice', 'Carol']);
  });

  it('refuses a negative balance', () => {
    const userId = repo.insertUser('Alice', null, 'Main');
    const main = repo.findVault(userId, 'Main');
    if (!main) throw new Error('missing vault');

    expect(() => repo.adjustBalance(main.vault_id, -1)).toThrow(/CHECK constraint failed/);
  });

  it('rolls back everything when a transaction callback throws', () => {
    expect(() =>
      repo.transaction(() => {
        repo.insertUser('Alice', null, 'Main');
        throw new Error('abort');
      }),
    ).toThrow('abort');

    expect(repo.findUser('Alice')).toBeUndefined();
  });

  it('accumulates loans per vault pair', () => {
    const alice = repo.insertUser('Alice', null, 'Main');
    const bob = repo.insertUser('Bob', null, 'Main');
    const from = repo.findVault(alice, 'Main');
    const to = repo.findVault(bob, 'Main');
    if (!from || !to) throw new Error('missing vault');

    repo.upsertLoan(from.vault_id, to.vault_id, 1000);
    repo.upsertLoan(from.vault_id, to.vault_id, 250);

    expect(repo.listLoans('Alice')).toEqual([{ fromUser: 'Alice', toUser: 'Bob', amount: 1250 }]);
    expect(repo.listLoans('Bob')).toEqual([{ fromUser: 'Alice', toUser: 'Bob', amount: 1250 }]);
  });

  it('merges loans when moving a vault into another', () => {
    const alice = repo.insertUser('Alice', null, 'Main');
    const bob = repo.insertUser('Bob', null, 'Main');
    const savings = repo.insertVault(alice, 'Savings');
    const main = repo.findVault(alice, 'Main');
    const bobMain = repo.findVault(bob, 'Main');
    if (!main || !bobMain) throw new Error('missing vault');

    repo.upsertLoan(main.vault_id, bobMain.vault_id, 300);
    repo.upsertLoan(savings, bobMain.vault_id, 200);
    repo.moveVaultContents(savings, main.vault_id);

    const rows = db
      .prepare<[], { from_vault_id: number; to_vault_id: number; amount: number }>('SELECT * FROM loans')
      .all();
    expect(rows).toEqual([{ from_vault_id: main.vault_id, to_vault_id: bobMain.vault_id, amount: 500 }]);
  });

  it('filters transactions by vault, month and type', () => {
    const alice = repo.insertUser('Alice', null, 'Main');
    const main = repo.findVault(alice, 'Main');
    const categoryId = repo.findCategoryId('Food') ?? null;
    if (!main) throw new Error('missing vault');

    const base = {
      vaultId: main.vault_id,
      categoryId,
      description: 'lunch',
      quantity: null,
      unitId: null,
      counterpartyVaultId: null,
    };
    repo.insertTransaction({ ...base, type: 'deposit', amount: 500, date: '2024-01-10 12:00:00' });
    repo.insertTransaction({ ...base, type: 'withdraw', amount: -200, date: '2024-02-01 12:00:00' });

    expect(repo.listTransactions(alice).map((t) => t.amount)).toEqual([-200, 500]);
    expect(repo.listTransactions(alice, { month: '2024-01' }).map((t) => t.amount)).toEqual([500]);
    expect(repo.listTransactions(alice, { type: 'withdraw' }).map((t) => t.amount)).toEqual([-200]);
    expect(repo.listTransactions(alice, { vault: 'Other' })).toEqual([]);
  });
});
