import { describe, it, expect, beforeEach } from 'vitest';
import type { LedgerService } from '../src/ledger.js';
import { NOW_STAMP, PASSWORD, createLedger, signupAll } from './helpers.js';

let service: LedgerService;

beforeEach(() => {
  service = createLedger().service;
});

describe('signup', () => {
  it('registers a normalised username with a Main vault', () => {
    expect(service.signup('  aLICE ', PASSWORD, PASSWORD)).toEqual({ ok: true, username: 'Alice' });
    expect(service.listVaults('alice')).toEqual([{ name: 'Main', balance: 0 }]);
  });

  it('rejects duplicates regardless of case', () => {
    signupAll(service, 'alice');
    expect(service.signup('ALICE', PASSWORD, PASSWORD)).toEqual({
      ok: false,
      error: 'username_exists',
      message: "Username 'Alice' already exists",
    });
  });

  it('checks username, password and confirmation in that order', () => {
    expect(service.signup('   ', PASSWORD, PASSWORD)).toMatchObject({ ok: false, error: 'invalid_username' });
    expect(service.signup('bob', '', '')).toMatchObject({ ok: false, error: 'invalid_password' });
    expect(service.signup('bob', 'one', 'two')).toMatchObject({ ok: false, error: 'password_mismatch' });
    expect(service.userExists('bob')).toBe(false);
  });
});

describe('login and changePassword', () => {
  beforeEach(() => {
    signupAll(service, 'alice');
  });

  it('accepts the right password', () => {
    expect(service.login('alice', PASSWORD)).toEqual({ ok: true, username: 'Alice' });
  });

  it('rejects unknown users and wrong passwords', () => {
    expect(service.login('carol', PASSWORD)).toEqual({
      ok: false,
      error: 'invalid_username',
      message: "Username 'Carol' doesn't exist",
    });
    expect(service.login('alice', 'nope')).toMatchObject({ ok: false, error: 'invalid_password' });
  });

  it('replaces the password after checking the current one', () => {
    expect(service.changePassword('alice', 'nope', 'new-secret', 'new-secret')).toMatchObject({
      error: 'invalid_password',
    });
    expect(service.changePassword('alice', PASSWORD, 'new-secret', 'other')).toMatchObject({
      error: 'password_mismatch',
    });
    expect(service.changePassword('alice', PASSWORD, 'new-secret', 'new-secret')).toEqual({
      ok: true,
      username: 'Alice',
    });
    expect(service.login('alice', 'new-secret').ok).toBe(true);
    expect(service.login('alice', PASSWORD).ok).toBe(false);
  });
});

describe('deposit and withdraw', () => {
  beforeEach(() => {
    signupAll(service, 'alice');
  });

  it('credits the vault and records the entry', () => {
    const result = service.deposit('alice', {
      vault: 'main',
      amount: 10000,
      category: 'Salary',
      description: '  Monthly PAY ',
    });

    expect(result).toEqual({ ok: true, amount: 10000, message: 'Deposit successful', transactionIds: [1] });
    expect(service.getVaultBalance('alice', 'Main')).toBe(10000);
    expect(service.listTransactions('alice')).toEqual([
      {
        id: 1,
        vault: 'Main',
        type: 'deposit',
        amount: 10000,
        category: 'Salary',
        description: 'monthly pay',
        quantity: null,
        unit: null,
        date: NOW_STAMP,
        counterpartyUser: null,
        counterpartyVault: null,
      },
    ]);
  });

  it('debits with quantity, unit and a back-dated day', () => {
    service.deposit('alice', { vault: 'Main', amount: 10000, category: 'Salary', description: 'pay' });
    const result = service.withdraw('alice', {
      vault: 'Main',
      amount: 2500,
      category: 'Food',
      description: 'Rice',
      quantity: 2,
      unit: 'kg',
      date: '2024-01-03',
    });

    expect(result).toEqual({ ok: true, amount: 2500, message: 'Withdrawal successful', transactionIds: [2] });
    expect(service.getVaultBalance('alice', 'Main')).toBe(7500);
    expect(service.listTransactions('alice', { type: 'withdraw' })).toMatchObject([
      { amount: -2500, category: 'Food', description: 'rice', quantity: 2, unit: 'kg', date: '2024-01-03 09:03:07' },
    ]);
  });

  it('refuses to overdraw with both figures in the message', () => {
    service.deposit('alice', { vault: 'Main', amount: 1000, category: 'Salary', description: 'pay' });

    expect(service.withdraw('alice', { vault: 'Main', amount: 2500, category: 'Food', description: 'feast' })).toEqual({
      ok: false,
      error: 'insufficient_funds',
      message: 'Insufficient funds. Balance: 10.00, Required: 25.00',
    });
    expect(service.getVaultBalance('alice', 'Main')).toBe(1000);
  });

  it('validates amount before anything else', () => {
    expect(service.deposit('alice', { vault: 'Nowhere', amount: 0, category: 'Rent', description: '' })).toMatchObject({
      error: 'invalid_amount',
    });
    expect(service.deposit('alice', { vault: 'Main', amount: 12.5, category: 'Salary', description: 'x' })).toMatchObject({
      error: 'invalid_amount',
    });
  });

  it('keeps amounts and balances within the exact integer range', () => {
    const pay = { vault: 'Main', category: 'Salary', description: 'pay' };

    expect(service.deposit('alice', { ...pay, amount: 1e300 })).toEqual({
      ok: false,
      error: 'invalid_amount',
      message: 'Amount is too large',
    });
    expect(service.deposit('alice', { ...pay, amount: Number.MAX_SAFE_INTEGER })).toMatchObject({ ok: true });
    expect(service.deposit('alice', { ...pay, amount: 2 })).toEqual({
      ok: false,
      error: 'invalid_amount',
      message: "Vault 'Main' can't hold a balance that large",
    });
    expect(service.getVaultBalance('alice', 'Main')).toBe(Number.MAX_SAFE_INTEGER);

    expect(service.withdraw('alice', { ...pay, category: 'Food', amount: 1 })).toMatchObject({ ok: true });
    expect(service.getVaultBalance('alice', 'Main')).toBe(Number.MAX_SAFE_INTEGER - 1);
  });

  it('reports each field problem with its code', () => {
    const entry = { vault: 'Main', amount: 100, category: 'Food', description: 'bread' };

    expect(service.deposit('alice', { ...entry, vault: 'nowhere' })).toEqual({
      ok: false,
      error: 'invalid_vault',
      message: "Vault 'Nowhere' does not exist",
    });
    expect(service.deposit('alice', { ...entry, category: ' ' })).toEqual({
      ok: false,
      error: 'validation_error',
      message: 'Category is required',
    });
    expect(service.deposit('alice', { ...entry, category: 'Rent' })).toMatchObject({ error: 'invalid_category' });
    expect(service.deposit('alice', { ...entry, description: '' })).toMatchObject({ error: 'validation_error' });
    expect(service.deposit('alice', { ...entry, quantity: 2 })).toEqual({
      ok: false,
      error: 'validation_error',
      message: 'Unit is required when quantity is specified',
    });
    expect(service.deposit('alice', { ...entry, quantity: 2, unit: 'boxes' })).toMatchObject({
      error: 'invalid_unit',
    });
    expect(service.deposit('alice', { ...entry, date: 'soon' })).toEqual({
      ok: false,
      error: 'validation_error',
      message: 'Date must be in YYYY-MM-DD format',
    });
    expect(service.listTransactions('alice')).toEqual([]);
  });
});

describe('transfer', () => {
  beforeEach(() => {
    signupAll(service, 'alice', 'bob');
    service.deposit('alice', { vault: 'Main', amount: 10000, category: 'Salary', description: 'pay' });
    service.addVault('alice', 'savings');
  });

  it('moves money between own vaults with two legs', () => {
    const result = service.transfer('alice', { fromVault: 'Main', toUser: 'alice', toVault: 'savings', amount: 4000 });

    expect(result).toEqual({ ok: true, amount: 4000, message: 'Transfer successful', transactionIds: [2, 3] });
    expect(service.listVaults('alice')).toEqual([
      { name: 'Main', balance: 6000 },
      { name: 'Savings', balance: 4000 },
    ]);
    expect(service.listTransactions('alice').slice(0, 2)).toMatchObject([
      { id: 3, vault: 'Savings', type: 'transfer', amount: 4000, category: 'Others', description: 'transferring money', counterpartyUser: 'Alice', counterpartyVault: 'Main' },
      { id: 2, vault: 'Main', type: 'transfer', amount: -4000, category: 'Others', description: 'transferring money', counterpartyUser: 'Alice', counterpartyVault: 'Savings' },
    ]);
  });

  it('refuses a credit that would overflow the destination vault', () => {
    service.deposit('bob', { vault: 'Main', amount: Number.MAX_SAFE_INTEGER - 5000, category: 'Salary', description: 'pay' });

    expect(service.transfer('alice', { fromVault: 'Main', toUser: 'bob', toVault: 'Main', amount: 6000 })).toEqual({
      ok: false,
      error: 'invalid_amount',
      message: "Vault 'Main' can't hold a balance that large",
    });
    expect(service.getVaultBalance('alice', 'Main')).toBe(10000);
  });

  it('credits another user and keeps the given description', () => {
    service.transfer('alice', { fromVault: 'Main', toUser: 'Bob', toVault: 'Main', amount: 1500, description: 'Rent Share' });

    expect(service.getTotalBalance('alice')).toBe(8500);
    expect(service.getTotalBalance('bob')).toBe(1500);
    expect(service.listTransactions('bob')).toMatchObject([
      { vault: 'Main', amount: 1500, description: 'rent share', counterpartyUser: 'Alice', counterpartyVault: 'Main' },
    ]);
  });

  it('rejects bad destinations', () => {
    const base = { fromVault: 'Main', toUser: 'alice', toVault: 'Main', amount: 100 };

    expect(service.transfer('alice', base)).toEqual({
      ok: false,
      error: 'same_vault_transfer',
      message: 'Cannot transfer to the same vault',
    });
    expect(service.transfer('alice', { ...base, toUser: 'zed' })).toEqual({
      ok: false,
      error: 'invalid_user',
      message: "User 'Zed' does not exist",
    });
    expect(service.transfer('alice', { ...base, toUser: 'bob', toVault: 'Vacation' })).toEqual({
      ok: false,
      error: 'invalid_vault',
      message: "Vault 'Vacation' does not exist for user 'Bob'",
    });
  });

  it('refuses to overdraw the source vault', () => {
    expect(service.transfer('alice', { fromVault: 'Savings', toUser: 'bob', toVault: 'Main', amount: 1 })).toEqual({
      ok: false,
      error: 'insufficient_funds',
      message: 'Insufficient funds. Balance: 0.00, Required: 0.01',
    });
  });
});

describe('loan', () => {
  beforeEach(() => {
    signupAll(service, 'alice');
    service.deposit('alice', { vault: 'Main', amount: 5000, category: 'Salary', description: 'pay' });
  });

  it('creates an unknown borrower as a passwordless party and accumulates the debt', () => {
    const first = service.loan('alice', { fromVault: 'Main', toUser: 'carol', amount: 1500 });
    service.loan('alice', { fromVault: 'Main', toUser: 'Carol', amount: 500 });

    expect(first).toEqual({ ok: true, amount: 1500, message: 'Loan recorded', transactionIds: [2, 3] });
    expect(service.userExists('carol')).toBe(true);
    expect(service.login('carol', '')).toMatchObject({ ok: false, error: 'invalid_password' });
    expect(service.getVaultBalance('carol', 'Main')).toBe(2000);
    expect(service.listLoans('alice')).toEqual([{ fromUser: 'Alice', toUser: 'Carol', amount: 2000 }]);
    expect(service.listLoans('carol')).toEqual([{ fromUser: 'Alice', toUser: 'Carol', amount: 2000 }]);
    expect(service.listTransactions('alice', { type: 'loan' })[0]).toMatchObject({
      amount: -500,
      description: 'lending money',
    });
  });

  it('leaves no placeholder party behind when the loan is refused', () => {
    expect(service.loan('alice', { fromVault: 'Main', toUser: 'dave', amount: 9000 })).toMatchObject({
      ok: false,
      error: 'insufficient_funds',
    });
    expect(service.userExists('dave')).toBe(false);
  });

  it('refuses to lend to yourself', () => {
    expect(service.loan('alice', { fromVault: 'Main', toUser: ' ALICE', amount: 100 })).toEqual({
      ok: false,
      error: 'validation_error',
      message: 'Cannot lend to yourself',
    });
  });
});

describe('vaults', () => {
  beforeEach(() => {
    signupAll(service, 'alice', 'bob');
  });

  it('adds vaults once per name', () => {
    expect(service.addVault('alice', 'rainy day')).toEqual({ ok: true, vault: { name: 'Rainy day', balance: 0 } });
    expect(service.addVault('alice', 'RAINY DAY')).toMatchObject({ ok: false, error: 'vault_exists' });
    expect(service.addVault('alice', ' ')).toMatchObject({ ok: false, error: 'validation_error' });
    expect(service.addVault('bob', 'rainy day').ok).toBe(true);
    expect(service.listVaultNames('alice')).toEqual(['Main', 'Rainy day']);
  });

  it('folds a removed vault into Main', () => {
    service.deposit('alice', { vault: 'Main', amount: 6000, category: 'Salary', description: 'pay' });
    service.addVault('alice', 'savings');
    service.transfer('alice', { fromVault: 'Main', toUser: 'alice', toVault: 'Savings', amount: 4000 });
    service.loan('alice', { fromVault: 'Savings', toUser: 'bob', amount: 1000 });

    expect(service.removeVault('alice', 'savings')).toEqual({ ok: true, vault: { name: 'Main', balance: 5000 } });
    expect(service.listVaults('alice')).toEqual([{ name: 'Main', balance: 5000 }]);
    expect(service.listTransactions('alice').every((t) => t.vault === 'Main')).toBe(true);
    expect(service.listTransactions('alice')).toHaveLength(4);
    expect(service.listLoans('alice')).toEqual([{ fromUser: 'Alice', toUser: 'Bob', amount: 1000 }]);
  });

  it('protects Main and reports unknown vaults', () => {
    expect(service.removeVault('alice', 'main')).toEqual({
      ok: false,
      error: 'protected_vault',
      message: "The Main vault can't be removed",
    });
    expect(service.removeVault('alice', 'ghost')).toMatchObject({ ok: false, error: 'invalid_vault' });
  });
});

describe('summary and export', () => {
  beforeEach(() => {
    signupAll(service, 'alice');
    service.deposit('alice', { vault: 'Main', amount: 10000, category: 'Salary', description: 'pay' });
    service.withdraw('alice', { vault: 'Main', amount: 2500, category: 'Food', description: 'groceries' });
  });

  it('aggregates totals per category and flows per vault', () => {
    const summary = service.summary('alice');

    expect(summary.username).toBe('Alice');
    expect(summary.totalBalance).toBe(7500);
    expect(summary.vaults).toEqual([{ name: 'Main', balance: 7500 }]);
    expect(summary.categoryTotals).toEqual([
      { category: 'Food', deposited: 0, withdrawn: 2500 },
      { category: 'Salary', deposited: 10000, withdrawn: 0 },
    ]);
    expect(summary.flows).toEqual([
      { vault: 'Main', category: 'Salary', direction: 'in', amount: 10000 },
      { vault: 'Main', category: 'Food', direction: 'out', amount: 2500 },
    ]);
    expect(summary.loans).toEqual([]);
  });

  it('returns empty data for an unknown user', () => {
    expect(service.exportData('ghost')).toEqual({ username: 'Ghost', transactions: [], vaults: [], loans: [] });
  });

  it('collects everything the workbook needs', () => {
    const data = service.exportData('alice');
    expect(data.transactions.map((t) => t.amount)).toEqual([-2500, 10000]);
    expect(data.vaults).toEqual([{ name: 'Main', balance: 7500 }]);
  });
});
