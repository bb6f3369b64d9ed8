/**
 * Business logic layer.
 *
 * Validates every request against the vault/category/unit tables, computes
 * the balance changes and persists them through LedgerRepository. Each
 * operation that moves money commits its balance updates and transaction
 * rows in a single SQLite transaction.
 */
import type { LedgerRepository, TransactionFilter } from './repository.js';
import type {
  CategoryTotal,
  LoanView,
  MoneyFlow,
  TransactionType,
  TransactionView,
  UserRow,
  VaultRow,
} from './db.js';
import { hashPassword, verifyPassword, DEFAULT_HASH_ITERATIONS } from './auth.js';
import { fitsBalance, formatMinor, normalizeName, resolveTimestamp } from './format.js';
import {
  fail,
  type AuthResult,
  type Failure,
  type TransactionError,
  type TransactionResult,
  type VaultResult,
  type VaultSummary,
} from './results.js';

/** Category recorded on both legs of a transfer or loan */
export const TRANSFER_CATEGORY = 'Others';

export interface LedgerServiceOptions {
  defaultVaultName?: string;
  hashIterations?: number;
  now?: () => Date;
}

export interface EntryInput {
  vault: string;
  /** minor units, > 0 */
  amount: number;
  category?: string | null;
  description?: string | null;
  quantity?: number | null;
  unit?: string | null;
  date?: string | null;
}

export interface TransferInput {
  fromVault: string;
  toUser: string;
  toVault: string;
  amount: number;
  description?: string | null;
  date?: string | null;
}

export interface LoanInput {
  fromVault: string;
  toUser: string;
  /** defaults to the counterpart's default vault */
  toVault?: string | null;
  amount: number;
  description?: string | null;
  date?: string | null;
}

export interface LedgerSummary {
  username: string;
  totalBalance: number;
  vaults: VaultSummary[];
  categoryTotals: CategoryTotal[];
  flows: MoneyFlow[];
  loans: LoanView[];
}

export interface ExportData {
  username: string;
  transactions: TransactionView[];
  vaults: VaultSummary[];
  loans: LoanView[];
}

interface ResolvedEntry {
  vault: VaultRow;
  amount: number;
  categoryId: number;
  description: string;
  quantity: number | null;
  unitId: number | null;
  date: string;
}

type Checked<T> = { ok: true; value: T } | Failure<TransactionError>;

class RefusedLoan extends Error {
  constructor(readonly result: Failure<TransactionError>) {
    super(result.message);
  }
}

function toSummary(vault: VaultRow): VaultSummary {
  return { name: vault.vault_name, balance: vault.balance };
}

export class LedgerService {
  readonly defaultVaultName: string;
  private readonly hashIterations: number;
  private readonly now: () => Date;

  constructor(
    private readonly repo: LedgerRepository,
    options: LedgerServiceOptions = {},
  ) {
    this.defaultVaultName = normalizeName(options.defaultVaultName ?? 'Main');
    this.hashIterations = options.hashIterations ?? DEFAULT_HASH_ITERATIONS;
    this.now = options.now ?? (() => new Date());
  }

  // --- Authentication ---

  signup(username: string, password: string, confirmPassword: string): AuthResult {
    const name = normalizeName(username);
    if (name === '') {
      return fail('invalid_username', 'Username is required');
    }
    if (this.repo.findUser(name)) {
      return fail('username_exists', `Username '${name}' already exists`);
    }
    if (password === '') {
      return fail('invalid_password', 'Password is required');
    }
    if (password !== confirmPassword) {
      return fail('password_mismatch', 'Passwords must match');
    }

    this.repo.insertUser(name, hashPassword(password, this.hashIterations), this.defaultVaultName);
    return { ok: true, username: name };
  }

  login(username: string, password: string): AuthResult {
    const name = normalizeName(username);
    const user = this.repo.findUser(name);
    if (!user) {
      return fail('invalid_username', `Username '${name}' doesn't exist`);
    }
    if (!verifyPassword(password, user.password_hash)) {
      return fail('invalid_password', 'Incorrect password');
    }
    return { ok: true, username: user.username };
  }

  changePassword(
    username: string,
    currentPassword: string,
    newPassword: string,
    confirmPassword: string,
  ): AuthResult {
    const user = this.repo.findUser(normalizeName(username));
    if (!user) {
      return fail('invalid_username', `Username '${normalizeName(username)}' doesn't exist`);
    }
    if (!verifyPassword(currentPassword, user.password_hash)) {
      return fail('invalid_password', 'Incorrect password');
    }
    if (newPassword === '') {
      return fail('invalid_password', 'Password is required');
    }
    if (newPassword !== confirmPassword) {
      return fail('password_mismatch', 'Passwords must match');
    }
    this.repo.updatePasswordHash(user.user_id, hashPassword(newPassword, this.hashIterations));
    return { ok: true, username: user.username };
  }

  // --- Users & vaults ---

  listUsernames(): string[] {
    return this.repo.listUsernames();
  }

  userExists(username: string): boolean {
    return this.repo.findUser(normalizeName(username)) !== undefined;
  }

  vaultExists(username: string, vaultName: string): boolean {
    const user = this.repo.findUser(normalizeName(username));
    return user !== undefined && this.repo.findVault(user.user_id, normalizeName(vaultName)) !== undefined;
  }

  listVaults(username: string): VaultSummary[] {
    const user = this.repo.findUser(normalizeName(username));
    if (!user) return [];
    return this.repo.listVaults(user.user_id).map(toSummary);
  }

  listVaultNames(username: string): string[] {
    return this.listVaults(username).map((v) => v.name);
  }

  getTotalBalance(username: string): number {
    const user = this.repo.findUser(normalizeName(username));
    return user ? this.repo.totalBalance(user.user_id) : 0;
  }

  getVaultBalance(username: string, vaultName: string): number {
    const user = this.repo.findUser(normalizeName(username));
    if (!user) return 0;
    return this.repo.findVault(user.user_id, normalizeName(vaultName))?.balance ?? 0;
  }

  addVault(username: string, vaultName: string): VaultResult {
    const user = this.repo.findUser(normalizeName(username));
    const name = normalizeName(vaultName);
    if (!user) {
      return fail('invalid_vault', `Username '${normalizeName(username)}' doesn't exist`);
    }
    if (name === '') {
      return fail('validation_error', "Vault name can't be empty");
    }
    if (this.repo.findVault(user.user_id, name)) {
      return fail('vault_exists', `Vault '${name}' already exists in your vaults`);
    }
    this.repo.insertVault(user.user_id, name);
    return { ok: true, vault: { name, balance: 0 } };
  }

  /**
   * Remove a vault. Its balance, history and loans move into the default
   * vault, which itself can never be removed.
   */
  removeVault(username: string, vaultName: string): VaultResult {
    const user = this.repo.findUser(normalizeName(username));
    const name = normalizeName(vaultName);
    if (name === this.defaultVaultName) {
      return fail('protected_vault', `The ${this.defaultVaultName} vault can't be removed`);
    }
    const vault = user ? this.repo.findVault(user.user_id, name) : undefined;
    const main = user ? this.repo.findVault(user.user_id, this.defaultVaultName) : undefined;
    if (!vault || !main) {
      return fail('invalid_vault', `Vault '${name}' does not exist`);
    }
    if (!fitsBalance(main.balance, vault.balance)) {
      return fail('validation_error', `${main.vault_name} can't absorb the balance of '${name}'`);
    }

    this.repo.transaction(() => {
      this.repo.adjustBalance(main.vault_id, vault.balance);
      this.repo.moveVaultContents(vault.vault_id, main.vault_id);
      this.repo.deleteVault(vault.vault_id);
    });

    return { ok: true, vault: { name: main.vault_name, balance: main.balance + vault.balance } };
  }

  listCategories(): string[] {
    return this.repo.listCategoryNames();
  }

  listUnits(): string[] {
    return this.repo.listUnitNames();
  }

  // --- Transactions ---

  deposit(username: string, input: EntryInput): TransactionResult {
    const checked = this.checkEntry(username, input);
    if (!checked.ok) return checked;
    const entry = checked.value;

    const overflow = this.checkCredit(entry.vault, entry.amount);
    if (overflow) return overflow;

    const id = this.repo.transaction(() => {
      this.repo.adjustBalance(entry.vault.vault_id, entry.amount);
      return this.repo.insertTransaction({
        vaultId: entry.vault.vault_id,
        type: 'deposit',
        amount: entry.amount,
        categoryId: entry.categoryId,
        description: entry.description,
        quantity: entry.quantity,
        unitId: entry.unitId,
        date: entry.date,
        counterpartyVaultId: null,
      });
    });

    return { ok: true, amount: entry.amount, message: 'Deposit successful', transactionIds: [id] };
  }

  withdraw(username: string, input: EntryInput): TransactionResult {
    const checked = this.checkEntry(username, input);
    if (!checked.ok) return checked;
    const entry = checked.value;

    if (entry.vault.balance < entry.amount) {
      return this.insufficientFunds(entry.vault.balance, entry.amount);
    }

    const id = this.repo.transaction(() => {
      this.repo.adjustBalance(entry.vault.vault_id, -entry.amount);
      return this.repo.insertTransaction({
        vaultId: entry.vault.vault_id,
        type: 'withdraw',
        amount: -entry.amount,
        categoryId: entry.categoryId,
        description: entry.description,
        quantity: entry.quantity,
        unitId: entry.unitId,
        date: entry.date,
        counterpartyVaultId: null,
      });
    });

    return { ok: true, amount: entry.amount, message: 'Withdrawal successful', transactionIds: [id] };
  }

  transfer(username: string, input: TransferInput): TransactionResult {
    return this.moveMoney(username, input, 'transfer');
  }

  /**
   * Lend money: a transfer of type loan plus an accumulating loan record.
   * A counterpart that isn't registered is created as a passwordless party.
   */
  loan(username: string, input: LoanInput): TransactionResult {
    const lender = normalizeName(username);
    const borrower = normalizeName(input.toUser);
    if (borrower === '') {
      return fail('validation_error', 'Destination user is required');
    }
    if (borrower === lender) {
      return fail('validation_error', 'Cannot lend to yourself');
    }

    const toVault = input.toVault && input.toVault.trim() !== '' ? input.toVault : this.defaultVaultName;

    try {
      return this.repo.transaction((): TransactionResult => {
        if (!this.repo.findUser(borrower)) {
          this.repo.insertUser(borrower, null, this.defaultVaultName);
        }
        const result = this.moveMoney(lender, { ...input, toUser: borrower, toVault }, 'loan');
        if (!result.ok) {
          // unwinds the placeholder party
          throw new RefusedLoan(result);
        }
        const from = this.requireVault(lender, input.fromVault);
        const to = this.requireVault(borrower, toVault);
        this.repo.upsertLoan(from.vault_id, to.vault_id, result.amount);
        return { ...result, message: 'Loan recorded' };
      });
    } catch (err) {
      if (err instanceof RefusedLoan) return err.result;
      throw err;
    }
  }

  listTransactions(username: string, filter: TransactionFilter = {}): TransactionView[] {
    const user = this.repo.findUser(normalizeName(username));
    if (!user) return [];
    return this.repo.listTransactions(user.user_id, {
      ...filter,
      vault: filter.vault ? normalizeName(filter.vault) : undefined,
    });
  }

  listLoans(username: string): LoanView[] {
    return this.repo.listLoans(normalizeName(username));
  }

  summary(username: string): LedgerSummary {
    const user = this.repo.findUser(normalizeName(username));
    if (!user) {
      return { username: normalizeName(username), totalBalance: 0, vaults: [], categoryTotals: [], flows: [], loans: [] };
    }
    return {
      username: user.username,
      totalBalance: this.repo.totalBalance(user.user_id),
      vaults: this.repo.listVaults(user.user_id).map(toSummary),
      categoryTotals: this.repo.categoryTotals(user.user_id),
      flows: this.repo.moneyFlows(user.user_id),
      loans: this.repo.listLoans(user.username),
    };
  }

  exportData(username: string): ExportData {
    const user = this.repo.findUser(normalizeName(username));
    if (!user) {
      return { username: normalizeName(username), transactions: [], vaults: [], loans: [] };
    }
    return {
      username: user.username,
      transactions: this.repo.listTransactions(user.user_id),
      vaults: this.repo.listVaults(user.user_id).map(toSummary),
      loans: this.repo.listLoans(user.username),
    };
  }

  /** Run several operations atomically (used by bulk processing). */
  runAtomically<T>(fn: () => T): T {
    return this.repo.transaction(fn);
  }

  // --- Internals ---

  private findUserRow(username: string): UserRow | undefined {
    return this.repo.findUser(normalizeName(username));
  }

  private requireVault(username: string, vaultName: string): VaultRow {
    const user = this.findUserRow(username);
    const vault = user ? this.repo.findVault(user.user_id, normalizeName(vaultName)) : undefined;
    if (!vault) {
      throw new Error(`Vault '${vaultName}' vanished during an operation`);
    }
    return vault;
  }

  private insufficientFunds(balance: number, required: number): Failure<TransactionError> {
    return fail(
      'insufficient_funds',
      `Insufficient funds. Balance: ${formatMinor(balance)}, Required: ${formatMinor(required)}`,
    );
  }

  private checkAmount(amount: number): Failure<TransactionError> | null {
    if (!Number.isInteger(amount) || amount <= 0) {
      return fail('invalid_amount', 'Amount must be positive');
    }
    if (!Number.isSafeInteger(amount)) {
      return fail('invalid_amount', 'Amount is too large');
    }
    return null;
  }

  private checkCredit(vault: VaultRow, amount: number): Failure<TransactionError> | null {
    if (!fitsBalance(vault.balance, amount)) {
      return fail('invalid_amount', `Vault '${vault.vault_name}' can't hold a balance that large`);
    }
    return null;
  }

  private findOwnVault(username: string, vaultName: string): Checked<VaultRow> {
    const user = this.findUserRow(username);
    const name = normalizeName(vaultName);
    if (!user) {
      return fail('invalid_user', `User '${normalizeName(username)}' does not exist`);
    }
    if (name === '') {
      return fail('validation_error', 'Vault is required');
    }
    const vault = this.repo.findVault(user.user_id, name);
    if (!vault) {
      return fail('invalid_vault', `Vault '${name}' does not exist`);
    }
    return { ok: true, value: vault };
  }

  private checkEntry(username: string, input: EntryInput): Checked<ResolvedEntry> {
    const amountError = this.checkAmount(input.amount);
    if (amountError) return amountError;

    const vault = this.findOwnVault(username, input.vault);
    if (!vault.ok) return vault;

    const category = input.category?.trim() ?? '';
    if (category === '') {
      return fail('validation_error', 'Category is required');
    }
    const categoryId = this.repo.findCategoryId(category);
    if (categoryId === undefined) {
      return fail('invalid_category', `Category '${category}' does not exist`);
    }

    const description = input.description?.trim().toLowerCase() ?? '';
    if (description === '') {
      return fail('validation_error', 'Description is required');
    }

    const quantity = input.quantity ?? null;
    const unit = input.unit?.trim() ? input.unit.trim() : null;
    if (quantity !== null && (!Number.isFinite(quantity) || quantity <= 0)) {
      return fail('validation_error', 'Quantity must be positive');
    }
    if (quantity !== null && unit === null) {
      return fail('validation_error', 'Unit is required when quantity is specified');
    }
    let unitId: number | null = null;
    if (unit !== null) {
      const found = this.repo.findUnitId(unit);
      if (found === undefined) {
        return fail('invalid_unit', `Unit '${unit}' does not exist`);
      }
      unitId = found;
    }

    const date = resolveTimestamp(input.date, this.now());
    if (date === null) {
      return fail('validation_error', 'Date must be in YYYY-MM-DD format');
    }

    return {
      ok: true,
      value: { vault: vault.value, amount: input.amount, categoryId, description, quantity, unitId, date },
    };
  }

  private moveMoney(
    username: string,
    input: TransferInput,
    type: Extract<TransactionType, 'transfer' | 'loan'>,
  ): TransactionResult {
    const amountError = this.checkAmount(input.amount);
    if (amountError) return amountError;

    const source = this.findOwnVault(username, input.fromVault);
    if (!source.ok) return source;

    const toUserName = normalizeName(input.toUser);
    const toVaultName = normalizeName(input.toVault);
    if (toUserName === '') {
      return fail('validation_error', 'Destination user is required');
    }
    const toUser = this.repo.findUser(toUserName);
    if (!toUser) {
      return fail('invalid_user', `User '${toUserName}' does not exist`);
    }
    if (toVaultName === '') {
      return fail('validation_error', 'Destination vault is required');
    }
    const target = this.repo.findVault(toUser.user_id, toVaultName);
    if (!target) {
      return fail('invalid_vault', `Vault '${toVaultName}' does not exist for user '${toUserName}'`);
    }
    if (target.vault_id === source.value.vault_id) {
      return fail('same_vault_transfer', 'Cannot transfer to the same vault');
    }
    if (source.value.balance < input.amount) {
      return this.insufficientFunds(source.value.balance, input.amount);
    }
    const overflow = this.checkCredit(target, input.amount);
    if (overflow) return overflow;

    const date = resolveTimestamp(input.date, this.now());
    if (date === null) {
      return fail('validation_error', 'Date must be in YYYY-MM-DD format');
    }

    const categoryId = this.repo.findCategoryId(TRANSFER_CATEGORY) ?? null;
    const fallback = type === 'loan' ? 'lending money' : 'transferring money';
    const description = input.description?.trim() ? input.description.trim().toLowerCase() : fallback;

    const ids = this.repo.transaction(() => {
      this.repo.adjustBalance(source.value.vault_id, -input.amount);
      this.repo.adjustBalance(target.vault_id, input.amount);
      const debit = this.repo.insertTransaction({
        vaultId: source.value.vault_id,
        type,
        amount: -input.amount,
        categoryId,
        description,
        quantity: null,
        unitId: null,
        date,
        counterpartyVaultId: target.vault_id,
      });
      const credit = this.repo.insertTransaction({
        vaultId: target.vault_id,
        type,
        amount: input.amount,
        categoryId,
        description,
        quantity: null,
        unitId: null,
        date,
        counterpartyVaultId: source.value.vault_id,
      });
      return [debit, credit];
    });

    return { ok: true, amount: input.amount, message: 'Transfer successful', transactionIds: ids };
  }
}
