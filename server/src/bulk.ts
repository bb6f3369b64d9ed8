/**
 * Bulk transaction entry: validate a whole grid of rows against running
 * balances, then commit it in one go.
 */
import type { EntryInput, LedgerService } from './ledger.js';
import type { TransactionResult, VaultSummary } from './results.js';
import { fitsBalance, formatMinor, isDateOnly, normalizeName } from './format.js';

export const BULK_TYPES = ['deposit', 'withdraw', 'transfer'] as const;
export type BulkType = (typeof BULK_TYPES)[number];

export interface BulkRow {
  rowNumber: number;
  type: string;
  vault: string;
  /** minor units */
  amount: number | null;
  category?: string | null;
  description: string;
  quantity?: number | null;
  unit?: string | null;
  toUser?: string | null;
  toVault?: string | null;
  /** YYYY-MM-DD */
  date?: string | null;
}

export type BulkErrorCode =
  | 'empty_batch'
  | 'missing_required_field'
  | 'invalid_type'
  | 'invalid_vault'
  | 'invalid_amount'
  | 'invalid_quantity'
  | 'invalid_category'
  | 'invalid_unit'
  | 'invalid_date'
  | 'invalid_user'
  | 'same_vault_transfer'
  | 'insufficient_funds';

export interface BulkRowError {
  rowNumber: number;
  field: string;
  code: BulkErrorCode;
  message: string;
}

export interface BulkValidation {
  valid: boolean;
  errors: BulkRowError[];
  validCount: number;
  totalCount: number;
  summary: string;
}

/** What the validator needs to know about the ledger. */
export interface BulkLookup {
  listVaults(username: string): VaultSummary[];
  vaultExists(username: string, vaultName: string): boolean;
  getVaultBalance(username: string, vaultName: string): number;
  userExists(username: string): boolean;
  listCategories(): string[];
  listUnits(): string[];
}

function blank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === '';
}

export function isEmptyRow(row: BulkRow): boolean {
  return blank(row.type) && blank(row.vault) && row.amount === null && blank(row.category) && blank(row.description);
}

function isBulkType(value: string): value is BulkType {
  return BULK_TYPES.some((t) => t === value);
}

export class BulkValidator {
  constructor(private readonly lookup: BulkLookup) {}

  validate(rows: BulkRow[], username: string): BulkValidation {
    const user = normalizeName(username);
    const filled = rows.filter((row) => !isEmptyRow(row));

    if (filled.length === 0) {
      return {
        valid: false,
        errors: [{ rowNumber: 0, field: 'batch', code: 'empty_batch', message: 'No transactions to process' }],
        validCount: 0,
        totalCount: 0,
        summary: 'Found 1 errors in 0 transactions',
      };
    }

    const balances = new Map(this.lookup.listVaults(user).map((v) => [v.name, v.balance]));
    const categories = new Set(this.lookup.listCategories());
    const units = new Set(this.lookup.listUnits());
    const errors: BulkRowError[] = [];
    const badRows = new Set<number>();

    for (const row of filled) {
      const rowErrors = this.checkRow(row, user, balances, categories, units);
      if (rowErrors.length === 0) {
        this.applyToBalances(row, user, balances);
      } else {
        errors.push(...rowErrors);
        badRows.add(row.rowNumber);
      }
    }

    const valid = errors.length === 0;
    return {
      valid,
      errors,
      validCount: filled.length - badRows.size,
      totalCount: filled.length,
      summary: valid
        ? `All ${filled.length} transactions are valid`
        : `Found ${errors.length} errors in ${filled.length} transactions`,
    };
  }

  private checkRow(
    row: BulkRow,
    user: string,
    balances: Map<string, number>,
    categories: Set<string>,
    units: Set<string>,
  ): BulkRowError[] {
    const errors: BulkRowError[] = [];
    const push = (field: string, code: BulkErrorCode, message: string) =>
      errors.push({ rowNumber: row.rowNumber, field, code, message });

    const type = row.type.trim().toLowerCase();
    if (type === '') {
      push('type', 'missing_required_field', 'Transaction type is required');
      return errors;
    }
    if (!isBulkType(type)) {
      push('type', 'invalid_type', `Transaction type '${row.type.trim()}' is not one of ${BULK_TYPES.join(', ')}`);
      return errors;
    }

    const vault = normalizeName(row.vault);
    if (vault === '') {
      push('vault', 'missing_required_field', 'Vault is required');
    } else if (!this.lookup.vaultExists(user, vault)) {
      push('vault', 'invalid_vault', `Vault '${vault}' does not exist`);
    }

    if (row.amount === null) {
      push('amount', 'missing_required_field', 'Amount is required');
    } else if (!Number.isInteger(row.amount) || row.amount <= 0) {
      push('amount', 'invalid_amount', 'Amount must be positive');
    } else if (!Number.isSafeInteger(row.amount)) {
      push('amount', 'invalid_amount', 'Amount is too large');
    }

    if (blank(row.description)) {
      push('description', 'missing_required_field', 'Description is required');
    }

    const date = row.date?.trim() ?? '';
    if (date !== '' && !isDateOnly(date)) {
      push('date', 'invalid_date', 'Date must be in YYYY-MM-DD format');
    }

    if (type === 'transfer') {
      const toUser = normalizeName(row.toUser ?? '');
      const toVault = normalizeName(row.toVault ?? '');
      if (toUser === '') {
        push('toUser', 'missing_required_field', 'Destination user is required');
      } else if (!this.lookup.userExists(toUser)) {
        push('toUser', 'invalid_user', `User '${toUser}' does not exist`);
      }
      if (toVault === '') {
        push('toVault', 'missing_required_field', 'Destination vault is required');
      } else if (toUser !== '' && !this.lookup.vaultExists(toUser, toVault)) {
        push('toVault', 'invalid_vault', `Vault '${toVault}' does not exist for user '${toUser}'`);
      }
      if (vault !== '' && vault === toVault && toUser === user) {
        push('toVault', 'same_vault_transfer', 'Cannot transfer to the same vault');
      }
    } else {
      const category = row.category?.trim() ?? '';
      if (category === '') {
        push('category', 'missing_required_field', 'Category is required');
      } else if (!categories.has(category)) {
        push('category', 'invalid_category', `Category '${category}' does not exist`);
      }

      const quantity = row.quantity ?? null;
      if (quantity !== null && (!Number.isFinite(quantity) || quantity <= 0)) {
        push('quantity', 'invalid_quantity', 'Quantity must be positive');
      }

      const unit = row.unit?.trim() ?? '';
      if (quantity !== null && unit === '') {
        push('unit', 'missing_required_field', 'Unit is required when quantity is specified');
      } else if (unit !== '' && !units.has(unit)) {
        push('unit', 'invalid_unit', `Unit '${unit}' does not exist`);
      }
    }

    if (type !== 'deposit' && vault !== '' && row.amount !== null && row.amount > 0) {
      const balance = balances.get(vault) ?? 0;
      if (balance < row.amount) {
        push(
          'amount',
          'insufficient_funds',
          `Insufficient funds. Balance: ${formatMinor(balance)}, Required: ${formatMinor(row.amount)}`,
        );
      }
    }

    if (errors.length > 0 || row.amount === null) return errors;

    // the credited vault must stay within the exact integer range
    const credited = this.creditedVault(row, type, user);
    if (credited) {
      const balance = credited.user === user
        ? (balances.get(credited.vault) ?? 0)
        : this.lookup.getVaultBalance(credited.user, credited.vault);
      if (!fitsBalance(balance, row.amount)) {
        push('amount', 'invalid_amount', `Vault '${credited.vault}' can't hold a balance that large`);
      }
    }

    return errors;
  }

  private creditedVault(row: BulkRow, type: BulkType, user: string): { user: string; vault: string } | null {
    if (type === 'deposit') return { user, vault: normalizeName(row.vault) };
    if (type === 'transfer') return { user: normalizeName(row.toUser ?? ''), vault: normalizeName(row.toVault ?? '') };
    return null;
  }

  private applyToBalances(row: BulkRow, user: string, balances: Map<string, number>): void {
    if (row.amount === null) return;
    const vault = normalizeName(row.vault);
    const current = balances.get(vault) ?? 0;

    switch (row.type.trim().toLowerCase()) {
      case 'deposit':
        balances.set(vault, current + row.amount);
        break;
      case 'withdraw':
        balances.set(vault, current - row.amount);
        break;
      case 'transfer': {
        balances.set(vault, current - row.amount);
        // only our own vaults are tracked
        if (normalizeName(row.toUser ?? '') === user) {
          const toVault = normalizeName(row.toVault ?? '');
          balances.set(toVault, (balances.get(toVault) ?? 0) + row.amount);
        }
        break;
      }
    }
  }
}

function runRow(service: LedgerService, username: string, row: BulkRow, amount: number): TransactionResult {
  const type = row.type.trim().toLowerCase();
  if (type === 'transfer') {
    return service.transfer(username, {
      fromVault: row.vault,
      toUser: row.toUser ?? '',
      toVault: row.toVault ?? '',
      amount,
      description: row.description,
      date: row.date,
    });
  }

  const entry: EntryInput = {
    vault: row.vault,
    amount,
    category: row.category,
    description: row.description,
    quantity: row.quantity,
    unit: row.unit,
    date: row.date,
  };
  return type === 'deposit' ? service.deposit(username, entry) : service.withdraw(username, entry);
}

export type BatchOutcome =
  | { ok: true; successful: number; failed: number }
  | { ok: false; validation: BulkValidation };

/**
 * Validate, then run every row inside one database transaction.
 * An invalid batch is refused before anything is written.
 */
export function processBatch(service: LedgerService, username: string, rows: BulkRow[]): BatchOutcome {
  const validation = new BulkValidator(service).validate(rows, username);
  if (!validation.valid) {
    return { ok: false, validation };
  }

  return service.runAtomically(() => {
    let successful = 0;
    let failed = 0;

    for (const row of rows) {
      if (isEmptyRow(row) || row.amount === null) continue;

      const result = runRow(service, username, row, row.amount);

      if (result.ok) {
        successful++;
      } else {
        console.warn(`[Bulk] Row ${row.rowNumber} failed: ${result.message}`);
        failed++;
      }
    }

    return { ok: true, successful, failed };
  });
}
