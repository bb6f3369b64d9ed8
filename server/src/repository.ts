/**
 * Data layer: every SQL statement the ledger runs lives here.
 *
 * Methods take already-normalised names and ids; rule checking belongs to
 * LedgerService.
 */
import type {
  Db,
  UserRow,
  VaultRow,
  TransactionInsert,
  TransactionView,
  TransactionType,
  LoanView,
  CategoryTotal,
  MoneyFlow,
} from './db.js';

export interface TransactionFilter {
  vault?: string;
  /** YYYY-MM */
  month?: string;
  type?: TransactionType;
}

interface FlowRow {
  vault: string;
  category: string;
  direction: 'in' | 'out';
  amount: number;
}

export class LedgerRepository {
  constructor(private readonly db: Db) {}

  /** Run fn inside one SQLite transaction (nested calls become savepoints). */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // --- Users ---

  findUser(username: string): UserRow | undefined {
    return this.db
      .prepare<[string], UserRow>('SELECT * FROM users WHERE username = ?')
      .get(username);
  }

  listUsernames(): string[] {
    return this.db
      .prepare<[], { username: string }>('SELECT username FROM users ORDER BY username ASC')
      .all()
      .map((row) => row.username);
  }

  /** Insert a user together with its default vault; returns the new user id. */
  insertUser(username: string, passwordHash: string | null, defaultVault: string): number {
    return this.transaction(() => {
      const result = this.db
        .prepare<[string, string | null]>('INSERT INTO users (username, password_hash) VALUES (?, ?)')
        .run(username, passwordHash);
      const userId = Number(result.lastInsertRowid);
      this.insertVault(userId, defaultVault);
      return userId;
    });
  }

  updatePasswordHash(userId: number, passwordHash: string): void {
    this.db
      .prepare<[string, number]>('UPDATE users SET password_hash = ? WHERE user_id = ?')
      .run(passwordHash, userId);
  }

  // --- Vaults ---

  findVault(userId: number, vaultName: string): VaultRow | undefined {
    return this.db
      .prepare<[number, string], VaultRow>('SELECT * FROM vaults WHERE user_id = ? AND vault_name = ?')
      .get(userId, vaultName);
  }

  listVaults(userId: number): VaultRow[] {
    return this.db
      .prepare<[number], VaultRow>('SELECT * FROM vaults WHERE user_id = ? ORDER BY vault_id ASC')
      .all(userId);
  }

  insertVault(userId: number, vaultName: string): number {
    const result = this.db
      .prepare<[number, string]>('INSERT INTO vaults (user_id, vault_name, balance) VALUES (?, ?, 0)')
      .run(userId, vaultName);
    return Number(result.lastInsertRowid);
  }

  deleteVault(vaultId: number): void {
    this.db.prepare<[number]>('DELETE FROM vaults WHERE vault_id = ?').run(vaultId);
  }

  /** Add delta (may be negative) to a vault balance. */
  adjustBalance(vaultId: number, delta: number): void {
    this.db
      .prepare<[number, number]>('UPDATE vaults SET balance = balance + ? WHERE vault_id = ?')
      .run(delta, vaultId);
  }

  totalBalance(userId: number): number {
    const row = this.db
      .prepare<[number], { total: number }>('SELECT COALESCE(SUM(balance), 0) AS total FROM vaults WHERE user_id = ?')
      .get(userId);
    return row?.total ?? 0;
  }

  /** Re-home a vault's history and loans onto another vault of the same user. */
  moveVaultContents(fromVaultId: number, toVaultId: number): void {
    this.db
      .prepare<[number, number]>('UPDATE transactions SET vault_id = ? WHERE vault_id = ?')
      .run(toVaultId, fromVaultId);
    this.db
      .prepare<[number, number]>('UPDATE transactions SET counterparty_vault_id = ? WHERE counterparty_vault_id = ?')
      .run(toVaultId, fromVaultId);

    this.db
      .prepare<{ from: number; to: number }>(`
        INSERT INTO loans (from_vault_id, to_vault_id, amount)
        SELECT
          CASE WHEN from_vault_id = @from THEN @to ELSE from_vault_id END,
          CASE WHEN to_vault_id = @from THEN @to ELSE to_vault_id END,
          amount
        FROM loans
        WHERE from_vault_id = @from OR to_vault_id = @from
        ON CONFLICT(from_vault_id, to_vault_id) DO UPDATE SET
          amount = loans.amount + excluded.amount
      `)
      .run({ from: fromVaultId, to: toVaultId });

    this.db
      .prepare<[number, number]>('DELETE FROM loans WHERE from_vault_id = ? OR to_vault_id = ?')
      .run(fromVaultId, fromVaultId);
  }

  // --- Categories & units ---

  findCategoryId(name: string): number | undefined {
    return this.db
      .prepare<[string], { category_id: number }>('SELECT category_id FROM categories WHERE category_name = ?')
      .get(name)?.category_id;
  }

  listCategoryNames(): string[] {
    return this.db
      .prepare<[], { category_name: string }>('SELECT category_name FROM categories ORDER BY category_id ASC')
      .all()
      .map((row) => row.category_name);
  }

  findUnitId(name: string): number | undefined {
    return this.db
      .prepare<[string], { unit_id: number }>('SELECT unit_id FROM units WHERE unit_name = ?')
      .get(name)?.unit_id;
  }

  listUnitNames(): string[] {
    return this.db
      .prepare<[], { unit_name: string }>('SELECT unit_name FROM units ORDER BY unit_id ASC')
      .all()
      .map((row) => row.unit_name);
  }

  // --- Transactions ---

  insertTransaction(txn: TransactionInsert): number {
    const result = this.db
      .prepare<TransactionInsert>(`
        INSERT INTO transactions
          (vault_id, transaction_type, amount, category_id, description, quantity, unit_id, date, counterparty_vault_id)
        VALUES
          (@vaultId, @type, @amount, @categoryId, @description, @quantity, @unitId, @date, @counterpartyVaultId)
      `)
      .run(txn);
    return Number(result.lastInsertRowid);
  }

  listTransactions(userId: number, filter: TransactionFilter = {}): TransactionView[] {
    const clauses = ['v.user_id = @userId'];
    const params: Record<string, string | number> = { userId };

    if (filter.vault) {
      clauses.push('v.vault_name = @vault');
      params.vault = filter.vault;
    }
    if (filter.month) {
      clauses.push(`t.date LIKE @month || '%'`);
      params.month = filter.month;
    }
    if (filter.type) {
      clauses.push('t.transaction_type = @type');
      params.type = filter.type;
    }

    return this.db
      .prepare<Record<string, string | number>, TransactionView>(`
        SELECT
          t.transaction_id AS id,
          v.vault_name AS vault,
          t.transaction_type AS type,
          t.amount AS amount,
          c.category_name AS category,
          t.description AS description,
          t.quantity AS quantity,
          u.unit_name AS unit,
          t.date AS date,
          cu.username AS counterpartyUser,
          cv.vault_name AS counterpartyVault
        FROM transactions t
        JOIN vaults v ON v.vault_id = t.vault_id
        LEFT JOIN categories c ON c.category_id = t.category_id
        LEFT JOIN units u ON u.unit_id = t.unit_id
        LEFT JOIN vaults cv ON cv.vault_id = t.counterparty_vault_id
        LEFT JOIN users cu ON cu.user_id = cv.user_id
        WHERE ${clauses.join(' AND ')}
        ORDER BY t.date DESC, t.transaction_id DESC
      `)
      .all(params);
  }

  // --- Loans ---

  upsertLoan(fromVaultId: number, toVaultId: number, amount: number): void {
    this.db
      .prepare<[number, number, number]>(`
        INSERT INTO loans (from_vault_id, to_vault_id, amount)
        VALUES (?, ?, ?)
        ON CONFLICT(from_vault_id, to_vault_id) DO UPDATE SET
          amount = loans.amount + excluded.amount
      `)
      .run(fromVaultId, toVaultId, amount);
  }

  /** Loans where the user is lender or borrower, summed per user pair. */
  listLoans(username: string): LoanView[] {
    return this.db
      .prepare<{ username: string }, LoanView>(`
        SELECT
          u_from.username AS fromUser,
          u_to.username AS toUser,
          SUM(l.amount) AS amount
        FROM loans l
        JOIN vaults v_from ON l.from_vault_id = v_from.vault_id
        JOIN vaults v_to ON l.to_vault_id = v_to.vault_id
        JOIN users u_from ON v_from.user_id = u_from.user_id
        JOIN users u_to ON v_to.user_id = u_to.user_id
        WHERE u_from.username = @username OR u_to.username = @username
        GROUP BY u_from.username, u_to.username
        ORDER BY u_from.username ASC, u_to.username ASC
      `)
      .all({ username });
  }

  // --- Aggregates ---

  categoryTotals(userId: number): CategoryTotal[] {
    return this.db
      .prepare<[number], CategoryTotal>(`
        SELECT
          COALESCE(c.category_name, 'Uncategorized') AS category,
          COALESCE(SUM(CASE WHEN t.amount > 0 THEN t.amount ELSE 0 END), 0) AS deposited,
          COALESCE(SUM(CASE WHEN t.amount < 0 THEN -t.amount ELSE 0 END), 0) AS withdrawn
        FROM transactions t
        JOIN vaults v ON v.vault_id = t.vault_id
        LEFT JOIN categories c ON c.category_id = t.category_id
        WHERE v.user_id = ?
        GROUP BY COALESCE(c.category_name, 'Uncategorized')
        ORDER BY category ASC
      `)
      .all(userId);
  }

  moneyFlows(userId: number): MoneyFlow[] {
    return this.db
      .prepare<[number], FlowRow>(`
        SELECT
          v.vault_name AS vault,
          COALESCE(c.category_name, 'Uncategorized') AS category,
          CASE WHEN t.amount > 0 THEN 'in' ELSE 'out' END AS direction,
          SUM(ABS(t.amount)) AS amount
        FROM transactions t
        JOIN vaults v ON v.vault_id = t.vault_id
        LEFT JOIN categories c ON c.category_id = t.category_id
        WHERE v.user_id = ? AND t.amount <> 0
        GROUP BY v.vault_name, COALESCE(c.category_name, 'Uncategorized'), t.amount > 0
        ORDER BY direction ASC, vault ASC, category ASC
      `)
      .all(userId);
  }
}
