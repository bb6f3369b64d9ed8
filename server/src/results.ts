/**
 * Outcome types returned by LedgerService.
 *
 * Rule violations are values, not exceptions: callers switch on `ok` and
 * read `error` for the reason.
 */

export interface Failure<E extends string> {
  readonly ok: false;
  readonly error: E;
  readonly message: string;
}

export function fail<E extends string>(error: E, message: string): Failure<E> {
  return { ok: false, error, message };
}

// --- Auth ---

export type AuthError =
  | 'invalid_username'
  | 'invalid_password'
  | 'username_exists'
  | 'password_mismatch';

export type AuthResult =
  | { readonly ok: true; readonly username: string }
  | Failure<AuthError>;

// --- Transactions ---

export type TransactionError =
  | 'insufficient_funds'
  | 'invalid_amount'
  | 'invalid_vault'
  | 'invalid_user'
  | 'invalid_category'
  | 'invalid_unit'
  | 'same_vault_transfer'
  | 'validation_error';

export interface TransactionSuccess {
  readonly ok: true;
  readonly amount: number;
  readonly message: string;
  readonly transactionIds: readonly number[];
}

export type TransactionResult = TransactionSuccess | Failure<TransactionError>;

// --- Vaults ---

export type VaultError = 'vault_exists' | 'invalid_vault' | 'protected_vault' | 'validation_error';

export interface VaultSummary {
  readonly name: string;
  readonly balance: number;
}

export type VaultResult =
  | { readonly ok: true; readonly vault: VaultSummary }
  | Failure<VaultError>;
