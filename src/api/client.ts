import type {
  BulkResult,
  BulkRow,
  BulkValidation,
  Loan,
  Month,
  Session,
  Summary,
  Transaction,
  TransactionType,
  Vault,
} from '../domain/types';
import { z } from 'zod';

const API_BASE = '/api';

let authToken: string | null = null;
let onUnauthorized: (() => void) | null = null;

export function setAuthToken(token: string | null): void {
  authToken = token;
}

/** Called when an authenticated request comes back 401 */
export function setUnauthorizedHandler(handler: (() => void) | null): void {
  onUnauthorized = handler;
}

/** Non-2xx answer from the API; `code` is the business error code when there is one. */
export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: string,
    readonly body?: unknown,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

function field(body: unknown, key: string): string | undefined {
  if (typeof body !== 'object' || body === null || !(key in body)) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' ? value : undefined;
}

async function request<T>(method: string, path: string, body?: unknown): Promise<T> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (authToken) headers.Authorization = `Bearer ${authToken}`;

  const response = await fetch(`${API_BASE}${path}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  });

  if (!response.ok) {
    const payload: unknown = await response.json().catch(() => null);
    if (response.status === 401 && authToken) onUnauthorized?.();
    throw new ApiError(
      field(payload, 'error') ?? `Request failed with status ${response.status}`,
      response.status,
      field(payload, 'code'),
      payload,
    );
  }
  return response.json();
}

// --- Auth ---

export function signup(username: string, password: string, confirmPassword: string): Promise<Session> {
  return request('POST', '/auth/signup', { username, password, confirmPassword });
}

export function login(username: string, password: string): Promise<Session> {
  return request('POST', '/auth/login', { username, password });
}

export function logout(): Promise<{ ok: true }> {
  return request('POST', '/auth/logout');
}

export function changePassword(
  currentPassword: string,
  newPassword: string,
  confirmPassword: string,
): Promise<{ ok: true }> {
  return request('PUT', '/auth/password', { currentPassword, newPassword, confirmPassword });
}

// --- Users, vaults, lookups ---

export function getUsers(): Promise<string[]> {
  return request('GET', '/users');
}

export function getUserVaults(username: string): Promise<string[]> {
  return request('GET', `/users/${encodeURIComponent(username)}/vaults`);
}

export function getVaults(): Promise<Vault[]> {
  return request('GET', '/vaults');
}

export function addVault(name: string): Promise<Vault> {
  return request('POST', '/vaults', { name });
}

export function removeVault(name: string): Promise<Vault> {
  return request('DELETE', `/vaults/${encodeURIComponent(name)}`);
}

export function getCategories(): Promise<string[]> {
  return request('GET', '/categories');
}

export function getUnits(): Promise<string[]> {
  return request('GET', '/units');
}

// --- Transactions ---

export interface TransactionQuery {
  vault?: string;
  month?: Month;
  type?: TransactionType;
}

export function getTransactions(query: TransactionQuery = {}): Promise<Transaction[]> {
  const params = new URLSearchParams();
  if (query.vault) params.set('vault', query.vault);
  if (query.month) params.set('month', query.month);
  if (query.type) params.set('type', query.type);
  const qs = params.toString();
  return request('GET', qs ? `/transactions?${qs}` : '/transactions');
}

export interface EntryInput {
  vault: string;
  amount: number;
  category: string;
  description: string;
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

export interface TransactionReceipt {
  amount: number;
  message: string;
  transactionIds: number[];
}

export function deposit(input: EntryInput): Promise<TransactionReceipt> {
  return request('POST', '/transactions/deposit', input);
}

export function withdraw(input: EntryInput): Promise<TransactionReceipt> {
  return request('POST', '/transactions/withdraw', input);
}

export function transfer(input: TransferInput): Promise<TransactionReceipt> {
  return request('POST', '/transactions/transfer', input);
}

export function lend(input: TransferInput): Promise<TransactionReceipt> {
  return request('POST', '/transactions/loan', input);
}

export function validateBulk(rows: BulkRow[]): Promise<BulkValidation> {
  return request('POST', '/transactions/bulk/validate', { rows });
}

export function submitBulk(rows: BulkRow[]): Promise<BulkResult> {
  return request('POST', '/transactions/bulk', { rows });
}

const BulkValidationBody = z.object({
  valid: z.boolean(),
  errors: z.array(
    z.object({ rowNumber: z.number(), field: z.string(), code: z.string(), message: z.string() }),
  ),
  validCount: z.number(),
  totalCount: z.number(),
  summary: z.string(),
});

/** The validation report a refused bulk batch (422) carries, if the error is one. */
export function bulkValidationOf(error: unknown): BulkValidation | null {
  if (!(error instanceof ApiError) || error.status !== 422) return null;
  const parsed = BulkValidationBody.safeParse(error.body);
  return parsed.success ? parsed.data : null;
}

// --- Reports ---

export function getLoans(): Promise<Loan[]> {
  return request('GET', '/loans');
}

export function getSummary(): Promise<Summary> {
  return request('GET', '/summary');
}

/** Download the Excel workbook; resolves with the file name the server chose. */
export async function downloadExport(): Promise<{ blob: Blob; filename: string }> {
  const response = await fetch(`${API_BASE}/export.xlsx`, {
    headers: authToken ? { Authorization: `Bearer ${authToken}` } : {},
  });
  if (!response.ok) throw new ApiError('Failed to export workbook', response.status);

  const disposition = response.headers.get('Content-Disposition') ?? '';
  const match = /filename="([^"]+)"/.exec(disposition);
  return { blob: await response.blob(), filename: match?.[1] ?? 'vaultbook.xlsx' };
}
