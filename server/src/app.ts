import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { AppConfig } from './config.js';
import type { LedgerService } from './ledger.js';
import type { Failure } from './results.js';
import { requireSession, sessionOf, type SessionStore } from './auth.js';
import { BulkValidator, processBatch } from './bulk.js';
import { buildWorkbook, exportFilename } from './export.js';
import {
  BulkSchema,
  ChangePasswordSchema,
  CredentialsSchema,
  EntrySchema,
  LoanSchema,
  SignupSchema,
  TransactionQuerySchema,
  TransferSchema,
  VaultSchema,
  parseBody,
} from './validation.js';

export interface AppDeps {
  service: LedgerService;
  sessions: SessionStore;
  config: Pick<AppConfig, 'CURRENCY' | 'CORS_ORIGIN'>;
  now?: () => Date;
}

const CONFLICTS = new Set(['username_exists', 'vault_exists']);
const NOT_FOUND = new Set(['invalid_vault', 'invalid_user']);

/** HTTP status for a business rule violation */
export function statusFor(code: string): number {
  if (CONFLICTS.has(code)) return 409;
  if (NOT_FOUND.has(code)) return 404;
  if (code === 'insufficient_funds') return 422;
  return 400;
}

function sendFailure<E extends string>(res: Response, failure: Failure<E>, status = statusFor(failure.error)): void {
  res.status(status).json({ error: failure.message, code: failure.error });
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function createApp({ service, sessions, config, now = () => new Date() }: AppDeps): express.Express {
  const app = express();
  const auth = requireSession(sessions);

  app.use(cors({ origin: config.CORS_ORIGIN }));
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // --- Auth ---

  app.post('/auth/signup', (req, res) => {
    try {
      const body = parseBody(SignupSchema, req.body, res);
      if (!body) return;

      const result = service.signup(body.username, body.password, body.confirmPassword);
      if (!result.ok) {
        sendFailure(res, result);
        return;
      }
      console.log(`[Auth] Registered ${result.username}`);
      const token = sessions.create(result.username);
      res.status(201).json({ token, username: result.username, currency: config.CURRENCY, defaultVault: service.defaultVaultName });
    } catch (error) {
      console.error('Error signing up:', error);
      res.status(500).json({ error: 'Failed to sign up' });
    }
  });

  app.post('/auth/login', (req, res) => {
    try {
      const body = parseBody(CredentialsSchema, req.body, res);
      if (!body) return;

      const result = service.login(body.username, body.password);
      if (!result.ok) {
        sendFailure(res, result, 401);
        return;
      }
      const token = sessions.create(result.username);
      res.json({ token, username: result.username, currency: config.CURRENCY, defaultVault: service.defaultVaultName });
    } catch (error) {
      console.error('Error logging in:', error);
      res.status(500).json({ error: 'Failed to log in' });
    }
  });

  app.post('/auth/logout', auth, (_req, res) => {
    sessions.revoke(sessionOf(res).token);
    res.json({ ok: true });
  });

  app.put('/auth/password', auth, (req, res) => {
    try {
      const body = parseBody(ChangePasswordSchema, req.body, res);
      if (!body) return;

      const { username, token } = sessionOf(res);
      const result = service.changePassword(username, body.currentPassword, body.newPassword, body.confirmPassword);
      if (!result.ok) {
        sendFailure(res, result, result.error === 'invalid_password' ? 401 : statusFor(result.error));
        return;
      }
      sessions.revokeUser(username, token);
      res.json({ ok: true });
    } catch (error) {
      console.error('Error changing password:', error);
      res.status(500).json({ error: 'Failed to change password' });
    }
  });

  // --- Users, vaults, lookups ---

  app.get('/users', auth, (_req, res) => {
    try {
      res.json(service.listUsernames());
    } catch (error) {
      console.error('Error fetching users:', error);
      res.status(500).json({ error: 'Failed to fetch users' });
    }
  });

  app.get('/users/:username/vaults', auth, (req, res) => {
    try {
      const { username } = req.params;
      if (!service.userExists(username)) {
        res.status(404).json({ error: `User '${username}' does not exist`, code: 'invalid_user' });
        return;
      }
      res.json(service.listVaultNames(username));
    } catch (error) {
      console.error('Error fetching user vaults:', error);
      res.status(500).json({ error: 'Failed to fetch vaults' });
    }
  });

  app.get('/vaults', auth, (_req, res) => {
    try {
      res.json(service.listVaults(sessionOf(res).username));
    } catch (error) {
      console.error('Error fetching vaults:', error);
      res.status(500).json({ error: 'Failed to fetch vaults' });
    }
  });

  app.post('/vaults', auth, (req, res) => {
    try {
      const body = parseBody(VaultSchema, req.body, res);
      if (!body) return;

      const result = service.addVault(sessionOf(res).username, body.name);
      if (!result.ok) {
        sendFailure(res, result);
        return;
      }
      res.status(201).json(result.vault);
    } catch (error) {
      console.error('Error creating vault:', error);
      res.status(500).json({ error: 'Failed to create vault' });
    }
  });

  app.delete('/vaults/:name', auth, (req, res) => {
    try {
      const result = service.removeVault(sessionOf(res).username, req.params.name);
      if (!result.ok) {
        sendFailure(res, result);
        return;
      }
      res.json(result.vault);
    } catch (error) {
      console.error('Error deleting vault:', error);
      res.status(500).json({ error: 'Failed to delete vault' });
    }
  });

  app.get('/categories', auth, (_req, res) => {
    try {
      res.json(service.listCategories());
    } catch (error) {
      console.error('Error fetching categories:', error);
      res.status(500).json({ error: 'Failed to fetch categories' });
    }
  });

  app.get('/units', auth, (_req, res) => {
    try {
      res.json(service.listUnits());
    } catch (error) {
      console.error('Error fetching units:', error);
      res.status(500).json({ error: 'Failed to fetch units' });
    }
  });

  // --- Transactions ---

  app.get('/transactions', auth, (req, res) => {
    try {
      const filter = parseBody(
        TransactionQuerySchema,
        {
          vault: queryString(req.query.vault),
          month: queryString(req.query.month),
          type: queryString(req.query.type),
        },
        res,
      );
      if (!filter) return;

      res.json(service.listTransactions(sessionOf(res).username, filter));
    } catch (error) {
      console.error('Error fetching transactions:', error);
      res.status(500).json({ error: 'Failed to fetch transactions' });
    }
  });

  app.post('/transactions/deposit', auth, (req, res) => {
    try {
      const body = parseBody(EntrySchema, req.body, res);
      if (!body) return;

      const result = service.deposit(sessionOf(res).username, body);
      if (!result.ok) {
        sendFailure(res, result);
        return;
      }
      res.status(201).json({ amount: result.amount, message: result.message, transactionIds: result.transactionIds });
    } catch (error) {
      console.error('Error creating deposit:', error);
      res.status(500).json({ error: 'Failed to create deposit' });
    }
  });

  app.post('/transactions/withdraw', auth, (req, res) => {
    try {
      const body = parseBody(EntrySchema, req.body, res);
      if (!body) return;

      const result = service.withdraw(sessionOf(res).username, body);
      if (!result.ok) {
        sendFailure(res, result);
        return;
      }
      res.status(201).json({ amount: result.amount, message: result.message, transactionIds: result.transactionIds });
    } catch (error) {
      console.error('Error creating withdrawal:', error);
      res.status(500).json({ error: 'Failed to create withdrawal' });
    }
  });

  app.post('/transactions/transfer', auth, (req, res) => {
    try {
      const body = parseBody(TransferSchema, req.body, res);
      if (!body) return;

      const result = service.transfer(sessionOf(res).username, body);
      if (!result.ok) {
        sendFailure(res, result);
        return;
      }
      res.status(201).json({ amount: result.amount, message: result.message, transactionIds: result.transactionIds });
    } catch (error) {
      console.error('Error creating transfer:', error);
      res.status(500).json({ error: 'Failed to create transfer' });
    }
  });

  app.post('/transactions/loan', auth, (req, res) => {
    try {
      const body = parseBody(LoanSchema, req.body, res);
      if (!body) return;

      const result = service.loan(sessionOf(res).username, body);
      if (!result.ok) {
        sendFailure(res, result);
        return;
      }
      res.status(201).json({ amount: result.amount, message: result.message, transactionIds: result.transactionIds });
    } catch (error) {
      console.error('Error creating loan:', error);
      res.status(500).json({ error: 'Failed to create loan' });
    }
  });

  app.post('/transactions/bulk/validate', auth, (req, res) => {
    try {
      const body = parseBody(BulkSchema, req.body, res);
      if (!body) return;

      res.json(new BulkValidator(service).validate(body.rows, sessionOf(res).username));
    } catch (error) {
      console.error('Error validating bulk transactions:', error);
      res.status(500).json({ error: 'Failed to validate transactions' });
    }
  });

  app.post('/transactions/bulk', auth, (req, res) => {
    try {
      const body = parseBody(BulkSchema, req.body, res);
      if (!body) return;

      const outcome = processBatch(service, sessionOf(res).username, body.rows);
      if (!outcome.ok) {
        res.status(422).json(outcome.validation);
        return;
      }
      console.log(`[Bulk] ${outcome.successful} rows committed, ${outcome.failed} failed`);
      res.status(201).json({ successful: outcome.successful, failed: outcome.failed });
    } catch (error) {
      console.error('Error processing bulk transactions:', error);
      res.status(500).json({ error: 'Failed to process transactions' });
    }
  });

  // --- Reports ---

  app.get('/loans', auth, (_req, res) => {
    try {
      res.json(service.listLoans(sessionOf(res).username));
    } catch (error) {
      console.error('Error fetching loans:', error);
      res.status(500).json({ error: 'Failed to fetch loans' });
    }
  });

  app.get('/summary', auth, (_req, res) => {
    try {
      res.json({ ...service.summary(sessionOf(res).username), currency: config.CURRENCY });
    } catch (error) {
      console.error('Error computing summary:', error);
      res.status(500).json({ error: 'Failed to compute summary' });
    }
  });

  app.get('/export.xlsx', auth, (_req, res) => {
    const failed = (error: unknown) => {
      console.error('Error exporting workbook:', error);
      if (res.headersSent) {
        res.end();
      } else {
        res.status(500).json({ error: 'Failed to export workbook' });
      }
    };

    try {
      const data = service.exportData(sessionOf(res).username);
      const workbook = buildWorkbook(data, config.CURRENCY);
      res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
      res.attachment(exportFilename(data.username, now()));
      workbook.xlsx
        .write(res)
        .then(() => res.end())
        .catch(failed);
    } catch (error) {
      failed(error);
    }
  });

  // Malformed JSON bodies from express.json()
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({ error: 'Invalid JSON in request body' });
      return;
    }
    console.error('Unhandled error:', err);
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
