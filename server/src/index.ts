import { loadConfig } from './config.js';
import { openDatabase } from './db.js';
import { LedgerRepository } from './repository.js';
import { LedgerService } from './ledger.js';
import { SessionStore } from './auth.js';
import { createApp } from './app.js';

const config = loadConfig();
const db = openDatabase(config.DB_PATH);

const service = new LedgerService(new LedgerRepository(db), {
  defaultVaultName: config.DEFAULT_VAULT_NAME,
  hashIterations: config.PASSWORD_HASH_ITERATIONS,
});
const sessions = new SessionStore(config.SESSION_TTL_MS);
const app = createApp({ service, sessions, config });

const server = app.listen(config.PORT, config.HOST, () => {
  console.log(`[API] Vaultbook server running on http://${config.HOST}:${config.PORT} (${config.NODE_ENV})`);
  console.log(`[API] Database: ${config.DB_PATH}`);
});

function shutdown(signal: string): void {
  console.log(`[API] ${signal} received, closing`);
  server.close(() => {
    db.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
