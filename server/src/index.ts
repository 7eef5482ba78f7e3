import { createLedgerRepo } from '../../src/db/repo.js';
import { MemoryRowStore, type RowStore } from '../../src/db/rowStore.js';
import { createCommandRouter } from '../../src/api/router.js';
import { createTelegramClient } from '../../src/api/telegram.js';
import { createApp } from './app.js';
import { ConfigError, loadConfig, type Config } from './config.js';
import { SqliteRowStore, openDatabase } from './db.js';

function createStore(config: Config): { store: RowStore; close: () => void } {
  if (config.STORE === 'memory') {
    console.log('Using in-memory store (data is lost on exit)');
    return { store: new MemoryRowStore(), close: () => {} };
  }
  const db = openDatabase(config.DATABASE_PATH, config.STORE_TIMEOUT_MS);
  return { store: new SqliteRowStore(db), close: () => db.close() };
}

function main(): void {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  const { store, close } = createStore(config);
  const repo = createLedgerRepo(store);
  const router = createCommandRouter({ repo, defaultUserLabel: config.DEFAULT_USER_LABEL });
  const telegram = createTelegramClient({
    token: config.TELEGRAM_TOKEN,
    apiBase: config.TELEGRAM_API_BASE,
    timeoutMs: config.TELEGRAM_TIMEOUT_MS,
  });

  const app = createApp({ repo, router, telegram, webhookToken: config.TELEGRAM_TOKEN });
  const server = app.listen(config.PORT, () => {
    console.log(`Ledger bot listening on port ${config.PORT}`);
  });

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down`);
    server.close(() => {
      close();
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
