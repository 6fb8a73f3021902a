// Main entry point: loads configuration, opens the credential store and
// starts the HTTP server

import 'dotenv/config';
import type { Server } from 'node:http';
import { createApp } from './app.js';
import { ConfigError, loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { openDatabase } from './db.js';
import type { DbInstance } from './db.js';
import { createCredentialStore } from './models/user.js';
import { createAuthService } from './services/auth-service.js';
import { createTokenCodec } from './utils/jwt.js';
import { createPasswordHasher } from './utils/password.js';
import { createLogger } from './utils/logger.js';
import { loadDemoUsers, seedDemoUsers } from './seed.js';

async function start(config: AppConfig): Promise<{ server: Server; db: DbInstance }> {
  const log = createLogger('server', { level: config.logLevel });
  const sqlLog = createLogger('sql', { level: config.logLevel });

  const db = openDatabase(config.dbPath, config.sqlDebug ? { verbose: (sql) => sqlLog.debug(sql) } : {});
  const store = createCredentialStore(db);
  const hasher = createPasswordHasher({ rounds: config.bcryptRounds });
  const codec = createTokenCodec({ secret: config.tokenSecret, ttlSeconds: config.tokenTtlSeconds });

  if (config.tokenTtlSeconds === undefined) {
    log.warn('JWT_EXPIRY_SECONDS is not set: issued tokens stay valid until JWT_SECRET changes');
  }

  let demoEmails: string[] = [];
  if (config.seedDemoUsers) {
    const users = loadDemoUsers();
    const created = await seedDemoUsers(store, hasher, users);
    demoEmails = users.map((user) => user.email);
    log.info(`Demo users ready (${created.length} created, ${users.length - created.length} already present)`);
  }

  const authService = createAuthService({ store, hasher, codec });
  const app = createApp({ authService, logger: createLogger('http', { level: config.logLevel }), demoEmails });

  const server = app.listen(config.port, () => {
    log.info(`Server running on port ${config.port}`, { environment: config.environment, dbPath: config.dbPath });
  });

  return { server, db };
}

async function main(): Promise<void> {
  const log = createLogger('server');

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  const { server, db } = await start(config);

  const shutdown = (signal: string): void => {
    log.info(`Received ${signal}, shutting down...`);
    server.close((error) => {
      db.close();
      if (error) {
        log.error('HTTP server did not close cleanly', { error: error.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
