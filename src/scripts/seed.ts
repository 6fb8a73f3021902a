// Recreate the users table and load the demo accounts

import 'dotenv/config';
import { loadConfig } from '../config.js';
import { openDatabase, resetDatabase } from '../db.js';
import { createCredentialStore } from '../models/user.js';
import { createPasswordHasher } from '../utils/password.js';
import { createLogger } from '../utils/logger.js';
import { loadDemoUsers, seedDemoUsers } from '../seed.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger('seed', { level: config.logLevel });

  const db = openDatabase(config.dbPath);
  try {
    log.info('Recreating database', { dbPath: config.dbPath });
    resetDatabase(db);

    const created = await seedDemoUsers(
      createCredentialStore(db),
      createPasswordHasher({ rounds: config.bcryptRounds }),
      loadDemoUsers()
    );
    log.info(`Created ${created.length} users`, { userIds: created });
  } finally {
    db.close();
  }
}

main().catch((error: unknown) => {
  console.error('Seeding failed:', error);
  process.exit(1);
});
