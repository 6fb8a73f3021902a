// Demo account fixtures. Provisioning sits outside the auth core; this is
// what the server and tests use to get a populated store.

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import type { CredentialStore } from './models/user.js';
import type { PasswordHasher } from './utils/password.js';
import type { NewUser } from './types/auth-types.js';
import { isRecord } from './utils/guards.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Resolves the same from src/ and from the compiled dist/
export const DEMO_USERS_FILE = path.resolve(__dirname, '..', 'fixtures', 'demo-users.json');
export const DEMO_PASSWORD = 'password';

const isNewUser = (value: unknown): value is NewUser =>
  isRecord(value) &&
  typeof value.userId === 'string' &&
  typeof value.name === 'string' &&
  typeof value.email === 'string';

/**
 * Read and validate the demo account list
 */
export function loadDemoUsers(file: string = DEMO_USERS_FILE): NewUser[] {
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`${file} must contain a JSON array of users`);
  }

  return parsed.map((entry: unknown, index) => {
    if (!isNewUser(entry)) {
      throw new Error(`${file}: entry ${index} needs string userId, name and email`);
    }
    return { userId: entry.userId, name: entry.name, email: entry.email };
  });
}

/**
 * Create every listed account that does not exist yet and give it a password.
 * Accounts already present are left untouched.
 * @returns The user ids that were created
 */
export async function seedDemoUsers(
  store: CredentialStore,
  hasher: PasswordHasher,
  users: readonly NewUser[],
  password: string = DEMO_PASSWORD
): Promise<string[]> {
  const created: string[] = [];

  for (const user of users) {
    if (store.findByUserId(user.userId)) continue;

    store.createUser(user);
    store.setPasswordHash(user.userId, await hasher.hash(password));
    created.push(user.userId);
  }

  return created;
}
