import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { openDatabase, resetDatabase } from './db.js';
import type { DbInstance } from './db.js';
import { createCredentialStore } from './models/user.js';

describe('database', () => {
  let db: DbInstance | undefined;
  let tempDir: string | undefined;

  afterEach(() => {
    db?.close();
    db = undefined;
    if (tempDir) {
      rmSync(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    }
  });

  it('should create the parent directory of a file-backed database', () => {
    tempDir = mkdtempSync(join(tmpdir(), 'login-profile-'));
    const dbPath = join(tempDir, 'nested', 'users.db');

    db = openDatabase(dbPath);

    expect(existsSync(dbPath)).toBe(true);
  });

  it('should pass executed statements to the verbose callback', () => {
    const statements: string[] = [];
    db = openDatabase(':memory:', { verbose: (sql) => statements.push(sql) });

    createCredentialStore(db).findByEmail('ada@example.com');

    expect(statements.some((sql) => sql.startsWith('SELECT * FROM users WHERE email = '))).toBe(true);
  });

  it('should drop all users on reset', () => {
    db = openDatabase(':memory:');
    const store = createCredentialStore(db);
    store.createUser({ userId: '101', name: 'Ada Example', email: 'ada@example.com' });

    resetDatabase(db);

    expect(createCredentialStore(db).findByUserId('101')).toBeUndefined();
  });
});
