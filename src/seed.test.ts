import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { openDatabase } from './db.js';
import type { DbInstance } from './db.js';
import { createCredentialStore } from './models/user.js';
import type { CredentialStore } from './models/user.js';
import { createPasswordHasher } from './utils/password.js';
import { DEMO_PASSWORD, loadDemoUsers, seedDemoUsers } from './seed.js';

describe('demo users', () => {
  const hasher = createPasswordHasher({ rounds: 4 });

  describe('loadDemoUsers', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'demo-users-'));
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('should load the bundled fixture', () => {
      const users = loadDemoUsers();

      expect(users).toHaveLength(10);
      expect(users[0]).toEqual({ userId: '101', email: 'nick.gravgaard@example.com', name: 'Nick Gravgaard' });
      expect(users[9].userId).toBe('110');
    });

    it('should reject a file that is not an array', () => {
      const file = join(tempDir, 'users.json');
      writeFileSync(file, '{"userId":"1"}');

      expect(() => loadDemoUsers(file)).toThrow(`${file} must contain a JSON array of users`);
    });

    it('should reject entries missing a field', () => {
      const file = join(tempDir, 'users.json');
      writeFileSync(file, '[{"userId":"1","name":"A","email":"a@example.com"},{"userId":"2","name":"B"}]');

      expect(() => loadDemoUsers(file)).toThrow(`${file}: entry 1 needs string userId, name and email`);
    });
  });

  describe('seedDemoUsers', () => {
    let db: DbInstance;
    let store: CredentialStore;

    beforeEach(() => {
      db = openDatabase(':memory:');
      store = createCredentialStore(db);
    });

    afterEach(() => {
      db.close();
    });

    it('should create accounts with the demo password', async () => {
      const created = await seedDemoUsers(store, hasher, loadDemoUsers().slice(0, 3));

      expect(created).toEqual(['101', '102', '103']);
      const user = store.findByUserId('102');
      expect(user?.email).toBe('shane.edwards@example.com');
      expect(await hasher.verify(DEMO_PASSWORD, user?.password_hash ?? null)).toBe(true);
    });

    it('should skip accounts that already exist', async () => {
      const users = loadDemoUsers().slice(0, 2);
      await seedDemoUsers(store, hasher, users);
      store.updateName('101', 'Kept');

      const created = await seedDemoUsers(store, hasher, users);

      expect(created).toEqual([]);
      expect(store.findByUserId('101')?.name).toBe('Kept');
    });
  });
});
