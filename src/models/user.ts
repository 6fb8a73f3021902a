import type { DbInstance } from '../db.js';
import type { NewUser, User } from '../types/auth-types.js';

/**
 * Thrown when provisioning would break the unique email or user_id constraint
 */
export class DuplicateUserError extends Error {
  constructor(message = 'User already exists') {
    super(message);
    this.name = 'DuplicateUserError';
    Object.setPrototypeOf(this, DuplicateUserError.prototype);
  }
}

/**
 * Credential store contract. Lookups match the stored value exactly.
 */
export interface CredentialStore {
  findByEmail(email: string): User | undefined;
  findByUserId(userId: string): User | undefined;
  /** Persists the new name and returns the updated record */
  updateName(userId: string, name: string): User | undefined;
  /** Provisioning: new accounts start without a password */
  createUser(user: NewUser): User;
  setPasswordHash(userId: string, passwordHash: string | null): User | undefined;
}

// SQLite unique constraint error code
const isUniqueViolation = (error: unknown): boolean =>
  error instanceof Error &&
  (('code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE') || error.message.includes('UNIQUE constraint failed'));

/**
 * SQLite-backed credential store
 */
export const createCredentialStore = (db: DbInstance): CredentialStore => {
  const selectByEmail = db.prepare<[string], User>('SELECT * FROM users WHERE email = ?');
  const selectByUserId = db.prepare<[string], User>('SELECT * FROM users WHERE user_id = ?');
  const updateNameStmt = db.prepare<[string, string]>('UPDATE users SET name = ? WHERE user_id = ?');
  const updateHashStmt = db.prepare<[string | null, string]>('UPDATE users SET password_hash = ? WHERE user_id = ?');
  const insertStmt = db.prepare<[string, string, string]>(`
    INSERT INTO users (user_id, name, email, password_hash)
    VALUES (?, ?, ?, NULL)
  `);

  const findByUserId = (userId: string): User | undefined => selectByUserId.get(userId);

  return {
    findByEmail: (email) => selectByEmail.get(email),

    findByUserId,

    updateName: (userId, name) => {
      const result = updateNameStmt.run(name, userId);
      return result.changes > 0 ? findByUserId(userId) : undefined;
    },

    createUser: ({ userId, name, email }) => {
      try {
        insertStmt.run(userId, name, email);
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new DuplicateUserError(`User ${userId} <${email}> already exists`);
        }
        throw error;
      }

      const user = findByUserId(userId);
      if (!user) {
        throw new Error(`User ${userId} was not found after insert`);
      }
      return user;
    },

    setPasswordHash: (userId, passwordHash) => {
      const result = updateHashStmt.run(passwordHash, userId);
      return result.changes > 0 ? findByUserId(userId) : undefined;
    },
  };
};
