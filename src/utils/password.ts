import bcrypt from 'bcrypt';

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  /** Always false when no password has been set */
  verify(plain: string, hash: string | null): Promise<boolean>;
}

export interface PasswordHasherOptions {
  rounds: number;
}

const BCRYPT_HASH = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

/**
 * bcrypt-backed hasher. Hashes are salted and carry their own cost and salt,
 * so nothing besides the hash string needs to be stored.
 */
export const createPasswordHasher = ({ rounds }: PasswordHasherOptions): PasswordHasher => ({
  hash: async (plain) => bcrypt.hash(plain, rounds),

  verify: async (plain, hash) => {
    // Users can't log in until a password is set
    if (hash === null || !BCRYPT_HASH.test(hash)) {
      return false;
    }
    return bcrypt.compare(plain, hash);
  },
});
