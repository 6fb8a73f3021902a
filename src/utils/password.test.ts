import { describe, it, expect } from 'vitest';
import { createPasswordHasher } from './password.js';

describe('password hasher', () => {
  const hasher = createPasswordHasher({ rounds: 10 });

  describe('hash', () => {
    it('should return a bcrypt hash', async () => {
      const hash = await hasher.hash('mySecurePassword123');

      // Bcrypt hashes start with $2a$, $2b$, or $2y$
      expect(hash).toMatch(/^\$2[aby]\$/);
      expect(hash).toHaveLength(60);
    });

    it('should embed the configured rounds in the hash', async () => {
      const hash = await createPasswordHasher({ rounds: 11 }).hash('testPassword');

      // Extract rounds from hash (format: $2b$11$...)
      const rounds = parseInt(hash.split('$')[2], 10);
      expect(rounds).toBe(11);
    });

    it('should never return the plaintext', async () => {
      const hash = await hasher.hash('password');

      expect(hash).not.toBe('password');
      expect(hash.includes('password')).toBe(false);
    });

    it('should generate different hashes for the same password', async () => {
      const hash1 = await hasher.hash('samePassword');
      const hash2 = await hasher.hash('samePassword');

      // Same password should produce different hashes due to salt
      expect(hash1).not.toBe(hash2);
    });
  });

  describe('verify', () => {
    it('should return true for matching password', async () => {
      const hash = await hasher.hash('correctPassword123');

      expect(await hasher.verify('correctPassword123', hash)).toBe(true);
    });

    it('should return false for non-matching password', async () => {
      const hash = await hasher.hash('correctPassword123');

      expect(await hasher.verify('wrongPassword', hash)).toBe(false);
    });

    it('should handle empty passwords correctly', async () => {
      const hash = await hasher.hash('');

      expect(await hasher.verify('', hash)).toBe(true);
      expect(await hasher.verify('notEmpty', hash)).toBe(false);
    });

    it('should return false when no password has been set', async () => {
      for (const candidate of ['', 'password', 'null']) {
        expect(await hasher.verify(candidate, null)).toBe(false);
      }
    });

    it('should return false instead of throwing for a hash that is not bcrypt', async () => {
      await expect(hasher.verify('password', 'password')).resolves.toBe(false);
      await expect(hasher.verify('password', '')).resolves.toBe(false);
    });
  });
});
