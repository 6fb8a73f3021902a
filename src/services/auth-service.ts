import type { CredentialStore } from '../models/user.js';
import type { PasswordHasher } from '../utils/password.js';
import type { TokenCodec } from '../utils/jwt.js';
import { toProfile } from '../types/auth-types.js';
import type { AuthError, AuthResult, ProfilePatch, User, UserProfile } from '../types/auth-types.js';

export interface AuthServiceDeps {
  store: CredentialStore;
  hasher: PasswordHasher;
  codec: TokenCodec;
}

export interface AuthService {
  /**
   * Authenticate with email and password.
   * Unknown email and wrong password fail identically (AccessDenied).
   */
  login(email: string | undefined, password: string | undefined): Promise<AuthResult<string>>;
  getProfile(token: string | undefined): AuthResult<UserProfile>;
  /** Only `name` is applied; other patch fields are ignored */
  updateProfile(token: string | undefined, patch: ProfilePatch): AuthResult<UserProfile>;
}

const success = <T>(value: T): AuthResult<T> => ({ ok: true, value });
const failure = <T>(error: AuthError): AuthResult<T> => ({ ok: false, error });

export const createAuthService = ({ store, hasher, codec }: AuthServiceDeps): AuthService => {
  /**
   * Resolve a presented token to the stored user it names
   */
  const resolveSubject = (token: string | undefined): AuthResult<User> => {
    const decoded = codec.decode(token);
    if (!decoded.ok || !decoded.claims.user_id) {
      return failure({ kind: 'MissingOrInvalidToken' });
    }

    const userId = decoded.claims.user_id;
    const user = store.findByUserId(userId);
    if (!user) {
      // Token checks out but the account has gone since it was issued
      return failure({ kind: 'SubjectNotFound', userId });
    }

    return success(user);
  };

  return {
    login: async (email, password) => {
      if (email === undefined || password === undefined) {
        return failure({ kind: 'MissingFields' });
      }

      const user = store.findByEmail(email);
      if (!user || !(await hasher.verify(password, user.password_hash))) {
        return failure({ kind: 'AccessDenied' });
      }

      return success(codec.encode(toProfile(user)));
    },

    getProfile: (token) => {
      const subject = resolveSubject(token);
      return subject.ok ? success(toProfile(subject.value)) : subject;
    },

    updateProfile: (token, patch) => {
      const subject = resolveSubject(token);
      if (!subject.ok) {
        return subject;
      }

      let user = subject.value;
      if (patch.name !== undefined) {
        const updated = store.updateName(user.user_id, patch.name);
        if (!updated) {
          return failure({ kind: 'SubjectNotFound', userId: user.user_id });
        }
        user = updated;
      }

      return success(toProfile(user));
    },
  };
};
