/**
 * User record as stored in the credential store
 */
export interface User {
  id: number;
  user_id: string;
  name: string;
  email: string;
  password_hash: string | null;
}

/**
 * Public projection of a user, safe to return to callers and embed in tokens
 */
export interface UserProfile {
  user_id: string;
  name: string;
  email: string;
}

/**
 * Identity claims carried inside a session token
 */
export type TokenClaims = UserProfile;

/**
 * Login request payload
 */
export interface LoginRequest {
  email: string;
  password: string;
}

/**
 * Response returned after a successful login
 */
export interface LoginResponse {
  token: string;
}

/**
 * Fields a caller may change on their own profile
 */
export interface ProfilePatch {
  name?: string;
}

/**
 * Details needed to provision a new account
 */
export interface NewUser {
  userId: string;
  name: string;
  email: string;
}

export type AuthError =
  | { kind: 'MissingFields' }
  | { kind: 'AccessDenied' }
  | { kind: 'MissingOrInvalidToken' }
  | { kind: 'SubjectNotFound'; userId: string };

export type AuthResult<T> = { ok: true; value: T } | { ok: false; error: AuthError };

/**
 * Project a stored user onto its public fields
 */
export const toProfile = (user: User): UserProfile => ({
  user_id: user.user_id,
  name: user.name,
  email: user.email
});
