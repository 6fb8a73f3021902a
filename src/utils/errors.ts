import type { AuthError } from '../types/auth-types.js';

export type AuthErrorKind =
  | 'MissingFields'
  | 'AccessDenied'
  | 'MissingOrInvalidToken'
  | 'SubjectNotFound'
  | 'MalformedBody'
  | 'NotFound'
  | 'Unexpected';

/**
 * Error carrying the HTTP status and failure kind it maps to.
 * Used throughout the request path for consistent error responses.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly kind: AuthErrorKind;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, kind: AuthErrorKind, isOperational = true) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.kind = kind;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    // Set the prototype explicitly to ensure instanceof works correctly
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export const MESSAGES = {
  missingFields: "Please provide a Json message with 'email' and 'password' fields.",
  accessDenied: 'Access denied',
  missingToken: 'Please provide a token header that includes a user_id.',
  malformedBody: 'Malformed JSON body',
  rejectedBody: 'Request body rejected',
  notFound: 'Not Found',
  unexpected: 'Internal server error',
} as const;

export const subjectNotFoundMessage = (userId: string): string => `Respondent ID ${userId} not found.`;

/**
 * Factory functions for common HTTP errors
 */
export const createBadRequestError = (message: string, kind: AuthErrorKind = 'MalformedBody'): AppError => {
  return new AppError(message, 400, kind);
};

export const createUnauthorizedError = (message: string, kind: AuthErrorKind): AppError => {
  return new AppError(message, 401, kind);
};

export const createNotFoundError = (message: string = MESSAGES.notFound): AppError => {
  return new AppError(message, 404, 'NotFound');
};

export const createUnexpectedError = (): AppError => {
  return new AppError(MESSAGES.unexpected, 500, 'Unexpected', false);
};

/**
 * Map an auth service failure onto its HTTP error
 */
export const toAppError = (error: AuthError): AppError => {
  switch (error.kind) {
    case 'MissingFields':
      return createUnauthorizedError(MESSAGES.missingFields, error.kind);
    case 'AccessDenied':
      return createUnauthorizedError(MESSAGES.accessDenied, error.kind);
    case 'MissingOrInvalidToken':
      return createUnauthorizedError(MESSAGES.missingToken, error.kind);
    case 'SubjectNotFound':
      return createBadRequestError(subjectNotFoundMessage(error.userId), error.kind);
  }
};
