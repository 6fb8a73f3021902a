import type { Request } from 'express';

/**
 * Extract the session token from a request.
 * Checks the `token` header first, then an Authorization Bearer header.
 * @returns Token string or undefined if not found
 */
export const extractToken = (req: Request): string | undefined => {
  const header = req.get('token');
  if (header) {
    return header;
  }

  const authHeader = req.get('authorization');
  if (authHeader && authHeader.startsWith('Bearer ')) {
    return authHeader.substring(7) || undefined; // Remove 'Bearer ' prefix
  }

  return undefined;
};
