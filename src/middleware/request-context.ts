import type { Request } from 'express';
import { isRecord } from '../utils/guards.js';

const REDACTED = '[redacted]';
const SECRET_FIELDS = new Set(['password']);

/**
 * Full URL of the request, as echoed back in error messages
 */
export const requestUrl = (req: Request): string =>
  `${req.protocol}://${req.get('host') ?? 'localhost'}${req.originalUrl}`;

/**
 * Request body suitable for logs: top-level password fields are masked
 */
export const redactPayload = (body: unknown): unknown => {
  if (!isRecord(body)) {
    return body;
  }

  return Object.fromEntries(
    Object.entries(body).map(([key, value]) => [key, SECRET_FIELDS.has(key) ? REDACTED : value])
  );
};
