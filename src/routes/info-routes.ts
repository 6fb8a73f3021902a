import { Router } from 'express';
import type { Request, Response } from 'express';

const escapeHtml = (value: string): string =>
  value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

/**
 * Usage hint page listing the endpoints and any demo addresses
 */
export const renderInfoPage = (demoEmails: readonly string[]): string => {
  const emails = demoEmails.length > 0
    ? `<li>Valid email addresses are: ${demoEmails.map(escapeHtml).join(', ')}</li>`
    : '';

  return [
    '<ul>',
    '<li>Try POST to <a href="/login">/login</a></li>',
    emails,
    '<li>Make a note of the returned token and pass it in a "token" header for other requests.</li>',
    '<li>Try GET or POST to <a href="/profile">/profile</a></li>',
    '</ul>',
  ].filter(Boolean).join('\n');
};

export const createInfoRoutes = (demoEmails: readonly string[]): Router => {
  const router = Router();
  const page = renderInfoPage(demoEmails);

  // Health check endpoint
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  router.get('/', (_req: Request, res: Response) => {
    res.type('html').send(page);
  });

  return router;
};
