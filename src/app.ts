// Express application setup

import express from 'express';
import type { AuthService } from './services/auth-service.js';
import type { Logger } from './utils/logger.js';
import { createAuthRoutes } from './routes/auth-routes.js';
import { createProfileRoutes } from './routes/profile-routes.js';
import { createInfoRoutes } from './routes/info-routes.js';
import { createErrorHandler, notFoundHandler } from './middleware/error-handler.js';

export interface AppDeps {
  authService: AuthService;
  logger: Logger;
  /** Addresses listed on the index page */
  demoEmails?: readonly string[];
}

export function createApp({ authService, logger, demoEmails = [] }: AppDeps): express.Application {
  const app = express();

  app.use(express.json()); // Parse JSON request bodies

  app.use(createInfoRoutes(demoEmails));
  app.use(createAuthRoutes(authService));
  app.use(createProfileRoutes(authService));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}
