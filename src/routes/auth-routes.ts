import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { AuthService } from '../services/auth-service.js';
import { isRecord } from '../utils/guards.js';
import { toAppError } from '../utils/errors.js';
import type { LoginRequest, LoginResponse } from '../types/auth-types.js';

/**
 * Pick the credential fields out of an arbitrary JSON body.
 * Non-string values count as absent.
 */
export const readCredentials = (body: unknown): Partial<LoginRequest> => {
  if (!isRecord(body)) {
    return {};
  }

  const { email, password } = body;
  return {
    email: typeof email === 'string' ? email : undefined,
    password: typeof password === 'string' ? password : undefined,
  };
};

export const createAuthRoutes = (authService: AuthService): Router => {
  const router = Router();

  /**
   * POST /login
   * Request body: { email: string, password: string }
   * Response: { token: string }
   */
  router.post('/login', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { email, password } = readCredentials(req.body);
      const result = await authService.login(email, password);

      if (!result.ok) {
        next(toAppError(result.error));
        return;
      }

      const body: LoginResponse = { token: result.value };
      res.status(200).json(body);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
