import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { AuthService } from '../services/auth-service.js';
import { extractToken } from '../middleware/auth-middleware.js';
import { isRecord } from '../utils/guards.js';
import { toAppError } from '../utils/errors.js';
import type { AuthResult, ProfilePatch, UserProfile } from '../types/auth-types.js';

/**
 * Reduce a request body to the fields a profile update may touch
 */
export const readProfilePatch = (body: unknown): ProfilePatch => {
  if (!isRecord(body) || typeof body.name !== 'string') {
    return {};
  }
  return { name: body.name };
};

const respond = (result: AuthResult<UserProfile>, res: Response, next: NextFunction): void => {
  if (!result.ok) {
    next(toAppError(result.error));
    return;
  }
  res.status(200).json(result.value);
};

export const createProfileRoutes = (authService: AuthService): Router => {
  const router = Router();

  /**
   * GET /profile
   * Requires: `token` header
   * Response: { user_id, name, email }
   */
  router.get('/profile', (req: Request, res: Response, next: NextFunction) => {
    try {
      respond(authService.getProfile(extractToken(req)), res, next);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /profile
   * Requires: `token` header
   * Request body: { name?: string }
   * Response: the updated { user_id, name, email }
   */
  router.post('/profile', (req: Request, res: Response, next: NextFunction) => {
    try {
      respond(authService.updateProfile(extractToken(req), readProfilePatch(req.body)), res, next);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
