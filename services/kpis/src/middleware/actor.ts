import type { Response, NextFunction } from 'express';
import { resolveKpiCapabilities, type AuthRequest } from '@metrica/auth-utils';
import { createLogger } from '@metrica/config';
import type { Actor } from '../types.js';
import type { UserDirectory } from '../services/user-directory.js';
import { AppError } from './error-handler.js';

const log = createLogger('kpis:actor');

export interface ActorRequest extends AuthRequest {
  actor?: Actor;
}

/**
 * Resolves the caller against the directory once per request. The role on
 * the token may be stale, so `req.user.role` is replaced with the current one
 * before any permission gate runs.
 */
export function createActorMiddleware(directory: UserDirectory) {
  return async (req: ActorRequest, res: Response, next: NextFunction): Promise<void> => {
    const claims = req.user;
    if (!claims) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    try {
      const user = await directory.getUser(claims.sub);
      if (!user || !user.isActive || user.organizationId !== claims.organizationId) {
        log.warn({ userId: claims.sub, organizationId: claims.organizationId }, 'Rejected token for unknown or inactive user');
        res.status(401).json({ error: 'User is not active in this organization' });
        return;
      }

      req.user = { ...claims, role: user.role };
      req.actor = {
        userId: user.id,
        organizationId: user.organizationId,
        role: user.role,
        capabilities: resolveKpiCapabilities(user.role),
      };
      next();
    } catch (err) {
      next(err);
    }
  };
}

export function getActor(req: ActorRequest): Actor {
  if (!req.actor) {
    throw new AppError(401, 'Authentication required', 'UNAUTHENTICATED');
  }
  return req.actor;
}
