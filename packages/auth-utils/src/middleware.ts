import type { Request, Response, NextFunction } from 'express';
import { verifyAccessToken, type JwtPayload } from './jwt.js';

export interface AuthRequest extends Request {
  user?: JwtPayload;
}

// ─── Bearer Token Authentication ─────────────────────────────────────
export function authMiddleware(req: AuthRequest, res: Response, next: NextFunction): void {
  const header = req.headers.authorization;
  if (!header || !header.startsWith('Bearer ')) {
    res.status(401).json({ error: 'Authentication required' });
    return;
  }

  const token = header.slice('Bearer '.length).trim();
  try {
    req.user = verifyAccessToken(token);
  } catch {
    res.status(401).json({ error: 'Invalid or expired token' });
    return;
  }

  next();
}
