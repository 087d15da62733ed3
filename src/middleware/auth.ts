import { Request, Response, NextFunction } from 'express';
import { verifyToken, TokenPayload } from '../utils/jwt.js';

export interface AuthRequest extends Request {
  user?: TokenPayload;
}

/**
 * Verifies the bearer token issued by the operator login service.
 * The payload's userId owns every credential, job and history row the request touches.
 */
export function authMiddleware(req: AuthRequest, res: Response, next: NextFunction) {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    res.status(401).json({ error: 'No token provided' });
    return;
  }

  try {
    req.user = verifyToken(authHeader.substring(7));
    next();
  } catch {
    res.status(401).json({ error: 'Invalid token' });
  }
}
