import { Response } from 'express';
import { z } from 'zod';
import { AuthRequest } from '../../middleware/auth.js';
import { BackupInProgressError, SnapshotError, StoreError } from '../../utils/errors.js';

export const idParamSchema = z.object({
  id: z.string().regex(/^\d+$/, 'id must be a positive integer'),
});

/**
 * Owner id of an authenticated request; answers 401 and returns null otherwise
 */
export function requireOwner(req: AuthRequest, res: Response): number | null {
  if (!req.user) {
    res.status(401).json({ error: 'No token provided' });
    return null;
  }
  return req.user.userId;
}

/**
 * Log and answer a failed request with the status its error class maps to
 */
export function sendError(res: Response, error: unknown, fallback: string) {
  if (error instanceof BackupInProgressError || error instanceof StoreError) {
    res.status(409).json({ error: error.message });
    return;
  }
  if (error instanceof SnapshotError) {
    console.error(`${fallback}:`, error.message, error.stderr);
    res.status(502).json({ error: error.message });
    return;
  }

  console.error(`${fallback}:`, error);
  res.status(500).json({ error: fallback });
}
