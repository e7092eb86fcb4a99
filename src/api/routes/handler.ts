import type { Request, Response } from 'express';
import type { User } from '../../shared/types.js';
import { errorMessage, userMessage } from '../../shared/errors.js';

type AuthedHandler = (req: Request, res: Response, user: User) => Promise<void>;

export function idParam(req: Request, name = 'id'): number | null {
  const value = Number(req.params[name]);
  return Number.isInteger(value) && value > 0 ? value : null;
}

/** Wrap an async route that needs the authenticated user. */
export function authed(label: string, fn: AuthedHandler) {
  return async (req: Request, res: Response): Promise<void> => {
    const user = req.user;
    if (!user) {
      res.status(401).json({ error: { kind: 'Unauthorized', message: 'Not authenticated' } });
      return;
    }
    try {
      await fn(req, res, user);
    } catch (err) {
      console.error(`[api] ${label} error:`, errorMessage(err));
      res.status(500).json({ error: { kind: 'Internal', message: userMessage('Internal') } });
    }
  };
}

export function badId(res: Response): void {
  res.status(400).json({ error: { kind: 'InvalidInput', message: 'Invalid id' } });
}
