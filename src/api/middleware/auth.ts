import crypto from 'crypto';
import { z } from 'zod';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { CommandService } from '../../commands/index.js';
import type { User } from '../../shared/types.js';
import { errorMessage } from '../../shared/errors.js';

const telegramUserSchema = z.object({
  id: z.number().int(),
  first_name: z.string(),
  last_name: z.string().optional(),
  username: z.string().optional(),
});

export type TelegramUser = z.infer<typeof telegramUserSchema>;

declare global {
  namespace Express {
    interface Request {
      telegramUser?: TelegramUser;
      user?: User;
    }
  }
}

/**
 * Validate Telegram Mini App initData.
 * See: https://core.telegram.org/bots/webapps#validating-data-received-via-the-mini-app
 */
export function validateInitData(initData: string, botToken: string): TelegramUser | null {
  const params = new URLSearchParams(initData);
  const hash = params.get('hash');
  if (!hash) return null;

  // Remove hash from params and sort alphabetically
  params.delete('hash');
  const dataCheckString = Array.from(params.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${value}`)
    .join('\n');

  const secretKey = crypto
    .createHmac('sha256', 'WebAppData')
    .update(botToken)
    .digest();

  const computedHash = crypto
    .createHmac('sha256', secretKey)
    .update(dataCheckString)
    .digest('hex');

  if (computedHash !== hash) return null;

  const userStr = params.get('user');
  if (!userStr) return null;

  try {
    const parsed = telegramUserSchema.safeParse(JSON.parse(userStr));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Express middleware to authenticate Telegram Mini App requests and resolve
 * the engine user behind them. Expects `Authorization: tma <initData>` header.
 */
export function telegramAuth(botToken: string, commands: CommandService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('tma ')) {
      res.status(401).json({ error: { kind: 'Unauthorized', message: 'Missing Telegram Mini App authorization' } });
      return;
    }

    const telegramUser = validateInitData(authHeader.slice(4), botToken);
    if (!telegramUser) {
      res.status(401).json({ error: { kind: 'Unauthorized', message: 'Invalid Telegram Mini App authorization' } });
      return;
    }

    commands.ensureUser(telegramUser.id, telegramUser.username ?? null)
      .then((result) => {
        if (!result.ok) {
          res.status(500).json({ error: result.error });
          return;
        }
        req.telegramUser = telegramUser;
        req.user = result.value;
        next();
      })
      .catch((err: unknown) => {
        console.error('[api] Failed to resolve user:', errorMessage(err));
        next(err);
      });
  };
}
