import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { CommandService } from '../commands/index.js';
import { telegramAuth } from './middleware/auth.js';
import { campaignsRouter } from './routes/campaigns.js';
import { offersRouter } from './routes/offers.js';
import { channelsRouter } from './routes/channels.js';
import { balanceRouter } from './routes/balance.js';
import { errorMessage, userMessage } from '../shared/errors.js';

export interface ApiOptions {
  commands: CommandService;
  botToken: string;
}

export function createApp({ commands, botToken }: ApiOptions): express.Express {
  const app = express();

  // Trust proxy so req.ip returns the real client IP behind Nginx
  app.set('trust proxy', true);

  app.use(express.json());

  // Health check (no auth required)
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes (all require Telegram auth)
  const auth = telegramAuth(botToken, commands);
  app.use('/api/balance', auth, balanceRouter(commands));
  app.use('/api/campaigns', auth, campaignsRouter(commands));
  app.use('/api/offers', auth, offersRouter(commands));
  app.use('/api/channels', auth, channelsRouter(commands));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[api] Unhandled error:', errorMessage(err));
    res.status(500).json({ error: { kind: 'Internal', message: userMessage('Internal') } });
  });

  return app;
}

export function startApi(app: express.Express, port: number): void {
  app.listen(port, '0.0.0.0', () => {
    console.log(`[api] Server listening on port ${port}`);
  });
}
