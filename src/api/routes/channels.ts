import { Router } from 'express';
import { z } from 'zod';
import type { CommandService } from '../../commands/index.js';
import { sendResult } from '../errors.js';
import { authed, badId, idParam } from './handler.js';

const registerSchema = z.object({
  telegramChannelId: z.string().trim().min(1).max(64),
});

export function channelsRouter(commands: CommandService): Router {
  const router = Router();

  // GET /api/channels: the caller's channels
  router.get('/', authed('GET /channels', async (_req, res, user) => {
    sendResult(res, await commands.listMyChannels(user.id));
  }));

  // POST /api/channels: register and run a first verification
  router.post('/', authed('POST /channels', async (req, res, user) => {
    const body = registerSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: { kind: 'InvalidInput', message: body.error.issues[0]?.message ?? 'Invalid body' } });
      return;
    }
    sendResult(res, await commands.registerChannel(user.id, body.data.telegramChannelId), 201);
  }));

  // POST /api/channels/:id/verify
  router.post('/:id/verify', authed('POST /channels/:id/verify', async (req, res, user) => {
    const id = idParam(req);
    if (id === null) return badId(res);
    sendResult(res, await commands.verifyChannel(user.id, id));
  }));

  return router;
}
