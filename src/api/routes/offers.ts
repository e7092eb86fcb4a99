import { Router } from 'express';
import { z } from 'zod';
import type { CommandService } from '../../commands/index.js';
import { sendResult } from '../errors.js';
import { authed, badId, idParam } from './handler.js';

const acceptSchema = z.object({
  channelId: z.number().int().positive().optional(),
});

export function offersRouter(commands: CommandService): Router {
  const router = Router();

  // GET /api/offers: campaigns the caller's verified channels can take
  router.get('/', authed('GET /offers', async (_req, res, user) => {
    sendResult(res, await commands.listOffers(user.id));
  }));

  // POST /api/offers/:id/accept
  router.post('/:id/accept', authed('POST /offers/:id/accept', async (req, res, user) => {
    const id = idParam(req);
    if (id === null) return badId(res);
    const body = acceptSchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: { kind: 'InvalidInput', message: body.error.issues[0]?.message ?? 'Invalid body' } });
      return;
    }
    sendResult(res, await commands.acceptOffer(user.id, id, body.data.channelId));
  }));

  // POST /api/offers/:id/withdraw: owner backs out before posting
  router.post('/:id/withdraw', authed('POST /offers/:id/withdraw', async (req, res, user) => {
    const id = idParam(req);
    if (id === null) return badId(res);
    sendResult(res, await commands.withdrawAcceptance(user.id, id));
  }));

  return router;
}
