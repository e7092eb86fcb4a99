import { Router } from 'express';
import { z } from 'zod';
import { TOPUP_REFERENCE_MAX, type CommandService } from '../../commands/index.js';
import { sendResult } from '../errors.js';
import { authed } from './handler.js';

// Room for `topup:api:<user id>:` in front of the client's key; ids stay below 2^53 (16 digits).
const CLIENT_REFERENCE_MAX = TOPUP_REFERENCE_MAX - 'topup:api::'.length - String(Number.MAX_SAFE_INTEGER).length;

const topUpSchema = z.object({
  amount: z.number().int().positive(),
  // Client-generated idempotency key; retries with the same key credit once.
  reference: z.string().min(1).max(CLIENT_REFERENCE_MAX),
});

export function balanceRouter(commands: CommandService): Router {
  const router = Router();

  // GET /api/balance
  router.get('/', authed('GET /balance', async (_req, res, user) => {
    const balance = await commands.getBalance(user.id);
    if (!balance.ok) {
      sendResult(res, balance);
      return;
    }
    const transactions = await commands.listMyTransactions(user.id);
    if (!transactions.ok) {
      sendResult(res, transactions);
      return;
    }
    res.json({ balance: balance.value, transactions: transactions.value });
  }));

  // POST /api/balance/topup
  router.post('/topup', authed('POST /balance/topup', async (req, res, user) => {
    const body = topUpSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: { kind: 'InvalidInput', message: body.error.issues[0]?.message ?? 'Invalid body' } });
      return;
    }
    sendResult(res, await commands.topUp(user.id, body.data.amount, `topup:api:${user.id}:${body.data.reference}`), 201);
  }));

  return router;
}
