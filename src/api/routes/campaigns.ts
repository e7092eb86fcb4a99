import { Router } from 'express';
import type { CommandService } from '../../commands/index.js';
import { sendResult } from '../errors.js';
import { authed, badId, idParam } from './handler.js';

export function campaignsRouter(commands: CommandService): Router {
  const router = Router();

  // GET /api/campaigns: the caller's campaigns, newest first
  router.get('/', authed('GET /campaigns', async (_req, res, user) => {
    sendResult(res, await commands.listMyCampaigns(user.id));
  }));

  // POST /api/campaigns: create a draft; body is validated by the command
  router.post('/', authed('POST /campaigns', async (req, res, user) => {
    sendResult(res, await commands.createCampaign(user.id, req.body), 201);
  }));

  // GET /api/campaigns/:id
  router.get('/:id', authed('GET /campaigns/:id', async (req, res, user) => {
    const id = idParam(req);
    if (id === null) return badId(res);
    sendResult(res, await commands.getCampaign(user.id, id));
  }));

  // POST /api/campaigns/:id/fund: hold the budget and publish the offer
  router.post('/:id/fund', authed('POST /campaigns/:id/fund', async (req, res, user) => {
    const id = idParam(req);
    if (id === null) return badId(res);
    sendResult(res, await commands.fundCampaign(user.id, id));
  }));

  // POST /api/campaigns/:id/cancel
  router.post('/:id/cancel', authed('POST /campaigns/:id/cancel', async (req, res, user) => {
    const id = idParam(req);
    if (id === null) return badId(res);
    sendResult(res, await commands.cancelCampaign(user.id, id));
  }));

  // GET /api/campaigns/:id/transactions
  router.get('/:id/transactions', authed('GET /campaigns/:id/transactions', async (req, res, user) => {
    const id = idParam(req);
    if (id === null) return badId(res);
    sendResult(res, await commands.campaignTransactions(user.id, id));
  }));

  return router;
}
