import { Router } from 'express';
import type { CampaignService } from '../services/CampaignService';
import { sendError } from './httpErrors';
import { readCaller } from './payload';

export function createFinalizeRouter(service: CampaignService): Router {
  const router = Router();

  router.post('/campaigns/:id/withdraw', async (req, res) => {
    try {
      const amount = await service.withdraw(req.params.id, readCaller(req));
      res.json({ id: req.params.id, amount: amount.toString(), balance: service.getBalance(req.params.id).toString() });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
