import { Router } from 'express';
import type { CampaignService } from '../services/CampaignService';
import { sendError } from './httpErrors';
import { readCaller } from './payload';

export function createRefundRouter(service: CampaignService): Router {
  const router = Router();

  router.post('/campaigns/:id/refund', async (req, res) => {
    try {
      const caller = readCaller(req);
      const amount = await service.refund(req.params.id, caller);
      res.json({ id: req.params.id, backer: caller, amount: amount.toString() });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
