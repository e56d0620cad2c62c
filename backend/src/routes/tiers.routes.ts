import { Router } from 'express';
import type { CampaignService } from '../services/CampaignService';
import { sendError } from './httpErrors';
import { bodyOf, parseAmount, parseIndex, parseRequiredText, readCaller } from './payload';
import { serializeTier } from './serialize';

export function createTiersRouter(service: CampaignService): Router {
  const router = Router();

  router.get('/campaigns/:id/tiers', (req, res) => {
    try {
      res.json(service.getTiers(req.params.id).map(serializeTier));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/campaigns/:id/tiers', async (req, res) => {
    try {
      const caller = readCaller(req);
      const body = bodyOf(req);
      const tier = await service.addTier(
        req.params.id,
        caller,
        parseRequiredText(body.name, 'name'),
        parseAmount(body.amount, 'amount'),
      );
      res.status(201).json(serializeTier(tier));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.delete('/campaigns/:id/tiers/:index', async (req, res) => {
    try {
      const caller = readCaller(req);
      await service.removeTier(req.params.id, caller, parseIndex(req.params.index, 'tierIndex'));
      res.json(service.getTiers(req.params.id).map(serializeTier));
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
