import { Router } from 'express';
import type { CampaignService } from '../services/CampaignService';
import { sendError } from './httpErrors';
import { bodyOf, parseAmount, parseIndex, readCaller } from './payload';
import { serializeBacker } from './serialize';

export function createPledgeRouter(service: CampaignService): Router {
  const router = Router();

  router.post('/campaigns/:id/fund', async (req, res) => {
    try {
      const caller = readCaller(req);
      const body = bodyOf(req);
      const backer = await service.fund(
        req.params.id,
        caller,
        parseIndex(body.tierIndex, 'tierIndex'),
        parseAmount(body.value, 'value'),
      );
      res.json({
        ...serializeBacker(backer),
        status: service.getCampaignStatus(req.params.id),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/campaigns/:id/backers', (req, res) => {
    try {
      res.json(service.listBackers(req.params.id).map(serializeBacker));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/campaigns/:id/backers/:identity', (req, res) => {
    try {
      res.json(serializeBacker(service.getBacker(req.params.id, req.params.identity)));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/campaigns/:id/backers/:identity/tiers/:index', (req, res) => {
    try {
      const tierIndex = parseIndex(req.params.index, 'tierIndex');
      res.json({
        identity: req.params.identity,
        tierIndex,
        funded: service.hasFundedTier(req.params.id, req.params.identity, tierIndex),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
