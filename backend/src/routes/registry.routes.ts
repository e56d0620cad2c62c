import { Router } from 'express';
import type { CampaignService } from '../services/CampaignService';
import { sendError } from './httpErrors';
import { readCaller } from './payload';

export function createRegistryRouter(service: CampaignService): Router {
  const router = Router();

  router.get('/registry', (_req, res) => {
    res.json({
      owner: service.registry.owner,
      paused: service.registry.isPaused(),
      campaignCount: service.registry.count(),
    });
  });

  router.post('/registry/pause', async (req, res) => {
    try {
      const paused = await service.toggleRegistryPause(readCaller(req));
      res.json({ paused });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
