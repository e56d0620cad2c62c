import { Router } from 'express';
import type { CampaignService } from '../services/CampaignService';
import { sendError } from './httpErrors';
import {
  bodyOf,
  parseAmount,
  parseOptionalText,
  parsePositiveInteger,
  parseRequiredText,
  readCaller,
} from './payload';
import { serializeCampaign, serializeRegistryRecord, serializeTransfer } from './serialize';

export function createCampaignsRouter(service: CampaignService): Router {
  const router = Router();

  router.post('/campaigns', async (req, res) => {
    try {
      const caller = readCaller(req);
      const body = bodyOf(req);
      const summary = await service.createCampaign(caller, {
        name: parseRequiredText(body.name, 'name'),
        description: parseOptionalText(body.description, 'description'),
        goal: parseAmount(body.goal, 'goal'),
        durationDays: parsePositiveInteger(body.durationDays, 'durationDays'),
      });
      res.status(201).json(serializeCampaign(summary));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/campaigns', (req, res) => {
    try {
      const creator = typeof req.query.creator === 'string' ? req.query.creator.trim() : '';
      const records = creator ? service.listCampaignsByCreator(creator) : service.listCampaigns();
      res.json(records.map(serializeRegistryRecord));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/creators/:creator/campaigns', (req, res) => {
    try {
      res.json(service.listCampaignsByCreator(req.params.creator).map(serializeRegistryRecord));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/campaigns/:id', (req, res) => {
    try {
      res.json(serializeCampaign(service.getCampaign(req.params.id)));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/campaigns/:id/status', (req, res) => {
    try {
      const id = req.params.id;
      res.json({
        id,
        status: service.getCampaignStatus(id),
        balance: service.getBalance(id).toString(),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/campaigns/:id/history', async (req, res) => {
    try {
      res.json(await service.getCampaignHistory(req.params.id));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/campaigns/:id/transfers', async (req, res) => {
    try {
      const transfers = await service.listTransfers(req.params.id);
      res.json(transfers.map(serializeTransfer));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/campaigns/:id/pause', async (req, res) => {
    try {
      const paused = await service.togglePause(req.params.id, readCaller(req));
      res.json({ id: req.params.id, paused });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/campaigns/:id/extend', async (req, res) => {
    try {
      const caller = readCaller(req);
      const days = parsePositiveInteger(bodyOf(req).days, 'days');
      const deadline = await service.extendDeadline(req.params.id, caller, days);
      res.json({ id: req.params.id, deadline, deadlineAt: new Date(deadline).toISOString() });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
