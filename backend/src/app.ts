import express from 'express';
import cors from 'cors';
import { getCorsOrigins } from './config/constants';
import type { CampaignService } from './services/CampaignService';
import { createCampaignsRouter } from './routes/campaigns.routes';
import { createTiersRouter } from './routes/tiers.routes';
import { createPledgeRouter } from './routes/pledge.routes';
import { createFinalizeRouter } from './routes/finalize.routes';
import { createRefundRouter } from './routes/refund.routes';
import { createRegistryRouter } from './routes/registry.routes';

export function createApp(service: CampaignService) {
  const app = express();

  const isProduction = process.env.NODE_ENV === 'production';
  const allowDevLocalhost = !isProduction;
  const allowedOrigins = getCorsOrigins();
  const devLocalhostRegex = /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/;

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      if (!origin) {
        callback(null, true);
        return;
      }
      const isAllowed =
        allowedOrigins.includes(origin) || (allowDevLocalhost && devLocalhostRegex.test(origin));
      if (!isProduction) {
        console.log(`[cors] origin ${isAllowed ? 'allowed' : 'blocked'}: ${origin}`);
      }
      callback(null, isAllowed);
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Caller-Id'],
    optionsSuccessStatus: 204,
  };

  app.use(cors(corsOptions));
  app.options('*', cors(corsOptions));

  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', campaigns: service.registry.count(), timestamp: new Date().toISOString() });
  });

  app.use('/api', createRegistryRouter(service));
  app.use('/api', createCampaignsRouter(service));
  app.use('/api', createTiersRouter(service));
  app.use('/api', createPledgeRouter(service));
  app.use('/api', createFinalizeRouter(service));
  app.use('/api', createRefundRouter(service));

  return app;
}
