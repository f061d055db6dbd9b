import express from 'express';
import cors from 'cors';

import catalogRouter from './routes/catalog';
import { getMetricsSnapshot, metricsContentType } from './observability/metrics';
import { errorMessage } from './observability/logger';
import { applyRequestTracing } from './observability/requestTracing';

export function createApp(): express.Express {
  const app = express();

  app.use(applyRequestTracing());
  app.use(cors());
  app.use(express.json());

  app.use('/api/catalog', catalogRouter);

  app.get('/', (_req, res) => {
    res.send('Orbit Catalog – solar-system bodies at J2000');
  });

  app.get('/metrics', async (_req, res) => {
    try {
      const metrics = await getMetricsSnapshot();
      res.setHeader('Content-Type', metricsContentType);
      res.send(metrics);
    } catch (err) {
      res.status(500).send(`# Metrics error: ${errorMessage(err)}`);
    }
  });

  return app;
}
