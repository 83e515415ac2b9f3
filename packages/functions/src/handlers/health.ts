import express from 'express';
import cors from 'cors';
import { stripPathPrefix } from '../middleware/strip-path-prefix.js';
import { errorHandler } from '../middleware/error-handler.js';
import { getConfig } from '../config.js';
import type { ApiSuccess } from '../shared.js';

interface HealthStatus {
  status: 'healthy';
  service: string;
  version: string;
  region: string;
  maxInsights: number;
  timestamp: string;
}

const SERVICE_NAME = 'health-scoring';
const SERVICE_VERSION = '1.0.0';

// Liveness probe only, so no body parser
const app = express();
app.use(cors({ origin: true }));
app.use(stripPathPrefix('health'));

app.get('/', (_req, res) => {
  const { region, maxInsights } = getConfig();
  const response: ApiSuccess<HealthStatus> = {
    success: true,
    data: {
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      region,
      maxInsights,
      timestamp: new Date().toISOString(),
    },
  };
  res.json(response);
});

app.use(errorHandler);

export const healthApp = app;
