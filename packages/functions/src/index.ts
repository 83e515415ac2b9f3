import type { Application } from 'express';
import { onRequest, type HttpsFunction, type HttpsOptions } from 'firebase-functions/v2/https';
import { loadConfig } from './config.js';

// Import handler apps
import { healthApp } from './handlers/health.js';
import { healthReportApp } from './handlers/health-report.js';

// Fail the cold start on invalid configuration
const config = loadConfig();

// Common options
const defaultOptions: HttpsOptions = {
  region: config.region,
  cors: true,
  invoker: 'public',
};

/** Register a dev/prod function pair from an Express app. */
function register(
  app: Application,
  options: HttpsOptions = defaultOptions
): { dev: HttpsFunction; prod: HttpsFunction } {
  return {
    dev: onRequest(options, app),
    prod: onRequest(options, app),
  };
}

// ============ Function Registration ============
const { dev: devHealth, prod: prodHealth } = register(healthApp);
const { dev: devHealthReport, prod: prodHealthReport } = register(healthReportApp);

export {
  devHealth, prodHealth,
  devHealthReport, prodHealthReport,
};
