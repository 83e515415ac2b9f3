/**
 * Runtime configuration, read from environment variables.
 */

import { z } from 'zod';
import { ConfigError } from './types/errors.js';
import { DEFAULT_MAX_INSIGHTS } from './services/health-insights.service.js';

const configSchema = z.object({
  HEALTH_INSIGHT_LIMIT: z.coerce.number().int().min(1).max(20).default(DEFAULT_MAX_INSIGHTS),
  FUNCTIONS_REGION: z.string().min(1).default('us-central1'),
});

export interface AppConfig {
  /** Maximum number of insights returned per report. */
  maxInsights: number;
  /** Region the HTTPS functions are deployed to. */
  region: string;
}

/**
 * Parse configuration from an environment.
 *
 * @throws ConfigError when a variable is set to an invalid value
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError('Invalid environment configuration', result.error.issues);
  }
  return {
    maxInsights: result.data.HEALTH_INSIGHT_LIMIT,
    region: result.data.FUNCTIONS_REGION,
  };
}

let cachedConfig: AppConfig | null = null;

/** Configuration for the current process, parsed once. */
export function getConfig(): AppConfig {
  if (cachedConfig === null) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
