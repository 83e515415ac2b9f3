import { describe, it, expect, vi, afterEach } from 'vitest';
import { getConfig, loadConfig, resetConfig } from './config.js';
import { ConfigError } from './types/errors.js';

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('loadConfig', () => {
    it('should fall back to defaults', () => {
      expect(loadConfig({})).toEqual({ maxInsights: 6, region: 'us-central1' });
    });

    it('should read values from the environment', () => {
      expect(loadConfig({ HEALTH_INSIGHT_LIMIT: '10', FUNCTIONS_REGION: 'europe-west1' })).toEqual({
        maxInsights: 10,
        region: 'europe-west1',
      });
    });

    it.each(['0', '21', '2.5', 'abc'])('should reject an insight limit of %s', (value) => {
      expect(() => loadConfig({ HEALTH_INSIGHT_LIMIT: value })).toThrow(ConfigError);
    });

    it('should list the failing variables', () => {
      try {
        loadConfig({ HEALTH_INSIGHT_LIMIT: '0' });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError);
        if (err instanceof ConfigError) {
          expect(err.statusCode).toBe(500);
          expect(err.code).toBe('CONFIG_ERROR');
          expect(err.details).toEqual([
            expect.objectContaining({ path: ['HEALTH_INSIGHT_LIMIT'] }),
          ]);
        }
      }
    });
  });

  describe('getConfig', () => {
    it('should cache the parsed configuration until reset', () => {
      vi.stubEnv('HEALTH_INSIGHT_LIMIT', '4');
      expect(getConfig().maxInsights).toBe(4);

      vi.stubEnv('HEALTH_INSIGHT_LIMIT', '8');
      expect(getConfig().maxInsights).toBe(4);

      resetConfig();
      expect(getConfig().maxInsights).toBe(8);
    });
  });
});
