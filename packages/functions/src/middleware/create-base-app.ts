import express from 'express';
import cors from 'cors';
import { stripPathPrefix } from './strip-path-prefix.js';

/**
 * Create an Express app with the standard middleware stack.
 */
export function createBaseApp(resourceName: string): express.Application {
  const app = express();
  app.use(cors({ origin: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(stripPathPrefix(resourceName));
  return app;
}
