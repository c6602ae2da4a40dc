import express, { type Express } from 'express';
import { makeStatusRoute } from './status-route.js';
import { makeClientsRoute } from './clients-route.js';
import type { RelayContext } from './types.js';

export function createStatusApp(ctx: RelayContext): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use('/api', makeStatusRoute(ctx));
  app.use('/api', makeClientsRoute(ctx));
  return app;
}
