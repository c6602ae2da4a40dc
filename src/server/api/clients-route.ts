import { Router } from 'express';
import type { RelayContext } from './types.js';

export function makeClientsRoute(ctx: RelayContext): Router {
  const router = Router();
  router.get('/clients', (req, res) => {
    const clientType = typeof req.query.clientType === 'string' ? req.query.clientType : undefined;
    const clients = ctx.directory.list();
    res.json({ clients: clientType ? clients.filter((c) => c.clientType === clientType) : clients });
  });
  return router;
}
