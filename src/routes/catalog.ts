/**
 * Component Catalog Routes
 */

import { Router, Request, Response } from 'express';
import { getEngineContext } from '../services/context';
import { CatalogQuerySchema } from '../schemas/requests';
import { parseInput, route } from './respond';

const router = Router();

/**
 * GET /api/v1/catalog?itclass=MCB&q=acme&include_inactive=true
 * Active entries only unless include_inactive is set
 */
router.get('/', route('List catalog', async (req: Request, res: Response, signal) => {
  const { itclass, q, include_inactive } = parseInput(CatalogQuerySchema, req.query);
  const components = await getEngineContext().catalog.listEntries({
    itclass,
    search: q,
    activeOnly: !include_inactive
  }, signal);
  res.json({ success: true, count: components.length, components });
}));

router.get('/:componentId', route('Get component', async (req: Request, res: Response, signal) => {
  const component = await getEngineContext().catalog.getEntry(req.params.componentId, signal);
  res.json({ success: true, component });
}));

export default router;
