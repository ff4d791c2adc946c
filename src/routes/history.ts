import { Router } from 'express';
import type { ProductionHistory } from '../services/productionHistory';

export default function createHistoryRouter(history: ProductionHistory): Router {
  const router = Router();

  /**
   * @openapi
   * /api/history:
   *   get:
   *     summary: Recent samples of the production counter, oldest first.
   *     tags:
   *       - Monitoring
   *     responses:
   *       '200':
   *         description: Samples as `{ time: 'HH:MM', value }`.
   */
  router.get('/', (_req, res) => {
    res.json({ samples: history.list() });
  });

  return router;
}
