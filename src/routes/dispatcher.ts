import { Router } from 'express';
import type { Dispatcher } from '../services/dispatcher';
import type { CompletionStore } from '../services/completionStore';

export default function createDispatcherRouter(dispatcher: Dispatcher, completions: CompletionStore | null): Router {
  const router = Router();

  /**
   * @openapi
   * /api/dispatcher:
   *   get:
   *     summary: Current dispatch loop state, slot counters and last dispatched job.
   *     tags:
   *       - Dispatch
   *     responses:
   *       '200':
   *         description: Dispatcher status snapshot.
   */
  router.get('/', (_req, res) => {
    res.json({ ...dispatcher.status(), pendingRuns: completions?.list() ?? [] });
  });

  return router;
}
