import { Router } from 'express';
import type { JobCatalog } from '../services/jobCatalog';

export default function createJobsRouter(catalog: JobCatalog): Router {
  const router = Router();

  /**
   * @openapi
   * /api/jobs:
   *   get:
   *     summary: List the motion jobs the cell can run and their slot variants.
   *     tags:
   *       - Dispatch
   *     responses:
   *       '200':
   *         description: Job catalogue summary.
   */
  router.get('/', (_req, res) => {
    res.json({
      jobs: catalog.list().map((job) => ({
        index: job.index,
        name: job.name,
        variants: job.variants.map((variant, slot) => ({ slot, label: variant.label, statements: variant.script.length })),
      })),
    });
  });

  /**
   * @openapi
   * /api/jobs/{index}:
   *   get:
   *     summary: Full definition of one job, including its URScript variants.
   *     tags:
   *       - Dispatch
   *     responses:
   *       '200':
   *         description: Job definition.
   *       '404':
   *         description: Unknown job index.
   */
  router.get('/:index', (req, res) => {
    const index = Number(req.params.index);
    const job = Number.isInteger(index) ? catalog.get(index) : undefined;

    if (!job) {
      res.status(404).json({ error: 'Unknown job index.' });
      return;
    }

    res.json(job);
  });

  return router;
}
