import { Router } from 'express';
import { EncodeRangeError, TransportError } from '../errors';
import type { RegisterClient } from '../services/commandClient';

const DEFAULT_FROM = 0;
const DEFAULT_TO = 18;

const parseSelector = (value: unknown): number | null => {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    return null;
  }
  const parsed = Number(value);
  return parsed <= 255 ? parsed : null;
};

const transportFailure = (error: unknown) => (error instanceof TransportError ? error.message : null);

export default function createRegistersRouter(client: RegisterClient): Router {
  const router = Router();

  /**
   * @openapi
   * /api/registers:
   *   get:
   *     summary: Read a contiguous range of job source registers.
   *     tags:
   *       - Registers
   *     parameters:
   *       - in: query
   *         name: from
   *         schema:
   *           type: integer
   *       - in: query
   *         name: to
   *         schema:
   *           type: integer
   *     responses:
   *       '200':
   *         description: Register values keyed by selector.
   *       '400':
   *         description: Invalid range.
   *       '502':
   *         description: The job source could not be reached.
   */
  router.get('/', async (req, res, next) => {
    const from = req.query.from === undefined ? DEFAULT_FROM : parseSelector(req.query.from);
    const to = req.query.to === undefined ? DEFAULT_TO : parseSelector(req.query.to);

    if (from === null || to === null || from > to) {
      res.status(400).json({ error: 'from and to must be selectors between 0 and 255 with from <= to.' });
      return;
    }

    try {
      const registers: Record<number, number> = {};
      for (let selector = from; selector <= to; selector += 1) {
        registers[selector] = await client.query(selector);
      }
      res.json({ registers });
    } catch (error) {
      const message = transportFailure(error);
      if (message) {
        res.status(502).json({ error: message });
        return;
      }
      next(error);
    }
  });

  /**
   * @openapi
   * /api/registers/{selector}:
   *   get:
   *     summary: Read one job source register.
   *     tags:
   *       - Registers
   *     responses:
   *       '200':
   *         description: Current register value.
   *       '502':
   *         description: The job source could not be reached.
   */
  router.get('/:selector', async (req, res, next) => {
    const selector = parseSelector(req.params.selector);
    if (selector === null) {
      res.status(400).json({ error: 'selector must be an integer between 0 and 255.' });
      return;
    }

    try {
      const value = await client.query(selector);
      res.json({ selector, value });
    } catch (error) {
      const message = transportFailure(error);
      if (message) {
        res.status(502).json({ error: message });
        return;
      }
      next(error);
    }
  });

  /**
   * @openapi
   * /api/registers/{selector}:
   *   post:
   *     summary: Write one job source register.
   *     tags:
   *       - Registers
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               value:
   *                 type: integer
   *     responses:
   *       '200':
   *         description: Value written.
   *       '400':
   *         description: Selector or value cannot be encoded.
   *       '502':
   *         description: The job source could not be reached.
   */
  router.post('/:selector', async (req, res, next) => {
    const selector = parseSelector(req.params.selector);
    const { value } = req.body ?? {};

    if (selector === null) {
      res.status(400).json({ error: 'selector must be an integer between 0 and 255.' });
      return;
    }

    if (typeof value !== 'number') {
      res.status(400).json({ error: 'value must be provided as a number.' });
      return;
    }

    try {
      await client.set(selector, value);
      res.json({ selector, value });
    } catch (error) {
      if (error instanceof EncodeRangeError) {
        res.status(400).json({ error: error.message });
        return;
      }
      const message = transportFailure(error);
      if (message) {
        res.status(502).json({ error: message });
        return;
      }
      next(error);
    }
  });

  return router;
}
