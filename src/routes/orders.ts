import { Response, Router } from 'express';
import {
  EncodeRangeError,
  InvalidOrderError,
  OrderNotFoundError,
  OrderStateError,
  TransportError,
} from '../errors';
import type { RegisterClient } from '../services/commandClient';
import { OrderActionSchema, OrderInputSchema, OrderStore } from '../services/orderStore';

/** Maps order failures to a status code; anything else goes to the error middleware. */
const statusFor = (error: unknown): number | null => {
  if (error instanceof OrderNotFoundError) {
    return 404;
  }
  if (error instanceof OrderStateError) {
    return 409;
  }
  if (error instanceof InvalidOrderError || error instanceof EncodeRangeError) {
    return 400;
  }
  if (error instanceof TransportError) {
    return 502;
  }
  return null;
};

const answerFailure = (res: Response, error: unknown): boolean => {
  const status = statusFor(error);
  if (status === null || !(error instanceof Error)) {
    return false;
  }
  res.status(status).json({ error: error.message });
  return true;
};

export default function createOrdersRouter(store: OrderStore, client: RegisterClient): Router {
  const router = Router();

  /**
   * @openapi
   * /api/orders:
   *   get:
   *     summary: List all orders, oldest first.
   *     tags:
   *       - Orders
   *     responses:
   *       '200':
   *         description: Orders with their status.
   */
  router.get('/', (_req, res) => {
    res.json({ orders: store.list() });
  });

  /**
   * @openapi
   * /api/orders:
   *   post:
   *     summary: Create a pending order.
   *     tags:
   *       - Orders
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [customer, deliveryDate]
   *             properties:
   *               customer:
   *                 type: string
   *               deliveryDate:
   *                 type: string
   *               priority:
   *                 type: string
   *               quantities:
   *                 type: object
   *                 properties:
   *                   A:
   *                     type: integer
   *                   B:
   *                     type: integer
   *                   C:
   *                     type: integer
   *     responses:
   *       '201':
   *         description: Order created.
   *       '400':
   *         description: Invalid body, or every quantity is zero.
   */
  router.post('/', async (req, res, next) => {
    const parsed = OrderInputSchema.safeParse(req.body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<body>'}: ${issue.message}`);
      res.status(400).json({ error: `Invalid order: ${issues.join('; ')}` });
      return;
    }

    try {
      res.status(201).json(await store.create(parsed.data));
    } catch (error) {
      if (!answerFailure(res, error)) {
        next(error);
      }
    }
  });

  /**
   * @openapi
   * /api/orders/{id}:
   *   delete:
   *     summary: Delete an order. Only pending orders unless `force=true`.
   *     tags:
   *       - Orders
   *     parameters:
   *       - in: query
   *         name: force
   *         schema:
   *           type: boolean
   *     responses:
   *       '200':
   *         description: Order deleted; counters are left untouched.
   *       '404':
   *         description: Unknown order.
   *       '409':
   *         description: The order is no longer pending and force was not given.
   */
  router.delete('/:id', async (req, res, next) => {
    const force = req.query.force === 'true' || req.query.force === '1';

    try {
      await store.remove(req.params.id, force);
      res.json({ ok: true });
    } catch (error) {
      if (!answerFailure(res, error)) {
        next(error);
      }
    }
  });

  /**
   * @openapi
   * /api/orders/{id}/exec:
   *   post:
   *     summary: Produce a pending order or return an executed one, adjusting the product counters.
   *     tags:
   *       - Orders
   *     parameters:
   *       - in: query
   *         name: action
   *         schema:
   *           type: string
   *           enum: [produce, return]
   *           default: produce
   *     responses:
   *       '200':
   *         description: Counter changes per product.
   *       '400':
   *         description: Unknown action, or the order carries no quantities.
   *       '404':
   *         description: Unknown order.
   *       '409':
   *         description: The order's status does not allow the action.
   *       '502':
   *         description: The job source could not be reached.
   */
  router.post('/:id/exec', async (req, res, next) => {
    const action = OrderActionSchema.default('produce').safeParse(req.query.action);
    if (!action.success) {
      res.status(400).json({ error: 'action must be "produce" or "return".' });
      return;
    }

    try {
      const execution = await store.execute(req.params.id, action.data, client);
      res.json({ ok: true, ...execution });
    } catch (error) {
      if (!answerFailure(res, error)) {
        next(error);
      }
    }
  });

  return router;
}
