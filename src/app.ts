/**
 * Express application. Applies cross-cutting middleware, mounts feature routers, and exposes
 * auxiliary developer tooling such as Swagger UI.
 */
import path from 'node:path';
import cors from 'cors';
import express, { Express, NextFunction, Request, Response } from 'express';
import swaggerJsdoc from 'swagger-jsdoc';
import swaggerUi from 'swagger-ui-express';
import { CellDispatchError } from './errors';
import type { RegisterClient } from './services/commandClient';
import type { CompletionStore } from './services/completionStore';
import type { Dispatcher } from './services/dispatcher';
import type { JobCatalog } from './services/jobCatalog';
import type { OrderStore } from './services/orderStore';
import type { ProductionHistory } from './services/productionHistory';
import createDispatcherRouter from './routes/dispatcher';
import createHistoryRouter from './routes/history';
import createJobsRouter from './routes/jobs';
import createOrdersRouter from './routes/orders';
import createRegistersRouter from './routes/registers';

export interface AppDependencies {
  corsOrigins: string[] | true;
  client: RegisterClient;
  dispatcher: Dispatcher;
  catalog: JobCatalog;
  completions: CompletionStore | null;
  orders: OrderStore;
  history: ProductionHistory;
}

export function createApp({
  corsOrigins,
  client,
  dispatcher,
  catalog,
  completions,
  orders,
  history,
}: AppDependencies): Express {
  const app = express();

  app.use(cors({ origin: corsOrigins, credentials: true }));
  app.use(express.json());

  const swaggerSpec = swaggerJsdoc({
    definition: {
      openapi: '3.1.0',
      info: {
        title: 'Cell Dispatch API',
        version: '0.1.0',
        description:
          'Inspect the job dispatch loop, read or write job source registers over the command protocol, and book orders against the product counters.',
      },
    },
    apis: [path.resolve(__dirname, 'app.{ts,js}'), path.resolve(__dirname, 'routes/*.{ts,js}')],
  });

  app.use('/docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));

  /**
   * @openapi
   * /health:
   *   get:
   *     summary: Lightweight service health probe.
   *     tags:
   *       - System
   *     responses:
   *       '200':
   *         description: Service is ready to receive requests.
   */
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/dispatcher', createDispatcherRouter(dispatcher, completions));
  app.use('/api/registers', createRegistersRouter(client));
  app.use('/api/jobs', createJobsRouter(catalog));
  app.use('/api/orders', createOrdersRouter(orders, client));
  app.use('/api/history', createHistoryRouter(history));

  /**
   * Express error-handling middleware that normalizes thrown values into JSON responses.
   */
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = error instanceof Error ? error.message : 'Unknown error';
    res.status(500).json({ error: message, kind: error instanceof CellDispatchError ? error.name : undefined });
  });

  return app;
}
