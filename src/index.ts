/**
 * Process bootstrap: loads the job catalogue, starts the HTTP API and the completion socket
 * server, then runs the dispatch loop until it fails or the process is asked to stop.
 */
import { createApp } from './app';
import { config } from './config';
import { CommandClient } from './services/commandClient';
import { TcpTransport } from './services/commandSession';
import { startCompletionSocketServer } from './services/completionSocketServer';
import { CompletionStore } from './services/completionStore';
import { Dispatcher } from './services/dispatcher';
import { JobCatalog } from './services/jobCatalog';
import { OrderStore } from './services/orderStore';
import { ProductionHistory, startHistorySampler } from './services/productionHistory';
import { UrJobExecutor } from './services/urJobExecutor';

async function main(): Promise<void> {
  const catalog = await JobCatalog.load(config.jobCatalogPath, config.dispatch.slotModulus);
  const client = new CommandClient(new TcpTransport(config.jobSource));

  const completions = config.robot.enabled && config.robot.completionHost ? new CompletionStore() : null;
  if (completions) {
    startCompletionSocketServer(completions, config.robot.completionPort);
  }

  const executor = new UrJobExecutor({
    catalog,
    robot: config.robot.enabled ? { host: config.robot.host, port: config.robot.port } : null,
    completion: completions
      ? {
          host: config.robot.completionHost,
          port: config.robot.completionPort,
          timeoutMs: config.robot.completionTimeoutMs,
          store: completions,
        }
      : null,
  });

  const dispatcher = new Dispatcher(client, executor, config.dispatch);
  const orders = await OrderStore.load(config.orders);
  const history = new ProductionHistory(config.history.length, config.history.intervalMs);
  const stopSampling = startHistorySampler(history, client, config.history);

  const app = createApp({
    corsOrigins: config.corsOrigins,
    client,
    dispatcher,
    catalog,
    completions,
    orders,
    history,
  });
  app.listen(config.port, () => {
    // eslint-disable-next-line no-console
    console.log(`Cell dispatch API listening on port ${config.port}`);
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    stopSampling();
    // eslint-disable-next-line no-console
    console.log(`${signal} received, releasing the cell`);
    dispatcher.release().then(
      () => process.exit(0),
      (error: unknown) => {
        // eslint-disable-next-line no-console
        console.error('Failed to release the cell:', error);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  // eslint-disable-next-line no-console
  console.log(
    `Dispatching from ${client.endpoint} (${catalog.list().length} jobs, robot ${config.robot.enabled ? 'enabled' : 'dry run'})`,
  );
  await dispatcher.run();
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Dispatcher stopped:', error);
  process.exit(1);
});
