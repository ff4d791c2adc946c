import test from 'node:test';
import assert from 'node:assert/strict';
import type { Server } from 'node:http';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { createApp } from '../src/app';
import type { RegisterClient } from '../src/services/commandClient';
import { Dispatcher } from '../src/services/dispatcher';
import { JobCatalog } from '../src/services/jobCatalog';
import { OrderStore } from '../src/services/orderStore';
import { ProductionHistory, sampleInto } from '../src/services/productionHistory';
import { payloadFor } from '../src/services/frameCodec';
import { TransportError } from '../src/errors';

const DispatcherBody = z.object({
  state: z.string(),
  cycles: z.number(),
  slots: z.record(z.number()),
  lastDispatch: z.object({ index: z.number(), slot: z.number(), finishedAt: z.string().nullable() }),
  pendingRuns: z.array(z.unknown()),
});

const JobListBody = z.object({
  jobs: z.array(z.object({ index: z.number(), name: z.string(), variants: z.array(z.unknown()) })),
});

const JobBody = z.object({ variants: z.array(z.object({ label: z.string() })) });

const OrderBody = z.object({ id: z.string(), status: z.string() });

interface ApiContext {
  client: RegisterClient;
  history: ProductionHistory;
  ordersPath: string;
}

/** Register client over a plain map; selector 99 behaves like an unreachable job source. */
const memoryClient = (registers: Map<number, number>): RegisterClient => ({
  set: async (selector, value) => {
    payloadFor(value);
    if (selector === 99) {
      throw new TransportError('fake:1400', 'connect', 'connection refused');
    }
    registers.set(selector, value);
  },
  query: async (selector) => {
    if (selector === 99) {
      throw new TransportError('fake:1400', 'connect', 'connection refused');
    }
    return registers.get(selector) ?? 0;
  },
});

const withApi = async (
  run: (baseUrl: string, registers: Map<number, number>, context: ApiContext) => Promise<void>,
) => {
  const registers = new Map<number, number>([
    [2, 1],
    [3, 2],
  ]);
  const client = memoryClient(registers);
  const catalog = await JobCatalog.load(path.resolve(__dirname, 'fixtures/jobs.json'));
  const dispatcher = new Dispatcher(
    client,
    { executeJob: async () => undefined },
    {
      gateSelector: 1,
      armValue: 1,
      releaseValue: 0,
      readySelector: 2,
      jobIndexSelector: 3,
      pollIntervalMs: 10,
      sleep: async () => undefined,
    },
  );
  await dispatcher.runCycle();

  const directory = await fs.mkdtemp(path.join(os.tmpdir(), 'cell-dispatch-orders-'));
  const ordersPath = path.join(directory, 'orders.json');
  let nextOrder = 0;
  const orders = await OrderStore.load({
    filePath: ordersPath,
    productRegisters: { A: 16, B: 17, C: 18 },
    createId: () => {
      nextOrder += 1;
      return `order-${nextOrder}`;
    },
  });
  const history = new ProductionHistory(3, 5 * 60 * 1000, new Date(2026, 0, 1, 10, 0));

  const app = createApp({ corsOrigins: true, client, dispatcher, catalog, completions: null, orders, history });
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : 0;

  try {
    await run(`http://127.0.0.1:${port}`, registers, { client, history, ordersPath });
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await fs.rm(directory, { recursive: true, force: true });
  }
};

test('GET /health reports ok', async () => {
  await withApi(async (baseUrl) => {
    const response = await fetch(`${baseUrl}/health`);
    assert.strictEqual(response.status, 200);
    assert.deepEqual(await response.json(), { status: 'ok' });
  });
});

test('GET /api/dispatcher returns the state after one cycle', async () => {
  await withApi(async (baseUrl) => {
    const response = await fetch(`${baseUrl}/api/dispatcher`);
    const body = DispatcherBody.parse(await response.json());

    assert.strictEqual(response.status, 200);
    assert.strictEqual(body.state, 'polling');
    assert.strictEqual(body.cycles, 1);
    assert.deepEqual(body.slots, { 2: 1 });
    assert.strictEqual(body.lastDispatch.index, 2);
    assert.strictEqual(body.lastDispatch.slot, 0);
    assert.notStrictEqual(body.lastDispatch.finishedAt, null);
    assert.deepEqual(body.pendingRuns, []);
  });
});

test('GET /api/registers reads the requested range', async () => {
  await withApi(async (baseUrl) => {
    const response = await fetch(`${baseUrl}/api/registers?from=1&to=3`);
    assert.strictEqual(response.status, 200);
    assert.deepEqual(await response.json(), { registers: { 1: 1, 2: 1, 3: 2 } });
  });
});

test('GET /api/registers rejects an inverted range', async () => {
  await withApi(async (baseUrl) => {
    const response = await fetch(`${baseUrl}/api/registers?from=5&to=2`);
    assert.strictEqual(response.status, 400);
  });
});

test('POST /api/registers/:selector writes the value', async () => {
  await withApi(async (baseUrl, registers) => {
    const response = await fetch(`${baseUrl}/api/registers/7`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ value: 42 }),
    });

    assert.strictEqual(response.status, 200);
    assert.deepEqual(await response.json(), { selector: 7, value: 42 });
    assert.strictEqual(registers.get(7), 42);
  });
});

test('POST /api/registers/:selector answers 400 for values outside the signed 32-bit range', async () => {
  await withApi(async (baseUrl, registers) => {
    const response = await fetch(`${baseUrl}/api/registers/7`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ value: 2147483648 }),
    });

    assert.strictEqual(response.status, 400);
    assert.deepEqual(await response.json(), { error: 'Value 2147483648 is not an integer in the signed 32-bit range.' });
    assert.strictEqual(registers.has(7), false);
  });
});

test('register routes answer 502 when the job source is unreachable', async () => {
  await withApi(async (baseUrl) => {
    const response = await fetch(`${baseUrl}/api/registers/99`);
    assert.strictEqual(response.status, 502);
    assert.deepEqual(await response.json(), { error: 'Transport connect failed for fake:1400: connection refused' });
  });
});

test('GET /api/jobs summarises the catalogue and GET /api/jobs/:index returns one job', async () => {
  await withApi(async (baseUrl) => {
    const list = JobListBody.parse(await (await fetch(`${baseUrl}/api/jobs`)).json());
    assert.deepEqual(list.jobs[0], { index: 0, name: 'Home', variants: [{ slot: 0, label: 'home', statements: 1 }] });

    const job = await fetch(`${baseUrl}/api/jobs/2`);
    assert.strictEqual(job.status, 200);
    assert.strictEqual(JobBody.parse(await job.json()).variants[1].label, 'middle');

    const missing = await fetch(`${baseUrl}/api/jobs/5`);
    assert.strictEqual(missing.status, 404);
  });
});

const postJson = (url: string, body: unknown) =>
  fetch(url, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) });

const createOrder = async (baseUrl: string, quantities: Record<string, number>) => {
  const response = await postJson(`${baseUrl}/api/orders`, {
    customer: 'Test customer',
    deliveryDate: '2026-11-02',
    quantities,
  });
  assert.strictEqual(response.status, 201);
  return OrderBody.parse(await response.json()).id;
};

test('POST /api/orders creates a pending order and persists it', async () => {
  await withApi(async (baseUrl, _registers, { ordersPath }) => {
    const response = await postJson(`${baseUrl}/api/orders`, {
      customer: 'Test customer',
      deliveryDate: '2026-11-02',
      quantities: { A: 2, C: 5 },
    });
    const body = z.object({ createdAt: z.string() }).passthrough().parse(await response.json());

    assert.strictEqual(response.status, 201);
    assert.deepEqual(body, {
      id: 'order-1',
      customer: 'Test customer',
      deliveryDate: '2026-11-02',
      priority: 'normal',
      quantities: { A: 2, B: 0, C: 5 },
      status: 'pending',
      createdAt: body.createdAt,
    });

    const listed = z.object({ orders: z.array(OrderBody) }).parse(await (await fetch(`${baseUrl}/api/orders`)).json());
    assert.deepEqual(
      listed.orders.map((order) => order.id),
      ['order-1'],
    );
    const persisted = z.array(OrderBody).parse(JSON.parse(await fs.readFile(ordersPath, 'utf8')));
    assert.deepEqual(persisted.map((order) => order.id), ['order-1']);
  });
});

test('POST /api/orders rejects a missing customer and an order with no quantities', async () => {
  await withApi(async (baseUrl) => {
    const missing = await postJson(`${baseUrl}/api/orders`, { deliveryDate: '2026-11-02', quantities: { A: 1 } });
    assert.strictEqual(missing.status, 400);
    assert.deepEqual(await missing.json(), { error: 'Invalid order: customer: Required' });

    const empty = await postJson(`${baseUrl}/api/orders`, { customer: 'Test customer', deliveryDate: '2026-11-02' });
    assert.strictEqual(empty.status, 400);
    assert.deepEqual(await empty.json(), { error: 'An order needs at least one product with a quantity above 0.' });
  });
});

test('producing an order adds its quantities to the product counters once', async () => {
  await withApi(async (baseUrl, registers) => {
    registers.set(16, 10);
    const id = await createOrder(baseUrl, { A: 2, C: 5 });

    const produced = await fetch(`${baseUrl}/api/orders/${id}/exec?action=produce`, { method: 'POST' });
    assert.strictEqual(produced.status, 200);
    assert.deepEqual(await produced.json(), {
      ok: true,
      action: 'produce',
      results: {
        A: { register: 16, previous: 10, next: 12, quantity: 2 },
        C: { register: 18, previous: 0, next: 5, quantity: 5 },
      },
    });
    assert.strictEqual(registers.get(16), 12);
    assert.strictEqual(registers.get(18), 5);
    assert.strictEqual(registers.has(17), false);

    const again = await fetch(`${baseUrl}/api/orders/${id}/exec`, { method: 'POST' });
    assert.strictEqual(again.status, 409);
    assert.strictEqual(registers.get(16), 12);
  });
});

test('returning an order subtracts its quantities without going below zero', async () => {
  await withApi(async (baseUrl, registers) => {
    const id = await createOrder(baseUrl, { A: 4, B: 3 });

    const early = await fetch(`${baseUrl}/api/orders/${id}/exec?action=return`, { method: 'POST' });
    assert.strictEqual(early.status, 409);

    await fetch(`${baseUrl}/api/orders/${id}/exec?action=produce`, { method: 'POST' });
    registers.set(16, 1);

    const returned = await fetch(`${baseUrl}/api/orders/${id}/exec?action=return`, { method: 'POST' });
    assert.strictEqual(returned.status, 200);
    assert.strictEqual(registers.get(16), 0);
    assert.strictEqual(registers.get(17), 0);

    const listed = z.object({ orders: z.array(OrderBody) }).parse(await (await fetch(`${baseUrl}/api/orders`)).json());
    assert.deepEqual(listed.orders, [{ id, status: 'returned' }]);
  });
});

test('order execution answers 404 for unknown orders and 400 for unknown actions', async () => {
  await withApi(async (baseUrl) => {
    const id = await createOrder(baseUrl, { B: 1 });

    const unknownOrder = await fetch(`${baseUrl}/api/orders/nope/exec`, { method: 'POST' });
    assert.strictEqual(unknownOrder.status, 404);
    assert.deepEqual(await unknownOrder.json(), { error: 'Order nope does not exist.' });

    const unknownAction = await fetch(`${baseUrl}/api/orders/${id}/exec?action=cancel`, { method: 'POST' });
    assert.strictEqual(unknownAction.status, 400);
    assert.deepEqual(await unknownAction.json(), { error: 'action must be "produce" or "return".' });
  });
});

test('DELETE /api/orders/:id needs force once an order has been executed', async () => {
  await withApi(async (baseUrl) => {
    const pending = await createOrder(baseUrl, { A: 1 });
    const executed = await createOrder(baseUrl, { C: 1 });
    await fetch(`${baseUrl}/api/orders/${executed}/exec`, { method: 'POST' });

    assert.strictEqual((await fetch(`${baseUrl}/api/orders/${pending}`, { method: 'DELETE' })).status, 200);
    assert.strictEqual((await fetch(`${baseUrl}/api/orders/${pending}`, { method: 'DELETE' })).status, 404);

    const refused = await fetch(`${baseUrl}/api/orders/${executed}`, { method: 'DELETE' });
    assert.strictEqual(refused.status, 409);
    assert.deepEqual(await refused.json(), {
      error: `Order ${executed} is executed; only pending orders can be deleted without force.`,
    });

    const forced = await fetch(`${baseUrl}/api/orders/${executed}?force=true`, { method: 'DELETE' });
    assert.strictEqual(forced.status, 200);
    assert.deepEqual(await forced.json(), { ok: true });
    const listed = z.object({ orders: z.array(OrderBody) }).parse(await (await fetch(`${baseUrl}/api/orders`)).json());
    assert.deepEqual(listed.orders, []);
  });
});

test('GET /api/history returns the seeded samples followed by the latest reading', async () => {
  await withApi(async (baseUrl, registers, { client, history }) => {
    registers.set(7, 42);
    await sampleInto(history, client, 7, new Date(2026, 0, 1, 10, 5));

    const response = await fetch(`${baseUrl}/api/history`);
    assert.strictEqual(response.status, 200);
    assert.deepEqual(await response.json(), {
      samples: [
        { time: '09:55', value: 0 },
        { time: '10:00', value: 0 },
        { time: '10:05', value: 42 },
      ],
    });
  });
});
