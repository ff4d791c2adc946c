/**
 * Customer orders booked against the product counter registers. Producing an order adds its
 * quantities to the counters; returning it takes them off again. The list is persisted to a JSON
 * file after every change.
 */
import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { InvalidOrderError, OrderNotFoundError, OrderStateError } from '../errors';
import type { RegisterClient } from './commandClient';

export const PRODUCTS = ['A', 'B', 'C'] as const;
export type Product = (typeof PRODUCTS)[number];

const quantityField = z.number().int().min(0).default(0);

export const OrderInputSchema = z.object({
  quantities: z.object({ A: quantityField, B: quantityField, C: quantityField }).default({}),
  priority: z.string().min(1).default('normal'),
  deliveryDate: z.string().min(1),
  customer: z.string().min(1),
});

export const OrderStatusSchema = z.enum(['pending', 'executed', 'returned']);

export const OrderSchema = OrderInputSchema.extend({
  id: z.string().min(1),
  status: OrderStatusSchema,
  createdAt: z.string(),
});

export const OrderActionSchema = z.enum(['produce', 'return']);

export type OrderInput = z.infer<typeof OrderInputSchema>;
export type Order = z.infer<typeof OrderSchema>;
export type OrderAction = z.infer<typeof OrderActionSchema>;

/** One counter change made while executing an order. */
export interface CounterAdjustment {
  register: number;
  previous: number;
  next: number;
  quantity: number;
}

export interface OrderExecution {
  action: OrderAction;
  results: Partial<Record<Product, CounterAdjustment>>;
}

export interface OrderStoreOptions {
  filePath: string;
  productRegisters: Record<Product, number>;
  createId?: () => string;
}

const totalQuantity = (order: OrderInput): number =>
  PRODUCTS.reduce((sum, product) => sum + order.quantities[product], 0);

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export class OrderStore {
  private orders: Order[];
  private writes: Promise<void> = Promise.resolve();
  private readonly executing = new Set<string>();
  private readonly createId: () => string;

  constructor(
    private readonly options: OrderStoreOptions,
    orders: Order[] = [],
  ) {
    this.orders = orders;
    this.createId = options.createId ?? (() => randomUUID().slice(0, 8));
  }

  /** Reads the persisted list, starting empty when the file does not exist yet. */
  static async load(options: OrderStoreOptions): Promise<OrderStore> {
    let content: string;
    try {
      content = await fs.readFile(path.resolve(options.filePath), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return new OrderStore(options);
      }
      throw error;
    }

    const result = z.array(OrderSchema).safeParse(JSON.parse(content));
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
      throw new Error(`Invalid order file ${options.filePath}: ${issues.join('; ')}`);
    }
    return new OrderStore(options, result.data);
  }

  list(): Order[] {
    return [...this.orders];
  }

  get(id: string): Order | undefined {
    return this.orders.find((order) => order.id === id);
  }

  async create(input: OrderInput): Promise<Order> {
    if (totalQuantity(input) === 0) {
      throw new InvalidOrderError('An order needs at least one product with a quantity above 0.');
    }
    const order: Order = {
      ...input,
      id: this.createId(),
      status: 'pending',
      createdAt: new Date().toISOString(),
    };
    this.orders.push(order);
    await this.persist();
    return order;
  }

  /**
   * Deletes an order. Without `force` only pending orders may go; a forced delete leaves any
   * counters the order already changed as they are.
   */
  async remove(id: string, force = false): Promise<void> {
    const order = this.require(id);
    if (this.executing.has(id)) {
      throw new OrderStateError(`Order ${id} is being executed.`);
    }
    if (!force && order.status !== 'pending') {
      throw new OrderStateError(`Order ${id} is ${order.status}; only pending orders can be deleted without force.`);
    }
    this.orders = this.orders.filter((candidate) => candidate.id !== id);
    await this.persist();
  }

  /**
   * Applies an order to the product counters: `produce` moves a pending order to executed and adds
   * each quantity, `return` moves an executed order to returned and subtracts, never below zero.
   * Each counter is read and then written through `client`. The status only changes once every
   * counter has been written.
   */
  async execute(id: string, action: OrderAction, client: RegisterClient): Promise<OrderExecution> {
    const order = this.require(id);
    if (this.executing.has(id)) {
      throw new OrderStateError(`Order ${id} is already being executed.`);
    }
    if (action === 'produce' && order.status !== 'pending') {
      throw new OrderStateError(`Order ${id} is ${order.status}; only pending orders can be produced.`);
    }
    if (action === 'return' && order.status !== 'executed') {
      throw new OrderStateError(`Order ${id} is ${order.status}; only executed orders can be returned.`);
    }
    if (totalQuantity(order) === 0) {
      throw new InvalidOrderError(`Order ${id} has no products to ${action}.`);
    }

    this.executing.add(id);
    try {
      const results: OrderExecution['results'] = {};
      for (const product of PRODUCTS) {
        const quantity = order.quantities[product];
        if (quantity <= 0) {
          continue;
        }
        const register = this.options.productRegisters[product];
        const previous = await client.query(register);
        const next = action === 'produce' ? previous + quantity : Math.max(0, previous - quantity);
        await client.set(register, next);
        results[product] = { register, previous, next, quantity };
      }

      order.status = action === 'produce' ? 'executed' : 'returned';
      await this.persist();
      // eslint-disable-next-line no-console
      console.log(`Order ${id} ${order.status} (${Object.keys(results).join(', ')})`);
      return { action, results };
    } finally {
      this.executing.delete(id);
    }
  }

  private require(id: string): Order {
    const order = this.get(id);
    if (!order) {
      throw new OrderNotFoundError(id);
    }
    return order;
  }

  private persist(): Promise<void> {
    const content = `${JSON.stringify(this.orders, null, 2)}\n`;
    const write = this.writes.then(() => fs.writeFile(path.resolve(this.options.filePath), content, 'utf8'));
    // Writes land in call order; each caller still sees its own failure through `write`.
    this.writes = write.catch(() => undefined);
    return write;
  }
}
