/**
 * Register-level operations built from one or two command exchanges. The client admits one
 * operation at a time, so the dispatcher and the HTTP API never have two sessions open at once.
 */
import { exchangeFrame, Transport } from './commandSession';
import { EMPTY_PAYLOAD, frameValue, Opcode, payloadFor } from './frameCodec';

/** What the dispatcher and routes need from the job source. */
export interface RegisterClient {
  /** Writes `value` into register `selector`. */
  set(selector: number, value: number): Promise<void>;
  /** Reads register `selector`, then releases it. */
  query(selector: number): Promise<number>;
}

export class CommandClient implements RegisterClient {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly transport: Transport) {}

  get endpoint(): string {
    return this.transport.endpoint;
  }

  async set(selector: number, value: number): Promise<void> {
    // Encoding happens before queueing so an out-of-range value rejects without opening a connection.
    const payload = payloadFor(value);
    await this.serialize(async () => {
      await exchangeFrame(this.transport, { opcode: Opcode.SelectForSet, argument: selector, payload: EMPTY_PAYLOAD });
      await exchangeFrame(this.transport, { opcode: Opcode.CommitSet, argument: selector, payload });
    });
  }

  query(selector: number): Promise<number> {
    return this.serialize(async () => {
      const response = await exchangeFrame(this.transport, {
        opcode: Opcode.Query,
        argument: selector,
        payload: EMPTY_PAYLOAD,
      });
      await exchangeFrame(this.transport, { opcode: Opcode.Release, argument: selector, payload: EMPTY_PAYLOAD });
      return frameValue(response);
    });
  }

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.tail.then(operation);
    // The caller observes failures through `run`; the queue only needs to know it settled.
    this.tail = run.catch(() => undefined);
    return run;
  }
}
