import test from 'node:test';
import assert from 'node:assert/strict';
import { CommandClient } from '../src/services/commandClient';
import { Connection, exchangeFrame, Transport } from '../src/services/commandSession';
import { Opcode } from '../src/services/frameCodec';
import { EncodeRangeError, TransportError } from '../src/errors';

interface RecordedConnection {
  sent: number[][];
  closed: boolean;
}

/**
 * In-process transport answering each request with a canned response. Every `connect` creates a
 * new recorded connection so tests can check how many were opened and that each was closed.
 */
class FakeTransport implements Transport {
  readonly endpoint = 'fake:1400';
  readonly connections: RecordedConnection[] = [];
  failReceiveOn: number | null = null;

  constructor(private readonly respond: (request: Buffer) => number[]) {}

  async connect(): Promise<Connection> {
    const record: RecordedConnection = { sent: [], closed: false };
    const connectionNumber = this.connections.push(record);
    let lastRequest: Buffer | null = null;

    return {
      send: async (frame) => {
        record.sent.push([...frame]);
        lastRequest = frame;
      },
      receive: async (length) => {
        if (this.failReceiveOn === connectionNumber || !lastRequest) {
          throw new TransportError(this.endpoint, 'receive', 'peer closed');
        }
        return Buffer.from(this.respond(lastRequest)).subarray(0, length);
      },
      close: () => {
        record.closed = true;
      },
    };
  }
}

const ack = (request: Buffer) => [request[0] + 1, request[1], 0, 0, 0, 0, 0, 0];

test('set opens two connections: select then commit with the encoded payload', async () => {
  const transport = new FakeTransport(ack);
  const client = new CommandClient(transport);

  await client.set(4, 0x010203);

  assert.strictEqual(transport.connections.length, 2);
  assert.deepEqual(transport.connections[0].sent, [[Opcode.SelectForSet, 4, 0, 0, 0, 0, 0, 0]]);
  assert.deepEqual(transport.connections[1].sent, [[Opcode.CommitSet, 4, 0, 0, 0, 1, 2, 3]]);
  assert.ok(transport.connections.every((connection) => connection.closed), 'every connection should be closed');
});

test('set writes negative values as their low 24 bits with a zero top byte', async () => {
  const transport = new FakeTransport(ack);
  await new CommandClient(transport).set(9, -1);

  assert.deepEqual(transport.connections[1].sent, [[Opcode.CommitSet, 9, 0, 0, 0, 255, 255, 255]]);
});

test('query decodes the first response and releases the selector on a second connection', async () => {
  const transport = new FakeTransport((request) =>
    request[0] === Opcode.Query ? [0x41, request[1], 0, 0, 0, 0, 0x01, 0x2c] : ack(request),
  );
  const client = new CommandClient(transport);

  const value = await client.query(3);

  assert.strictEqual(value, 300);
  assert.strictEqual(transport.connections.length, 2);
  assert.deepEqual(transport.connections[0].sent, [[Opcode.Query, 3, 0, 0, 0, 0, 0, 0]]);
  assert.deepEqual(transport.connections[1].sent, [[Opcode.Release, 3, 0, 0, 0, 0, 0, 0]]);
  assert.ok(transport.connections.every((connection) => connection.closed));
});

test('query reads the top payload byte of the response as well', async () => {
  const transport = new FakeTransport((request) =>
    request[0] === Opcode.Query ? [0x41, request[1], 0, 0, 0xff, 0xff, 0xff, 0xfe] : ack(request),
  );
  assert.strictEqual(await new CommandClient(transport).query(1), -2);
});

test('set with an out-of-range value rejects with EncodeRangeError before connecting', async () => {
  const transport = new FakeTransport(ack);
  const client = new CommandClient(transport);

  const pending = client.set(1, 2147483648);
  const caught = await pending.catch((error: unknown) => error);

  assert.ok(caught instanceof EncodeRangeError);
  assert.strictEqual(caught.value, 2147483648);
  assert.strictEqual(transport.connections.length, 0);
  await client.set(2, 7);
  assert.strictEqual(transport.connections.length, 2, 'a rejected set must not block the queue');
});

test('a transport failure propagates and still closes the connection', async () => {
  const transport = new FakeTransport(ack);
  transport.failReceiveOn = 1;
  const client = new CommandClient(transport);

  await assert.rejects(client.query(5), TransportError);
  assert.strictEqual(transport.connections.length, 1, 'release must not be attempted after a failed query');
  assert.strictEqual(transport.connections[0].closed, true);
});

test('concurrent operations run one after another, never overlapping sessions', async () => {
  let open = 0;
  let maxOpen = 0;
  const inner = new FakeTransport(ack);
  const transport: Transport = {
    endpoint: inner.endpoint,
    connect: async () => {
      const connection = await inner.connect();
      open += 1;
      maxOpen = Math.max(maxOpen, open);
      return {
        send: connection.send,
        receive: async (length) => {
          await new Promise((resolve) => setImmediate(resolve));
          return connection.receive(length);
        },
        close: () => {
          open -= 1;
          connection.close();
        },
      };
    },
  };
  const client = new CommandClient(transport);

  await Promise.all([client.set(1, 1), client.query(2), client.set(3, 3)]);

  assert.strictEqual(maxOpen, 1);
  assert.deepEqual(
    inner.connections.map((connection) => connection.sent[0][0]),
    [Opcode.SelectForSet, Opcode.CommitSet, Opcode.Query, Opcode.Release, Opcode.SelectForSet, Opcode.CommitSet],
  );
});

test('a failed operation does not block the ones queued behind it', async () => {
  const transport = new FakeTransport(ack);
  transport.failReceiveOn = 1;
  const client = new CommandClient(transport);

  const failing = client.query(1);
  const following = client.set(2, 5);

  await assert.rejects(failing, TransportError);
  await following;
  assert.strictEqual(transport.connections.length, 3);
});

test('exchangeFrame serializes each request into a fresh zero-filled frame', async () => {
  const transport = new FakeTransport(ack);

  await exchangeFrame(transport, { opcode: Opcode.CommitSet, argument: 1, payload: [0, 0xaa, 0xbb, 0xcc] });
  await exchangeFrame(transport, { opcode: Opcode.Query, argument: 2, payload: [0, 0, 0, 0] });

  assert.deepEqual(transport.connections[1].sent, [[Opcode.Query, 2, 0, 0, 0, 0, 0, 0]]);
});
