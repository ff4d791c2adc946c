/**
 * TCP peer for the command protocol, backed by a `RegisterTable`. Stands in for the PLC-side job
 * source on the bench and in integration tests.
 */
import net from 'net';
import {
  EMPTY_PAYLOAD,
  encodePayload,
  FRAME_LENGTH,
  frameValue,
  Opcode,
  parseFrame,
  responseOpcodeFor,
  serializeFrame,
} from './frameCodec';
import { RegisterTable } from './registerTable';

export interface RegisterServerHandle {
  server: net.Server;
  table: RegisterTable;
  /** Port actually bound, useful when listening on port 0. */
  port: number;
  close(): Promise<void>;
}

/**
 * Builds the response to one request frame, or `null` when the frame should be ignored.
 * Query responses carry the register's full 32-bit value.
 */
export function respondToFrame(table: RegisterTable, frame: Buffer): Buffer | null {
  const request = parseFrame(frame);
  const { argument } = request;

  switch (request.opcode) {
    case Opcode.Query: {
      const value = table.get(argument);
      const payload = Buffer.alloc(4);
      payload.writeInt32BE(value);
      return serializeFrame({
        opcode: responseOpcodeFor(Opcode.Query),
        argument,
        payload: [payload[0], payload[1], payload[2], payload[3]],
      });
    }
    case Opcode.Release:
      table.get(argument);
      return serializeFrame({ opcode: responseOpcodeFor(Opcode.Release), argument, payload: EMPTY_PAYLOAD });
    case Opcode.SelectForSet:
      table.get(argument);
      return serializeFrame({ opcode: responseOpcodeFor(Opcode.SelectForSet), argument, payload: EMPTY_PAYLOAD });
    case Opcode.CommitSet:
      table.set(argument, frameValue(request));
      return serializeFrame({ opcode: responseOpcodeFor(Opcode.CommitSet), argument, payload: EMPTY_PAYLOAD });
    default:
      return null;
  }
}

export const startRegisterServer = (
  port: number,
  table: RegisterTable = new RegisterTable(),
  host = '0.0.0.0',
): Promise<RegisterServerHandle> => {
  const server = net.createServer((socket) => {
    let buffer = Buffer.alloc(0);

    socket.on('data', (chunk: Buffer) => {
      buffer = Buffer.concat([buffer, chunk]);

      while (buffer.length >= FRAME_LENGTH) {
        const frame = buffer.subarray(0, FRAME_LENGTH);
        buffer = buffer.subarray(FRAME_LENGTH);

        try {
          const response = respondToFrame(table, frame);
          if (response) {
            socket.write(response);
          }
        } catch (error) {
          // eslint-disable-next-line no-console
          console.error('Rejected register request, closing connection:', error instanceof Error ? error.message : error);
          socket.destroy();
          return;
        }
      }
    });

    socket.on('error', (error) => {
      // eslint-disable-next-line no-console
      console.error('Register socket connection error:', error);
    });
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      server.on('error', (error) => {
        // eslint-disable-next-line no-console
        console.error('Register server error:', error);
      });
      const address = server.address();
      const boundPort = typeof address === 'object' && address ? address.port : port;
      resolve({
        server,
        table,
        port: boundPort,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.close((error) => (error ? rejectClose(error) : resolveClose()));
          }),
      });
    });
  });
};

/** Parses an `index=value` (or `index value`) line typed into the simulator console. */
export function parseRegisterAssignment(line: string): { index: number; value: number } | null {
  const match = line.trim().match(/^(\d+)\s*(?:=|\s)\s*(-?\d+)$/);
  if (!match) {
    return null;
  }
  const index = Number(match[1]);
  const value = Number(match[2]);
  if (!encodePayload(value).ok) {
    return null;
  }
  return { index, value };
}
