/**
 * One command exchange with the register server: open a connection, send a single frame, read a
 * single frame back, close. Connections are never reused, so a late or stray response can only
 * ever land on a socket that is already gone.
 */
import net from 'net';
import { TransportError } from '../errors';
import { CommandFrame, FRAME_LENGTH, parseFrame, serializeFrame } from './frameCodec';

/** An open, exclusively owned connection to the job source. */
export interface Connection {
  send(frame: Buffer): Promise<void>;
  /** Resolves with exactly `length` bytes, or rejects if the peer closes first. */
  receive(length: number): Promise<Buffer>;
  close(): void;
}

/** Opens connections to one fixed endpoint. */
export interface Transport {
  readonly endpoint: string;
  connect(): Promise<Connection>;
}

export interface TcpTransportOptions {
  host: string;
  port: number;
  /** Inactivity timeout in milliseconds; `0` or omitted waits indefinitely. */
  timeoutMs?: number;
}

/**
 * Connection backed by a Node socket. Incoming bytes are buffered until a reader asks for them;
 * a socket error, timeout or close fails the pending and all later reads.
 */
class SocketConnection implements Connection {
  private received = Buffer.alloc(0);
  private failure: Error | null = null;
  private pending: { length: number; resolve: (data: Buffer) => void; reject: (error: Error) => void } | null =
    null;

  constructor(
    private readonly socket: net.Socket,
    private readonly endpoint: string,
  ) {
    socket.on('data', (chunk: Buffer) => {
      this.received = Buffer.concat([this.received, chunk]);
      this.flush();
    });
    socket.on('error', (error) => {
      this.fail(new TransportError(endpoint, 'receive', error.message, error));
    });
    socket.on('timeout', () => {
      this.fail(new TransportError(endpoint, 'receive', 'socket timed out'));
      socket.destroy();
    });
    socket.on('close', () => {
      this.fail(new TransportError(endpoint, 'receive', 'connection closed before a full frame arrived'));
    });
  }

  send(frame: Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.failure) {
        reject(new TransportError(this.endpoint, 'send', this.failure.message, this.failure));
        return;
      }
      this.socket.write(frame, (writeError) => {
        if (writeError) {
          reject(new TransportError(this.endpoint, 'send', writeError.message, writeError));
          return;
        }
        resolve();
      });
    });
  }

  receive(length: number): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      this.pending = { length, resolve, reject };
      this.flush();
    });
  }

  close(): void {
    this.pending = null;
    this.socket.end();
    this.socket.destroy();
  }

  private flush(): void {
    if (!this.pending) {
      return;
    }
    if (this.received.length >= this.pending.length) {
      const { length, resolve } = this.pending;
      this.pending = null;
      resolve(this.received.subarray(0, length));
      this.received = this.received.subarray(length);
      return;
    }
    if (this.failure) {
      const { reject } = this.pending;
      this.pending = null;
      reject(this.failure);
    }
  }

  private fail(error: Error): void {
    this.failure ??= error;
    this.flush();
  }
}

/**
 * Plain TCP transport to the register server.
 */
export class TcpTransport implements Transport {
  readonly endpoint: string;

  constructor(private readonly options: TcpTransportOptions) {
    this.endpoint = `${options.host}:${options.port}`;
  }

  connect(): Promise<Connection> {
    return new Promise<Connection>((resolve, reject) => {
      const socket = new net.Socket();

      const onConnectError = (error: Error) => {
        socket.destroy();
        reject(new TransportError(this.endpoint, 'connect', error.message, error));
      };
      const onConnectTimeout = () => onConnectError(new Error('connection attempt timed out'));
      socket.once('error', onConnectError);

      if (this.options.timeoutMs) {
        socket.setTimeout(this.options.timeoutMs);
        socket.once('timeout', onConnectTimeout);
      }

      socket.connect(this.options.port, this.options.host, () => {
        socket.off('error', onConnectError);
        socket.off('timeout', onConnectTimeout);
        resolve(new SocketConnection(socket, this.endpoint));
      });
    });
  }
}

/**
 * Runs exactly one request/response exchange on a connection of its own. The request is
 * serialized into a fresh zeroed frame, and the connection is closed on every exit path.
 */
export async function exchangeFrame(transport: Transport, request: CommandFrame): Promise<CommandFrame> {
  const outgoing = serializeFrame(request);
  const connection = await transport.connect();
  try {
    await connection.send(outgoing);
    const response = await connection.receive(FRAME_LENGTH);
    return parseFrame(response);
  } finally {
    connection.close();
  }
}
