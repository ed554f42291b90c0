/**
 * Socket Transport for the ONDD control socket
 *
 * Owns one connection to the daemon (Unix socket or TCP), writes request
 * lines and accumulates response bytes until a full frame is available.
 *
 * @module ipc/transport
 */

import { createConnection, type Socket } from 'net';
import { expandPath } from '../utils/paths.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { AbortError, ConnectionError, TimeoutError } from './errors.js';
import { DEFAULT_CONNECT_TIMEOUT, END_OF_RESPONSE } from './protocol.js';

// =============================================================================
// Types
// =============================================================================

export type Endpoint =
  | { kind: 'unix'; path: string }
  | { kind: 'tcp'; host: string; port: number };

/**
 * A byte channel to the daemon carrying one exchange at a time.
 */
export interface Transport {
  /** Whether the connection is currently open */
  readonly isOpen: boolean;

  /** Establish the connection; no-op when already open */
  open(options?: OpenOptions): Promise<void>;

  /** Write a complete request line */
  send(data: string): Promise<void>;

  /** Wait for one complete response frame and return it without its end marker */
  receive(options: ReceiveOptions): Promise<Buffer>;

  /** Release the connection; safe to call repeatedly */
  close(): void;
}

export interface OpenOptions {
  /** Aborting while connecting destroys the socket and rejects with AbortError */
  signal?: AbortSignal;

  /** Command the connection is opened for, named in abort errors */
  command?: string;
}

export interface ReceiveOptions {
  /** Time allowed for the full frame to arrive, in milliseconds */
  timeoutMs: number;

  /** Aborting closes the connection and rejects with AbortError */
  signal?: AbortSignal;

  /** Command awaiting the response, named in timeout and abort errors */
  command?: string;
}

export interface SocketTransportOptions {
  /** Connect timeout in milliseconds (default: 5000) */
  connectTimeout?: number;

  logger?: Logger;
}

export type TransportFactory = (endpoint: Endpoint, options: SocketTransportOptions) => Transport;

type PendingReceive = {
  resolve: (frame: Buffer) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
};

// =============================================================================
// Endpoint Parsing
// =============================================================================

/**
 * Parse an endpoint string.
 *
 * Paths (anything with a slash or a leading ~) are Unix sockets; `host:port`
 * and `[v6]:port` are TCP; any other string is taken as a socket path.
 */
export function parseEndpoint(endpoint: string): Endpoint {
  if (endpoint.includes('/') || endpoint.startsWith('~')) {
    return { kind: 'unix', path: expandPath(endpoint) };
  }

  const match = /^(?:\[([^\]]+)\]|([^:]+)):(\d{1,5})$/.exec(endpoint);
  if (match) {
    const port = Number(match[3]);
    if (port > 0 && port <= 65535) {
      return { kind: 'tcp', host: match[1] ?? match[2], port };
    }
  }

  return { kind: 'unix', path: endpoint };
}

/**
 * Format an endpoint for messages.
 */
export function describeEndpoint(endpoint: Endpoint): string {
  if (endpoint.kind === 'unix') {
    return endpoint.path;
  }
  return endpoint.host.includes(':')
    ? `[${endpoint.host}]:${endpoint.port}`
    : `${endpoint.host}:${endpoint.port}`;
}

// =============================================================================
// SocketTransport Class
// =============================================================================

export class SocketTransport implements Transport {
  private socket: Socket | null = null;
  private opening: Promise<void> | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private pending: PendingReceive | null = null;
  private readonly endpoint: Endpoint;
  private readonly address: string;
  private readonly connectTimeout: number;
  private readonly logger: Logger;

  constructor(endpoint: Endpoint, options: SocketTransportOptions = {}) {
    this.endpoint = endpoint;
    this.address = describeEndpoint(endpoint);
    this.connectTimeout = options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT;
    this.logger = options.logger ?? silentLogger;
  }

  get isOpen(): boolean {
    return this.socket !== null;
  }

  // ===========================================================================
  // Connection Management
  // ===========================================================================

  async open({ signal, command }: OpenOptions = {}): Promise<void> {
    if (this.socket) {
      return;
    }
    if (signal?.aborted) {
      throw new AbortError(command, { cause: signal.reason });
    }

    if (!this.opening) {
      this.opening = this.connect(signal, command).finally(() => {
        this.opening = null;
      });
    }

    return this.opening;
  }

  private connect(signal?: AbortSignal, command?: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket =
        this.endpoint.kind === 'unix'
          ? createConnection(this.endpoint.path)
          : createConnection(this.endpoint.port, this.endpoint.host);

      const onAbort = (): void => {
        clearTimeout(timer);
        socket.destroy();
        reject(new AbortError(command, { cause: signal?.reason }));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        socket.destroy();
        reject(
          new ConnectionError(
            `Connection to ${this.address} timed out after ${this.connectTimeout}ms`,
            this.address
          )
        );
      }, this.connectTimeout);

      socket.once('connect', () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        socket.removeAllListeners('error');
        this.attach(socket);
        this.logger.debug(`Connected to ${this.address}`);
        resolve();
      });

      socket.once('error', (err) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        socket.destroy();
        reject(
          new ConnectionError(`Failed to connect to ${this.address}: ${err.message}`, this.address, {
            cause: err,
          })
        );
      });
    });
  }

  private attach(socket: Socket): void {
    this.socket = socket;
    this.buffer = Buffer.alloc(0);

    socket.on('data', (chunk: Buffer) => {
      if (socket !== this.socket) {
        return;
      }
      this.buffer = Buffer.concat([this.buffer, chunk]);
      this.deliver();
    });

    socket.on('end', () => {
      this.handlePeerClosed(socket);
    });

    socket.on('close', () => {
      this.handlePeerClosed(socket);
    });

    socket.on('error', (err) => {
      this.logger.debug(`Socket error on ${this.address}: ${err.message}`);
      if (socket !== this.socket) {
        return;
      }
      this.teardown(
        new ConnectionError(`Connection to ${this.address} failed: ${err.message}`, this.address, {
          cause: err,
        })
      );
    });
  }

  close(): void {
    this.teardown(new ConnectionError(`Connection to ${this.address} closed`, this.address));
  }

  private teardown(reason: Error): void {
    const socket = this.socket;
    if (!socket) {
      return;
    }

    this.socket = null;
    this.buffer = Buffer.alloc(0);
    socket.destroy();
    this.fail(reason);
  }

  private handlePeerClosed(socket: Socket): void {
    if (socket !== this.socket) {
      return;
    }

    // A daemon that closes after writing a response ends the frame
    if (this.buffer.length > 0 && this.buffer.indexOf(END_OF_RESPONSE) === -1) {
      this.buffer = Buffer.concat([this.buffer, Buffer.from([END_OF_RESPONSE])]);
    }
    this.deliver();

    const unread = this.buffer;
    this.teardown(new ConnectionError(`Connection to ${this.address} closed by daemon`, this.address));
    this.buffer = unread;
  }

  // ===========================================================================
  // I/O
  // ===========================================================================

  async send(data: string): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      throw new ConnectionError(`Not connected to ${this.address}`, this.address);
    }

    return new Promise((resolve, reject) => {
      socket.write(data, 'utf8', (err) => {
        if (err) {
          reject(
            new ConnectionError(`Write to ${this.address} failed: ${err.message}`, this.address, {
              cause: err,
            })
          );
        } else {
          resolve();
        }
      });
    });
  }

  receive({ timeoutMs, signal, command }: ReceiveOptions): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(
        new ConnectionError(`A response from ${this.address} is already awaited`, this.address)
      );
    }

    const framed = this.takeFrame();
    if (framed) {
      return Promise.resolve(framed);
    }

    if (!this.socket) {
      return Promise.reject(new ConnectionError(`Not connected to ${this.address}`, this.address));
    }

    if (signal?.aborted) {
      this.close();
      return Promise.reject(new AbortError(command, { cause: signal.reason }));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.fail(new TimeoutError(timeoutMs, command));
        this.logger.warn(`No response from ${this.address} within ${timeoutMs}ms, closing`);
        this.close();
      }, timeoutMs);

      const onAbort = (): void => {
        this.fail(new AbortError(command, { cause: signal?.reason }));
        this.close();
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending = {
        resolve,
        reject,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      };
    });
  }

  // ===========================================================================
  // Framing
  // ===========================================================================

  private takeFrame(): Buffer | null {
    const end = this.buffer.indexOf(END_OF_RESPONSE);
    if (end === -1) {
      return null;
    }
    const frame = this.buffer.subarray(0, end);
    this.buffer = this.buffer.subarray(end + 1);
    return frame;
  }

  private deliver(): void {
    if (!this.pending) {
      return;
    }
    const frame = this.takeFrame();
    if (frame) {
      this.settle(frame);
    }
  }

  private settle(frame: Buffer): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    this.pending = null;
    pending.cleanup();
    pending.resolve(frame);
  }

  private fail(error: Error): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    this.pending = null;
    pending.cleanup();
    pending.reject(error);
  }
}

/**
 * Default factory creating a {@link SocketTransport}.
 */
export const createSocketTransport: TransportFactory = (endpoint, options) =>
  new SocketTransport(endpoint, options);
