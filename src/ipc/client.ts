/**
 * ONDD Protocol Client
 *
 * Public API over the daemon's control socket. Every method validates its
 * parameters, performs one request/response exchange and maps the returned
 * stanzas to typed records. Nothing is cached between calls.
 *
 * @module ipc/client
 */

import { mergeWithDefaults, type ClientConfig, type ConnectionMode } from '../config/defaults.js';
import { assertTimeout } from '../config/index.js';
import {
  fromTransponder,
  normalizeTunerParameters,
  tunerArguments,
  type TransponderParameters,
  type TunerParameters,
} from '../tuner/parameters.js';
import { createLogger, type Logger } from '../utils/logger.js';
import {
  AbortError,
  CommandRejectedError,
  ConnectionError,
  InvalidArgumentError,
  MalformedResponseError,
  TimeoutError,
} from './errors.js';
import { Mutex } from './mutex.js';
import { Commands, FAILURE_CODE_THRESHOLD, type Command, type LineTerminator } from './protocol.js';
import {
  toAcknowledgement,
  toCacheInfo,
  toDaemonEvent,
  toFileEntry,
  toOutputPath,
  toStreamInfo,
  toTransferStatus,
  toTunerSettings,
  toTunerStatus,
  type CacheInfo,
  type DaemonEvent,
  type FileEntry,
  type StreamInfo,
  type TransferStatus,
  type TunerSettings,
  type TunerStatus,
} from './records.js';
import { decodeResponse, encodeCommand, type Stanza } from './stanza.js';
import {
  createSocketTransport,
  describeEndpoint,
  parseEndpoint,
  type Endpoint,
  type Transport,
  type TransportFactory,
} from './transport.js';

// =============================================================================
// Types
// =============================================================================

export interface OnddClientOptions extends Partial<ClientConfig> {
  /** Logger (default: console logger at `logLevel`) */
  logger?: Logger;

  /** Creates transports (default: Unix/TCP socket transport) */
  transportFactory?: TransportFactory;
}

export interface CallOptions {
  /** Response timeout for this call in milliseconds */
  timeout?: number;

  /** Aborting closes the connection and rejects with AbortError */
  signal?: AbortSignal;
}

// =============================================================================
// OnddClient Class
// =============================================================================

export class OnddClient {
  private readonly endpoint: Endpoint;
  private readonly address: string;
  private readonly timeout: number;
  private readonly connectTimeout: number;
  private readonly connectionMode: ConnectionMode;
  private readonly autoOpen: boolean;
  private readonly lineTerminator: LineTerminator;
  private readonly logger: Logger;
  private readonly createTransport: TransportFactory;
  private readonly mutex = new Mutex();
  private transport: Transport | null = null;

  constructor(options: OnddClientOptions = {}) {
    const config = mergeWithDefaults(options);
    this.timeout = assertTimeout(config.timeout);
    this.connectTimeout = assertTimeout(config.connectTimeout, 'connectTimeout');
    this.endpoint = parseEndpoint(config.endpoint);
    this.address = describeEndpoint(this.endpoint);
    this.connectionMode = config.connectionMode;
    this.autoOpen = config.autoOpen;
    this.lineTerminator = config.lineTerminator;
    this.logger = options.logger ?? createLogger({ level: config.logLevel, prefix: 'ondd' });
    this.createTransport = options.transportFactory ?? createSocketTransport;
  }

  // ===========================================================================
  // Connection Management
  // ===========================================================================

  /**
   * Open the shared connection. Only meaningful in persistent mode; per-call
   * mode opens a connection inside every call.
   */
  async open(): Promise<void> {
    if (this.connectionMode === 'per-call') {
      return;
    }
    await this.sharedTransport().open();
  }

  /**
   * Close the shared connection. Safe to call repeatedly.
   */
  close(): void {
    if (this.transport) {
      this.transport.close();
      this.transport = null;
      this.logger.debug(`Closed connection to ${this.address}`);
    }
  }

  /**
   * Whether the shared connection is open
   */
  isOpen(): boolean {
    return this.transport?.isOpen ?? false;
  }

  private sharedTransport(): Transport {
    if (!this.transport) {
      this.transport = this.newTransport();
    }
    return this.transport;
  }

  private newTransport(): Transport {
    return this.createTransport(this.endpoint, {
      connectTimeout: this.connectTimeout,
      logger: this.logger,
    });
  }

  // ===========================================================================
  // Exchanges
  // ===========================================================================

  /**
   * Send a raw command and return the decoded stanzas.
   *
   * @throws {InvalidArgumentError} before any I/O if the command is not well formed
   */
  async execute(command: Command, options: CallOptions = {}): Promise<Stanza[]> {
    const payload = encodeCommand(command, this.lineTerminator);
    const timeout = assertTimeout(options.timeout ?? this.timeout);

    const { signal } = options;
    if (signal?.aborted) {
      throw new AbortError(command.name, { cause: signal.reason });
    }

    if (this.connectionMode === 'per-call') {
      const transport = this.newTransport();
      try {
        await transport.open({ signal, command: command.name });
        return await this.roundTrip(transport, command, payload, timeout, signal);
      } finally {
        transport.close();
      }
    }

    await this.acquire(command, signal);
    try {
      const transport = this.sharedTransport();
      if (!transport.isOpen) {
        if (!this.autoOpen) {
          throw new ConnectionError(`Not connected to ${this.address}`, this.address);
        }
        await transport.open({ signal, command: command.name });
      }
      return await this.roundTrip(transport, command, payload, timeout, signal);
    } finally {
      this.mutex.release();
    }
  }

  /**
   * Wait for the shared connection; aborting leaves the queue.
   */
  private async acquire(command: Command, signal?: AbortSignal): Promise<void> {
    try {
      await this.mutex.acquire(signal);
    } catch (err) {
      if (signal?.aborted) {
        this.logger.debug(`${command.name} aborted while waiting for ${this.address}`);
        throw new AbortError(command.name, { cause: signal.reason });
      }
      throw err;
    }
  }

  private async roundTrip(
    transport: Transport,
    command: Command,
    payload: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<Stanza[]> {
    if (signal?.aborted) {
      throw new AbortError(command.name, { cause: signal.reason });
    }
    this.logger.debug(`> ${payload.trimEnd()}`);
    await transport.send(payload);
    const frame = await transport.receive({ timeoutMs, signal, command: command.name });
    const stanzas = decodeResponse(frame, {
      terminator: this.lineTerminator,
      command: command.name,
    });
    this.logger.debug(`< ${command.name}: ${stanzas.length} stanza(s), ${frame.length} bytes`);
    return stanzas;
  }

  private async querySingle<R>(
    command: Command,
    map: (stanza: Stanza) => R,
    options?: CallOptions
  ): Promise<R> {
    const stanzas = await this.execute(command, options);
    if (stanzas.length !== 1) {
      throw new MalformedResponseError(`expected exactly one stanza, got ${stanzas.length}`, {
        command: command.name,
      });
    }
    return map(stanzas[0]);
  }

  private async queryList<R>(
    command: Command,
    map: (stanza: Stanza) => R,
    options?: CallOptions
  ): Promise<R[]> {
    const stanzas = await this.execute(command, options);
    return stanzas.map(map);
  }

  private async control(command: Command, options?: CallOptions): Promise<void> {
    const stanzas = await this.execute(command, options);
    if (stanzas.length === 0) {
      return;
    }
    if (stanzas.length > 1) {
      throw new MalformedResponseError(`expected at most one stanza, got ${stanzas.length}`, {
        command: command.name,
      });
    }

    const ack = toAcknowledgement(stanzas[0]);
    if (ack.code >= FAILURE_CODE_THRESHOLD) {
      this.logger.error(`${command.name} rejected by daemon (${ack.code}): ${ack.message}`);
      throw new CommandRejectedError(command.name, ack.code, ack.message);
    }
  }

  // ===========================================================================
  // Public API Methods
  // ===========================================================================

  /**
   * Check whether the daemon answers.
   *
   * Connection failures and timeouts answer `false`; any other error is thrown.
   */
  async ping(options?: CallOptions): Promise<boolean> {
    try {
      await this.execute({ name: Commands.PING }, options);
      return true;
    } catch (err) {
      if (err instanceof ConnectionError || err instanceof TimeoutError) {
        this.logger.debug(`Ping to ${this.address} failed: ${err.message}`);
        return false;
      }
      throw err;
    }
  }

  /**
   * Get the current transfer state
   */
  async getStatus(options?: CallOptions): Promise<TransferStatus> {
    return this.querySingle({ name: Commands.STATUS }, toTransferStatus, options);
  }

  /**
   * List transfers in progress, in daemon order
   */
  async listTransfers(options?: CallOptions): Promise<TransferStatus[]> {
    return this.queryList({ name: Commands.LIST }, toTransferStatus, options);
  }

  /**
   * List files announced on the signaling channel
   */
  async listFiles(options?: CallOptions): Promise<FileEntry[]> {
    return this.queryList({ name: Commands.FILES }, toFileEntry, options);
  }

  /**
   * Get download cache usage
   */
  async getCacheInfo(options?: CallOptions): Promise<CacheInfo> {
    return this.querySingle({ name: Commands.CACHE }, toCacheInfo, options);
  }

  /**
   * Discard everything in the download cache
   */
  async resetCache(options?: CallOptions): Promise<void> {
    return this.control({ name: Commands.CACHE_RESET }, options);
  }

  /**
   * Get tuner lock and signal quality
   */
  async getTunerStatus(options?: CallOptions): Promise<TunerStatus> {
    return this.querySingle({ name: Commands.TUNER }, toTunerStatus, options);
  }

  /**
   * List streams on the tuned transponder
   */
  async listStreams(options?: CallOptions): Promise<StreamInfo[]> {
    return this.queryList({ name: Commands.STREAMS }, toStreamInfo, options);
  }

  /**
   * Get the tuner settings in effect
   */
  async getTunerSettings(options?: CallOptions): Promise<TunerSettings> {
    return this.querySingle({ name: Commands.SETTINGS }, toTunerSettings, options);
  }

  /**
   * Apply tuner parameters
   *
   * @throws {InvalidArgumentError} before any I/O if a parameter is out of range
   */
  async setTunerParameters(params: TunerParameters, options?: CallOptions): Promise<void> {
    const normalized = normalizeTunerParameters(params);
    return this.control({ name: Commands.SET_TUNER, args: tunerArguments(normalized) }, options);
  }

  /**
   * Tune to a transponder, converting its frequency for the given LNB
   */
  async tuneTransponder(transponder: TransponderParameters, options?: CallOptions): Promise<void> {
    return this.setTunerParameters(fromTransponder(transponder), options);
  }

  /**
   * Get the directory completed files are written to
   */
  async getOutputPath(options?: CallOptions): Promise<string> {
    const output = await this.querySingle({ name: Commands.OUTPUT }, toOutputPath, options);
    return output.path;
  }

  /**
   * Set the directory completed files are written to
   *
   * @param path - Absolute path without whitespace
   */
  async setOutputPath(path: string, options?: CallOptions): Promise<void> {
    if (!path.startsWith('/')) {
      throw new InvalidArgumentError('path', `expected an absolute path, got "${path}"`);
    }
    return this.control({ name: Commands.SET_OUTPUT, args: [path] }, options);
  }

  /**
   * Get the daemon's event log, oldest first
   */
  async getEvents(options?: CallOptions): Promise<DaemonEvent[]> {
    return this.queryList({ name: Commands.EVENTS }, toDaemonEvent, options);
  }
}

// =============================================================================
// Exports
// =============================================================================

export default OnddClient;
