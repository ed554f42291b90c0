/**
 * IPC Module
 *
 * Exports the protocol client and its building blocks.
 *
 * @module ipc
 */

// Protocol constants
export {
  Commands,
  type Command,
  type LineTerminator,
  DEFAULT_LINE_TERMINATOR,
  END_OF_RESPONSE,
  DEFAULT_SOCKET_PATH,
  DEFAULT_TIMEOUT,
  DEFAULT_CONNECT_TIMEOUT,
  FAILURE_CODE_THRESHOLD,
} from './protocol.js';

// Errors
export {
  OnddError,
  ConnectionError,
  TimeoutError,
  AbortError,
  MalformedResponseError,
  MissingFieldError,
  FieldTypeError,
  InvalidArgumentError,
  CommandRejectedError,
  type MalformedResponseDetails,
} from './errors.js';

// Codec
export { encodeCommand, decodeResponse, stanzaOf, type Stanza, type DecodeOptions } from './stanza.js';

// Records
export {
  mapStanza,
  required,
  optional,
  toTransferStatus,
  toCacheInfo,
  toTunerStatus,
  toStreamInfo,
  toTunerSettings,
  toFileEntry,
  toDaemonEvent,
  toOutputPath,
  toAcknowledgement,
  type Coercion,
  type FieldSpec,
  type FieldTable,
  type FieldReader,
  type TransferStatus,
  type CacheInfo,
  type TunerStatus,
  type StreamInfo,
  type TunerSettings,
  type FileEntry,
  type DaemonEvent,
  type OutputPath,
  type Acknowledgement,
} from './records.js';

// Transport
export {
  SocketTransport,
  createSocketTransport,
  parseEndpoint,
  describeEndpoint,
  type Endpoint,
  type Transport,
  type TransportFactory,
  type OpenOptions,
  type ReceiveOptions,
  type SocketTransportOptions,
} from './transport.js';

// Client
export { OnddClient, type OnddClientOptions, type CallOptions } from './client.js';
export { Mutex } from './mutex.js';
