/**
 * ONDD IPC Protocol
 *
 * Wire constants and command names for the daemon's control socket.
 *
 * Requests are single lines `COMMAND [arg]*`. Responses are zero or more
 * stanzas of `key: value` lines separated by blank lines, ended by a NUL byte.
 *
 * @module ipc/protocol
 */

// =============================================================================
// Commands
// =============================================================================

/**
 * Command names understood by the daemon
 */
export const Commands = {
  PING: 'PING',
  STATUS: 'STATUS',
  LIST: 'LIST',
  FILES: 'FILES',
  CACHE: 'CACHE',
  CACHE_RESET: 'CACHE-RESET',
  TUNER: 'TUNER',
  STREAMS: 'STREAMS',
  SETTINGS: 'SETTINGS',
  SET_TUNER: 'SET-TUNER',
  OUTPUT: 'OUTPUT',
  SET_OUTPUT: 'SET-OUTPUT',
  EVENTS: 'EVENTS',
} as const;

/**
 * A command plus its ordered arguments
 */
export interface Command {
  name: string;
  args?: readonly string[];
}

// =============================================================================
// Framing
// =============================================================================

/** Line terminators the daemon may be configured with */
export type LineTerminator = '\n' | '\r\n';

/** Default request/response line terminator */
export const DEFAULT_LINE_TERMINATOR: LineTerminator = '\n';

/** Byte that ends every response */
export const END_OF_RESPONSE = 0x00;

// =============================================================================
// Constants
// =============================================================================

/** Default daemon control socket */
export const DEFAULT_SOCKET_PATH = '/var/run/ondd.ctrl';

/** Default response timeout in milliseconds */
export const DEFAULT_TIMEOUT = 20000;

/** Default connect timeout in milliseconds */
export const DEFAULT_CONNECT_TIMEOUT = 5000;

/** Largest delay a timer accepts; longer ones fire at once */
export const MAX_TIMEOUT = 2147483647;

/** Acknowledgement codes at or above this value mean the command failed */
export const FAILURE_CODE_THRESHOLD = 400;
