/**
 * Default configuration values for the ONDD client.
 *
 * @module config/defaults
 */

import {
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_LINE_TERMINATOR,
  DEFAULT_SOCKET_PATH,
  DEFAULT_TIMEOUT,
  type LineTerminator,
} from '../ipc/protocol.js';
import type { LogLevel } from '../utils/logger.js';

/**
 * How the client holds connections:
 * - `persistent`: one shared connection, exchanges serialized by a lock
 * - `per-call`: every call opens and closes its own connection
 */
export type ConnectionMode = 'persistent' | 'per-call';

export interface ClientConfig {
  /** Unix socket path, or host:port (default: /var/run/ondd.ctrl) */
  endpoint: string;

  /** Response timeout in milliseconds (default: 20000) */
  timeout: number;

  /** Connect timeout in milliseconds (default: 5000) */
  connectTimeout: number;

  /** Connection discipline (default: persistent) */
  connectionMode: ConnectionMode;

  /** Open the connection on first use in persistent mode (default: true) */
  autoOpen: boolean;

  /** Line terminator the daemon expects (default: LF) */
  lineTerminator: LineTerminator;

  /** Minimum level of the default console logger (default: warn) */
  logLevel: LogLevel;
}

/**
 * Default client configuration.
 */
export const DEFAULT_CONFIG: ClientConfig = {
  endpoint: DEFAULT_SOCKET_PATH,
  timeout: DEFAULT_TIMEOUT,
  connectTimeout: DEFAULT_CONNECT_TIMEOUT,
  connectionMode: 'persistent',
  autoOpen: true,
  lineTerminator: DEFAULT_LINE_TERMINATOR,
  logLevel: 'warn',
};

/**
 * Merges a partial configuration with the default configuration.
 *
 * Keys explicitly set to `undefined` keep their default.
 *
 * @param partialConfig - Partial configuration to merge
 * @returns Complete configuration with defaults applied
 */
export function mergeWithDefaults(partialConfig?: Partial<ClientConfig>): ClientConfig {
  if (!partialConfig) {
    return { ...DEFAULT_CONFIG };
  }

  return {
    endpoint: partialConfig.endpoint ?? DEFAULT_CONFIG.endpoint,
    timeout: partialConfig.timeout ?? DEFAULT_CONFIG.timeout,
    connectTimeout: partialConfig.connectTimeout ?? DEFAULT_CONFIG.connectTimeout,
    connectionMode: partialConfig.connectionMode ?? DEFAULT_CONFIG.connectionMode,
    autoOpen: partialConfig.autoOpen ?? DEFAULT_CONFIG.autoOpen,
    lineTerminator: partialConfig.lineTerminator ?? DEFAULT_CONFIG.lineTerminator,
    logLevel: partialConfig.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
}
