/**
 * Command context for the ondd CLI.
 *
 * Builds the client every command talks through from environment
 * variables overridden by command-line flags.
 *
 * @module cli/context
 */

import { configFromEnv, mergeWithDefaults, parseTimeout } from '../config/index.js';
import { OnddClient } from '../ipc/client.js';
import type { TransportFactory } from '../ipc/transport.js';

// =============================================================================
// Types
// =============================================================================

export interface GlobalFlags {
  /** Daemon socket path or host:port */
  socket?: string;
  /** Response timeout in milliseconds, as typed */
  timeout?: string;
  /** Print records as JSON */
  json: boolean;
  /** Log protocol exchanges to stderr */
  verbose: boolean;
}

export interface CommandContext {
  client: OnddClient;
  /** Endpoint the client talks to, for messages */
  endpoint: string;
  json: boolean;
}

// =============================================================================
// Context Creation
// =============================================================================

/**
 * Create the command context.
 *
 * Flags win over environment variables, which win over defaults.
 *
 * @throws {InvalidArgumentError} for a malformed timeout or environment value
 */
export function createContext(
  flags: GlobalFlags,
  env: NodeJS.ProcessEnv = process.env,
  transportFactory?: TransportFactory
): CommandContext {
  const config = mergeWithDefaults(configFromEnv(env));

  if (flags.socket) {
    config.endpoint = flags.socket;
  }
  if (flags.timeout !== undefined) {
    config.timeout = parseTimeout(flags.timeout);
  }
  if (flags.verbose) {
    config.logLevel = 'debug';
  }

  return {
    client: new OnddClient({ ...config, transportFactory }),
    endpoint: config.endpoint,
    json: flags.json,
  };
}
