/**
 * Client configuration module.
 *
 * Exports default configuration values, merging, and environment parsing.
 *
 * @module config
 */

import { InvalidArgumentError } from '../ipc/errors.js';
import { MAX_TIMEOUT } from '../ipc/protocol.js';
import { isLogLevel } from '../utils/logger.js';
import type { ClientConfig, ConnectionMode } from './defaults.js';

export { DEFAULT_CONFIG, mergeWithDefaults, type ClientConfig, type ConnectionMode } from './defaults.js';

/** Environment variables read by {@link configFromEnv} */
export const ENV_VARS = {
  endpoint: 'ONDD_SOCKET',
  timeout: 'ONDD_TIMEOUT',
  connectionMode: 'ONDD_CONNECTION_MODE',
  logLevel: 'ONDD_LOG_LEVEL',
} as const;

/**
 * Check a timeout in milliseconds.
 *
 * @throws {InvalidArgumentError} unless the value is an integer between 1 and {@link MAX_TIMEOUT}
 */
export function assertTimeout(value: number, argument = 'timeout'): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(argument, `expected a positive integer, got ${value}`);
  }
  if (value > MAX_TIMEOUT) {
    throw new InvalidArgumentError(argument, `must not exceed ${MAX_TIMEOUT}ms, got ${value}`);
  }
  return value;
}

/**
 * Parse a timeout given in milliseconds.
 *
 * @throws {InvalidArgumentError} unless the value is a positive integer no larger than {@link MAX_TIMEOUT}
 */
export function parseTimeout(value: string, argument = 'timeout'): number {
  if (!/^\d+$/.test(value) || Number(value) === 0) {
    throw new InvalidArgumentError(argument, `expected a positive number of milliseconds, got "${value}"`);
  }
  return assertTimeout(Number(value), argument);
}

export function isConnectionMode(value: string): value is ConnectionMode {
  return value === 'persistent' || value === 'per-call';
}

/**
 * Read configuration overrides from environment variables.
 *
 * Unset or empty variables are left out of the result.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ClientConfig> {
  const config: Partial<ClientConfig> = {};

  const endpoint = env[ENV_VARS.endpoint];
  if (endpoint) {
    config.endpoint = endpoint;
  }

  const timeout = env[ENV_VARS.timeout];
  if (timeout) {
    config.timeout = parseTimeout(timeout, ENV_VARS.timeout);
  }

  const mode = env[ENV_VARS.connectionMode];
  if (mode) {
    if (!isConnectionMode(mode)) {
      throw new InvalidArgumentError(ENV_VARS.connectionMode, `expected "persistent" or "per-call", got "${mode}"`);
    }
    config.connectionMode = mode;
  }

  const logLevel = env[ENV_VARS.logLevel];
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new InvalidArgumentError(ENV_VARS.logLevel, `unknown log level "${logLevel}"`);
    }
    config.logLevel = logLevel;
  }

  return config;
}
