/**
 * ondd-client
 *
 * Client library for the ONDD receiver daemon's control socket.
 *
 * @module ondd-client
 */

export * from './ipc/index.js';

export {
  DEFAULT_CONFIG,
  mergeWithDefaults,
  configFromEnv,
  type ClientConfig,
  type ConnectionMode,
} from './config/index.js';

export {
  LnbType,
  toLBand,
  needsTone,
  voltageForPolarization,
  polarizationForVoltage,
  type Polarization,
  type Voltage,
} from './tuner/lnb.js';

export {
  normalizeTunerParameters,
  fromTransponder,
  type TunerParameters,
  type TransponderParameters,
  type DeliverySystem,
  type Modulation,
} from './tuner/parameters.js';

export { createLogger, silentLogger, type Logger, type LogLevel } from './utils/logger.js';
