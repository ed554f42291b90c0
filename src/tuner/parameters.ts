/**
 * Tuner parameters for SET-TUNER
 *
 * Validation, defaults and argument encoding for tuner control, plus
 * conversion from transponder data using the LNB helpers.
 *
 * @module tuner/parameters
 */

import { InvalidArgumentError } from '../ipc/errors.js';
import {
  needsTone,
  toLBand,
  voltageForPolarization,
  type LnbType,
  type Polarization,
  type Voltage,
} from './lnb.js';

// =============================================================================
// Types
// =============================================================================

export const DELIVERY_SYSTEMS = ['dvb-s', 'dvb-s2'] as const;
export type DeliverySystem = (typeof DELIVERY_SYSTEMS)[number];

export const MODULATIONS = ['qpsk', '8psk', '16apsk', '32apsk'] as const;
export type Modulation = (typeof MODULATIONS)[number];

export interface TunerParameters {
  /** L-band frequency in MHz (950-2150) */
  frequency: number;
  /** Symbol rate in ksym/s */
  symbolRate: number;
  /** Delivery system (default: dvb-s) */
  delivery?: DeliverySystem;
  /** Modulation (default: qpsk) */
  modulation?: Modulation;
  /** 22 kHz tone (default: true) */
  tone?: boolean;
  /** LNB supply voltage (default: 13) */
  voltage?: Voltage;
  /** Dish azimuth in degrees (default: 0) */
  azimuth?: number;
}

export interface TransponderParameters {
  /** Transponder (downlink) frequency in MHz */
  transponderFrequency: number;
  symbolRate: number;
  lnb: LnbType;
  polarization: Polarization;
  delivery?: DeliverySystem;
  modulation?: Modulation;
  azimuth?: number;
}

// =============================================================================
// Constants
// =============================================================================

/** L-band tuning range in MHz */
export const L_BAND_MIN = 950;
export const L_BAND_MAX = 2150;

/** Highest accepted symbol rate in ksym/s */
export const MAX_SYMBOL_RATE = 100000;

// =============================================================================
// Validation
// =============================================================================

function assertIntegerInRange(argument: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidArgumentError(argument, `expected an integer between ${min} and ${max}, got ${value}`);
  }
}

function assertOneOf<T extends string>(argument: string, value: string, allowed: readonly T[]): void {
  if (!allowed.some((candidate) => candidate === value)) {
    throw new InvalidArgumentError(argument, `expected one of ${allowed.join(', ')}, got "${value}"`);
  }
}

/**
 * Validate tuner parameters and fill in defaults.
 *
 * @throws {InvalidArgumentError} naming the first offending parameter
 */
export function normalizeTunerParameters(params: TunerParameters): Required<TunerParameters> {
  const normalized: Required<TunerParameters> = {
    frequency: params.frequency,
    symbolRate: params.symbolRate,
    delivery: params.delivery ?? 'dvb-s',
    modulation: params.modulation ?? 'qpsk',
    tone: params.tone ?? true,
    voltage: params.voltage ?? 13,
    azimuth: params.azimuth ?? 0,
  };

  assertIntegerInRange('frequency', normalized.frequency, L_BAND_MIN, L_BAND_MAX);
  assertIntegerInRange('symbolRate', normalized.symbolRate, 1, MAX_SYMBOL_RATE);
  assertOneOf('delivery', normalized.delivery, DELIVERY_SYSTEMS);
  assertOneOf('modulation', normalized.modulation, MODULATIONS);
  if (normalized.voltage !== 0 && normalized.voltage !== 13 && normalized.voltage !== 18) {
    throw new InvalidArgumentError('voltage', `expected 0, 13 or 18, got ${normalized.voltage}`);
  }
  assertIntegerInRange('azimuth', normalized.azimuth, 0, 359);

  return normalized;
}

/**
 * Encode normalized parameters as SET-TUNER arguments, in fixed order.
 */
export function tunerArguments(params: Required<TunerParameters>): string[] {
  return [
    `frequency=${params.frequency}`,
    `symbolrate=${params.symbolRate}`,
    `delivery=${params.delivery}`,
    `modulation=${params.modulation}`,
    `tone=${params.tone ? 'yes' : 'no'}`,
    `voltage=${params.voltage}`,
    `azimuth=${params.azimuth}`,
  ];
}

/**
 * Derive tuner parameters from transponder data: the L-band frequency and
 * tone come from the LNB type, the voltage from the polarization.
 */
export function fromTransponder(transponder: TransponderParameters): TunerParameters {
  return {
    frequency: toLBand(transponder.transponderFrequency, transponder.lnb),
    symbolRate: transponder.symbolRate,
    delivery: transponder.delivery,
    modulation: transponder.modulation,
    tone: needsTone(transponder.transponderFrequency, transponder.lnb),
    voltage: voltageForPolarization(transponder.polarization),
    azimuth: transponder.azimuth,
  };
}
