/**
 * Record Mapper
 *
 * Converts decoded stanzas into immutable typed records. Each record kind
 * declares a field table mapping its fields to protocol keys, coercions and
 * fallbacks. Keys the table does not mention are ignored.
 *
 * @module ipc/records
 */

import { posix } from 'path';
import { polarizationForVoltage, type Polarization } from '../tuner/lnb.js';
import { FieldTypeError, MissingFieldError } from './errors.js';
import type { Stanza } from './stanza.js';

// =============================================================================
// Field Tables
// =============================================================================

/**
 * Converts a raw stanza value; throws with a reason when the value is invalid.
 */
export type Coercion<T> = (raw: string) => T;

export type FieldSpec<T> =
  | { key: string; coerce: Coercion<T>; required: true }
  | { key: string; coerce: Coercion<T>; required: false; fallback: T };

/**
 * Declared fields of a record kind, one entry per field.
 */
export type FieldTable<F> = { readonly [K in keyof F]: FieldSpec<F[K]> };

/** Reads one declared field from the stanza being mapped */
export type FieldReader<F> = <K extends keyof F & string>(field: K) => F[K];

export function required<T>(key: string, coerce: Coercion<T>): FieldSpec<T> {
  return { key, coerce, required: true };
}

export function optional<T>(key: string, coerce: Coercion<T>, fallback: T): FieldSpec<T> {
  return { key, coerce, required: false, fallback };
}

function readField<T>(kind: string, field: string, spec: FieldSpec<T>, stanza: Stanza): T {
  const raw = stanza.get(spec.key);

  if (raw === undefined) {
    if (spec.required) {
      throw new MissingFieldError(kind, field, spec.key);
    }
    return spec.fallback;
  }

  try {
    return spec.coerce(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FieldTypeError(kind, field, spec.key, raw, reason);
  }
}

/**
 * Map a stanza to a frozen record.
 *
 * `build` assembles the record from the declared fields, deriving any
 * computed values.
 */
export function mapStanza<F, R extends object>(
  kind: string,
  table: FieldTable<F>,
  stanza: Stanza,
  build: (read: FieldReader<F>) => R
): Readonly<R> {
  const read: FieldReader<F> = (field) => readField(kind, field, table[field], stanza);
  return Object.freeze(build(read));
}

// =============================================================================
// Coercions
// =============================================================================

export const asString: Coercion<string> = (raw) => raw;

export const asInteger: Coercion<number> = (raw) => {
  if (!/^[-+]?\d+$/.test(raw)) {
    throw new Error('expected an integer');
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new Error('integer out of range');
  }
  return value;
};

export const asCount: Coercion<number> = (raw) => {
  const value = asInteger(raw);
  if (value < 0) {
    throw new Error('expected a non-negative integer');
  }
  return value;
};

export const asFloat: Coercion<number> = (raw) => {
  if (!/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(raw)) {
    throw new Error('expected a number');
  }
  return Number(raw);
};

export const asPercentage: Coercion<number> = (raw) => {
  const value = asFloat(raw);
  if (value < 0 || value > 100) {
    throw new Error('expected a percentage between 0 and 100');
  }
  return value;
};

const TRUE_TOKENS = new Set(['yes', 'true', 'on', '1']);
const FALSE_TOKENS = new Set(['no', 'false', 'off', '0']);

export const asBoolean: Coercion<boolean> = (raw) => {
  if (TRUE_TOKENS.has(raw)) return true;
  if (FALSE_TOKENS.has(raw)) return false;
  throw new Error('expected one of yes/no, true/false, on/off, 1/0');
};

/**
 * Epoch seconds or an ISO-8601 date-time.
 */
export const asTimestamp: Coercion<Date> = (raw) => {
  const date = /^\d+$/.test(raw) ? new Date(Number(raw) * 1000) : new Date(raw);
  if (Number.isNaN(date.getTime())) {
    throw new Error('expected epoch seconds or an ISO-8601 timestamp');
  }
  return date;
};

/**
 * LNB supply voltage to polarization; 13V selects vertical, 18V horizontal.
 */
export const asPolarization: Coercion<Polarization> = (raw) => {
  if (raw === '13') return polarizationForVoltage(13);
  if (raw === '18') return polarizationForVoltage(18);
  return '0';
};

// =============================================================================
// Records
// =============================================================================

/**
 * A file transfer, as reported by STATUS (current transfer) and LIST.
 */
export interface TransferStatus {
  id: string;
  path: string;
  /** Basename of `path` */
  filename: string;
  hash: string;
  state: string;
  /** Size in bytes */
  size: number;
  /** Bytes received so far */
  received: number;
  blockCount: number;
  blocksReceived: number;
  complete: boolean;
  /** Completion percentage, 0-100 */
  progress: number;
}

interface TransferFields {
  id: string;
  path: string;
  hash: string;
  state: string | null;
  size: number;
  received: number;
  blockCount: number;
  blocksReceived: number;
  complete: boolean;
  progress: number | null;
}

export const TRANSFER_STATUS_FIELDS: FieldTable<TransferFields> = {
  id: optional('id', asString, ''),
  path: optional('path', asString, ''),
  hash: optional('hash', asString, ''),
  state: optional<string | null>('state', asString, null),
  size: optional('size', asCount, 0),
  received: optional('received', asCount, 0),
  blockCount: optional('block_count', asCount, 0),
  blocksReceived: optional('block_received', asCount, 0),
  complete: optional('complete', asBoolean, false),
  progress: optional<number | null>('progress', asPercentage, null),
};

function deriveProgress(fields: {
  complete: boolean;
  blockCount: number;
  blocksReceived: number;
  size: number;
  received: number;
}): number {
  if (fields.complete) return 100;
  if (fields.blockCount > 0) return (fields.blocksReceived * 100) / fields.blockCount;
  if (fields.size > 0) return (fields.received * 100) / fields.size;
  return 0;
}

export function toTransferStatus(stanza: Stanza): Readonly<TransferStatus> {
  return mapStanza('TransferStatus', TRANSFER_STATUS_FIELDS, stanza, (read) => {
    const path = read('path');
    const complete = read('complete');
    const counts = {
      complete,
      size: read('size'),
      received: read('received'),
      blockCount: read('blockCount'),
      blocksReceived: read('blocksReceived'),
    };
    return {
      id: read('id'),
      path,
      filename: posix.basename(path),
      hash: read('hash'),
      state: read('state') ?? (complete ? 'complete' : 'active'),
      ...counts,
      progress: read('progress') ?? deriveProgress(counts),
    };
  });
}

/**
 * Download cache usage, in bytes.
 */
export interface CacheInfo {
  used: number;
  free: number;
  /** `used + free` */
  total: number;
}

interface CacheFields {
  used: number;
  free: number;
}

export const CACHE_INFO_FIELDS: FieldTable<CacheFields> = {
  used: required('used', asCount),
  free: required('free', asCount),
};

export function toCacheInfo(stanza: Stanza): Readonly<CacheInfo> {
  return mapStanza('CacheInfo', CACHE_INFO_FIELDS, stanza, (read) => {
    const used = read('used');
    const free = read('free');
    return { used, free, total: used + free };
  });
}

/**
 * Tuner lock and signal quality.
 */
export interface TunerStatus {
  locked: boolean;
  /** Signal strength, 0-100 */
  signal: number;
  /** Signal to noise ratio in dB */
  snr: number;
}

export const TUNER_STATUS_FIELDS: FieldTable<TunerStatus> = {
  locked: required('lock', asBoolean),
  signal: optional('signal', asInteger, 0),
  snr: optional('snr', asFloat, 0),
};

export function toTunerStatus(stanza: Stanza): Readonly<TunerStatus> {
  return mapStanza('TunerStatus', TUNER_STATUS_FIELDS, stanza, (read) => ({
    locked: read('locked'),
    signal: read('signal'),
    snr: read('snr'),
  }));
}

/**
 * A data stream carried on the tuned transponder.
 */
export interface StreamInfo {
  id: string;
  /** Bits per second */
  bitrate: number;
}

export const STREAM_INFO_FIELDS: FieldTable<StreamInfo> = {
  id: required('ident', asString),
  bitrate: optional('bitrate', asCount, 0),
};

export function toStreamInfo(stanza: Stanza): Readonly<StreamInfo> {
  return mapStanza('StreamInfo', STREAM_INFO_FIELDS, stanza, (read) => ({
    id: read('id'),
    bitrate: read('bitrate'),
  }));
}

/**
 * Tuner settings currently applied by the daemon.
 */
export interface TunerSettings {
  /** L-band frequency in MHz */
  frequency: number;
  /** Symbol rate in ksym/s */
  symbolRate: number;
  delivery: string;
  modulation: string;
  polarization: Polarization;
  /** 22 kHz tone enabled */
  tone: boolean;
  azimuth: number;
}

export const TUNER_SETTINGS_FIELDS: FieldTable<TunerSettings> = {
  frequency: required('frequency', asCount),
  symbolRate: optional('symbolrate', asCount, 0),
  delivery: optional('delivery', asString, ''),
  modulation: optional('modulation', asString, ''),
  polarization: optional<Polarization>('voltage', asPolarization, '0'),
  tone: optional('tone', asBoolean, false),
  azimuth: optional('azimuth', asInteger, 0),
};

export function toTunerSettings(stanza: Stanza): Readonly<TunerSettings> {
  return mapStanza('TunerSettings', TUNER_SETTINGS_FIELDS, stanza, (read) => ({
    frequency: read('frequency'),
    symbolRate: read('symbolRate'),
    delivery: read('delivery'),
    modulation: read('modulation'),
    polarization: read('polarization'),
    tone: read('tone'),
    azimuth: read('azimuth'),
  }));
}

/**
 * A file announced on the signaling channel.
 */
export interface FileEntry {
  path: string;
  filename: string;
  size: number;
}

interface FileFields {
  path: string;
  size: number;
}

export const FILE_ENTRY_FIELDS: FieldTable<FileFields> = {
  path: required('path', asString),
  size: optional('size', asCount, 0),
};

export function toFileEntry(stanza: Stanza): Readonly<FileEntry> {
  return mapStanza('FileEntry', FILE_ENTRY_FIELDS, stanza, (read) => {
    const path = read('path');
    return { path, filename: posix.basename(path), size: read('size') };
  });
}

/**
 * An entry of the daemon's event log.
 */
export interface DaemonEvent {
  type: string;
  time: Date | null;
  path: string;
  message: string;
}

export const DAEMON_EVENT_FIELDS: FieldTable<DaemonEvent> = {
  type: required('type', asString),
  time: optional<Date | null>('time', asTimestamp, null),
  path: optional('path', asString, ''),
  message: optional('message', asString, ''),
};

export function toDaemonEvent(stanza: Stanza): Readonly<DaemonEvent> {
  return mapStanza('DaemonEvent', DAEMON_EVENT_FIELDS, stanza, (read) => ({
    type: read('type'),
    time: read('time'),
    path: read('path'),
    message: read('message'),
  }));
}

export interface OutputPath {
  path: string;
}

export const OUTPUT_PATH_FIELDS: FieldTable<OutputPath> = {
  path: required('path', asString),
};

export function toOutputPath(stanza: Stanza): Readonly<OutputPath> {
  return mapStanza('OutputPath', OUTPUT_PATH_FIELDS, stanza, (read) => ({
    path: read('path'),
  }));
}

/**
 * Reply to a control command.
 */
export interface Acknowledgement {
  code: number;
  message: string;
}

export const ACKNOWLEDGEMENT_FIELDS: FieldTable<Acknowledgement> = {
  code: required('code', asInteger),
  message: optional('message', asString, ''),
};

export function toAcknowledgement(stanza: Stanza): Readonly<Acknowledgement> {
  return mapStanza('Acknowledgement', ACKNOWLEDGEMENT_FIELDS, stanza, (read) => ({
    code: read('code'),
    message: read('message'),
  }));
}
