/**
 * Tune command for the ondd CLI.
 *
 * Tunes the receiver to a transponder. The L-band frequency, tone and LNB
 * voltage are derived from the transponder frequency, LNB type and
 * polarization.
 *
 * @module cli/commands/tune
 */

import { InvalidArgumentError } from '../../ipc/errors.js';
import { isLnbType, toLBand, type Polarization } from '../../tuner/lnb.js';
import {
  DELIVERY_SYSTEMS,
  MODULATIONS,
  type DeliverySystem,
  type Modulation,
  type TransponderParameters,
} from '../../tuner/parameters.js';
import { formatFrequency } from '../../utils/format.js';
import type { CommandContext } from '../context.js';
import { successMessage, toJson } from '../utils/output.js';
import { runAction } from '../utils/run.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Tune flags as typed on the command line
 */
export interface TuneFlags {
  frequency?: string;
  symbolRate?: string;
  lnb?: string;
  polarization?: string;
  delivery?: string;
  modulation?: string;
  azimuth?: string;
}

// =============================================================================
// Flag Parsing
// =============================================================================

function parseInteger(flag: string, value: string | undefined): number {
  if (value === undefined) {
    throw new InvalidArgumentError(flag, 'missing value');
  }
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError(flag, `expected a whole number, got "${value}"`);
  }
  return Number(value);
}

function isPolarization(value: string): value is Polarization {
  return value === 'v' || value === 'h';
}

function isDeliverySystem(value: string): value is DeliverySystem {
  return DELIVERY_SYSTEMS.some((system) => system === value);
}

function isModulation(value: string): value is Modulation {
  return MODULATIONS.some((modulation) => modulation === value);
}

/**
 * Build transponder parameters from tune flags. Range checks happen in the
 * client; this only checks that values are well formed.
 *
 * @throws {InvalidArgumentError} naming the offending flag
 */
export function parseTransponder(flags: TuneFlags): TransponderParameters {
  const lnb = flags.lnb ?? 'u';
  if (!isLnbType(lnb)) {
    throw new InvalidArgumentError('--lnb', `expected k, c or u, got "${lnb}"`);
  }

  const polarization = flags.polarization ?? 'v';
  if (!isPolarization(polarization)) {
    throw new InvalidArgumentError('--polarization', `expected v or h, got "${polarization}"`);
  }

  const transponder: TransponderParameters = {
    transponderFrequency: parseInteger('--frequency', flags.frequency),
    symbolRate: parseInteger('--symbol-rate', flags.symbolRate),
    lnb,
    polarization,
  };

  if (flags.delivery !== undefined) {
    if (!isDeliverySystem(flags.delivery)) {
      throw new InvalidArgumentError('--delivery', `expected one of ${DELIVERY_SYSTEMS.join(', ')}, got "${flags.delivery}"`);
    }
    transponder.delivery = flags.delivery;
  }

  if (flags.modulation !== undefined) {
    if (!isModulation(flags.modulation)) {
      throw new InvalidArgumentError('--modulation', `expected one of ${MODULATIONS.join(', ')}, got "${flags.modulation}"`);
    }
    transponder.modulation = flags.modulation;
  }

  if (flags.azimuth !== undefined) {
    transponder.azimuth = parseInteger('--azimuth', flags.azimuth);
  }

  return transponder;
}

// =============================================================================
// Main Tune Function
// =============================================================================

/**
 * Execute the tune command (non-interactive).
 */
export async function executeTune(context: CommandContext, flags: TuneFlags): Promise<void> {
  await runAction(async () => {
    const transponder = parseTransponder(flags);
    await context.client.tuneTransponder(transponder);

    const lBand = toLBand(transponder.transponderFrequency, transponder.lnb);
    if (context.json) {
      console.log(toJson({ tuned: true, frequency: lBand }));
      return;
    }
    console.log(
      successMessage(
        `Tuned to ${formatFrequency(transponder.transponderFrequency)} (L-band ${formatFrequency(lBand)})`
      )
    );
  }, context);
}

export default executeTune;
