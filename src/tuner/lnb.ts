/**
 * LNB frequency conversion
 *
 * Converts transponder frequencies to the L-band frequency the receiver tunes
 * to, and decides the 22 kHz tone and supply voltage the LNB needs.
 *
 * @module tuner/lnb
 */

// =============================================================================
// Constants
// =============================================================================

/**
 * LNB types
 */
export const LnbType = {
  /** North America Ku band */
  KU_BAND: 'k',
  /** C band */
  C_BAND: 'c',
  /** Universal (dual local oscillator) */
  UNIVERSAL: 'u',
} as const;

export type LnbType = (typeof LnbType)[keyof typeof LnbType];

/** C band local oscillator (MHz) */
export const C_BAND_LO = 5150;

/** North America Ku band local oscillator (MHz) */
export const KU_BAND_LO = 10750;

/** Universal LNB low band local oscillator (MHz) */
export const UNIVERSAL_LOW_LO = 9750;

/** Universal LNB high band local oscillator (MHz) */
export const UNIVERSAL_HIGH_LO = 10600;

/** Transponder frequency above which a Universal LNB switches to high band (MHz) */
export const UNIVERSAL_SWITCH = 11700;

// =============================================================================
// Conversion
// =============================================================================

export function isLnbType(value: string): value is LnbType {
  return value === LnbType.KU_BAND || value === LnbType.C_BAND || value === LnbType.UNIVERSAL;
}

/**
 * Convert a transponder frequency to the L-band frequency.
 *
 * @example
 * toLBand(11471, 'u'); // 1721
 */
export function toLBand(frequency: number, lnb: LnbType): number {
  switch (lnb) {
    case LnbType.KU_BAND:
      return frequency - KU_BAND_LO;
    case LnbType.C_BAND:
      // C band LNBs invert the spectrum
      return Math.abs(frequency - C_BAND_LO);
    case LnbType.UNIVERSAL:
      return frequency > UNIVERSAL_SWITCH
        ? frequency - UNIVERSAL_HIGH_LO
        : frequency - UNIVERSAL_LOW_LO;
  }
}

/**
 * Whether the LNB needs the 22 kHz tone; only a Universal LNB in high band does.
 */
export function needsTone(frequency: number, lnb: LnbType): boolean {
  if (lnb !== LnbType.UNIVERSAL) {
    return false;
  }
  return frequency > UNIVERSAL_SWITCH;
}

/** Signal polarization: vertical, horizontal, or none (LNB unpowered) */
export type Polarization = 'v' | 'h' | '0';

/** LNB supply voltage: 13V vertical, 18V horizontal, 0 unpowered */
export type Voltage = 0 | 13 | 18;

export function voltageForPolarization(polarization: Polarization): Voltage {
  switch (polarization) {
    case 'v':
      return 13;
    case 'h':
      return 18;
    default:
      return 0;
  }
}

export function polarizationForVoltage(voltage: Voltage): Polarization {
  switch (voltage) {
    case 13:
      return 'v';
    case 18:
      return 'h';
    default:
      return '0';
  }
}
