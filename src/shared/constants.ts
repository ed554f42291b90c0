/**
 * Shared constants
 *
 * @module shared/constants
 */

/** Package version, shown by `ondd --version` */
export const VERSION = '0.1.0';
