/**
 * CLI Commands Index
 *
 * Exports all CLI command implementations.
 *
 * @module cli/commands
 */

// Status command
export { StatusCommand, StatusView, fetchStatus, runStatus, type DaemonStatus } from './status.js';

// Ping command
export { executePing } from './ping.js';

// Transfers command
export { TransfersCommand, TransferTable, runTransfers } from './transfers.js';

// Files command
export { FilesCommand, FileTable, runFiles } from './files.js';

// Cache command
export { CacheCommand, CacheView, runCache, executeCacheReset } from './cache.js';

// Tuner commands
export { TunerCommand, TunerView, fetchTunerReport, runTuner, type TunerReport } from './tuner.js';
export { executeTune, parseTransponder, type TuneFlags } from './tune.js';

// Output command
export { executeOutput } from './output.js';

// Events command
export { EventsCommand, EventList, runEvents } from './events.js';
