#!/usr/bin/env node
/**
 * ondd CLI Entry Point
 *
 * This module handles command-line argument parsing and routes
 * to the appropriate command implementations.
 *
 * @module cli
 */

import React from 'react';
import { render, Text, Box } from 'ink';
import meow from 'meow';
import { VERSION } from '../shared/constants.js';
import { createContext, type CommandContext } from './context.js';
import {
  executeCacheReset,
  executeOutput,
  executePing,
  executeTune,
  runCache,
  runEvents,
  runFiles,
  runStatus,
  runTransfers,
  runTuner,
} from './commands/index.js';
import { describeError } from './utils/output.js';

// =============================================================================
// CLI Configuration
// =============================================================================

const cli = meow(
  `
  Usage
    $ ondd <command> [options]

  Commands
    status              Show tuner lock and the current transfer (default)
    ping                Check that the daemon answers
    transfers           List transfers in progress (alias: list, ls)
    files               List files announced on the signaling channel
    cache [reset]       Show cache usage, or discard the cache
    tuner               Show tuner settings and streams
    tune                Tune to a transponder
    output [path]       Show or set the output directory
    events              Show the daemon event log

  Options
    --socket, -s        Daemon socket path or host:port (env ONDD_SOCKET)
    --timeout           Response timeout in ms (env ONDD_TIMEOUT)
    --json              Print results as JSON
    --verbose           Log protocol exchanges to stderr
    --version, -v       Show version
    --help, -h          Show help

  Tune options
    --frequency, -f     Transponder frequency in MHz
    --symbol-rate       Symbol rate in ksym/s
    --lnb               LNB type: u (Universal), k (Ku), c (C band)  [u]
    --polarization, -p  v or h  [v]
    --delivery          dvb-s or dvb-s2  [dvb-s]
    --modulation        qpsk, 8psk, 16apsk or 32apsk  [qpsk]
    --azimuth           Dish azimuth in degrees  [0]

  Examples
    $ ondd status
    $ ondd transfers --json
    $ ondd -s /tmp/ondd.ctrl cache
    $ ondd tune -f 11471 --symbol-rate 27500 -p v
    $ ondd output /srv/downloads
`,
  {
    importMeta: import.meta,
    version: VERSION,
    flags: {
      version: {
        type: 'boolean',
        shortFlag: 'v',
      },
      socket: {
        type: 'string',
        shortFlag: 's',
      },
      timeout: {
        type: 'string',
      },
      json: {
        type: 'boolean',
        default: false,
      },
      verbose: {
        type: 'boolean',
        default: false,
      },
      frequency: {
        type: 'string',
        shortFlag: 'f',
      },
      symbolRate: {
        type: 'string',
      },
      lnb: {
        type: 'string',
      },
      polarization: {
        type: 'string',
        shortFlag: 'p',
      },
      delivery: {
        type: 'string',
      },
      modulation: {
        type: 'string',
      },
      azimuth: {
        type: 'string',
      },
    },
  }
);

// =============================================================================
// Error Display Component
// =============================================================================

interface ErrorProps {
  message: string;
}

/**
 * Error display component
 */
function ErrorDisplay({ message }: ErrorProps) {
  return (
    <Box flexDirection="column" padding={1}>
      <Text color="red" bold>
        Error: {message}
      </Text>
      <Box marginTop={1}>
        <Text>Run </Text>
        <Text color="yellow">ondd --help</Text>
        <Text> for usage information</Text>
      </Box>
    </Box>
  );
}

function fail(message: string): void {
  render(<ErrorDisplay message={message} />).unmount();
  process.exitCode = 1;
}

// =============================================================================
// Command Routing
// =============================================================================

/**
 * Route the command to the appropriate handler
 */
async function routeCommand(): Promise<void> {
  const [command = 'status', ...args] = cli.input;
  const flags = cli.flags;

  // Handle version flag
  if (flags.version) {
    console.log(VERSION);
    return;
  }

  let context: CommandContext;
  try {
    context = createContext(flags);
  } catch (err) {
    fail(describeError(err));
    return;
  }

  switch (command.toLowerCase()) {
    case 'status':
      return runStatus(context);

    case 'ping':
      return executePing(context);

    case 'transfers':
    case 'list':
    case 'ls':
      return runTransfers(context);

    case 'files':
      return runFiles(context);

    case 'cache': {
      const action = args[0];
      if (action === undefined) {
        return runCache(context);
      }
      if (action === 'reset') {
        return executeCacheReset(context);
      }
      context.client.close();
      fail(`Unknown cache action: ${action} (expected reset)`);
      return;
    }

    case 'tuner':
      return runTuner(context);

    case 'tune':
      return executeTune(context, flags);

    case 'output':
      return executeOutput(context, args[0]);

    case 'events':
      return runEvents(context);

    default: {
      context.client.close();
      fail(`Unknown command: ${command}`);
    }
  }
}

// =============================================================================
// Main Entry Point
// =============================================================================

routeCommand().catch((err: unknown) => {
  console.error(describeError(err));
  process.exitCode = 1;
});
