/**
 * Cache command for the ondd CLI.
 *
 * Shows download cache usage, or discards the cache with `cache reset`.
 *
 * @module cli/commands/cache
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { OnddClient } from '../../ipc/client.js';
import type { CacheInfo } from '../../ipc/records.js';
import { formatBytes } from '../../utils/format.js';
import { QueryResult } from '../components/QueryResult.js';
import type { CommandContext } from '../context.js';
import { useClientQuery } from '../hooks/useClientQuery.js';
import { createProgressBar, successMessage, toJson } from '../utils/output.js';
import { runAction, runJson, runView } from '../utils/run.js';

// =============================================================================
// Components
// =============================================================================

/**
 * Cache usage with a fill bar
 */
export const CacheView: React.FC<{ cache: CacheInfo }> = ({ cache }) => {
  const percentUsed = cache.total > 0 ? (cache.used * 100) / cache.total : 0;

  return (
    <Box flexDirection="column">
      <Text bold>Cache</Text>
      <Box>
        <Box width={8}>
          <Text dimColor>Used</Text>
        </Box>
        <Text>{formatBytes(cache.used)}</Text>
      </Box>
      <Box>
        <Box width={8}>
          <Text dimColor>Free</Text>
        </Box>
        <Text>{formatBytes(cache.free)}</Text>
      </Box>
      <Box>
        <Box width={8}>
          <Text dimColor>Total</Text>
        </Box>
        <Text>{formatBytes(cache.total)}</Text>
      </Box>
      <Text color={percentUsed >= 90 ? 'red' : 'green'}>{createProgressBar(percentUsed)}</Text>
    </Box>
  );
};

export function CacheCommand({ client }: { client: OnddClient }): React.ReactElement {
  const state = useClientQuery(() => client.getCacheInfo());
  return (
    <QueryResult state={state} loadingText="Reading cache usage...">
      {(cache) => <CacheView cache={cache} />}
    </QueryResult>
  );
}

// =============================================================================
// Main Functions
// =============================================================================

/**
 * Execute `cache reset` (non-interactive).
 */
export async function executeCacheReset(context: CommandContext): Promise<void> {
  await runAction(async () => {
    await context.client.resetCache();
    console.log(context.json ? toJson({ reset: true }) : successMessage('Cache reset'));
  }, context);
}

export async function runCache(context: CommandContext): Promise<void> {
  if (context.json) {
    return runJson(() => context.client.getCacheInfo(), context);
  }
  return runView(<CacheCommand client={context.client} />, context);
}

export default runCache;
