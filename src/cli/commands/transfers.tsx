/**
 * Transfers command for the ondd CLI.
 *
 * Lists transfers in progress with their size, progress and state.
 *
 * @module cli/commands/transfers
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { OnddClient } from '../../ipc/client.js';
import type { TransferStatus } from '../../ipc/records.js';
import { formatBytes, formatPercent, truncateText } from '../../utils/format.js';
import { QueryResult } from '../components/QueryResult.js';
import type { CommandContext } from '../context.js';
import { useClientQuery } from '../hooks/useClientQuery.js';
import { runJson, runView } from '../utils/run.js';

// =============================================================================
// Components
// =============================================================================

/**
 * Map transfer state to Ink color
 */
function getStateColor(transfer: TransferStatus): string {
  if (transfer.complete) {
    return 'green';
  }
  switch (transfer.state) {
    case 'active':
      return 'blue';
    case 'idle':
      return 'gray';
    case 'error':
      return 'red';
    default:
      return 'white';
  }
}

const TransferRow: React.FC<{ transfer: TransferStatus; index: number }> = ({ transfer, index }) => (
  <Box>
    <Box width={4}>
      <Text dimColor>{(index + 1).toString().padStart(3)}.</Text>
    </Box>
    <Box width={42}>
      <Text>{truncateText(transfer.filename || transfer.id, 40)}</Text>
    </Box>
    <Box width={12} justifyContent="flex-end">
      <Text>{formatBytes(transfer.size)}</Text>
    </Box>
    <Box width={10} justifyContent="flex-end">
      <Text>{formatPercent(transfer.progress)}</Text>
    </Box>
    <Box width={12}>
      <Text color={getStateColor(transfer)}> {transfer.state}</Text>
    </Box>
  </Box>
);

const TableHeader: React.FC = () => (
  <Box>
    <Box width={4}>
      <Text bold dimColor>
        {'  #'}
      </Text>
    </Box>
    <Box width={42}>
      <Text bold dimColor>
        File
      </Text>
    </Box>
    <Box width={12} justifyContent="flex-end">
      <Text bold dimColor>
        Size
      </Text>
    </Box>
    <Box width={10} justifyContent="flex-end">
      <Text bold dimColor>
        Progress
      </Text>
    </Box>
    <Box width={12}>
      <Text bold dimColor>
        {' '}
        State
      </Text>
    </Box>
  </Box>
);

/**
 * Table of transfers, in daemon order
 */
export const TransferTable: React.FC<{ transfers: readonly TransferStatus[] }> = ({ transfers }) => {
  if (transfers.length === 0) {
    return (
      <Box>
        <Text color="yellow">[INFO] No transfers in progress</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column">
      <TableHeader />
      <Text dimColor>{'-'.repeat(80)}</Text>
      {transfers.map((transfer, index) => (
        <TransferRow key={transfer.id || index} transfer={transfer} index={index} />
      ))}
      <Box marginTop={1}>
        <Text dimColor>
          {transfers.length} transfer{transfers.length !== 1 ? 's' : ''}
        </Text>
      </Box>
    </Box>
  );
};

/**
 * Transfers command component using Ink for rendering
 */
export function TransfersCommand({ client }: { client: OnddClient }): React.ReactElement {
  const state = useClientQuery(() => client.listTransfers());
  return (
    <QueryResult state={state} loadingText="Loading transfers...">
      {(transfers) => <TransferTable transfers={transfers} />}
    </QueryResult>
  );
}

/**
 * Run the transfers command
 */
export async function runTransfers(context: CommandContext): Promise<void> {
  if (context.json) {
    return runJson(() => context.client.listTransfers(), context);
  }
  return runView(<TransfersCommand client={context.client} />, context);
}

export default runTransfers;
