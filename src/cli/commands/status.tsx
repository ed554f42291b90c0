/**
 * Status command for the ondd CLI.
 *
 * Shows tuner lock and the transfer currently in progress.
 *
 * @module cli/commands/status
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { TransferStatus, TunerStatus } from '../../ipc/records.js';
import type { OnddClient } from '../../ipc/client.js';
import { formatBytes, truncateText } from '../../utils/format.js';
import { QueryResult } from '../components/QueryResult.js';
import type { CommandContext } from '../context.js';
import { useClientQuery } from '../hooks/useClientQuery.js';
import { createProgressBar } from '../utils/output.js';
import { runJson, runView } from '../utils/run.js';

// =============================================================================
// Types
// =============================================================================

export interface DaemonStatus {
  tuner: TunerStatus;
  transfer: TransferStatus;
}

// =============================================================================
// Data
// =============================================================================

/**
 * Fetch tuner and transfer status. Both requests are issued together; the
 * client serializes them on its connection.
 */
export async function fetchStatus(client: OnddClient): Promise<DaemonStatus> {
  const [tuner, transfer] = await Promise.all([client.getTunerStatus(), client.getStatus()]);
  return { tuner, transfer };
}

// =============================================================================
// Components
// =============================================================================

const Field: React.FC<{ label: string; children: React.ReactNode }> = ({ label, children }) => (
  <Box>
    <Box width={10}>
      <Text dimColor>{label}</Text>
    </Box>
    {children}
  </Box>
);

/**
 * Tuner and current transfer
 */
export const StatusView: React.FC<DaemonStatus> = ({ tuner, transfer }) => (
  <Box flexDirection="column">
    <Text bold>Tuner</Text>
    <Field label="Lock">
      <Text color={tuner.locked ? 'green' : 'red'}>{tuner.locked ? 'locked' : 'no lock'}</Text>
    </Field>
    <Field label="Signal">
      <Text>{tuner.signal}%</Text>
    </Field>
    <Field label="SNR">
      <Text>{tuner.snr.toFixed(1)} dB</Text>
    </Field>

    <Box marginTop={1}>
      <Text bold>Transfer</Text>
    </Box>
    {transfer.path === '' ? (
      <Field label="State">
        <Text>{transfer.state}</Text>
      </Field>
    ) : (
      <>
        <Field label="File">
          <Text>{truncateText(transfer.filename, 50)}</Text>
        </Field>
        <Field label="State">
          <Text>{transfer.state}</Text>
        </Field>
        <Field label="Size">
          <Text>
            {formatBytes(transfer.received)} / {formatBytes(transfer.size)}
          </Text>
        </Field>
        <Field label="Progress">
          <Text color={transfer.complete ? 'green' : 'blue'}>{createProgressBar(transfer.progress)}</Text>
        </Field>
      </>
    )}
  </Box>
);

/**
 * Status command component using Ink for rendering
 */
export function StatusCommand({ client }: { client: OnddClient }): React.ReactElement {
  const state = useClientQuery(() => fetchStatus(client));
  return (
    <QueryResult state={state} loadingText="Querying daemon...">
      {(status) => <StatusView {...status} />}
    </QueryResult>
  );
}

/**
 * Run the status command
 */
export async function runStatus(context: CommandContext): Promise<void> {
  if (context.json) {
    return runJson(() => fetchStatus(context.client), context);
  }
  return runView(<StatusCommand client={context.client} />, context);
}

export default runStatus;
