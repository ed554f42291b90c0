/**
 * Tuner command for the ondd CLI.
 *
 * Shows tuner lock, the settings in effect and the streams on the tuned
 * transponder.
 *
 * @module cli/commands/tuner
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { OnddClient } from '../../ipc/client.js';
import type { StreamInfo, TunerSettings, TunerStatus } from '../../ipc/records.js';
import type { Polarization } from '../../tuner/lnb.js';
import { formatBitrate, formatFrequency } from '../../utils/format.js';
import { QueryResult } from '../components/QueryResult.js';
import type { CommandContext } from '../context.js';
import { useClientQuery } from '../hooks/useClientQuery.js';
import { runJson, runView } from '../utils/run.js';

// =============================================================================
// Types
// =============================================================================

export interface TunerReport {
  status: TunerStatus;
  settings: TunerSettings;
  streams: StreamInfo[];
}

// =============================================================================
// Data
// =============================================================================

export async function fetchTunerReport(client: OnddClient): Promise<TunerReport> {
  const [status, settings, streams] = await Promise.all([
    client.getTunerStatus(),
    client.getTunerSettings(),
    client.listStreams(),
  ]);
  return { status, settings, streams };
}

// =============================================================================
// Components
// =============================================================================

const POLARIZATION_NAMES: Record<Polarization, string> = {
  v: 'vertical',
  h: 'horizontal',
  '0': 'off',
};

const Row: React.FC<{ label: string; value: string }> = ({ label, value }) => (
  <Box>
    <Box width={14}>
      <Text dimColor>{label}</Text>
    </Box>
    <Text>{value}</Text>
  </Box>
);

export const TunerView: React.FC<TunerReport> = ({ status, settings, streams }) => (
  <Box flexDirection="column">
    <Box>
      <Text bold>Tuner </Text>
      <Text color={status.locked ? 'green' : 'red'}>{status.locked ? '[locked]' : '[no lock]'}</Text>
    </Box>
    <Row label="Signal" value={`${status.signal}%`} />
    <Row label="SNR" value={`${status.snr.toFixed(1)} dB`} />
    <Row label="Frequency" value={formatFrequency(settings.frequency)} />
    <Row label="Symbol rate" value={`${settings.symbolRate} ksym/s`} />
    <Row label="Delivery" value={settings.delivery || '--'} />
    <Row label="Modulation" value={settings.modulation || '--'} />
    <Row label="Polarization" value={POLARIZATION_NAMES[settings.polarization]} />
    <Row label="Tone" value={settings.tone ? 'on' : 'off'} />
    <Row label="Azimuth" value={`${settings.azimuth}°`} />

    <Box marginTop={1}>
      <Text bold>Streams</Text>
    </Box>
    {streams.length === 0 ? (
      <Text dimColor>none</Text>
    ) : (
      streams.map((stream) => <Row key={stream.id} label={stream.id} value={formatBitrate(stream.bitrate)} />)
    )}
  </Box>
);

export function TunerCommand({ client }: { client: OnddClient }): React.ReactElement {
  const state = useClientQuery(() => fetchTunerReport(client));
  return (
    <QueryResult state={state} loadingText="Querying tuner...">
      {(report) => <TunerView {...report} />}
    </QueryResult>
  );
}

export async function runTuner(context: CommandContext): Promise<void> {
  if (context.json) {
    return runJson(() => fetchTunerReport(context.client), context);
  }
  return runView(<TunerCommand client={context.client} />, context);
}

export default runTuner;
