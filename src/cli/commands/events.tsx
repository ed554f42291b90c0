/**
 * Events command for the ondd CLI.
 *
 * Prints the daemon's event log, oldest first.
 *
 * @module cli/commands/events
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { OnddClient } from '../../ipc/client.js';
import type { DaemonEvent } from '../../ipc/records.js';
import { formatTimestamp } from '../../utils/format.js';
import { QueryResult } from '../components/QueryResult.js';
import type { CommandContext } from '../context.js';
import { useClientQuery } from '../hooks/useClientQuery.js';
import { runJson, runView } from '../utils/run.js';

function getEventColor(type: string): string {
  switch (type) {
    case 'error':
      return 'red';
    case 'completed':
      return 'green';
    default:
      return 'cyan';
  }
}

export const EventList: React.FC<{ events: readonly DaemonEvent[] }> = ({ events }) => {
  if (events.length === 0) {
    return (
      <Box>
        <Text color="yellow">[INFO] No events</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column">
      {events.map((event, index) => (
        <Box key={index}>
          <Box width={21}>
            <Text dimColor>{formatTimestamp(event.time)}</Text>
          </Box>
          <Box width={12}>
            <Text color={getEventColor(event.type)}>{event.type}</Text>
          </Box>
          <Text>{[event.path, event.message].filter(Boolean).join(' ')}</Text>
        </Box>
      ))}
    </Box>
  );
};

export function EventsCommand({ client }: { client: OnddClient }): React.ReactElement {
  const state = useClientQuery(() => client.getEvents());
  return (
    <QueryResult state={state} loadingText="Loading events...">
      {(events) => <EventList events={events} />}
    </QueryResult>
  );
}

export async function runEvents(context: CommandContext): Promise<void> {
  if (context.json) {
    return runJson(() => context.client.getEvents(), context);
  }
  return runView(<EventsCommand client={context.client} />, context);
}

export default runEvents;
