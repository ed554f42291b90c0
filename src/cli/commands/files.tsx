/**
 * Files command for the ondd CLI.
 *
 * Lists files announced on the signaling channel.
 *
 * @module cli/commands/files
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { OnddClient } from '../../ipc/client.js';
import type { FileEntry } from '../../ipc/records.js';
import { formatBytes, truncateText } from '../../utils/format.js';
import { QueryResult } from '../components/QueryResult.js';
import type { CommandContext } from '../context.js';
import { useClientQuery } from '../hooks/useClientQuery.js';
import { runJson, runView } from '../utils/run.js';

/**
 * Announced files with their sizes and total
 */
export const FileTable: React.FC<{ files: readonly FileEntry[] }> = ({ files }) => {
  if (files.length === 0) {
    return (
      <Box>
        <Text color="yellow">[INFO] No files announced</Text>
      </Box>
    );
  }

  const total = files.reduce((sum, file) => sum + file.size, 0);

  return (
    <Box flexDirection="column">
      {files.map((file) => (
        <Box key={file.path}>
          <Box width={62}>
            <Text>{truncateText(file.path, 60)}</Text>
          </Box>
          <Box width={12} justifyContent="flex-end">
            <Text>{formatBytes(file.size)}</Text>
          </Box>
        </Box>
      ))}
      <Box marginTop={1}>
        <Text dimColor>
          {files.length} file{files.length !== 1 ? 's' : ''}, {formatBytes(total)}
        </Text>
      </Box>
    </Box>
  );
};

export function FilesCommand({ client }: { client: OnddClient }): React.ReactElement {
  const state = useClientQuery(() => client.listFiles());
  return (
    <QueryResult state={state} loadingText="Loading files...">
      {(files) => <FileTable files={files} />}
    </QueryResult>
  );
}

export async function runFiles(context: CommandContext): Promise<void> {
  if (context.json) {
    return runJson(() => context.client.listFiles(), context);
  }
  return runView(<FilesCommand client={context.client} />, context);
}

export default runFiles;
