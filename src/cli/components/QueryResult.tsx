/**
 * QueryResult - loading and error frame around a query's view.
 *
 * @module cli/components/QueryResult
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { QueryState } from '../hooks/useClientQuery.js';

export interface QueryResultProps<T> {
  state: QueryState<T>;
  /** Shown while the query runs */
  loadingText: string;
  /** Renders the result */
  children: (data: T) => React.ReactElement;
}

export function QueryResult<T>({ state, loadingText, children }: QueryResultProps<T>): React.ReactElement | null {
  if (state.loading) {
    return (
      <Box>
        <Text color="cyan">{loadingText}</Text>
      </Box>
    );
  }

  if (state.error !== null) {
    return (
      <Box>
        <Text color="red">[ERROR] {state.error}</Text>
      </Box>
    );
  }

  if (state.data === null) {
    return null;
  }

  return children(state.data);
}

export default QueryResult;
