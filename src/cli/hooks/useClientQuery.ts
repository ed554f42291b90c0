/**
 * useClientQuery Hook - Runs one daemon query for a CLI view.
 *
 * The query starts on mount. Once it settles the Ink app exits, with the
 * error when the query failed so `waitUntilExit()` rejects.
 *
 * @module cli/hooks/useClientQuery
 */

import { useEffect, useState } from 'react';
import { useApp } from 'ink';
import { describeError } from '../utils/output.js';

// =============================================================================
// Hook Return Type
// =============================================================================

export interface QueryState<T> {
  /** Query result, null until it arrives */
  data: T | null;

  /** Error message if the query failed */
  error: string | null;

  /** Whether the query is still running */
  loading: boolean;
}

// =============================================================================
// useClientQuery Hook
// =============================================================================

export function useClientQuery<T>(query: () => Promise<T>): QueryState<T> {
  const { exit } = useApp();
  const [state, setState] = useState<QueryState<T>>({
    data: null,
    error: null,
    loading: true,
  });

  useEffect(() => {
    let cancelled = false;

    query().then(
      (data) => {
        if (!cancelled) {
          setState({ data, error: null, loading: false });
        }
      },
      (err: unknown) => {
        if (!cancelled) {
          setState({ data: null, error: describeError(err), loading: false });
        }
      }
    );

    return () => {
      cancelled = true;
    };
    // The query runs once per mount
  }, []);

  useEffect(() => {
    if (state.loading) {
      return;
    }
    exit(state.error === null ? undefined : new Error(state.error));
  }, [state, exit]);

  return state;
}
