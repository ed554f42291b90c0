/**
 * Command runners shared by the ondd CLI commands.
 *
 * @module cli/utils/run
 */

import type React from 'react';
import { render } from 'ink';
import type { CommandContext } from '../context.js';
import { describeError, errorMessage, toJson } from './output.js';

/**
 * Render a query view and wait for it to finish, then release the client.
 * A failed query sets a non-zero exit code.
 */
export async function runView(element: React.ReactElement, context: CommandContext): Promise<void> {
  const { waitUntilExit } = render(element);
  try {
    await waitUntilExit();
  } catch {
    // The view already shows the error
    process.exitCode = 1;
  } finally {
    context.client.close();
  }
}

/**
 * Run a query and print its result as JSON.
 */
export async function runJson<T>(query: () => Promise<T>, context: CommandContext): Promise<void> {
  await runAction(async () => {
    console.log(toJson(await query()));
  }, context);
}

/**
 * Run a non-interactive action, reporting failures on stderr.
 */
export async function runAction(action: () => Promise<void>, context: CommandContext): Promise<void> {
  try {
    await action();
  } catch (err) {
    console.error(errorMessage(describeError(err)));
    process.exitCode = 1;
  } finally {
    context.client.close();
  }
}
