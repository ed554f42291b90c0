/**
 * Ping command for the ondd CLI.
 *
 * Exits non-zero when the daemon does not answer.
 *
 * @module cli/commands/ping
 */

import type { CommandContext } from '../context.js';
import { errorMessage, successMessage, toJson } from '../utils/output.js';
import { runAction } from '../utils/run.js';

export async function executePing(context: CommandContext): Promise<void> {
  await runAction(async () => {
    const reachable = await context.client.ping();
    if (!reachable) {
      process.exitCode = 1;
    }

    if (context.json) {
      console.log(toJson({ endpoint: context.endpoint, reachable }));
    } else if (reachable) {
      console.log(successMessage(`Daemon is answering on ${context.endpoint}`));
    } else {
      console.error(errorMessage(`No answer from daemon on ${context.endpoint}`));
    }
  }, context);
}

export default executePing;
