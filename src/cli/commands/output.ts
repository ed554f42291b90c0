/**
 * Output command for the ondd CLI.
 *
 * Prints the directory completed files are written to, or changes it when a
 * path is given.
 *
 * @module cli/commands/output
 */

import type { CommandContext } from '../context.js';
import { successMessage, toJson } from '../utils/output.js';
import { runAction } from '../utils/run.js';

export async function executeOutput(context: CommandContext, path?: string): Promise<void> {
  await runAction(async () => {
    if (path !== undefined) {
      await context.client.setOutputPath(path);
      console.log(context.json ? toJson({ path }) : successMessage(`Output path set to ${path}`));
      return;
    }

    const current = await context.client.getOutputPath();
    console.log(context.json ? toJson({ path: current }) : current);
  }, context);
}

export default executeOutput;
