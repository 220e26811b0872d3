/**
 * Global CLI context, initialized by the program's preAction hook
 *
 * @module cli/lib/context
 */

import type { ParcelWatchConfig } from '../../config/config.js';
import { errorMessage } from '../../core/errors.js';
import { printError, type CommandOutput } from './output.js';
import { exitCodeFor, type ExitCode } from './exit-codes.js';

export interface GlobalContext {
  readonly config: ParcelWatchConfig;
  readonly out: CommandOutput;
}

let globalContext: GlobalContext | null = null;

export function setGlobalContext(context: GlobalContext): void {
  globalContext = context;
}

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

/**
 * Run a command body and set the process exit code from its result
 */
export async function runCommand(
  body: (context: GlobalContext) => Promise<ExitCode>
): Promise<void> {
  const context = getGlobalContext();
  try {
    process.exitCode = await body(context);
  } catch (error) {
    printError(context.out, errorMessage(error), context.config.json);
    process.exitCode = exitCodeFor(error);
  }
}
