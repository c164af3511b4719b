/**
 * Map failures to process exit codes
 */

import chalk from "chalk";
import { CommandTimeoutError, ConnectionError, RunCommandError, logger } from "@hopshell/core";

export const EXIT_FAILURE = 1;
export const EXIT_TIMEOUT = 124;
export const EXIT_INTERRUPTED = 130;
export const EXIT_CONNECTION = 255;

export function exitCodeFor(error: unknown, signal?: AbortSignal): number {
  if (signal?.aborted) {
    return EXIT_INTERRUPTED;
  }
  if (error instanceof RunCommandError) {
    return error.exitCode > 0 ? error.exitCode : EXIT_FAILURE;
  }
  if (error instanceof CommandTimeoutError) {
    return EXIT_TIMEOUT;
  }
  if (error instanceof ConnectionError) {
    return EXIT_CONNECTION;
  }
  return EXIT_FAILURE;
}

/**
 * Report a failed command and return the exit code to use
 */
export function reportFailure(action: string, error: unknown, signal?: AbortSignal): number {
  const code = exitCodeFor(error, signal);
  if (code === EXIT_INTERRUPTED) {
    console.error(chalk.yellow("\n⚠️  Interrupted\n"));
    return code;
  }
  logger.debug(`${action} failed`, error);
  console.error(chalk.red(`\n❌ ${action} failed: ${(error as Error).message}\n`));
  return code;
}

/**
 * Abort the returned signal on Ctrl-C until `dispose` is called
 */
export function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort(new Error("Interrupted by user"));
  process.on("SIGINT", onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => process.removeListener("SIGINT", onInterrupt),
  };
}
