/**
 * Run Command
 * Run a command on the last host of a hop chain
 */

import chalk from "chalk";
import ora from "ora";
import { openChain } from "@hopshell/core";
import type { OpenedChain, RunCommandOptions } from "@hopshell/core";
import type { CliContext } from "../utils/context.js";
import { EXIT_FAILURE, interruptSignal, reportFailure } from "../utils/exit.js";
import { chainOptions, parseExitCodes, parseInteger, resolveHops } from "../utils/options.js";
import type { HopOptions } from "../utils/options.js";

export interface RunOptions extends HopOptions {
  as?: string;
  timeout?: string;
  retry?: string;
  retryInterval?: string;
  success?: string;
  stream?: boolean;
  silent?: boolean;
  redact?: string[];
  raise: boolean;
}

/**
 * Translate command line options into command options
 */
export function toRunCommandOptions(
  options: RunOptions,
  defaults: { timeout?: number; commandRetryInterval: number }
): RunCommandOptions {
  let silent: RunCommandOptions["silent"] = false;
  if (options.silent) {
    silent = true;
  } else if (options.redact && options.redact.length > 0) {
    silent = options.redact;
  }

  return {
    username: options.as,
    timeout: options.timeout === undefined ? defaults.timeout : parseInteger(options.timeout, "--timeout"),
    retry: options.retry === undefined ? 0 : parseInteger(options.retry, "--retry"),
    retryInterval:
      options.retryInterval === undefined
        ? defaults.commandRetryInterval
        : parseInteger(options.retryInterval, "--retry-interval"),
    successExitCode: options.success === undefined ? undefined : parseExitCodes(options.success),
    continuousOutput: options.stream ?? false,
    silent,
    raiseIfError: options.raise,
  };
}

/**
 * Run command handler
 * @returns process exit code
 */
export async function runCommand(command: string[], options: RunOptions, context: CliContext): Promise<number> {
  const interrupt = interruptSignal();
  let chain: OpenedChain | undefined;

  try {
    const config = await context.configManager.load();
    const hops = resolveHops(options, config);
    const commandOptions = toRunCommandOptions(options, config.defaults);
    const target = hops[hops.length - 1];

    const spinner = ora({ text: `Connecting to ${target.host}...`, isSilent: context.quiet }).start();
    try {
      chain = await openChain(hops, chainOptions(options, config, context));
      spinner.succeed(chalk.green(`Connected to ${target.host}`));
    } catch (error) {
      spinner.fail(chalk.red(`Failed to connect to ${target.host}`));
      throw error;
    }

    const result = await chain.target.runCommand(command.join(" "), { ...commandOptions, signal: interrupt.signal });

    if (!commandOptions.continuousOutput && result.output) {
      context.stdout.write(`${result.output}\n`);
    }

    if (result.succeeded) {
      return 0;
    }
    return result.exitCode > 0 ? result.exitCode : EXIT_FAILURE;
  } catch (error) {
    return reportFailure("Command", error, interrupt.signal);
  } finally {
    chain?.root.close();
    interrupt.dispose();
  }
}
