#!/usr/bin/env node

/**
 * hopshell CLI
 * Main entry point
 */

import { Command } from "commander";
import { initLogger, logger, LogLevel } from "@hopshell/core";
import { runCommand } from "./commands/run.js";
import type { RunOptions } from "./commands/run.js";
import { requestCommand } from "./commands/request.js";
import type { RequestOptions } from "./commands/request.js";
import {
  profileAddCommand,
  profileListCommand,
  profileRemoveCommand,
  profileShowCommand,
} from "./commands/profile.js";
import type { ProfileAddOptions, ProfileRemoveOptions } from "./commands/profile.js";
import { createCliContext } from "./utils/context.js";
import type { CliContext } from "./utils/context.js";
import { collect } from "./utils/options.js";

interface GlobalOptions {
  verbose?: boolean;
  config?: string;
}

const program = new Command();

/**
 * CLI Version and description
 */
program
  .name("hopshell")
  .description("Run commands and HTTP requests on hosts reachable only through SSH gateways")
  .version("1.0.0")
  .option("-v, --verbose", "Show debug logs")
  .option("-c, --config <path>", "Use a specific configuration file");

function context(): CliContext {
  return createCliContext(program.opts<GlobalOptions>().config);
}

/**
 * Apply the log level before any command runs
 */
program.hook("preAction", async () => {
  const { verbose } = program.opts<GlobalOptions>();
  if (verbose) {
    initLogger({ level: LogLevel.DEBUG });
    return;
  }
  const config = await context().configManager.load();
  initLogger({ level: config.defaults.logLevel });
});

/**
 * Options shared by the commands that open a hop chain
 */
function withHopOptions(command: Command): Command {
  return command
    .option("--hop <user@host:port>", "Host to go through, in order; the last one is the target", collect)
    .option("-p, --profile <name>", "Use a saved hop chain")
    .option("-i, --identity <path>", "Private key for hops without one")
    .option("--connect-retry <n>", "Connection retries per hop (-1 for infinite retry)");
}

/**
 * Run command - Run a command on the target host
 */
withHopOptions(program.command("run <command...>"))
  .description("Run a command on the last host of the chain")
  .option("--as <user>", "Run the command as another user (sudo privilege needed)")
  .option("-t, --timeout <ms>", "Timeout of each attempt, in milliseconds")
  .option("-r, --retry <n>", "Retries while the exit code is not a success code (-1 for infinite retry)")
  .option("--retry-interval <ms>", "Milliseconds between retries")
  .option("--success <codes>", "Comma separated success exit codes", "0")
  .option("--stream", "Show output while the command runs")
  .option("-s, --silent", "Keep the command out of the logs")
  .option("--redact <pattern>", "Mask matches of this pattern in logs", collect)
  .option("--no-raise", "Do not fail on an unexpected exit code")
  .action(async (command: string[], options: RunOptions) => {
    process.exitCode = await runCommand(command, options, context());
  });

/**
 * Request command - HTTP request with curl on the target host
 */
withHopOptions(program.command("request <method> <uri>"))
  .description("Perform an HTTP request from the last host of the chain")
  .option("-H, --header <name:value>", "Request header", collect)
  .option("--param <name=value>", "Query string parameter", collect)
  .option("-d, --data <data>", "Request body")
  .option("--remote-file <path>", "Send a file of the target host as request body")
  .option("--local-file <path>", "Send a local file as request body")
  .option("-u, --user <user:password>", "Basic authentication")
  .option("-k, --insecure", "Do not verify the server certificate")
  .option("-I, --head-only", "Only fetch status line and headers")
  .option("-s, --silent", "Keep the curl command out of the logs")
  .option("-f, --fail", "Fail unless the status code is 200 or 201")
  .action(async (method: string, uri: string, options: RequestOptions) => {
    process.exitCode = await requestCommand(method, uri, options, context());
  });

/**
 * Profile command - Manage saved hop chains
 */
const profileCmd = program.command("profile").description("Manage saved hop chains");

profileCmd
  .command("list")
  .description("List profiles")
  .action(async () => {
    process.exitCode = await profileListCommand(context());
  });

profileCmd
  .command("show <name>")
  .description("Show the hops of a profile")
  .action(async (name: string) => {
    process.exitCode = await profileShowCommand(name, context());
  });

profileCmd
  .command("add <name> <hops...>")
  .description("Save a hop chain, gateway first")
  .option("-i, --identity <path>", "Private key for every hop")
  .option("--force", "Replace an existing profile")
  .action(async (name: string, hops: string[], options: ProfileAddOptions) => {
    process.exitCode = await profileAddCommand(name, hops, options, context());
  })
  .addHelpText(
    "after",
    `
Examples:
  $ hopshell profile add prod deploy@gateway.example.com admin@db.internal:2222
  $ hopshell run --profile prod -- uptime
`
  );

profileCmd
  .command("remove <name>")
  .description("Delete a profile")
  .option("-y, --yes", "Do not ask for confirmation")
  .action(async (name: string, options: ProfileRemoveOptions) => {
    process.exitCode = await profileRemoveCommand(name, options, context());
  });

/**
 * Parse and execute commands
 */
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    logger.error("CLI error", error);
    process.exit(1);
  }
}

void main();

export { program };
