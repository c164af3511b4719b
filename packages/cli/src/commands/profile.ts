/**
 * Profile Command
 * Manage saved hop chains
 */

import chalk from "chalk";
import { parseHop } from "@hopshell/core";
import type { HopConfig } from "@hopshell/core";
import type { CliContext } from "../utils/context.js";
import { EXIT_FAILURE, reportFailure } from "../utils/exit.js";

export interface ProfileAddOptions {
  identity?: string;
  force?: boolean;
}

export interface ProfileRemoveOptions {
  yes?: boolean;
}

function formatHop(hop: HopConfig): string {
  const user = hop.username ? `${hop.username}@` : "";
  const port = hop.port === undefined ? "" : `:${hop.port}`;
  return `${user}${hop.host}${port}`;
}

/**
 * List profiles
 */
export async function profileListCommand(context: CliContext): Promise<number> {
  try {
    const config = await context.configManager.load();
    const names = context.configManager.listProfiles();

    if (names.length === 0) {
      console.log(chalk.yellow("\n⚠️  No profiles found.\n"));
      return 0;
    }

    console.log(chalk.bold.cyan("\nProfiles\n"));
    for (const name of names) {
      const hops = config.profiles[name] ?? [];
      console.log(`${chalk.bold(name)}  ${chalk.gray(hops.map(formatHop).join(" -> "))}`);
    }
    console.log();
    return 0;
  } catch (error) {
    return reportFailure("Listing profiles", error);
  }
}

/**
 * Show one profile, one hop per line
 */
export async function profileShowCommand(name: string, context: CliContext): Promise<number> {
  try {
    await context.configManager.load();
    const hops = context.configManager.getProfile(name);
    if (!hops) {
      console.log(chalk.red(`\n❌ Profile '${name}' not found\n`));
      return EXIT_FAILURE;
    }

    console.log(chalk.bold.cyan(`\nProfile: ${name}\n`));
    hops.forEach((hop, index) => {
      const key = hop.privateKeyPath ? chalk.gray(` (key: ${hop.privateKeyPath})`) : "";
      console.log(`  ${index + 1}. ${formatHop(hop)}${key}`);
    });
    console.log();
    return 0;
  } catch (error) {
    return reportFailure("Showing profile", error);
  }
}

/**
 * Save a hop chain under a name
 */
export async function profileAddCommand(
  name: string,
  hops: string[],
  options: ProfileAddOptions,
  context: CliContext
): Promise<number> {
  try {
    const config = await context.configManager.load();

    if (context.configManager.getProfile(name) && !options.force) {
      console.log(chalk.red(`\n❌ Profile '${name}' already exists, use --force to replace it\n`));
      return EXIT_FAILURE;
    }

    const hopConfigs: HopConfig[] = hops.map((notation) => {
      const hop = parseHop(notation, { port: config.defaults.port });
      return {
        host: hop.host,
        port: hop.port,
        username: hop.username,
        ...(options.identity ? { privateKeyPath: options.identity } : {}),
      };
    });

    context.configManager.setProfile(name, hopConfigs);
    await context.configManager.save();

    console.log(chalk.green(`\n✅ Profile '${name}' saved (${hopConfigs.map(formatHop).join(" -> ")})\n`));
    return 0;
  } catch (error) {
    return reportFailure("Saving profile", error);
  }
}

/**
 * Delete a profile, after confirmation
 */
export async function profileRemoveCommand(
  name: string,
  options: ProfileRemoveOptions,
  context: CliContext
): Promise<number> {
  try {
    await context.configManager.load();

    if (!context.configManager.getProfile(name)) {
      console.log(chalk.red(`\n❌ Profile '${name}' not found\n`));
      return EXIT_FAILURE;
    }

    const confirmed =
      options.yes ||
      (await context.confirm(`Are you sure you want to delete profile '${name}'?`, {
        defaultAnswer: false,
        interruptAnswer: false,
      }));
    if (!confirmed) {
      console.log(chalk.yellow("\n⚠️  Deletion cancelled\n"));
      return 0;
    }

    context.configManager.removeProfile(name);
    await context.configManager.save();
    console.log(chalk.green(`\n✅ Profile '${name}' deleted\n`));
    return 0;
  } catch (error) {
    return reportFailure("Deleting profile", error);
  }
}
