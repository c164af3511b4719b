/**
 * Option parsing shared by the commands
 */

import os from "node:os";
import { InvalidArgumentError, parseHop } from "@hopshell/core";
import type { ChainOptions, Hop, HopshellConfig } from "@hopshell/core";
import type { CliContext } from "./context.js";

/**
 * Options selecting and opening the hop chain
 */
export interface HopOptions {
  hop?: string[];
  profile?: string;
  identity?: string;
  connectRetry?: string;
}

/**
 * Accumulate a repeatable option
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parseInteger(value: string, name: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Invalid value '${value}' for ${name}, an integer is expected`);
  }
  return Number.parseInt(value, 10);
}

/**
 * `0,127` to `[0, 127]`
 */
export function parseExitCodes(value: string): number[] {
  return value.split(",").map((code) => parseInteger(code, "--success"));
}

/**
 * Split `name<separator>value` at the first separator
 */
export function parsePair(value: string, separator: string, name: string): [string, string] {
  const index = value.indexOf(separator);
  if (index <= 0) {
    throw new InvalidArgumentError(`Invalid value '${value}' for ${name}, expected key${separator}value`);
  }
  return [value.slice(0, index).trim(), value.slice(index + separator.length).trim()];
}

/**
 * Hops from `--hop` or from a saved profile, gateway first
 */
export function resolveHops(options: HopOptions, config: HopshellConfig): Hop[] {
  const localUser = os.userInfo().username;
  const hops = options.hop ?? [];

  if (hops.length > 0 && options.profile) {
    throw new InvalidArgumentError("Use either --hop or --profile, not both");
  }

  let resolved: Hop[];
  if (options.profile) {
    const profile = config.profiles[options.profile];
    if (!profile) {
      throw new InvalidArgumentError(`Profile '${options.profile}' not found`);
    }
    resolved = profile.map((hop) => ({
      host: hop.host,
      port: hop.port ?? config.defaults.port,
      username: hop.username ?? localUser,
      privateKeyPath: hop.privateKeyPath,
    }));
  } else if (hops.length > 0) {
    resolved = hops.map((notation) => parseHop(notation, { port: config.defaults.port, username: localUser }));
  } else {
    throw new InvalidArgumentError("No host given, use --hop <user@host:port> or --profile <name>");
  }

  if (resolved.length === 0) {
    throw new InvalidArgumentError(`Profile '${options.profile}' has no hop`);
  }
  return resolved.map((hop) => ({ ...hop, privateKeyPath: hop.privateKeyPath ?? options.identity }));
}

/**
 * How to open the chain, from configuration defaults and the command line
 */
export function chainOptions(options: HopOptions, config: HopshellConfig, context: CliContext): ChainOptions {
  return {
    retry: options.connectRetry === undefined ? config.defaults.retry : parseInteger(options.connectRetry, "--connect-retry"),
    retryInterval: config.defaults.retryInterval,
    agent: config.defaults.agent ?? process.env.SSH_AUTH_SOCK,
    transport: context.transport,
    confirm: context.confirm,
    stdout: context.stdout,
  };
}
