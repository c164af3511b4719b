/**
 * Request Command
 * Perform an HTTP request from the last host of a hop chain
 */

import chalk from "chalk";
import ora from "ora";
import { HTTP_METHODS, InvalidArgumentError, RestSSHClient, openChain } from "@hopshell/core";
import type { HttpMethod, OpenedChain, RestRequestOptions } from "@hopshell/core";
import type { CliContext } from "../utils/context.js";
import { interruptSignal, reportFailure } from "../utils/exit.js";
import { chainOptions, parsePair, resolveHops } from "../utils/options.js";
import type { HopOptions } from "../utils/options.js";

export interface RequestOptions extends HopOptions {
  header?: string[];
  param?: string[];
  data?: string;
  remoteFile?: string;
  localFile?: string;
  user?: string;
  insecure?: boolean;
  headOnly?: boolean;
  silent?: boolean;
  fail?: boolean;
}

export function parseMethod(method: string): HttpMethod {
  const upper = method.toUpperCase();
  const known = HTTP_METHODS.find((candidate) => candidate === upper);
  if (!known) {
    throw new InvalidArgumentError(`Unsupported http method '${method}', expected one of ${HTTP_METHODS.join(", ")}`);
  }
  return known;
}

/**
 * Translate command line options into request options
 */
export function toRestRequestOptions(options: RequestOptions): RestRequestOptions {
  const bodies = [options.data, options.remoteFile, options.localFile].filter((body) => body !== undefined);
  if (bodies.length > 1) {
    throw new InvalidArgumentError("Use only one of --data, --remote-file and --local-file");
  }

  return {
    headers: Object.fromEntries((options.header ?? []).map((header) => parsePair(header, ":", "--header"))),
    params: Object.fromEntries((options.param ?? []).map((param) => parsePair(param, "=", "--param"))),
    auth: options.user === undefined ? undefined : parsePair(options.user, ":", "--user"),
    verify: !options.insecure,
    documentInfoOnly: options.headOnly ?? false,
    data: options.data,
    remoteFile: options.remoteFile,
    localFile: options.localFile,
    silent: options.silent ?? false,
  };
}

/**
 * Request command handler
 * @returns process exit code
 */
export async function requestCommand(
  method: string,
  uri: string,
  options: RequestOptions,
  context: CliContext
): Promise<number> {
  const interrupt = interruptSignal();
  let chain: OpenedChain | undefined;

  try {
    const httpMethod = parseMethod(method);
    const requestOptions = toRestRequestOptions(options);
    const config = await context.configManager.load();
    const hops = resolveHops(options, config);
    const target = hops[hops.length - 1];

    const spinner = ora({ text: `Connecting to ${target.host}...`, isSilent: context.quiet }).start();
    try {
      chain = await openChain(hops, chainOptions(options, config, context));
      spinner.succeed(chalk.green(`Connected to ${target.host}`));
    } catch (error) {
      spinner.fail(chalk.red(`Failed to connect to ${target.host}`));
      throw error;
    }

    const client = new RestSSHClient(chain.target);
    const response = await client.request(httpMethod, uri, { ...requestOptions, signal: interrupt.signal });
    context.stdout.write(`${response.toString()}\n`);

    if (options.fail) {
      response.checkForSuccess();
    }
    return 0;
  } catch (error) {
    return reportFailure("Request", error, interrupt.signal);
  } finally {
    chain?.root.close();
    interrupt.dispose();
  }
}
