/**
 * Hop Chains
 * Open a target host through an ordered list of gateways
 */

import os from "node:os";
import type { OutputSink } from "../command/executor.js";
import type { ConfirmPrompt } from "../command/types.js";
import { InvalidArgumentError } from "../errors.js";
import type { Transport } from "../transport/types.js";
import { SSHSession } from "./session.js";
import { SSH_PORT } from "./types.js";
import type { OpenOptions } from "./types.js";

/**
 * One host of a chain
 */
export interface Hop {
  host: string;
  username: string;
  port?: number;
  password?: string;
  privateKeyPath?: string;
  passphrase?: string;
}

export interface ChainOptions extends OpenOptions {
  transport?: Transport;
  confirm?: ConfirmPrompt;
  stdout?: OutputSink;
  /**
   * ssh-agent socket, used for every hop
   */
  agent?: string;
  readyTimeout?: number;
}

export interface OpenedChain {
  /**
   * Session to the first hop; closing it closes the whole chain
   */
  root: SSHSession;
  /**
   * Session to the last hop
   */
  target: SSHSession;
}

const HOP_PATTERN = /^(?:([^@\s]+)@)?([^@:\s]+)(?::(\d+))?$/;

/**
 * Parse `[user@]host[:port]`; missing parts are taken from `defaults`, then from the local user and port 22
 */
export function parseHop(notation: string, defaults: { username?: string; port?: number } = {}): Hop {
  const match = HOP_PATTERN.exec(notation.trim());
  if (!match) {
    throw new InvalidArgumentError(`Invalid hop '${notation}', expected [user@]host[:port]`);
  }

  const [, username, host, port] = match;
  const portNumber = port === undefined ? defaults.port ?? SSH_PORT : Number.parseInt(port, 10);
  if (portNumber < 1 || portNumber > 65535) {
    throw new InvalidArgumentError(`Invalid port '${port}' in hop '${notation}'`);
  }

  return {
    host,
    port: portNumber,
    username: username ?? defaults.username ?? os.userInfo().username,
  };
}

/**
 * Open every hop in order, each one through the previous one
 */
export async function openChain(hops: readonly Hop[], options: ChainOptions = {}): Promise<OpenedChain> {
  const [first, ...rest] = hops;
  if (!first) {
    throw new InvalidArgumentError("At least one hop is required");
  }

  const openOptions: OpenOptions = { retry: options.retry, retryInterval: options.retryInterval };
  const root = new SSHSession({
    ...first,
    agent: options.agent,
    transport: options.transport,
    confirm: options.confirm,
    stdout: options.stdout,
    readyTimeout: options.readyTimeout,
  });
  await root.open(openOptions);

  let target = root;
  try {
    for (const hop of rest) {
      target = await target.getRemoteSession({ ...hop, ...openOptions });
    }
  } catch (error) {
    root.close();
    throw error;
  }

  return { root, target };
}
