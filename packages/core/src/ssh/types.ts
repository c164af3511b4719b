/**
 * SSH Module Types
 */

import type { ConfirmPrompt } from "../command/types.js";
import type { OutputSink } from "../command/executor.js";
import type { Transport, TransportConnection } from "../transport/types.js";

export const SSH_PORT = 22;

/**
 * SSH session configuration
 */
export interface SSHSessionConfig {
  host: string;
  username: string;
  port?: number;
  password?: string;
  privateKeyPath?: string;
  passphrase?: string;
  agent?: string;
  /**
   * Connection of the gateway to tunnel through; not owned by the session
   */
  proxy?: TransportConnection;
  /**
   * Defaults to the node-ssh transport
   */
  transport?: Transport;
  /**
   * Asked on interrupt whether to terminate the remote command; defaults to a terminal prompt
   */
  confirm?: ConfirmPrompt;
  /**
   * Receives continuous output; defaults to process.stdout
   */
  stdout?: OutputSink;
  readyTimeout?: number;
}

/**
 * Connection retry settings
 */
export interface OpenOptions {
  /**
   * Number of retries to establish the connection (-1 for infinite retry)
   */
  retry?: number;
  /**
   * Milliseconds between retries
   */
  retryInterval?: number;
}

/**
 * Remote host to reach through an open session
 */
export interface RemoteSessionOptions extends OpenOptions {
  host: string;
  port?: number;
  /**
   * Defaults to the user of the parent session
   */
  username?: string;
  password?: string;
  privateKeyPath?: string;
  passphrase?: string;
}

export interface FileOptions {
  /**
   * Write through a temporary file moved in place with sudo
   */
  useSudo?: boolean;
  /**
   * `user:group`, or `user` when the group has the same name
   */
  owner?: string;
  /**
   * chmod format
   */
  permissions?: string;
  /**
   * sudo user
   */
  username?: string;
  silent?: boolean;
}

export interface GetFileOptions {
  useSudo?: boolean;
  username?: string;
}
