/**
 * Transport Module Types
 */

import type { Duplex } from "node:stream";
import type { HostKeyStore } from "./host-key-store.js";

/**
 * Credentials used to authenticate against a host
 */
export interface Credentials {
  username: string;
  password?: string;
  privateKeyPath?: string;
  passphrase?: string;
  /**
   * Path to an SSH agent socket; enables agent forwarding on command channels
   */
  agent?: string;
}

/**
 * Options for opening a transport connection
 */
export interface TransportConnectOptions {
  host: string;
  port: number;
  credentials: Credentials;
  /**
   * Raw stream tunnelled through another connection. When given, no socket is opened.
   */
  sock?: Duplex;
  hostKeys?: HostKeyStore;
  readyTimeout?: number;
}

/**
 * Options for opening a command channel
 */
export interface ExecChannelOptions {
  pty: boolean;
  agentForward?: boolean;
}

/**
 * One remote command execution, as seen by the command pump
 */
export interface CommandChannel {
  onData(listener: (chunk: Buffer) => void): void;
  onExit(listener: (code: number | null) => void): void;
  onEnd(listener: () => void): void;
  onClose(listener: () => void): void;
  isWritable(): boolean;
  isClosed(): boolean;
  write(data: string): void;
  shutdownRead(): void;
  close(): void;
}

/**
 * An authenticated connection to a single host
 */
export interface TransportConnection {
  isConnected(): boolean;
  exec(command: string, options: ExecChannelOptions): Promise<CommandChannel>;
  /**
   * Open a raw bidirectional stream to host:port from the remote side of this connection
   */
  openTunnel(host: string, port: number): Promise<Duplex>;
  readFile(remotePath: string): Promise<Buffer>;
  writeFile(remotePath: string, content: string | Buffer): Promise<void>;
  removeFile(remotePath: string): Promise<void>;
  putFile(localPath: string, remotePath: string): Promise<void>;
  close(): void;
}

/**
 * Opens transport connections
 */
export interface Transport {
  connect(options: TransportConnectOptions): Promise<TransportConnection>;
}
