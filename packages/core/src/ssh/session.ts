/**
 * SSH Session
 * Handles a connection to one host, the sessions opened through it and remote command execution
 */

import fs from "node:fs/promises";
import path from "node:path";
import { CommandExecutor } from "../command/executor.js";
import type { OutputSink } from "../command/executor.js";
import { normalizeCommandRequest } from "../command/request.js";
import type { RunCommandResult } from "../command/result.js";
import type { ConfirmPrompt, RunCommandOptions } from "../command/types.js";
import { ConnectionError, InvalidArgumentError } from "../errors.js";
import { createMemoryHostKeyStore } from "../transport/host-key-store.js";
import { NodeSSHTransport } from "../transport/node-ssh.js";
import type { Credentials, Transport, TransportConnection } from "../transport/types.js";
import { sleep } from "../utils/async.js";
import { logger } from "../utils/logger.js";
import { yesNoQuery } from "../utils/prompt.js";
import { idGenerator } from "../utils/random.js";
import { createSessionKey, SessionRegistry } from "./registry.js";
import { SSH_PORT } from "./types.js";
import type {
  FileOptions,
  GetFileOptions,
  OpenOptions,
  RemoteSessionOptions,
  SSHSessionConfig,
} from "./types.js";

const DEFAULT_CONNECT_RETRY_INTERVAL = 10000;

/**
 * Establish SSH session with a remote host
 *
 * @example
 * const gateway = await new SSHSession({ host: "gateway.example.com", username: "deploy" }).open();
 * const remote = await gateway.getRemoteSession({ host: "db.internal" });
 * const { output } = await remote.runCommand("hostname");
 * gateway.close();
 */
export class SSHSession {
  public readonly host: string;
  public readonly port: number;
  public readonly username: string;

  private readonly credentials: Credentials;
  private readonly proxy?: TransportConnection;
  private readonly transport: Transport;
  private readonly confirm: ConfirmPrompt;
  private readonly stdout: OutputSink;
  private readonly readyTimeout?: number;
  private readonly hostKeys = createMemoryHostKeyStore();
  private readonly remoteSessions = new SessionRegistry<SSHSession>();
  private connection: TransportConnection | undefined;
  private connectAttempts = 0;

  constructor(config: SSHSessionConfig) {
    this.host = config.host;
    this.port = config.port ?? SSH_PORT;
    this.username = config.username;
    this.credentials = {
      username: config.username,
      password: config.password,
      privateKeyPath: config.privateKeyPath,
      passphrase: config.passphrase,
      agent: config.agent,
    };
    this.proxy = config.proxy;
    this.transport = config.transport ?? new NodeSSHTransport();
    this.confirm = config.confirm ?? yesNoQuery;
    this.stdout = config.stdout ?? process.stdout;
    this.readyTimeout = config.readyTimeout;
  }

  /**
   * Check if connection with remote host is still active.
   * An inactive session cannot run commands on the remote host.
   */
  public isActive(): boolean {
    return this.connection?.isConnected() ?? false;
  }

  /**
   * Open session with the remote host; harmless on an active session
   */
  public async open(options: OpenOptions = {}): Promise<this> {
    if (this.isActive()) {
      return this;
    }

    const retry = options.retry ?? 0;
    const retryInterval = options.retryInterval ?? DEFAULT_CONNECT_RETRY_INTERVAL;

    if (this.proxy && !this.proxy.isConnected()) {
      throw new ConnectionError(
        `Unable to connect to '${this.host}:${this.port}' with user '${this.username}': gateway session is not active`
      );
    }

    this.connectAttempts = 0;
    for (;;) {
      try {
        this.connection = await this.connect();
        break;
      } catch (error) {
        // negative retry value means infinite retry
        if (retry < 0 || this.connectAttempts < retry) {
          logger.warn(
            `ssh to '${this.host}:${this.port}' still not possible (attempt ${this.connectAttempts}): ` +
              `${(error as Error).message}. Keep retrying...`
          );
          this.connectAttempts += 1;
          await sleep(retryInterval);
        } else {
          throw new ConnectionError(
            `Unable to connect to '${this.host}:${this.port}' with user '${this.username}'`,
            error
          );
        }
      }
    }

    logger.info(`Successfully connected to '${this.host}:${this.port}'`);
    return this;
  }

  /**
   * Close connection with remote host, and every session opened through it first
   */
  public close(): void {
    this.remoteSessions.closeAll();

    if (this.connection?.isConnected()) {
      logger.debug(`Closing connection to '${this.host}:${this.port}'...`);
      this.connection.close();
    }
    this.connection = undefined;

    // host keys may not be valid for the next connection
    this.hostKeys.clear();
  }

  /**
   * Run command on the remote host and return result locally
   *
   * @throws InvalidArgumentError if `command` is neither a string nor a list of strings
   * @throws CommandTimeoutError if an attempt runs longer than `timeout`
   * @throws RunCommandError if the final exit code is not a success code and `raiseIfError` is not false
   */
  public async runCommand(command: string | readonly string[], options: RunCommandOptions = {}): Promise<RunCommandResult> {
    const request = normalizeCommandRequest(command, options);

    // check session is still active before running a command, else try to open it
    if (!this.isActive()) {
      await this.open();
    }

    const executor = new CommandExecutor({
      connection: this.requireConnection(),
      host: this.host,
      username: this.username,
      isActive: () => this.isActive(),
      confirm: this.confirm,
      stdout: this.stdout,
      agentForward: this.credentials.agent !== undefined,
    });
    return executor.run(request);
  }

  /**
   * Return output of remotely executed command
   */
  public async getCommandOutput(command: string | readonly string[], options: RunCommandOptions = {}): Promise<string> {
    const result = await this.runCommand(command, options);
    return result.output;
  }

  /**
   * Return exit code of remotely executed command, never raising on a failing exit code
   */
  public async getExitCode(command: string | readonly string[], options: RunCommandOptions = {}): Promise<number> {
    const result = await this.runCommand(command, { ...options, raiseIfError: false });
    return result.exitCode;
  }

  /**
   * Establish connection with a remote host from current session.
   * The same live session is returned for the same host, port and user.
   */
  public async getRemoteSession(options: RemoteSessionOptions): Promise<SSHSession> {
    // check session is still active before using it as a jump server, else try to open it
    if (!this.isActive()) {
      await this.open();
    }

    const username = options.username ?? this.username;
    const port = options.port ?? SSH_PORT;
    const key = createSessionKey(options.host, port, username);

    const existing = this.remoteSessions.get(key);
    if (existing) {
      return existing;
    }

    logger.info(`Connecting to '${options.host}:${port}' through '${this.host}' with user '${username}'...`);
    const remoteSession = new SSHSession({
      host: options.host,
      port,
      username,
      password: options.password,
      privateKeyPath: options.privateKeyPath,
      passphrase: options.passphrase,
      agent: this.credentials.agent,
      proxy: this.requireConnection(),
      transport: this.transport,
      confirm: this.confirm,
      stdout: this.stdout,
      readyTimeout: this.readyTimeout,
    });
    await remoteSession.open({ retry: options.retry, retryInterval: options.retryInterval });

    this.remoteSessions.set(key, remoteSession);
    return remoteSession;
  }

  /**
   * Check if path exists on the remote host
   */
  public async exists(remotePath: string, options: { useSudo?: boolean } = {}): Promise<boolean> {
    const command = options.useSudo ? `sudo ls ${remotePath}` : `ls ${remotePath}`;
    return (await this.getExitCode(command, { silent: true })) === 0;
  }

  /**
   * Create a remote file with the given content
   */
  public async file(remotePath: string, content: string | Buffer, options: FileOptions = {}): Promise<void> {
    if (!options.silent) {
      logger.debug(`Create file '${remotePath}' on remote host '${this.host}' as '${this.username}'`);
    }
    const connection = await this.activeConnection();

    const copyPath = options.useSudo ? `/tmp/${idGenerator(15)}` : remotePath;
    await connection.writeFile(copyPath, content);

    if (options.useSudo) {
      await this.runCommand(`mv ${copyPath} ${remotePath}`, { silent: true, username: options.username ?? "root" });
    }

    if (options.owner) {
      const fullOwner = options.owner.includes(":") ? options.owner : `${options.owner}:${options.owner}`;
      await this.runCommand(`sudo chown ${fullOwner} ${remotePath}`, { silent: true });
    }

    if (options.permissions) {
      await this.runCommand(`sudo chmod ${options.permissions} ${remotePath}`, { silent: true });
    }
  }

  /**
   * Upload a local file to the remote host
   */
  public async put(localPath: string, remotePath: string, options: Omit<FileOptions, "silent"> = {}): Promise<void> {
    const isFile = await fs
      .stat(localPath)
      .then((stats) => stats.isFile())
      .catch(() => false);
    if (!isFile) {
      throw new InvalidArgumentError(`Local file '${localPath}' does not exist`);
    }

    logger.debug(`Copy local file '${localPath}' on remote host '${this.host}' in '${remotePath}' as '${this.username}'`);
    const content = await fs.readFile(localPath);
    await this.file(remotePath, content, { ...options, silent: true });
  }

  /**
   * Download a file from the remote host.
   * When `localPath` is a directory the remote file name is kept.
   */
  public async get(remotePath: string, localPath: string, options: GetFileOptions = {}): Promise<string> {
    const sudoUsername = options.username ?? (options.useSudo ? "root" : undefined);
    let copyPath = remotePath;

    // copy the remote file first to a temporary location readable by the current user
    if (options.useSudo) {
      copyPath = `/tmp/${idGenerator(15)}`;
      await this.runCommand(`cp ${remotePath} ${copyPath}`, { silent: true, username: sudoUsername });
    }

    const isDirectory = await fs
      .stat(localPath)
      .then((stats) => stats.isDirectory())
      .catch(() => false);
    const targetPath = isDirectory ? path.join(localPath, path.posix.basename(remotePath)) : localPath;

    try {
      const connection = await this.activeConnection();
      const content = await connection.readFile(copyPath);
      await fs.writeFile(targetPath, content);
    } finally {
      if (options.useSudo) {
        await this.runCommand(`rm ${copyPath}`, { silent: true, username: sudoUsername });
      }
    }
    return targetPath;
  }

  /**
   * Connection of this session, opening it first when needed
   */
  public async activeConnection(): Promise<TransportConnection> {
    if (!this.isActive()) {
      await this.open();
    }
    return this.requireConnection();
  }

  public toString(): string {
    return `SSHSession(host=${this.host}, username=${this.username}, port=${this.port}, proxied=${this.proxy !== undefined})`;
  }

  private async connect(): Promise<TransportConnection> {
    // through a gateway, the ssh stream is a tunnel opened from the gateway connection
    const sock = this.proxy ? await this.proxy.openTunnel(this.host, this.port) : undefined;

    try {
      return await this.transport.connect({
        host: this.host,
        port: this.port,
        credentials: this.credentials,
        sock,
        hostKeys: this.hostKeys,
        readyTimeout: this.readyTimeout,
      });
    } catch (error) {
      // each attempt gets a fresh tunnel
      sock?.destroy();
      throw error;
    }
  }

  private requireConnection(): TransportConnection {
    if (!this.connection) {
      throw new ConnectionError(`Session to '${this.host}:${this.port}' is not open`);
    }
    return this.connection;
  }
}
