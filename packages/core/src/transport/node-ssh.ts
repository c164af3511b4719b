/**
 * node-ssh Transport
 * Opens SSH connections with node-ssh and exposes ssh2 channels to the command pump
 */

import { NodeSSH } from "node-ssh";
import type { ClientChannel, SFTPWrapper } from "ssh2";
import type { Duplex } from "node:stream";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { logger } from "../utils/logger.js";
import type {
  CommandChannel,
  ExecChannelOptions,
  Transport,
  TransportConnection,
  TransportConnectOptions,
} from "./types.js";

/**
 * Wraps an ssh2 channel; stderr is merged into the data stream
 */
class SSH2CommandChannel implements CommandChannel {
  private closed = false;

  constructor(private readonly channel: ClientChannel) {
    channel.on("close", () => {
      this.closed = true;
    });
  }

  public onData(listener: (chunk: Buffer) => void): void {
    this.channel.on("data", listener);
    this.channel.stderr.on("data", listener);
  }

  public onExit(listener: (code: number | null) => void): void {
    this.channel.on("exit", (code: number | null) => {
      listener(typeof code === "number" ? code : null);
    });
  }

  public onEnd(listener: () => void): void {
    this.channel.on("end", listener);
  }

  public onClose(listener: () => void): void {
    this.channel.on("close", listener);
  }

  public isWritable(): boolean {
    return !this.closed && this.channel.writable;
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public write(data: string): void {
    this.channel.write(data);
  }

  public shutdownRead(): void {
    this.channel.pause();
    this.channel.stderr.pause();
  }

  public close(): void {
    if (!this.closed) {
      this.channel.close();
    }
  }
}

/**
 * A live node-ssh connection
 */
export class NodeSSHConnection implements TransportConnection {
  private ended = false;

  constructor(private readonly ssh: NodeSSH) {
    ssh.connection?.on("close", () => {
      this.ended = true;
    });
    // node-ssh only listens for errors while connecting
    ssh.connection?.on("error", (error: Error) => {
      logger.warn("SSH connection error", { error: error.message });
      this.ended = true;
    });
  }

  public isConnected(): boolean {
    return !this.ended && this.ssh.connection !== null;
  }

  public async exec(command: string, options: ExecChannelOptions): Promise<CommandChannel> {
    const client = this.requireClient();
    return new Promise((resolve, reject) => {
      client.exec(command, { pty: options.pty, agentForward: options.agentForward ?? false }, (error, channel) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(new SSH2CommandChannel(channel));
      });
    });
  }

  public async openTunnel(host: string, port: number): Promise<Duplex> {
    const client = this.requireClient();
    return new Promise((resolve, reject) => {
      client.forwardOut("127.0.0.1", 0, host, port, (error, channel) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(channel);
      });
    });
  }

  public async readFile(remotePath: string): Promise<Buffer> {
    return this.withSFTP(
      (sftp) =>
        new Promise<Buffer>((resolve, reject) => {
          sftp.readFile(remotePath, (error, data) => (error ? reject(error) : resolve(data)));
        })
    );
  }

  public async writeFile(remotePath: string, content: string | Buffer): Promise<void> {
    return this.withSFTP(
      (sftp) =>
        new Promise<void>((resolve, reject) => {
          sftp.writeFile(remotePath, content, (error) => (error ? reject(error) : resolve()));
        })
    );
  }

  public async removeFile(remotePath: string): Promise<void> {
    return this.withSFTP(
      (sftp) =>
        new Promise<void>((resolve, reject) => {
          sftp.unlink(remotePath, (error) => (error ? reject(error) : resolve()));
        })
    );
  }

  public async putFile(localPath: string, remotePath: string): Promise<void> {
    await this.ssh.putFile(localPath, remotePath);
  }

  public close(): void {
    if (!this.ended) {
      this.ended = true;
      this.ssh.dispose();
    }
  }

  private requireClient() {
    const client = this.ssh.connection;
    if (!client || this.ended) {
      throw new Error("Not connected. Call connect() first.");
    }
    return client;
  }

  private async withSFTP<T>(action: (sftp: SFTPWrapper) => Promise<T>): Promise<T> {
    const sftp = await this.ssh.requestSFTP();
    try {
      return await action(sftp);
    } finally {
      sftp.end();
    }
  }
}

/**
 * Read the private key to authenticate with, falling back to the default key locations
 */
async function loadPrivateKey(privateKeyPath?: string, password?: string): Promise<string | undefined> {
  if (privateKeyPath) {
    try {
      return await fs.readFile(privateKeyPath, "utf-8");
    } catch {
      logger.warn("Failed to read private key from path", { path: privateKeyPath });
    }
  }

  if (password) {
    return undefined;
  }

  const homeDir = os.homedir();
  const defaultKeyPaths = [
    path.join(homeDir, ".ssh", "id_rsa"),
    path.join(homeDir, ".ssh", "id_ed25519"),
    path.join(homeDir, ".ssh", "id_ecdsa"),
  ];

  for (const keyPath of defaultKeyPaths) {
    try {
      const content = await fs.readFile(keyPath, "utf-8");
      logger.debug("Using SSH key from default location", { path: keyPath });
      return content;
    } catch {
      // Try next key
    }
  }
  return undefined;
}

/**
 * Transport backed by node-ssh
 */
export class NodeSSHTransport implements Transport {
  public async connect(options: TransportConnectOptions): Promise<TransportConnection> {
    const { host, port, credentials, sock, hostKeys } = options;
    const privateKey = await loadPrivateKey(credentials.privateKeyPath, credentials.password);

    logger.debug("Opening SSH connection", {
      host,
      port,
      username: credentials.username,
      tunnelled: sock !== undefined,
    });

    const ssh = new NodeSSH();
    await ssh.connect({
      host,
      port,
      username: credentials.username,
      password: credentials.password,
      privateKey,
      passphrase: credentials.passphrase,
      agent: credentials.agent,
      sock,
      tryKeyboard: credentials.password !== undefined,
      readyTimeout: options.readyTimeout,
      hostHash: "sha256",
      hostVerifier: (fingerprint: string): boolean => (hostKeys ? hostKeys.verify(host, port, fingerprint) : true),
    });

    return new NodeSSHConnection(ssh);
  }
}
