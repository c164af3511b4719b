/**
 * REST client
 * Performs HTTP requests from a remote host with curl, through an SSH session
 */

import fs from "node:fs/promises";
import path from "node:path";
import { RestClientError } from "../errors.js";
import { SSHSession } from "../ssh/session.js";
import type { SSHSessionConfig } from "../ssh/types.js";
import { logger } from "../utils/logger.js";
import { buildCurlCommand } from "./curl.js";
import type { CurlOptions } from "./curl.js";
import { HTTPResponse } from "./response.js";

/**
 * curl exit code when the transfer is shorter or larger than announced, as happens with HEAD
 */
const CURLE_PARTIAL_FILE = 18;

export const HTTP_METHODS = ["GET", "OPTIONS", "HEAD", "POST", "PUT", "PATCH", "DELETE"] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export interface RestRequestOptions extends Omit<CurlOptions, "dataFile"> {
  /**
   * File on the remote host sent as request body
   */
  remoteFile?: string;
  /**
   * Local file sent as request body; staged on the remote host for the call
   */
  localFile?: string;
  /**
   * Keep the curl command out of the logs
   */
  silent?: boolean;
  /**
   * Aborting this signal while curl runs triggers interrupt handling
   */
  signal?: AbortSignal;
}

/**
 * @example
 * const client = new RestSSHClient({ host: "gateway.example.com", username: "deploy" });
 * await client.open();
 * const response = await client.get("http://remote.example.com/health");
 * response.checkForSuccess();
 * client.close();
 */
export class RestSSHClient {
  public readonly session: SSHSession;

  constructor(session: SSHSession | SSHSessionConfig) {
    this.session = session instanceof SSHSession ? session : new SSHSession(session);
  }

  public get host(): string {
    return this.session.host;
  }

  public get username(): string {
    return this.session.username;
  }

  public async open(): Promise<this> {
    await this.session.open();
    return this;
  }

  public close(): void {
    this.session.close();
  }

  /**
   * Perform http request from the remote host and return the parsed response
   */
  public async request(method: string, uri: string, options: RestRequestOptions = {}): Promise<HTTPResponse> {
    const upperMethod = method.toUpperCase();
    const { remoteFile, localFile, silent, signal, ...curlOptions } = options;

    let stagedFile: string | undefined;
    if (localFile !== undefined) {
      const isFile = await fs
        .stat(localFile)
        .then((stats) => stats.isFile())
        .catch(() => false);
      if (!isFile) {
        throw new RestClientError(`Invalid file path given '${localFile}'`);
      }
    } else if (remoteFile !== undefined && !(await this.session.exists(remoteFile))) {
      throw new RestClientError(`Invalid remote file path given '${remoteFile}' on host '${this.host}'`);
    }

    try {
      if (localFile !== undefined) {
        const target = path.basename(localFile);
        const connection = await this.session.activeConnection();
        await connection.putFile(localFile, target);
        stagedFile = target;
      }

      const command = buildCurlCommand(upperMethod, uri, {
        ...curlOptions,
        dataFile: stagedFile ?? remoteFile,
      });

      if (!silent) {
        logger.debug(`${upperMethod} ${uri} from '${this.host}'`);
      }

      // some successful queries end with a non zero exit code, checked below
      const result = await this.session.runCommand(command, {
        raiseIfError: false,
        silent: silent ?? false,
        signal,
      });

      if (result.exitCode !== 0 && !(result.exitCode === CURLE_PARTIAL_FILE && upperMethod === "HEAD")) {
        throw new RestClientError(
          `Remote command (${result.command}) returned exit status (${result.exitCode}): ${result.output}`
        );
      }

      return new HTTPResponse(result.output);
    } finally {
      if (stagedFile !== undefined) {
        const connection = await this.session.activeConnection();
        await connection.removeFile(stagedFile);
      }
    }
  }

  public async get(uri: string, options?: RestRequestOptions): Promise<HTTPResponse> {
    return this.request("GET", uri, options);
  }

  public async options(uri: string, options?: RestRequestOptions): Promise<HTTPResponse> {
    return this.request("OPTIONS", uri, options);
  }

  public async head(uri: string, options?: RestRequestOptions): Promise<HTTPResponse> {
    return this.request("HEAD", uri, options);
  }

  public async post(uri: string, options?: RestRequestOptions): Promise<HTTPResponse> {
    return this.request("POST", uri, options);
  }

  public async put(uri: string, options?: RestRequestOptions): Promise<HTTPResponse> {
    return this.request("PUT", uri, options);
  }

  public async patch(uri: string, options?: RestRequestOptions): Promise<HTTPResponse> {
    return this.request("PATCH", uri, options);
  }

  public async delete(uri: string, options?: RestRequestOptions): Promise<HTTPResponse> {
    return this.request("DELETE", uri, options);
  }

  public toString(): string {
    return `RestSSHClient(host=${this.host}, username=${this.username}, session=${this.session.toString()})`;
  }
}
