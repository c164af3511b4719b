/**
 * Error types raised by hopshell
 */

/**
 * Base error for every failure raised by the library.
 * When a cause is given its message is appended, and it stays reachable through `cause`.
 */
export class SSHError extends Error {
  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describeCause(cause)}`, { cause });
    this.name = new.target.name;
  }
}

/**
 * Raised when a session cannot be established with a remote host
 */
export class ConnectionError extends SSHError {}

/**
 * Raised when a remote command runs longer than the configured timeout
 */
export class CommandTimeoutError extends SSHError {
  public readonly command: string;
  public readonly timeout: number;

  constructor(command: string, timeout: number) {
    super(
      `Timeout of ${timeout}ms reached when calling command '${command}'. ` +
        "Increase timeout if you think the command was still running successfully."
    );
    this.command = command;
    this.timeout = timeout;
  }
}

/**
 * Raised when a request is malformed, before any remote I/O happens
 */
export class InvalidArgumentError extends SSHError {}

/**
 * Raised when an error occurs during a REST call tunnelled over SSH
 */
export class RestClientError extends SSHError {}

/**
 * Raised when a remote command returns an exit code outside the success set
 */
export class RunCommandError extends SSHError {
  public readonly exitCode: number;
  public readonly successExitCodes: readonly number[];
  public readonly command: string;
  public readonly output: string;
  public readonly attempts: number;

  constructor(details: {
    exitCode: number;
    successExitCodes: readonly number[];
    command: string;
    output: string;
    attempts: number;
  }) {
    let message =
      `Command (${details.command}) returned exit status (${details.exitCode}), ` +
      `expected [${details.successExitCodes.join(",")}]`;
    if (details.attempts > 1) {
      message += ` after ${details.attempts} attempts`;
    }
    super(`${message}: ${details.output}`);

    this.exitCode = details.exitCode;
    this.successExitCodes = details.successExitCodes;
    this.command = details.command;
    this.output = details.output;
    this.attempts = details.attempts;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
