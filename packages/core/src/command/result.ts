/**
 * Result of a command run with SSHSession
 */

import type { CommandAttempt } from "./types.js";

export class RunCommandResult implements CommandAttempt {
  /**
   * Exit code of the last attempt
   */
  public readonly exitCode: number;
  /**
   * Trimmed output of the last attempt
   */
  public readonly output: string;
  /**
   * Command as it may be logged (concealed per silence policy)
   */
  public readonly command: string;
  public readonly attempts: number;
  public readonly successExitCodes: readonly number[];
  /**
   * Every attempt, in order; empty unless retry history was requested
   */
  public readonly history: readonly CommandAttempt[];

  constructor(fields: {
    exitCode: number;
    output: string;
    command: string;
    attempts: number;
    successExitCodes: readonly number[];
    history: readonly CommandAttempt[];
  }) {
    this.exitCode = fields.exitCode;
    this.output = fields.output;
    this.command = fields.command;
    this.attempts = fields.attempts;
    this.successExitCodes = fields.successExitCodes;
    this.history = fields.history;
  }

  public get succeeded(): boolean {
    return this.successExitCodes.includes(this.exitCode);
  }

  public toString(): string {
    return `RunCommandResult(exitCode=${this.exitCode}, output=${JSON.stringify(this.output)})`;
  }
}
