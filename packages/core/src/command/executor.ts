/**
 * Command Executor
 * Drives one remote command to completion: channel pump, timeout, interactive input, interrupts and retries
 */

import { StringDecoder } from "node:string_decoder";
import { CommandTimeoutError, RunCommandError } from "../errors.js";
import type { CommandChannel, TransportConnection } from "../transport/types.js";
import { logger } from "../utils/logger.js";
import { sleep } from "../utils/async.js";
import { ChannelPump } from "./pump.js";
import { RunCommandResult } from "./result.js";
import type { CommandAttempt, CommandRequest, ConfirmPrompt } from "./types.js";

/**
 * Ctrl-C, forwarded to the remote process when the user asks to terminate it
 */
const INTERRUPT_SEQUENCE = "\x03";

/**
 * Lifecycle of a single attempt
 */
export type AttemptState = "connecting" | "executing" | "draining" | "completed" | "timed-out" | "interrupted";

/**
 * Where echoed output goes
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

export interface ExecutorContext {
  connection: TransportConnection;
  host: string;
  username: string;
  /**
   * Whether the owning session is still usable
   */
  isActive: () => boolean;
  confirm: ConfirmPrompt;
  stdout: OutputSink;
  agentForward?: boolean;
}

/**
 * Wrap a command so that it runs through a login shell of another user
 */
export function impersonate(command: string, username: string): string {
  return `sudo su - ${username} -c "${command.replace(/"/g, '\\"')}"`;
}

export class CommandExecutor {
  constructor(private readonly context: ExecutorContext) {}

  /**
   * Run the request until its exit code is a success code or the retry budget is spent
   */
  public async run(request: CommandRequest): Promise<RunCommandResult> {
    const user = request.username ?? this.context.username;
    const command = request.username ? impersonate(request.command, request.username) : request.command;

    if (request.silence.kind !== "on") {
      logger.debug(`Running command '${request.commandForLog}' on '${this.context.host}' as ${user}...`);
    }

    const history: CommandAttempt[] = [];
    let attempts = 0;

    for (;;) {
      attempts += 1;
      const attempt = await this.runAttempt(request, command);

      if (request.keepRetryHistory) {
        history.push(attempt);
      }

      const result = new RunCommandResult({
        exitCode: attempt.exitCode,
        output: attempt.output,
        command: request.commandForLog,
        attempts,
        successExitCodes: request.successExitCodes,
        history,
      });

      if (request.successExitCodes.includes(attempt.exitCode)) {
        return result;
      }

      // negative retry value means infinite retry
      if (request.retry < 0 || attempts <= request.retry) {
        logger.debug(`Command '${request.commandForLog}' exited with ${attempt.exitCode}, retrying`, {
          attempt: attempts,
          retryInterval: request.retryInterval,
        });
        await sleep(request.retryInterval);
        continue;
      }

      if (request.raiseIfError) {
        throw new RunCommandError({
          exitCode: attempt.exitCode,
          successExitCodes: request.successExitCodes,
          command: request.commandForLog,
          output: attempt.output,
          attempts,
        });
      }
      return result;
    }
  }

  private async runAttempt(request: CommandRequest, command: string): Promise<CommandAttempt> {
    let state: AttemptState = "connecting";
    const channel = await this.context.connection.exec(command, {
      pty: true,
      agentForward: this.context.agentForward,
    });
    const pump = new ChannelPump(channel);

    state = "executing";
    const startedAt = Date.now();
    const deadline = request.timeout !== undefined ? startedAt + request.timeout : undefined;
    const decoder = new StringDecoder("utf8");
    let output = "";
    let exitStatus: number | null | undefined;
    let readDone = false;

    while (state === "executing" || state === "draining") {
      const outcome = await pump.wait(deadline, request.signal);

      if (outcome.kind === "interrupted") {
        state = "interrupted";
        await this.handleInterrupt(channel, pump, request);
        pump.detach();
        const reason: unknown = request.signal?.reason;
        throw reason ?? new Error("Command interrupted");
      }

      if (outcome.kind === "timeout") {
        state = "timed-out";
        break;
      }

      for (const event of outcome.events) {
        switch (event.type) {
          case "data": {
            const text = decoder.write(event.chunk);
            output += text;
            if (text.length > 0) {
              this.echo(request, text);
              this.answerPrompts(request, channel, text);
            }
            break;
          }
          case "exit":
            exitStatus = event.code;
            state = "draining";
            break;
          case "end":
            readDone = true;
            break;
          case "close":
            readDone = true;
            exitStatus = exitStatus ?? null;
            break;
        }
      }

      // remote process has exited and there is nothing left to read
      if (exitStatus !== undefined && readDone) {
        channel.shutdownRead();
        channel.close();
        state = "completed";
      } else if (deadline !== undefined && Date.now() > deadline) {
        state = "timed-out";
      }
    }

    if (state === "timed-out") {
      pump.detach();
      throw new CommandTimeoutError(request.commandForLog, request.timeout ?? 0);
    }

    output += decoder.end();
    return {
      exitCode: exitStatus ?? -1,
      output: output.trim(),
    };
  }

  private echo(request: CommandRequest, text: string): void {
    if (request.continuousOutput && request.silence.kind === "off") {
      this.context.stdout.write(text);
    }
  }

  /**
   * Send the mapped input for every pattern matching the latest output
   */
  private answerPrompts(request: CommandRequest, channel: CommandChannel, text: string): void {
    if (request.inputData.length === 0 || !channel.isWritable()) {
      return;
    }
    for (const { pattern, text: input } of request.inputData) {
      if (pattern.test(text)) {
        channel.write(`${input}\n`);
      }
    }
  }

  /**
   * Offer to terminate the remote command; the interrupt is re-raised by the caller whatever the answer
   */
  private async handleInterrupt(channel: CommandChannel, pump: ChannelPump, request: CommandRequest): Promise<void> {
    if (!this.context.isActive()) {
      return;
    }

    let terminate: boolean;
    try {
      terminate = await this.context.confirm(`Terminate remote command '${request.commandForLog}'?`, {
        defaultAnswer: request.interruptDefault,
        interruptAnswer: false,
      });
    } catch (error) {
      logger.warn("Unable to ask whether to terminate the remote command", error);
      terminate = false;
    }

    if (!terminate) {
      logger.info(`Remote command '${request.commandForLog}' left running on '${this.context.host}'`);
      return;
    }

    if (channel.isClosed()) {
      const exitStatus = pump.lastExitStatus;
      if (exitStatus === undefined || exitStatus === null) {
        logger.warn("Unable to terminate remote command because channel is closed.");
      } else {
        logger.info(`Remote command execution already finished with exit code ${exitStatus}`);
      }
      return;
    }

    channel.write(INTERRUPT_SEQUENCE);
    channel.close();
  }
}
