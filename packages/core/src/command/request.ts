/**
 * Command Request
 * Validates the shape of a run request before any remote I/O
 */

import { InvalidArgumentError } from "../errors.js";
import type { CommandRequest, RunCommandOptions, Silence } from "./types.js";

export const REDACTION_MARKER = "XXXXXXX";

const DEFAULT_RETRY_INTERVAL = 5000;

/**
 * Join command fragments so that each one only runs if the previous one succeeded
 */
export function resolveCommand(command: unknown): string {
  if (typeof command === "string") {
    return command;
  }
  if (Array.isArray(command) && command.every((fragment): fragment is string => typeof fragment === "string")) {
    return command.join(" && ");
  }
  throw new InvalidArgumentError(`Invalid type for command argument '${describeType(command)}'`);
}

export function resolveSuccessExitCodes(successExitCode: unknown): number[] {
  if (successExitCode === undefined) {
    return [0];
  }
  if (typeof successExitCode === "number" && Number.isSafeInteger(successExitCode)) {
    return [successExitCode];
  }
  if (
    Array.isArray(successExitCode) &&
    successExitCode.every((code): code is number => typeof code === "number" && Number.isSafeInteger(code))
  ) {
    return [...successExitCode];
  }
  throw new InvalidArgumentError(`Invalid type for successExitCode argument '${describeType(successExitCode)}'`);
}

export function resolveSilence(silent: RunCommandOptions["silent"]): Silence {
  if (silent === undefined || silent === false) {
    return { kind: "off" };
  }
  if (silent === true) {
    return { kind: "on" };
  }
  return {
    kind: "redact",
    patterns: silent.map((pattern) =>
      typeof pattern === "string"
        ? compilePattern(pattern, "g", "silent")
        : new RegExp(pattern.source, pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`)
    ),
  };
}

function compilePattern(pattern: string, flags: string, argument: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new InvalidArgumentError(`Invalid pattern '${pattern}' in ${argument} argument: ${(error as Error).message}`);
  }
}

/**
 * Command text with secrets concealed according to the silence policy
 */
export function redactCommand(command: string, silence: Silence): string {
  switch (silence.kind) {
    case "off":
      return command;
    case "on":
      return REDACTION_MARKER;
    case "redact":
      return silence.patterns.reduce((text, pattern) => text.replace(pattern, REDACTION_MARKER), command);
  }
}

/**
 * Build a validated request from the caller's command and options
 */
export function normalizeCommandRequest(command: unknown, options: RunCommandOptions = {}): CommandRequest {
  const resolved = resolveCommand(command);
  const successExitCodes = resolveSuccessExitCodes(options.successExitCode);
  const silence = resolveSilence(options.silent);

  if (options.timeout !== undefined && !(options.timeout > 0)) {
    throw new InvalidArgumentError(`Invalid timeout '${options.timeout}', a positive number of milliseconds is expected`);
  }

  return {
    command: resolved,
    commandForLog: redactCommand(resolved, silence),
    username: options.username,
    raiseIfError: options.raiseIfError ?? true,
    continuousOutput: options.continuousOutput ?? false,
    silence,
    timeout: options.timeout,
    inputData: Object.entries(options.inputData ?? {}).map(([pattern, text]) => ({
      pattern: compilePattern(pattern, "", "inputData"),
      text,
    })),
    successExitCodes,
    retry: options.retry ?? 0,
    retryInterval: options.retryInterval ?? DEFAULT_RETRY_INTERVAL,
    keepRetryHistory: options.keepRetryHistory ?? false,
    signal: options.signal,
    interruptDefault: options.interruptDefault ?? true,
  };
}

function describeType(value: unknown): string {
  if (value === null) {
    return "null";
  }
  return Array.isArray(value) ? "array" : typeof value;
}
