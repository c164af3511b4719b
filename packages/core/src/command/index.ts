/**
 * Command Module
 */

export { CommandExecutor, impersonate } from "./executor.js";
export type { AttemptState, ExecutorContext, OutputSink } from "./executor.js";
export { RunCommandResult } from "./result.js";
export { normalizeCommandRequest, redactCommand, REDACTION_MARKER } from "./request.js";
export type { CommandAttempt, CommandRequest, ConfirmPrompt, RunCommandOptions, Silence } from "./types.js";
