/**
 * Command Module Types
 */

/**
 * Output and logging confidentiality of a command.
 * Decided once when the request is normalized.
 */
export type Silence =
  | { kind: "off" }
  | { kind: "on" }
  | { kind: "redact"; patterns: readonly RegExp[] };

/**
 * Options accepted by SSHSession.runCommand
 */
export interface RunCommandOptions {
  /**
   * Run the command as this user (sudo privilege needed)
   */
  username?: string;
  /**
   * Raise RunCommandError when the final exit code is not a success code (default: true)
   */
  raiseIfError?: boolean;
  /**
   * Echo output as the command produces it
   */
  continuousOutput?: boolean;
  /**
   * `true` hides the command from logs; a list of patterns masks every match instead
   */
  silent?: boolean | ReadonlyArray<string | RegExp>;
  /**
   * Per-attempt bound, in milliseconds
   */
  timeout?: number;
  /**
   * Output pattern to text sent back when the pattern shows up in the output
   */
  inputData?: Readonly<Record<string, string>>;
  successExitCode?: number | readonly number[];
  /**
   * Number of retries while the exit code is not a success code (-1 for infinite retry)
   */
  retry?: number;
  /**
   * Milliseconds to wait between retries
   */
  retryInterval?: number;
  keepRetryHistory?: boolean;
  /**
   * Aborting this signal while the command runs triggers interrupt handling
   */
  signal?: AbortSignal;
  /**
   * Default answer when asked whether to terminate the remote command on interrupt (default: true)
   */
  interruptDefault?: boolean;
}

/**
 * Validated form of a command request
 */
export interface CommandRequest {
  command: string;
  /**
   * Command text as it may appear in logs, errors and results
   */
  commandForLog: string;
  username?: string;
  raiseIfError: boolean;
  continuousOutput: boolean;
  silence: Silence;
  timeout?: number;
  inputData: ReadonlyArray<{ pattern: RegExp; text: string }>;
  successExitCodes: readonly number[];
  retry: number;
  retryInterval: number;
  keepRetryHistory: boolean;
  signal?: AbortSignal;
  interruptDefault: boolean;
}

/**
 * Outcome of one attempt
 */
export interface CommandAttempt {
  exitCode: number;
  output: string;
}

/**
 * Asks the user a yes/no question.
 * `interruptAnswer` is returned when the question itself is interrupted.
 */
export type ConfirmPrompt = (
  question: string,
  options: { defaultAnswer: boolean; interruptAnswer: boolean }
) => Promise<boolean>;
