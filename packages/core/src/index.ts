/**
 * @hopshell/core
 *
 * Run commands on hosts reachable only through one or more SSH gateways
 * Provides chained SSH sessions, remote command execution, REST calls over SSH and configuration management
 */

// Export SSH module
export { SSHSession, openChain, parseHop, SessionRegistry, createSessionKey, sameSessionKey, sessionKeyId, SSH_PORT } from "./ssh/index.js";
export type {
  Hop,
  ChainOptions,
  OpenedChain,
  SessionKey,
  RegisteredSession,
  SSHSessionConfig,
  OpenOptions,
  RemoteSessionOptions,
  FileOptions,
  GetFileOptions,
} from "./ssh/index.js";

// Export Command module
export { CommandExecutor, RunCommandResult, REDACTION_MARKER, impersonate, normalizeCommandRequest, redactCommand } from "./command/index.js";
export type {
  AttemptState,
  CommandAttempt,
  CommandRequest,
  ConfirmPrompt,
  ExecutorContext,
  OutputSink,
  RunCommandOptions,
  Silence,
} from "./command/index.js";

// Export HTTP module
export { RestSSHClient, HTTPResponse, HTTP_METHODS, buildCurlCommand, quotePlus, shellQuote, stripAnsi } from "./http/index.js";
export type { RestRequestOptions, HttpMethod, CurlOptions } from "./http/index.js";

// Export Transport module
export { NodeSSHTransport, createMemoryHostKeyStore } from "./transport/index.js";
export type {
  Credentials,
  CommandChannel,
  ExecChannelOptions,
  HostKeyStore,
  MemoryHostKeyStoreOptions,
  Transport,
  TransportConnection,
  TransportConnectOptions,
} from "./transport/index.js";

// Export Config module
export { ConfigManager, DEFAULT_CONFIG } from "./config/index.js";
export type { HopshellConfig, DefaultsConfig, HopConfig } from "./config/index.js";

// Export Errors
export {
  SSHError,
  ConnectionError,
  CommandTimeoutError,
  InvalidArgumentError,
  RestClientError,
  RunCommandError,
} from "./errors.js";

// Export Utils module
export { logger, initLogger, getLogger, getDefaultLogDir, LogLevel, yesNoQuery, sleep } from "./utils/index.js";
export type { Logger, LoggerConfig } from "./utils/index.js";
