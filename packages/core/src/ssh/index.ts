/**
 * SSH Module Exports
 */

export { SSHSession } from "./session.js";
export { openChain, parseHop } from "./chain.js";
export type { Hop, ChainOptions, OpenedChain } from "./chain.js";
export { SessionRegistry, createSessionKey, sameSessionKey, sessionKeyId } from "./registry.js";
export type { SessionKey, RegisteredSession } from "./registry.js";
export { SSH_PORT } from "./types.js";
export type { SSHSessionConfig, OpenOptions, RemoteSessionOptions, FileOptions, GetFileOptions } from "./types.js";
