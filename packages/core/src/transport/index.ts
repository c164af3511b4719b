/**
 * Transport Module
 */

export { NodeSSHTransport } from "./node-ssh.js";
export { createMemoryHostKeyStore } from "./host-key-store.js";
export type { HostKeyStore, MemoryHostKeyStoreOptions } from "./host-key-store.js";
export type {
  Credentials,
  CommandChannel,
  ExecChannelOptions,
  Transport,
  TransportConnection,
  TransportConnectOptions,
} from "./types.js";
