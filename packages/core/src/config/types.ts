/**
 * Configuration Module Types
 */

import { LogLevel } from "../utils/logger.js";

/**
 * One hop of a saved profile
 */
export interface HopConfig {
  host: string;
  port?: number;
  /**
   * Defaults to the local user name
   */
  username?: string;
  privateKeyPath?: string;
}

/**
 * Defaults applied to every command line invocation
 */
export interface DefaultsConfig {
  port: number;
  /**
   * Connection retries (-1 for infinite retry)
   */
  retry: number;
  /**
   * Milliseconds between connection retries
   */
  retryInterval: number;
  /**
   * Milliseconds between command retries
   */
  commandRetryInterval: number;
  /**
   * Per-attempt command timeout in milliseconds
   */
  timeout?: number;
  logLevel: LogLevel;
  /**
   * ssh-agent socket
   */
  agent?: string;
}

/**
 * Main hopshell configuration
 */
export interface HopshellConfig {
  defaults: DefaultsConfig;
  /**
   * Named hop chains, gateway first
   */
  profiles: Record<string, HopConfig[]>;
}

export const DEFAULT_CONFIG: HopshellConfig = {
  defaults: {
    port: 22,
    retry: 0,
    retryInterval: 10000,
    commandRetryInterval: 5000,
    logLevel: LogLevel.INFO,
  },
  profiles: {},
};
