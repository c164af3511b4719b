/**
 * Config Module - Configuration Management
 */

export { ConfigManager } from "./manager.js";
export type { HopshellConfig, DefaultsConfig, HopConfig } from "./types.js";
export { DEFAULT_CONFIG } from "./types.js";
