/**
 * Configuration Manager
 * Handles loading, saving, and managing the hopshell configuration file
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import yaml from "js-yaml";
import { LogLevel, logger } from "../utils/logger.js";
import type { DefaultsConfig, HopConfig, HopshellConfig } from "./types.js";
import { DEFAULT_CONFIG } from "./types.js";

/**
 * Configuration Manager class
 */
export class ConfigManager {
  private config: HopshellConfig | null = null;
  private readonly configPath: string;

  /**
   * @param configPath Optional path to configuration file (defaults to ~/.hopshell/config.yaml)
   */
  constructor(configPath?: string) {
    this.configPath = configPath ?? ConfigManager.getDefaultConfigPath();
  }

  public static getDefaultConfigPath(): string {
    return path.join(os.homedir(), ".hopshell", "config.yaml");
  }

  /**
   * Get the configuration file path
   */
  public getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file, falling back to defaults when there is none
   */
  public async load(): Promise<HopshellConfig> {
    let fileContent: string;
    try {
      fileContent = await fs.readFile(this.configPath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        logger.debug("Configuration file not found, using defaults", { path: this.configPath });
        this.config = this.mergeWithDefaults({});
        return this.config;
      }
      logger.error("Failed to load configuration", error);
      throw new Error(`Failed to load configuration: ${(error as Error).message}`);
    }

    let config: HopshellConfig;
    try {
      const loadedConfig: unknown = yaml.load(fileContent);
      config = this.mergeWithDefaults(loadedConfig ?? {});
    } catch (error) {
      logger.error("Failed to load configuration", error);
      throw new Error(`Failed to load configuration: ${(error as Error).message}`);
    }

    const { valid, errors } = this.validate(config);
    if (!valid) {
      logger.error("Invalid configuration", { path: this.configPath, errors });
      throw new Error(`Failed to load configuration: ${errors.join("; ")}`);
    }
    this.config = config;

    logger.debug("Configuration loaded successfully", { path: this.configPath });
    return this.config;
  }

  /**
   * Save configuration to file
   * @param config Optional configuration to save (uses current config if not provided)
   */
  public async save(config?: HopshellConfig): Promise<void> {
    const configToSave = config ?? this.config;

    if (!configToSave) {
      throw new Error("No configuration to save");
    }

    try {
      await fs.mkdir(path.dirname(this.configPath), { recursive: true });

      const yamlContent = yaml.dump(configToSave, {
        indent: 2,
        lineWidth: 100,
        noRefs: true,
      });
      await fs.writeFile(this.configPath, yamlContent, "utf-8");

      this.config = configToSave;
      logger.debug("Configuration saved successfully", { path: this.configPath });
    } catch (error) {
      logger.error("Failed to save configuration", error);
      throw new Error(`Failed to save configuration: ${(error as Error).message}`);
    }
  }

  /**
   * Get the current configuration
   */
  public get(): HopshellConfig {
    if (!this.config) {
      throw new Error("Configuration not loaded. Call load() first.");
    }
    return this.config;
  }

  public listProfiles(): string[] {
    return Object.keys(this.get().profiles).sort();
  }

  public getProfile(name: string): HopConfig[] | undefined {
    return this.get().profiles[name];
  }

  public setProfile(name: string, hops: HopConfig[]): void {
    if (hops.length === 0) {
      throw new Error(`Profile '${name}' needs at least one hop`);
    }
    this.get().profiles[name] = hops;
  }

  /**
   * @returns false when there was no such profile
   */
  public removeProfile(name: string): boolean {
    const config = this.get();
    if (!(name in config.profiles)) {
      return false;
    }
    delete config.profiles[name];
    return true;
  }

  /**
   * Validate configuration
   */
  public validate(config?: HopshellConfig): { valid: boolean; errors: string[] } {
    const configToValidate = config ?? this.config;

    if (!configToValidate) {
      return { valid: false, errors: ["No configuration to validate"] };
    }

    const errors: string[] = [];
    const { defaults } = configToValidate;

    if (!isPort(defaults.port)) {
      errors.push("Default port must be between 1 and 65535");
    }
    if (!Number.isInteger(defaults.retry) || defaults.retry < -1) {
      errors.push("Default retry must be an integer greater than or equal to -1");
    }
    if (!(defaults.retryInterval >= 0)) {
      errors.push("Default retry interval must be a positive number of milliseconds");
    }
    if (!(defaults.commandRetryInterval >= 0)) {
      errors.push("Default command retry interval must be a positive number of milliseconds");
    }
    if (defaults.timeout !== undefined && !(defaults.timeout > 0)) {
      errors.push("Default timeout must be a positive number of milliseconds");
    }

    for (const [name, hops] of Object.entries(configToValidate.profiles)) {
      if (hops.length === 0) {
        errors.push(`Profile '${name}' has no hop`);
      }
      hops.forEach((hop, index) => {
        if (!hop.host) {
          errors.push(`Profile '${name}' hop ${index + 1} has no host`);
        }
        if (hop.port !== undefined && !isPort(hop.port)) {
          errors.push(`Profile '${name}' hop ${index + 1} port must be between 1 and 65535`);
        }
      });
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Merge loaded YAML with defaults, keeping only well-typed values
   */
  private mergeWithDefaults(loaded: unknown): HopshellConfig {
    if (!isRecord(loaded)) {
      throw new Error("Configuration must be a mapping");
    }

    const rawDefaults = isRecord(loaded.defaults) ? loaded.defaults : {};
    const defaults: DefaultsConfig = { ...DEFAULT_CONFIG.defaults };
    for (const key of ["port", "retry", "retryInterval", "commandRetryInterval", "timeout"] as const) {
      const value = rawDefaults[key];
      if (typeof value === "number") {
        defaults[key] = value;
      }
    }
    const logLevel = Object.values(LogLevel).find((level) => level === rawDefaults.logLevel);
    if (logLevel) {
      defaults.logLevel = logLevel;
    }
    if (typeof rawDefaults.agent === "string") {
      defaults.agent = rawDefaults.agent;
    }

    const profiles: Record<string, HopConfig[]> = {};
    if (isRecord(loaded.profiles)) {
      for (const [name, hops] of Object.entries(loaded.profiles)) {
        if (Array.isArray(hops)) {
          profiles[name] = hops.filter(isRecord).map(toHopConfig);
        }
      }
    }

    return { defaults, profiles };
  }
}

function toHopConfig(raw: Record<string, unknown>): HopConfig {
  const hop: HopConfig = { host: typeof raw.host === "string" ? raw.host : "" };
  if (typeof raw.port === "number") {
    hop.port = raw.port;
  }
  if (typeof raw.username === "string") {
    hop.username = raw.username;
  }
  if (typeof raw.privateKeyPath === "string") {
    hop.privateKeyPath = raw.privateKeyPath;
  }
  return hop;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}
