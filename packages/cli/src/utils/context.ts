/**
 * Everything a command handler needs from the outside world
 */

import { ConfigManager, yesNoQuery } from "@hopshell/core";
import type { ConfirmPrompt, OutputSink, Transport } from "@hopshell/core";

export interface CliContext {
  configManager: ConfigManager;
  /**
   * Defaults to the node-ssh transport
   */
  transport?: Transport;
  confirm: ConfirmPrompt;
  stdout: OutputSink;
  /**
   * Hide progress spinners
   */
  quiet: boolean;
}

export function createCliContext(configPath?: string): CliContext {
  return {
    configManager: new ConfigManager(configPath),
    confirm: yesNoQuery,
    stdout: process.stdout,
    quiet: !process.stderr.isTTY,
  };
}
