import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import { ConfigManager } from "@hopshell/core";
import type { CliContext } from "../src/utils/context.js";
import { FakeTransport } from "../../core/test/helpers/fake-transport.js";
import type { Responder } from "../../core/test/helpers/fake-transport.js";

export interface TestContext extends CliContext {
  transport: FakeTransport;
  output: string[];
  tempDir: string;
}

export async function createTestContext(responder?: Responder): Promise<TestContext> {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "hopshell-cli-"));
  const output: string[] = [];
  return {
    configManager: new ConfigManager(path.join(tempDir, "config.yaml")),
    transport: new FakeTransport(responder),
    confirm: vi.fn(async () => true),
    stdout: { write: (chunk: string) => output.push(chunk) },
    quiet: true,
    output,
    tempDir,
  };
}
