import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCommand } from "../src/commands/run.js";
import type { RunOptions } from "../src/commands/run.js";
import { requestCommand } from "../src/commands/request.js";
import { EXIT_CONNECTION, EXIT_TIMEOUT } from "../src/utils/exit.js";
import { createTestContext } from "./helpers.js";
import type { TestContext } from "./helpers.js";

const HOPS = ["deploy@gateway", "admin@db.internal"];

function runOptions(overrides: Partial<RunOptions> = {}): RunOptions {
  return { hop: HOPS, raise: true, success: "0", ...overrides };
}

describe("run command", () => {
  let context: TestContext;
  let errors: string[];

  beforeEach(async () => {
    context = await createTestContext((command, channel) => {
      if (command === "uptime") {
        channel.finish("up 3 days\r\n", 0);
      } else if (command === "sleep 60") {
        return;
      } else {
        channel.finish("failed", 3);
      }
    });
    errors = [];
    vi.spyOn(console, "error").mockImplementation((message: string) => {
      errors.push(message);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(context.tempDir, { recursive: true, force: true });
  });

  it("runs the command on the last hop and prints its output", async () => {
    const code = await runCommand(["uptime"], runOptions(), context);

    expect(code).toBe(0);
    expect(context.output).toEqual(["up 3 days\n"]);
    expect(context.transport.connectionTo("db.internal").commands).toEqual(["uptime"]);
    expect(context.transport.connectionTo("gateway").commands).toEqual([]);
  });

  it("closes the whole chain afterwards", async () => {
    await runCommand(["uptime"], runOptions(), context);

    expect(context.transport.connections.map((connection) => connection.isConnected())).toEqual([false, false]);
  });

  it("exits with the remote exit code on failure", async () => {
    const code = await runCommand(["false"], runOptions(), context);

    expect(code).toBe(3);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain("Command failed: Command (false) returned exit status (3), expected [0]: failed");
  });

  it("prints the output without failing when --no-raise is given", async () => {
    const code = await runCommand(["false"], runOptions({ raise: false }), context);

    expect(code).toBe(3);
    expect(errors).toEqual([]);
    expect(context.output).toEqual(["failed\n"]);
  });

  it("exits with 0 for an accepted exit code", async () => {
    const code = await runCommand(["false"], runOptions({ success: "0,3" }), context);

    expect(code).toBe(0);
  });

  it("exits with 124 on timeout", async () => {
    const code = await runCommand(["sleep", "60"], runOptions({ timeout: "20" }), context);

    expect(code).toBe(EXIT_TIMEOUT);
  });

  it("exits with 255 when a hop cannot be reached", async () => {
    context.transport.failNext("db.internal", 1);

    const code = await runCommand(["uptime"], runOptions(), context);

    expect(code).toBe(EXIT_CONNECTION);
    expect(context.transport.connectionTo("gateway").isConnected()).toBe(false);
  });

  it("uses a saved profile", async () => {
    await context.configManager.load();
    context.configManager.setProfile("prod", [
      { host: "gateway", username: "deploy" },
      { host: "db.internal", username: "admin" },
    ]);
    await context.configManager.save();

    const code = await runCommand(["uptime"], { profile: "prod", raise: true }, context);

    expect(code).toBe(0);
    expect(context.transport.attempts.map((attempt) => attempt.credentials.username)).toEqual(["deploy", "admin"]);
  });
});

describe("request command", () => {
  let context: TestContext;

  beforeEach(async () => {
    context = await createTestContext((_command, channel) =>
      channel.finish('HTTP/1.0 404 Not Found\r\nContent-Type: application/json\r\n\r\n{"error":"missing"}', 0)
    );
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(context.tempDir, { recursive: true, force: true });
  });

  it("prints the response", async () => {
    const code = await requestCommand("get", "http://api.internal/items/9", { hop: ["deploy@gateway"] }, context);

    expect(code).toBe(0);
    expect(context.output).toEqual(['404 Not Found\n{\n    "error": "missing"\n}\n']);
    expect(context.transport.connectionTo("gateway").commands).toEqual([
      'curl -is --http1.0 -X GET "http://api.internal/items/9"',
    ]);
  });

  it("fails on an error status with --fail", async () => {
    const code = await requestCommand(
      "get",
      "http://api.internal/items/9",
      { hop: ["deploy@gateway"], fail: true },
      context
    );

    expect(code).toBe(1);
  });

  it("rejects unknown methods before connecting", async () => {
    const code = await requestCommand("trace", "http://api.internal", { hop: ["deploy@gateway"] }, context);

    expect(code).toBe(1);
    expect(context.transport.attempts).toEqual([]);
  });
});
