import { describe, expect, it, vi } from "vitest";
import { CommandExecutor, impersonate } from "../src/command/executor.js";
import type { ExecutorContext } from "../src/command/executor.js";
import { normalizeCommandRequest } from "../src/command/request.js";
import type { RunCommandOptions } from "../src/command/types.js";
import { CommandTimeoutError, RunCommandError } from "../src/errors.js";
import { FakeConnection } from "./helpers/fake-transport.js";
import type { Responder } from "./helpers/fake-transport.js";
import { captureLogs } from "./helpers/log-capture.js";

function createExecutor(responder: Responder, overrides: Partial<ExecutorContext> = {}) {
  const connection = new FakeConnection("target", responder);
  const echoed: string[] = [];
  const confirm = vi.fn(async () => true);
  const executor = new CommandExecutor({
    connection,
    host: "target",
    username: "deploy",
    isActive: () => connection.isConnected(),
    confirm,
    stdout: { write: (chunk: string) => echoed.push(chunk) },
    ...overrides,
  });
  const run = (command: string | string[], options: RunCommandOptions = {}) =>
    executor.run(normalizeCommandRequest(command, options));
  return { connection, echoed, confirm, run };
}

describe("CommandExecutor", () => {
  it("returns trimmed output and exit code of a successful command", async () => {
    const { connection, run } = createExecutor((_command, channel) => channel.finish("hello\r\n", 0));

    const result = await run("echo hello");

    expect(result.exitCode).toBe(0);
    expect(result.output).toBe("hello");
    expect(result.command).toBe("echo hello");
    expect(result.attempts).toBe(1);
    expect(result.succeeded).toBe(true);
    expect(connection.execOptions[0]).toEqual({ pty: true, agentForward: undefined });
  });

  it("joins a list of commands with &&", async () => {
    const { connection, run } = createExecutor((_command, channel) => channel.finish("", 0));

    await run(["cd /srv", "ls"]);

    expect(connection.commands).toEqual(["cd /srv && ls"]);
  });

  it("closes the channel once exit status and end of output are received", async () => {
    const { connection, run } = createExecutor((_command, channel) => channel.finish("done", 0));

    await run("true");

    expect(connection.channels[0].readShutdown).toBe(true);
    expect(connection.channels[0].isClosed()).toBe(true);
  });

  it("keeps output arriving after the exit status", async () => {
    const { run } = createExecutor((_command, channel) => {
      channel.emitExit(0);
      channel.emitData("late output");
      channel.emitEnd();
      channel.emitClose();
    });

    const result = await run("true");

    expect(result.output).toBe("late output");
  });

  it("raises RunCommandError on an unexpected exit code", async () => {
    const { run } = createExecutor((_command, channel) => channel.finish("boom", 2));

    const error = await run("false").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RunCommandError);
    expect(error).toMatchObject({ exitCode: 2, output: "boom", attempts: 1 });
    expect((error as RunCommandError).message).toBe("Command (false) returned exit status (2), expected [0]: boom");
  });

  it("returns the failing result when raiseIfError is false", async () => {
    const { run } = createExecutor((_command, channel) => channel.finish("boom", 2));

    const result = await run("false", { raiseIfError: false });

    expect(result.exitCode).toBe(2);
    expect(result.succeeded).toBe(false);
  });

  it("accepts every configured success exit code", async () => {
    const { run } = createExecutor((_command, channel) => channel.finish("", 127));

    const result = await run("missing-tool", { successExitCode: [0, 127] });

    expect(result.exitCode).toBe(127);
    expect(result.succeeded).toBe(true);
  });

  it("runs retry + 1 attempts and keeps the history when asked", async () => {
    const { connection, run } = createExecutor((_command, channel) => channel.finish("not yet", 1));

    const error = await run("check", { retry: 2, retryInterval: 1, keepRetryHistory: true }).catch(
      (caught: unknown) => caught
    );

    expect(connection.commands).toHaveLength(3);
    expect(error).toBeInstanceOf(RunCommandError);
    expect((error as RunCommandError).message).toBe(
      "Command (check) returned exit status (1), expected [0] after 3 attempts: not yet"
    );

    const result = await run("check", { retry: 1, retryInterval: 1, keepRetryHistory: true, raiseIfError: false });
    expect(result.attempts).toBe(2);
    expect(result.history).toEqual([
      { exitCode: 1, output: "not yet" },
      { exitCode: 1, output: "not yet" },
    ]);
  });

  it("stops retrying once a success exit code is returned", async () => {
    let calls = 0;
    const { connection, run } = createExecutor((_command, channel) => {
      calls += 1;
      channel.finish(calls < 3 ? "starting" : "ready", calls < 3 ? 1 : 0);
    });

    const result = await run("status", { retry: 5, retryInterval: 1 });

    expect(result.output).toBe("ready");
    expect(result.attempts).toBe(3);
    expect(result.history).toEqual([]);
    expect(connection.commands).toHaveLength(3);
  });

  it("raises CommandTimeoutError when an attempt runs past the timeout", async () => {
    const { connection, run } = createExecutor(() => undefined);
    const startedAt = Date.now();

    await expect(run("sleep 100", { timeout: 30 })).rejects.toThrow(
      new CommandTimeoutError("sleep 100", 30).message
    );

    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(30);
    expect(connection.channels[0].isClosed()).toBe(false);
    await expect(run("sleep 100", { timeout: 30 })).rejects.toBeInstanceOf(CommandTimeoutError);
  });

  it("answers prompts found in the output", async () => {
    const { connection, run } = createExecutor((_command, channel) => {
      channel.onWrite = (data) => {
        if (data === "test-secret\n") {
          channel.finish("ok", 0);
        }
      };
      channel.emitData("Password: ");
    });

    const result = await run("sudo -k true", { inputData: { "Password:": "test-secret" } });

    expect(connection.channels[0].written).toEqual(["test-secret\n"]);
    expect(result.output).toBe("Password: ok");
  });

  it("runs the command through sudo su when a user is given", async () => {
    const { connection, run } = createExecutor((_command, channel) => channel.finish("", 0));

    await run('echo "hi"', { username: "postgres" });

    expect(connection.commands).toEqual(['sudo su - postgres -c "echo \\"hi\\""']);
    expect(impersonate("id", "app")).toBe('sudo su - app -c "id"');
  });

  it("echoes output only when continuous output is on and the command is not silent", async () => {
    const streamed = createExecutor((_command, channel) => channel.finish("line 1\r\nline 2", 0));
    await streamed.run("cat log", { continuousOutput: true });
    expect(streamed.echoed.join("")).toBe("line 1\r\nline 2");

    const silent = createExecutor((_command, channel) => channel.finish("line 1", 0));
    await silent.run("cat log", { continuousOutput: true, silent: true });
    expect(silent.echoed).toEqual([]);
  });

  it("reports -1 when the channel closes without an exit status", async () => {
    const { run } = createExecutor((_command, channel) => channel.finish("killed", null));

    const result = await run("long-job", { raiseIfError: false });

    expect(result.exitCode).toBe(-1);
    expect(result.output).toBe("killed");
  });

  it("terminates the remote command on interrupt when the user agrees", async () => {
    const controller = new AbortController();
    const reason = new Error("Interrupted by user");
    const { connection, confirm, run } = createExecutor(() => controller.abort(reason));

    await expect(run("tail -f log", { signal: controller.signal })).rejects.toBe(reason);

    expect(confirm).toHaveBeenCalledWith("Terminate remote command 'tail -f log'?", {
      defaultAnswer: true,
      interruptAnswer: false,
    });
    expect(connection.channels[0].written).toEqual(["\x03"]);
    expect(connection.channels[0].isClosed()).toBe(true);
  });

  it("leaves the remote command running when the user declines", async () => {
    const controller = new AbortController();
    const reason = new Error("Interrupted by user");
    const { connection, run } = createExecutor(() => controller.abort(reason), {
      confirm: async () => false,
    });

    await expect(run("tail -f log", { signal: controller.signal, interruptDefault: false })).rejects.toBe(reason);

    expect(connection.channels[0].written).toEqual([]);
    expect(connection.channels[0].isClosed()).toBe(false);
  });

  it("logs the exit status when the command finished before the user agreed to terminate it", async () => {
    const logs = captureLogs();
    try {
      const controller = new AbortController();
      const reason = new Error("Interrupted by user");
      const { connection, run } = createExecutor((_command, channel) => {
        channel.emitExit(7);
        channel.emitClose();
        controller.abort(reason);
      });

      await expect(run("deploy.sh", { signal: controller.signal })).rejects.toBe(reason);

      expect(logs.lines).toContain("info: Remote command execution already finished with exit code 7");
      expect(connection.channels[0].written).toEqual([]);
    } finally {
      logs.restore();
    }
  });

  it("warns when the channel closed without an exit status before the user agreed to terminate", async () => {
    const logs = captureLogs();
    try {
      const controller = new AbortController();
      const reason = new Error("Interrupted by user");
      const { connection, run } = createExecutor((_command, channel) => {
        channel.emitClose();
        controller.abort(reason);
      });

      await expect(run("deploy.sh", { signal: controller.signal })).rejects.toBe(reason);

      expect(logs.lines).toContain("warn: Unable to terminate remote command because channel is closed.");
      expect(connection.channels[0].written).toEqual([]);
    } finally {
      logs.restore();
    }
  });

  it("does not prompt on interrupt when the session is no longer active", async () => {
    const controller = new AbortController();
    const confirm = vi.fn(async () => true);
    const { run } = createExecutor(() => controller.abort(new Error("Interrupted by user")), {
      isActive: () => false,
      confirm,
    });

    await expect(run("tail -f log", { signal: controller.signal })).rejects.toThrow("Interrupted by user");
    expect(confirm).not.toHaveBeenCalled();
  });
});
