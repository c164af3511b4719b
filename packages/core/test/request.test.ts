import { describe, expect, it } from "vitest";
import {
  normalizeCommandRequest,
  redactCommand,
  resolveCommand,
  resolveSilence,
  resolveSuccessExitCodes,
} from "../src/command/request.js";
import { InvalidArgumentError } from "../src/errors.js";

describe("normalizeCommandRequest", () => {
  it("applies defaults", () => {
    const request = normalizeCommandRequest("uptime");

    expect(request).toMatchObject({
      command: "uptime",
      commandForLog: "uptime",
      raiseIfError: true,
      continuousOutput: false,
      silence: { kind: "off" },
      successExitCodes: [0],
      retry: 0,
      retryInterval: 5000,
      keepRetryHistory: false,
      interruptDefault: true,
    });
    expect(request.timeout).toBeUndefined();
    expect(request.inputData).toEqual([]);
  });

  it("rejects a command that is neither a string nor a list of strings", () => {
    expect(() => resolveCommand(42)).toThrow(InvalidArgumentError);
    expect(() => resolveCommand(["ls", 1])).toThrow("Invalid type for command argument 'array'");
    expect(() => normalizeCommandRequest(null)).toThrow("Invalid type for command argument 'null'");
  });

  it("rejects invalid success exit codes", () => {
    expect(resolveSuccessExitCodes(3)).toEqual([3]);
    expect(resolveSuccessExitCodes([0, 127])).toEqual([0, 127]);
    expect(() => resolveSuccessExitCodes("0")).toThrow("Invalid type for successExitCode argument 'string'");
    expect(() => resolveSuccessExitCodes([0, 1.5])).toThrow(InvalidArgumentError);
  });

  it("rejects a timeout that is not positive", () => {
    expect(() => normalizeCommandRequest("ls", { timeout: 0 })).toThrow(InvalidArgumentError);
    expect(() => normalizeCommandRequest("ls", { timeout: -5 })).toThrow(
      "Invalid timeout '-5', a positive number of milliseconds is expected"
    );
  });

  it("compiles input patterns", () => {
    const request = normalizeCommandRequest("passwd", { inputData: { "[Pp]assword:": "test-secret" } });

    expect(request.inputData).toHaveLength(1);
    expect(request.inputData[0].pattern.test("New password:")).toBe(true);
    expect(request.inputData[0].text).toBe("test-secret");
  });

  it("rejects patterns that are not valid regular expressions", () => {
    expect(() => normalizeCommandRequest("passwd", { inputData: { "(": "test-secret" } })).toThrow(
      InvalidArgumentError
    );
    expect(() => normalizeCommandRequest("passwd", { inputData: { "(": "test-secret" } })).toThrow(
      "Invalid pattern '(' in inputData argument"
    );
    expect(() => normalizeCommandRequest("login", { silent: ["[secret"] })).toThrow(
      "Invalid pattern '[secret' in silent argument"
    );
  });
});

describe("redaction", () => {
  it("hides the whole command when silent is true", () => {
    const request = normalizeCommandRequest("mysql -p test-secret", { silent: true });

    expect(request.silence).toEqual({ kind: "on" });
    expect(request.commandForLog).toBe("XXXXXXX");
  });

  it("masks every match of every pattern", () => {
    const request = normalizeCommandRequest("login test-secret && login test-secret --token=abc123", {
      silent: ["test-secret", /token=\w+/],
    });

    expect(request.commandForLog).toBe("login XXXXXXX && login XXXXXXX --XXXXXXX");
    expect(request.command).toBe("login test-secret && login test-secret --token=abc123");
  });

  it("leaves the command untouched when silence is off", () => {
    expect(redactCommand("ls -la", resolveSilence(false))).toBe("ls -la");
  });
});
