import { describe, expect, it } from "vitest";
import { ConnectionError, InvalidArgumentError } from "../src/errors.js";
import { openChain, parseHop } from "../src/ssh/chain.js";
import { FakeTransport } from "./helpers/fake-transport.js";

describe("parseHop", () => {
  it("parses user, host and port", () => {
    expect(parseHop("deploy@gateway.example.com:2222")).toEqual({
      host: "gateway.example.com",
      port: 2222,
      username: "deploy",
    });
  });

  it("falls back to the given defaults", () => {
    expect(parseHop("db.internal", { username: "ops", port: 2200 })).toEqual({
      host: "db.internal",
      port: 2200,
      username: "ops",
    });
    expect(parseHop("admin@db.internal", { username: "ops" })).toEqual({
      host: "db.internal",
      port: 22,
      username: "admin",
    });
  });

  it("rejects malformed hops", () => {
    expect(() => parseHop("a@b@c")).toThrow(InvalidArgumentError);
    expect(() => parseHop("deploy@gateway:70000")).toThrow("Invalid port '70000' in hop 'deploy@gateway:70000'");
    expect(() => parseHop("")).toThrow("Invalid hop '', expected [user@]host[:port]");
  });
});

describe("openChain", () => {
  const hops = [
    { host: "gateway", username: "deploy" },
    { host: "bastion", username: "deploy", port: 2222 },
    { host: "db", username: "admin" },
  ];

  it("opens every hop through the previous one", async () => {
    const transport = new FakeTransport();

    const { root, target } = await openChain(hops, { transport });

    expect(root.host).toBe("gateway");
    expect(target.host).toBe("db");
    expect(target.username).toBe("admin");
    expect(transport.connections.map((connection) => connection.host)).toEqual(["gateway", "bastion", "db"]);
    expect(transport.connectionTo("gateway").tunnels).toEqual([{ host: "bastion", port: 2222 }]);
    expect(transport.connectionTo("bastion").tunnels).toEqual([{ host: "db", port: 22 }]);
  });

  it("closes the whole chain from the root", async () => {
    const transport = new FakeTransport();
    const { root, target } = await openChain(hops, { transport });

    root.close();

    expect(target.isActive()).toBe(false);
    expect(transport.connections.every((connection) => !connection.isConnected())).toBe(true);
  });

  it("closes the opened hops when a later hop fails", async () => {
    const transport = new FakeTransport();
    transport.failNext("db", 1);

    await expect(openChain(hops, { transport })).rejects.toBeInstanceOf(ConnectionError);
    expect(transport.connections.map((connection) => connection.isConnected())).toEqual([false, false]);
  });

  it("needs at least one hop", async () => {
    await expect(openChain([])).rejects.toThrow("At least one hop is required");
  });
});
