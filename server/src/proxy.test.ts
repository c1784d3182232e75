import { PassThrough } from "node:stream";
import { afterEach, describe, expect, it } from "vitest";

import { ConfigError, createLogger, DiscoveryError, resolveEndpoint, startProxy, type BridgeConfig, type BrowseFn } from "./index.js";
import { startMcpRemote } from "./testing/remote.js";

const logger = createLogger("silent");

function configFor(overrides: Partial<BridgeConfig>): BridgeConfig {
  return {
    port: 80,
    path: "/mcp",
    scheme: "http",
    discover: false,
    serviceType: "mcp",
    logLevel: "silent",
    ...overrides,
  };
}

const INITIALIZE = JSON.stringify({
  jsonrpc: "2.0",
  id: 1,
  method: "initialize",
  params: {
    protocolVersion: "2025-03-26",
    capabilities: {},
    clientInfo: { name: "test-client", version: "0.0.1" },
  },
});
const INITIALIZED = '{"jsonrpc":"2.0","method":"notifications/initialized"}';
const echoCall = (id: number, text: string) =>
  JSON.stringify({ jsonrpc: "2.0", id, method: "tools/call", params: { name: "echo", arguments: { text } } });

async function runLines(config: BridgeConfig, lines: string[]) {
  const input = new PassThrough();
  const output = new PassThrough();
  const chunks: string[] = [];
  output.on("data", (c: Buffer) => chunks.push(c.toString("utf-8")));

  const done = startProxy(config, { input, output, logger });
  input.end(lines.map((l) => l + "\n").join(""));
  await done;

  return chunks.join("").split("\n").filter(Boolean).map((l): unknown => JSON.parse(l));
}

describe("startProxy against a Streamable HTTP MCP server", () => {
  let remote: Awaited<ReturnType<typeof startMcpRemote>> | undefined;

  afterEach(async () => {
    await remote?.close();
    remote = undefined;
  });

  it("initializes, stays quiet for the notification, and calls a tool in the session", async () => {
    remote = await startMcpRemote();
    const { host, port } = remote.endpoint;

    const replies = await runLines(configFor({ host, port }), [INITIALIZE, INITIALIZED, echoCall(2, "hello")]);

    expect(replies).toHaveLength(2);
    expect(replies[0]).toMatchObject({ jsonrpc: "2.0", id: 1, result: { serverInfo: { name: "test-device" } } });
    expect(replies[1]).toMatchObject({ jsonrpc: "2.0", id: 2, result: { content: [{ type: "text", text: "hello" }] } });

    const sessionIds = remote.requests.map((r) => r.headers["mcp-session-id"]);
    expect(sessionIds[0]).toBeUndefined();
    expect(sessionIds[1]).toEqual(expect.any(String));
    expect(sessionIds[2]).toBe(sessionIds[1]);
  });

  it("reports a lost session and starts the next exchange without one", async () => {
    remote = await startMcpRemote();
    const { host, port } = remote.endpoint;
    const current = remote;

    const input = new PassThrough();
    const output = new PassThrough();
    const lines: string[] = [];
    let buffered = "";
    const waiters: Array<() => void> = [];
    output.on("data", (c: Buffer) => {
      buffered += c.toString("utf-8");
      const parts = buffered.split("\n");
      buffered = parts.pop() ?? "";
      lines.push(...parts);
      waiters.splice(0).forEach((w) => w());
    });
    const nextLine = async (n: number) => {
      while (lines.length < n) await new Promise<void>((r) => waiters.push(r));
    };

    const done = startProxy(configFor({ host, port }), { input, output, logger });

    input.write(INITIALIZE + "\n");
    await nextLine(1);
    current.dropSessions();

    input.write(echoCall(2, "lost") + "\n");
    await nextLine(2);
    input.end(INITIALIZE + "\n");
    await done;

    expect(JSON.parse(lines[1] ?? "")).toEqual({
      jsonrpc: "2.0",
      id: 2,
      error: { code: -32000, message: "HTTP 404: Session not found" },
    });
    expect(JSON.parse(lines[2] ?? "")).toMatchObject({ id: 1, result: { serverInfo: { name: "test-device" } } });
    expect(current.requests[1]?.headers["mcp-session-id"]).toEqual(expect.any(String));
    expect(current.requests[2]?.headers["mcp-session-id"]).toBeUndefined();
  });
});

describe("resolveEndpoint", () => {
  it("uses the static host, port and path", async () => {
    expect(await resolveEndpoint(configFor({ host: "device.local", port: 8080, path: "/rpc" }), { logger })).toEqual({
      scheme: "http",
      host: "device.local",
      port: 8080,
      path: "/rpc",
    });
  });

  it("takes host and port from discovery and keeps the configured path", async () => {
    const browse: BrowseFn = (_type, listener) => {
      listener.addService({ name: "device", host: "192.168.4.1", port: 8000 });
      return { close() {} };
    };

    const endpoint = await resolveEndpoint(configFor({ discover: true, path: "/api/mcp" }), { logger, browse });

    expect(endpoint).toEqual({ scheme: "http", host: "192.168.4.1", port: 8000, path: "/api/mcp" });
    expect(Object.isFrozen(endpoint)).toBe(true);
  });

  it("rejects a bad static host before the bridge starts", async () => {
    await expect(resolveEndpoint(configFor({ host: "bad host" }), { logger })).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects a discovered address that cannot form a URL", async () => {
    const browse: BrowseFn = (_type, listener) => {
      listener.addService({ name: "device", host: "bad host", port: 80 });
      return { close() {} };
    };

    await expect(resolveEndpoint(configFor({ discover: true }), { logger, browse })).rejects.toThrow(
      'device advertised an unusable address: invalid host "bad host"'
    );
  });

  it("does not start the bridge when discovery fails", async () => {
    const browse: BrowseFn = () => ({ close() {} });
    const input = new PassThrough();

    await expect(
      startProxy(configFor({ discover: true }), {
        input,
        output: new PassThrough(),
        logger,
        browse,
        discoveryTimeoutMs: 30,
      })
    ).rejects.toBeInstanceOf(DiscoveryError);
    expect(input.listenerCount("data")).toBe(0);
  });
});
