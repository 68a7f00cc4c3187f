import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createContext } from "../src/context.js";
import { getLogLevel, LogLevel, setLogLevel } from "../src/logger.js";

describe("createContext", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "edge-node-context-"));
    setLogLevel(LogLevel.INFO);
  });

  afterEach(async () => {
    setLogLevel(LogLevel.INFO);
    await rm(dir, { recursive: true, force: true });
  });

  it("turns on debug logging from the environment", async () => {
    const ctx = await createContext({}, dir, { EDGE_NODE_HOME: dir, EDGE_NODE_DEBUG: "1" });

    expect(ctx.settings.debug).toBe(true);
    expect(getLogLevel()).toBe(LogLevel.DEBUG);
    await ctx.handler.shutdown();
  });

  it("keeps the default level without debug settings", async () => {
    const ctx = await createContext({}, dir, { EDGE_NODE_HOME: dir });

    expect(getLogLevel()).toBe(LogLevel.INFO);
    await ctx.handler.shutdown();
  });

  it("lets quiet win over a configured debug flag", async () => {
    const ctx = await createContext({ quiet: true }, dir, { EDGE_NODE_HOME: dir, EDGE_NODE_DEBUG: "true" });

    expect(getLogLevel()).toBe(LogLevel.SILENT);
    await ctx.handler.shutdown();
  });

  it("applies the remote flag over file settings", async () => {
    const ctx = await createContext({ remote: "ssh user@host" }, dir, { EDGE_NODE_HOME: dir });

    expect(ctx.runner.remotePrefix).toEqual(["ssh", "user@host"]);
    expect(ctx.settings.registryPath).toBe(join(dir, "containers.json"));
    await ctx.handler.shutdown();
  });
});
