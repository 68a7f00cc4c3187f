import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createSettings, generateContainerName, getVolumeName } from "../src/config.js";
import { loadEnvSettings, loadSettings, mergeSettings, parseSimpleYaml } from "../src/config-file.js";
import { ConfigError } from "../src/errors.js";

describe("parseSimpleYaml", () => {
  it("reads flat keys with typed values", () => {
    const parsed = parseSimpleYaml(
      '# node manager\nimage: "ratio1/edge_node:devnet"\ndebug: true\nminRamGb: 4.5\nconflictRetryDelayMs: 500\nempty:\n'
    );

    expect(parsed).toEqual({
      image: "ratio1/edge_node:devnet",
      debug: true,
      minRamGb: 4.5,
      conflictRetryDelayMs: 500,
    });
  });
});

describe("loadEnvSettings", () => {
  it("reads EDGE_NODE_* variables", () => {
    expect(
      loadEnvSettings({
        EDGE_NODE_IMAGE: "ratio1/edge_node:testnet",
        EDGE_NODE_REMOTE: "ssh user@host",
        EDGE_NODE_MIN_RAM_GB: "8",
        EDGE_NODE_DEBUG: "1",
      })
    ).toEqual({ image: "ratio1/edge_node:testnet", remote: "ssh user@host", minRamGb: 8, debug: true });
  });

  it("rejects unparseable values", () => {
    expect(() => loadEnvSettings({ EDGE_NODE_MIN_RAM_GB: "lots" })).toThrow(ConfigError);
    expect(() => loadEnvSettings({ EDGE_NODE_DEBUG: "yes" })).toThrow(ConfigError);
  });
});

describe("mergeSettings", () => {
  it("lets later sources win", () => {
    expect(mergeSettings({ image: "a", minRamGb: 4 }, null, { image: "b" })).toEqual({ image: "b", minRamGb: 4 });
  });
});

describe("loadSettings", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "edge-node-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("layers global file, project file and environment", async () => {
    const home = join(dir, "home");
    const project = join(dir, "project");
    await mkdir(home);
    await mkdir(project);
    await writeFile(join(home, "config.yaml"), "image: from-global\nminRamGb: 8\nmountPath: /cache\n");
    await writeFile(join(project, "edge-node.yaml"), "image: from-project\nminRamGb: 10\n");

    const settings = loadSettings(project, { EDGE_NODE_HOME: home, EDGE_NODE_MIN_RAM_GB: "12" });

    expect(settings).toEqual({ image: "from-project", mountPath: "/cache", minRamGb: 12, home });
  });

  it("returns only environment values without files", () => {
    expect(loadSettings(dir, { EDGE_NODE_HOME: join(dir, "nowhere") })).toEqual({ home: join(dir, "nowhere") });
  });
});

describe("createSettings", () => {
  it("fills defaults", () => {
    const settings = createSettings({ home: "/tmp/edge" });

    expect(settings).toEqual({
      image: "ratio1/edge_node:mainnet",
      remote: [],
      home: "/tmp/edge",
      registryPath: join("/tmp/edge", "containers.json"),
      mountPath: "/edge_node/_local_cache",
      minRamGb: 6,
      conflictRetryDelayMs: 1000,
      debug: false,
    });
  });

  it("splits the remote prefix", () => {
    expect(createSettings({ home: "/tmp/edge", remote: " ssh  user@host " }).remote).toEqual(["ssh", "user@host"]);
  });

  it("rejects out-of-range values", () => {
    expect(() => createSettings({ minRamGb: 0 })).toThrow(ConfigError);
    expect(() => createSettings({ conflictRetryDelayMs: -1 })).toThrow(ConfigError);
  });
});

describe("naming", () => {
  it("picks the first free container name", () => {
    expect(generateContainerName([])).toBe("r1node");
    expect(generateContainerName(["r1node", "r1node1", "r1node3"])).toBe("r1node2");
  });

  it("pairs volumes with containers", () => {
    expect(getVolumeName("r1node")).toBe("r1vol");
    expect(getVolumeName("r1node7")).toBe("r1vol7");
    expect(getVolumeName("custom")).toBe("custom_vol");
  });
});
