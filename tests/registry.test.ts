import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CommandRunner } from "../src/docker/executor.js";
import { DuplicateNameError, ValidationError } from "../src/errors.js";
import { ContainerRegistry } from "../src/registry.js";
import { DockerMockRecorder, failure } from "./mocks/docker-mock.js";

const FIXED = new Date("2026-01-02T03:04:05.000Z");

describe("ContainerRegistry", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "edge-node-registry-"));
    path = join(dir, "containers.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createRegistry(): ContainerRegistry {
    return new ContainerRegistry(path, { now: () => FIXED });
  }

  it("starts empty when the file is missing", async () => {
    const registry = createRegistry();
    await registry.load();

    expect(registry.listAll()).toEqual([]);
  });

  it("starts empty when the file is corrupt", async () => {
    await writeFile(path, "{not json", "utf-8");
    const registry = createRegistry();
    await registry.load();

    expect(registry.listAll()).toEqual([]);
  });

  it("skips invalid entries and keeps valid ones", async () => {
    await writeFile(
      path,
      JSON.stringify({
        broken: { volume_name: "x" },
        r1node: { container_name: "r1node", volume_name: "r1vol", created_at: "a", last_used: "b" },
      }),
      "utf-8"
    );
    const registry = createRegistry();
    await registry.load();

    expect(registry.listAll().map((c) => c.name)).toEqual(["r1node"]);
  });

  it("round-trips entries through the file", async () => {
    const registry = createRegistry();
    await registry.load();
    await registry.add({ name: "r1node", volume: "r1vol", nodeAlias: "alpha", nodeAddress: "0xai_A", ethAddress: "0xE1" });

    const reloaded = createRegistry();
    await reloaded.load();

    expect(reloaded.get("r1node")).toEqual({
      name: "r1node",
      volume: "r1vol",
      createdAt: "2026-01-02T03:04:05.000Z",
      lastUsed: "2026-01-02T03:04:05.000Z",
      nodeAlias: "alpha",
      nodeAddress: "0xai_A",
      ethAddress: "0xE1",
    });
  });

  it("stores snake_case keys", async () => {
    const registry = createRegistry();
    await registry.add({ name: "r1node", volume: "r1vol" });

    const stored: unknown = JSON.parse(await readFile(path, "utf-8"));

    expect(stored).toEqual({
      r1node: {
        container_name: "r1node",
        volume_name: "r1vol",
        created_at: "2026-01-02T03:04:05.000Z",
        last_used: "2026-01-02T03:04:05.000Z",
      },
    });
  });

  it("refuses duplicates when overwrite is off", async () => {
    const registry = createRegistry();
    await registry.add({ name: "r1node", volume: "r1vol" });

    await expect(registry.add({ name: "r1node", volume: "r1vol" }, { overwrite: false })).rejects.toBeInstanceOf(
      DuplicateNameError
    );
  });

  it("never changes a stored volume", async () => {
    const registry = createRegistry();
    await registry.add({ name: "r1node", volume: "r1vol" });

    await expect(registry.add({ name: "r1node", volume: "other" })).rejects.toBeInstanceOf(ValidationError);
    await expect(registry.updateField("r1node", "volume", "other")).rejects.toBeInstanceOf(ValidationError);
    expect(registry.get("r1node")?.volume).toBe("r1vol");
  });

  it("keeps the stored volume and creation time on overwrite", async () => {
    let now = FIXED;
    const registry = new ContainerRegistry(path, { now: () => now });
    await registry.add({ name: "r1node", volume: "r1vol" });

    now = new Date("2026-02-01T00:00:00.000Z");
    const updated = await registry.add({ name: "r1node", volume: "", nodeAlias: "beta" });

    expect(updated.volume).toBe("r1vol");
    expect(updated.createdAt).toBe("2026-01-02T03:04:05.000Z");
    expect(updated.lastUsed).toBe("2026-02-01T00:00:00.000Z");
    expect(updated.nodeAlias).toBe("beta");
  });

  it("updates fields of known containers only", async () => {
    const registry = createRegistry();
    await registry.add({ name: "r1node", volume: "r1vol" });

    expect(await registry.updateField("r1node", "nodeAlias", "gamma")).toBe(true);
    expect(await registry.updateField("ghost", "nodeAlias", "gamma")).toBe(false);
    expect(registry.get("r1node")?.nodeAlias).toBe("gamma");
    expect(registry.has("ghost")).toBe(false);
  });

  it("sees entries another instance wrote", async () => {
    const first = createRegistry();
    const second = createRegistry();
    await first.load();
    await second.load();

    await first.add({ name: "r1node", volume: "r1vol" });
    await second.add({ name: "r1node1", volume: "r1vol1" });

    expect(await second.update("r1node", { nodeAlias: "alpha" })).toBe(true);
    expect(second.listAll().map((c) => c.name)).toEqual(["r1node", "r1node1"]);
  });

  it("keeps concurrent writes from one instance", async () => {
    const registry = createRegistry();

    await Promise.all([
      registry.add({ name: "r1node", volume: "r1vol" }),
      registry.add({ name: "r1node1", volume: "r1vol1" }),
      registry.add({ name: "r1node2", volume: "r1vol2" }),
    ]);

    const reloaded = createRegistry();
    await reloaded.load();
    expect(reloaded.listAll().map((c) => c.name)).toEqual(["r1node", "r1node1", "r1node2"]);
  });

  it("removes entries", async () => {
    const registry = createRegistry();
    await registry.add({ name: "r1node", volume: "r1vol" });

    expect(await registry.remove("r1node")).toBe(true);
    expect(await registry.remove("r1node")).toBe(false);
    expect(registry.listAll()).toEqual([]);
  });

  it("sorts names case-insensitively", async () => {
    const registry = createRegistry();
    await registry.add({ name: "beta", volume: "" });
    await registry.add({ name: "Alpha", volume: "" });
    await registry.add({ name: "gamma", volume: "" });

    expect(registry.listAll().map((c) => c.name)).toEqual(["Alpha", "beta", "gamma"]);
  });

  it("asks docker whether a volume exists", async () => {
    const docker = new DockerMockRecorder();
    docker.on(["volume", "inspect", "missing"], failure("Error: No such volume: missing"));
    const registry = new ContainerRegistry(path, { runner: new CommandRunner({ exec: docker.exec }) });

    expect(await registry.volumeExists("r1vol")).toBe(true);
    expect(await registry.volumeExists("missing")).toBe(false);
    expect(docker.commands()).toEqual(["docker volume inspect r1vol", "docker volume inspect missing"]);
  });

  it("reports volumes missing without a runner", async () => {
    expect(await createRegistry().volumeExists("r1vol")).toBe(false);
  });
});
