import { describe, expect, it } from "vitest";

import { DockerRunCommandBuilder } from "../src/docker/command-builder.js";

describe("DockerRunCommandBuilder", () => {
  it("emits flags in a fixed order", () => {
    const cmd = new DockerRunCommandBuilder("ratio1/edge_node:mainnet")
      .withVolume("r1vol", "/edge_node/_local_cache")
      .withRestartPolicy("unless-stopped")
      .withName("r1node")
      .withDetached()
      .withPlatform("linux/amd64")
      .buildFull();

    expect(cmd).toEqual([
      "docker", "run", "--platform", "linux/amd64", "-d", "--name", "r1node", "--restart", "unless-stopped",
      "-v", "r1vol:/edge_node/_local_cache", "ratio1/edge_node:mainnet",
    ]);
  });

  it("skips empty volumes", () => {
    const cmd = new DockerRunCommandBuilder("img").withVolume("", "/data").withName("r1node").build();

    expect(cmd).toEqual(["run", "--name", "r1node", "img"]);
  });
});
