import { describe, expect, it } from "vitest";

import { isArmHost, getRunPlatform } from "../src/platform/detection.js";
import { checkRamForNewNode, formatBytes } from "../src/system-resources.js";

const GIB = 1024 ** 3;

describe("checkRamForNewNode", () => {
  it("admits a node below capacity", () => {
    const check = checkRamForNewNode(1, { totalRamBytes: 16 * GIB, minRamGb: 6 });

    expect(check).toEqual({
      totalRamGb: 16,
      totalRam: "16.0 GB",
      minRequiredGb: 6,
      maxNodesSupported: 2,
      currentNodeCount: 1,
      usedByNodesGb: 6,
      canAddNode: true,
      message: "Node can be created. System supports 2 nodes total (16.0 GB / 6 GB per node), currently running 1 nodes",
    });
  });

  it("refuses a node at capacity", () => {
    const check = checkRamForNewNode(2, { totalRamBytes: 16 * GIB, minRamGb: 6 });

    expect(check.canAddNode).toBe(false);
    expect(check.message).toBe(
      "Maximum node capacity reached. System supports 2 nodes (16.0 GB / 6 GB per node), currently running 2 nodes"
    );
  });
});

describe("formatBytes", () => {
  it("picks a unit", () => {
    expect(formatBytes(512)).toBe("512.0 B");
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(8 * GIB)).toBe("8.0 GB");
  });
});

describe("platform detection", () => {
  it("emulates amd64 on ARM hosts only", () => {
    expect(isArmHost("aarch64")).toBe(true);
    expect(getRunPlatform("arm64")).toBe("linux/amd64");
    expect(getRunPlatform("x64")).toBeNull();
  });
});
