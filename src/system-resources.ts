/**
 * Host RAM admission check for new nodes.
 */

import { totalmem } from "node:os";

import { DEFAULT_MIN_RAM_GB_PER_NODE } from "./constants.js";

const BYTES_PER_GB = 1024 ** 3;

export interface RamCheck {
  totalRamGb: number;
  /** Total RAM for display, e.g. "15.6 GB". */
  totalRam: string;
  minRequiredGb: number;
  maxNodesSupported: number;
  currentNodeCount: number;
  usedByNodesGb: number;
  canAddNode: boolean;
  message: string;
}

export function bytesToGb(bytes: number): number {
  return bytes / BYTES_PER_GB;
}

/** Human-readable size, e.g. "8.2 GB". */
export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  for (const unit of units) {
    if (value < 1024 || unit === "TB") {
      return `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} TB`;
}

/**
 * Decide whether one more node fits: floor(total / min) nodes are
 * supported in total.
 */
export function checkRamForNewNode(
  existingNodeCount: number,
  options: { totalRamBytes?: number; minRamGb?: number } = {}
): RamCheck {
  const minRequiredGb = options.minRamGb ?? DEFAULT_MIN_RAM_GB_PER_NODE;
  const totalRamBytes = options.totalRamBytes ?? totalmem();
  const totalRamGb = bytesToGb(totalRamBytes);
  const maxNodesSupported = Math.floor(totalRamGb / minRequiredGb);
  const canAddNode = existingNodeCount < maxNodesSupported;

  const detail = `(${totalRamGb.toFixed(1)} GB / ${minRequiredGb} GB per node), currently running ${existingNodeCount} nodes`;
  const message = canAddNode
    ? `Node can be created. System supports ${maxNodesSupported} nodes total ${detail}`
    : `Maximum node capacity reached. System supports ${maxNodesSupported} nodes ${detail}`;

  return {
    totalRamGb,
    totalRam: formatBytes(totalRamBytes),
    minRequiredGb,
    maxNodesSupported,
    currentNodeCount: existingNodeCount,
    usedByNodesGb: existingNodeCount * minRequiredGb,
    canAddNode,
    message,
  };
}
