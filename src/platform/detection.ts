/**
 * Host platform detection.
 */

import { arch } from "node:os";

import { ARM_ARCHITECTURES, EMULATED_PLATFORM } from "../constants.js";

/**
 * Check if the host CPU is ARM. Node reports arm64; uname reports aarch64.
 */
export function isArmHost(hostArch: string = arch()): boolean {
  return ARM_ARCHITECTURES.includes(hostArch.toLowerCase());
}

/**
 * `--platform` value the node image needs on this host, or null when it
 * runs natively.
 */
export function getRunPlatform(hostArch: string = arch()): string | null {
  return isArmHost(hostArch) ? EMULATED_PLATFORM : null;
}
