/**
 * Runtime configuration for edge-node-manager.
 *
 * Resolves file/env settings into a complete Settings object and owns the
 * container and volume naming scheme.
 *
 * Dependency direction:
 *   This module has minimal dependencies (near-leaf module).
 *   It may be imported by: cli.ts, docker/handler.ts
 *   It should NOT import from: cli, docker/*
 */

import { join } from "node:path";

import type { EdgeNodeSettings } from "./config-file.js";
import {
  CONFLICT_RETRY_DELAY,
  CONTAINER_PREFIX,
  DEFAULT_IMAGE,
  DEFAULT_MIN_RAM_GB_PER_NODE,
  DEFAULT_MOUNT_PATH,
  REGISTRY_FILE_NAME,
  VOLUME_PREFIX,
  getDefaultHomeDir,
} from "./constants.js";
import { ConfigError } from "./errors.js";

/** Fully resolved settings. */
export interface Settings {
  image: string;
  /** Remote prefix argv; empty for local docker. */
  remote: string[];
  home: string;
  registryPath: string;
  mountPath: string;
  minRamGb: number;
  conflictRetryDelayMs: number;
  debug: boolean;
}

/**
 * Fill defaults in and check ranges.
 *
 * @throws ConfigError for non-positive RAM or a negative retry delay.
 */
export function createSettings(input: EdgeNodeSettings = {}): Settings {
  const home = input.home ?? getDefaultHomeDir();
  const minRamGb = input.minRamGb ?? DEFAULT_MIN_RAM_GB_PER_NODE;
  if (!(minRamGb > 0)) {
    throw new ConfigError(`minRamGb must be positive, got ${minRamGb}`);
  }
  const conflictRetryDelayMs = input.conflictRetryDelayMs ?? CONFLICT_RETRY_DELAY;
  if (conflictRetryDelayMs < 0) {
    throw new ConfigError(`conflictRetryDelayMs cannot be negative, got ${conflictRetryDelayMs}`);
  }

  return {
    image: input.image || DEFAULT_IMAGE,
    remote: (input.remote ?? "").trim().split(/\s+/).filter(Boolean),
    home,
    registryPath: join(home, REGISTRY_FILE_NAME),
    mountPath: input.mountPath || DEFAULT_MOUNT_PATH,
    minRamGb,
    conflictRetryDelayMs,
    debug: input.debug ?? false,
  };
}

/**
 * First free name of the form r1node, r1node1, r1node2, ...
 */
export function generateContainerName(existing: Iterable<string>): string {
  const taken = new Set(existing);
  if (!taken.has(CONTAINER_PREFIX)) {
    return CONTAINER_PREFIX;
  }
  for (let i = 1; ; i++) {
    const candidate = `${CONTAINER_PREFIX}${i}`;
    if (!taken.has(candidate)) {
      return candidate;
    }
  }
}

/**
 * Volume paired with a container: r1node3 -> r1vol3. Names outside the
 * scheme get `<name>_vol`.
 */
export function getVolumeName(containerName: string): string {
  if (containerName.startsWith(CONTAINER_PREFIX)) {
    return VOLUME_PREFIX + containerName.slice(CONTAINER_PREFIX.length);
  }
  return `${containerName}_vol`;
}
