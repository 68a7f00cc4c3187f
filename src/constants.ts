/**
 * Constants module for edge-node-manager.
 *
 * All timeout values and shared constants are defined here (SSOT).
 */

import { homedir } from "node:os";
import { join } from "node:path";

// === Version (SSOT: package.json) ===
import pkg from "../package.json" with { type: "json" };
export const VERSION: string = pkg.version;

// === Edge Node image ===
export const DEFAULT_IMAGE_REPOSITORY = "ratio1/edge_node";
export const DEFAULT_IMAGE_TAG = "mainnet";
export const DEFAULT_IMAGE = `${DEFAULT_IMAGE_REPOSITORY}:${DEFAULT_IMAGE_TAG}`;
/** The published image is x86-only; ARM hosts run it under emulation. */
export const EMULATED_PLATFORM = "linux/amd64";
export const ARM_ARCHITECTURES: readonly string[] = ["arm64", "aarch64"];

// === Container naming (SSOT) ===
export const CONTAINER_PREFIX = "r1node";
export const VOLUME_PREFIX = "r1vol";
/** Where the node keeps its identity and local cache inside the container. */
export const DEFAULT_MOUNT_PATH = "/edge_node/_local_cache";
export const RESTART_POLICY = "unless-stopped";

// === Docker Timeouts (milliseconds) ===
export const LOCAL_COMMAND_TIMEOUT = 10_000; // docker exec / inspect / ps on this host
export const REMOTE_COMMAND_TIMEOUT = 20_000; // same commands routed through SSH
export const DOCKER_RUN_TIMEOUT = 120_000; // docker run -d (image already present)
export const DOCKER_STOP_TIMEOUT = 60_000; // docker stop/rm; the daemon itself waits 10s before SIGKILL
export const IMAGE_PULL_TIMEOUT = 1_800_000; // 30 min for a cold pull of the node image
export const CONFLICT_RETRY_DELAY = 1_000; // let the daemon release a removed container's name

// === Exit code sentinels (no real process exit code) ===
export const SPAWN_FAILURE_EXIT_CODE = 127;
export const TIMEOUT_EXIT_CODE = 124;

// === Node RPC commands (run inside the container via docker exec) ===
export const RPC = {
  NODE_INFO: "get_node_info",
  NODE_HISTORY: "get_node_history",
  STARTUP_CONFIG: "get_startup_config",
  CONFIG_APP: "get_config_app",
  CHANGE_ALIAS: "change_alias",
  RESET_ADDRESS: "reset_address",
  GET_ALLOWED: "get_allowed",
  UPDATE_ALLOWED_BATCH: "update_allowed_batch",
} as const;

// === Node alias rules ===
export const MAX_ALIAS_LENGTH = 15;

// === History ===
export const DEFAULT_HISTORY_LIMIT = 100;

// === Capacity ===
export const DEFAULT_MIN_RAM_GB_PER_NODE = 6;

// === Paths ===
export const APP_DIR_NAME = ".edge_node";
export const REGISTRY_FILE_NAME = "containers.json";
export const GLOBAL_CONFIG_FILE_NAME = "config.yaml";

/** Default directory for the registry and global config. */
export function getDefaultHomeDir(): string {
  return join(homedir(), APP_DIR_NAME);
}

// === Environment variables (SSOT for names) ===
export const EDGE_NODE_ENV = {
  IMAGE: "EDGE_NODE_IMAGE",
  REMOTE: "EDGE_NODE_REMOTE",
  HOME: "EDGE_NODE_HOME",
  MIN_RAM_GB: "EDGE_NODE_MIN_RAM_GB",
  DEBUG: "EDGE_NODE_DEBUG",
} as const;
