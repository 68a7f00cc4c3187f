/**
 * edge-node-manager - orchestrate Edge Node Docker containers.
 *
 * This is the main entry point for the npm package.
 */

export { VERSION, DEFAULT_IMAGE, CONTAINER_PREFIX, VOLUME_PREFIX } from "./constants.js";
export { createSettings, generateContainerName, getVolumeName, type Settings } from "./config.js";
export { loadSettings, type EdgeNodeSettings } from "./config-file.js";
export { createContext, type Context, type GlobalOptions } from "./context.js";
export * from "./errors.js";
export { ok, err, attempt, unwrap, type Result, type Ok, type Err } from "./result.js";
export * from "./docker/index.js";
export { ContainerRegistry, type ContainerConfig, type NewContainer, type UpdatableField } from "./registry.js";
export { type NodeInfo } from "./models/node-info.js";
export { alignSeries, limitHistory, type NodeHistory } from "./models/node-history.js";
export { type StartupConfig, type ConfigApp } from "./models/node-config.js";
export {
  parseAllowedAddresses,
  parseAllowedEntries,
  formatAllowedBatch,
  type AllowedAddresses,
  type AllowedEntry,
} from "./models/allowed-addresses.js";
export { type ContainerListEntry, type ContainerInspect } from "./models/containers.js";
export { checkRamForNewNode, type RamCheck } from "./system-resources.js";
export { validateNodeAlias, validateContainerName } from "./validation.js";
export { configureLogging, log, LogLevel } from "./logger.js";
