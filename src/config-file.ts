/**
 * Configuration file support for edge-node-manager.
 *
 * Loads settings from edge-node.yaml or .edgenoderc files and applies
 * EDGE_NODE_* environment overrides on top.
 *
 * Config file locations (in order of precedence, lowest first):
 *   1. <home>/config.yaml (global, home defaults to ~/.edge_node)
 *   2. ./edge-node.yaml, ./edge-node.yml or ./.edgenoderc (project-specific)
 *   3. EDGE_NODE_* environment variables
 *
 * CLI flags are applied on top of the returned config by cli.ts.
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts, logger.ts
 *   It should NOT import from: cli, docker/*
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { EDGE_NODE_ENV, GLOBAL_CONFIG_FILE_NAME, getDefaultHomeDir } from "./constants.js";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";

/**
 * Manager settings. All fields are optional; defaults live in constants.ts.
 */
export interface EdgeNodeSettings {
  /** Full image reference, e.g. ratio1/edge_node:mainnet */
  image?: string;
  /** Command prefix that routes docker to another host, e.g. "ssh user@host" */
  remote?: string;
  /** Directory holding containers.json */
  home?: string;
  mountPath?: string;
  minRamGb?: number;
  conflictRetryDelayMs?: number;
  debug?: boolean;
}

const PROJECT_CONFIG_FILES = ["edge-node.yaml", "edge-node.yml", ".edgenoderc"];

/**
 * Parse YAML-like config (flat `key: value` lines, `#` comments).
 */
export function parseSimpleYaml(content: string): Record<string, string | number | boolean> {
  const result: Record<string, string | number | boolean> = {};

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.startsWith("#") || trimmed === "") {
      continue;
    }

    const match = trimmed.match(/^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.*)$/);
    if (!match) {
      continue;
    }
    const [, key, value] = match;
    if (!key || value === undefined) {
      continue;
    }

    const cleanValue = value.replace(/^["']|["']$/g, "").trim();
    if (cleanValue === "true") {
      result[key] = true;
    } else if (cleanValue === "false") {
      result[key] = false;
    } else if (/^\d+$/.test(cleanValue)) {
      result[key] = parseInt(cleanValue, 10);
    } else if (/^\d+\.\d+$/.test(cleanValue)) {
      result[key] = parseFloat(cleanValue);
    } else if (cleanValue !== "") {
      result[key] = cleanValue;
    }
  }

  return result;
}

/**
 * Map parsed key/values onto the typed settings, dropping keys of the wrong type.
 */
function toSettings(parsed: Record<string, string | number | boolean>): EdgeNodeSettings {
  const settings: EdgeNodeSettings = {};

  if (typeof parsed.image === "string") {settings.image = parsed.image;}
  if (typeof parsed.remote === "string") {settings.remote = parsed.remote;}
  if (typeof parsed.home === "string") {settings.home = parsed.home;}
  if (typeof parsed.mountPath === "string") {settings.mountPath = parsed.mountPath;}
  if (typeof parsed.minRamGb === "number") {settings.minRamGb = parsed.minRamGb;}
  if (typeof parsed.conflictRetryDelayMs === "number") {settings.conflictRetryDelayMs = parsed.conflictRetryDelayMs;}
  if (typeof parsed.debug === "boolean") {settings.debug = parsed.debug;}

  return settings;
}

/**
 * Load one config file. Missing or unreadable files yield null.
 */
function loadConfigFile(path: string): EdgeNodeSettings | null {
  if (!existsSync(path)) {
    return null;
  }

  try {
    return toSettings(parseSimpleYaml(readFileSync(path, "utf-8")));
  } catch (e) {
    log.debug(`Failed to read config file ${path}: ${String(e)}`);
    return null;
  }
}

function loadProjectConfig(projectPath: string): EdgeNodeSettings | null {
  for (const filename of PROJECT_CONFIG_FILES) {
    const configPath = join(projectPath, filename);
    const config = loadConfigFile(configPath);
    if (config) {
      log.debug(`Loaded project config: ${configPath}`);
      return config;
    }
  }
  return null;
}

/**
 * Read EDGE_NODE_* overrides.
 *
 * @throws ConfigError if a numeric or boolean variable cannot be parsed.
 */
export function loadEnvSettings(env: NodeJS.ProcessEnv = process.env): EdgeNodeSettings {
  const settings: EdgeNodeSettings = {};

  const image = env[EDGE_NODE_ENV.IMAGE];
  if (image) {settings.image = image;}

  const remote = env[EDGE_NODE_ENV.REMOTE];
  if (remote !== undefined) {settings.remote = remote;}

  const home = env[EDGE_NODE_ENV.HOME];
  if (home) {settings.home = home;}

  const minRam = env[EDGE_NODE_ENV.MIN_RAM_GB];
  if (minRam) {
    const value = Number(minRam);
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigError(`${EDGE_NODE_ENV.MIN_RAM_GB} must be a positive number, got '${minRam}'`);
    }
    settings.minRamGb = value;
  }

  const debug = env[EDGE_NODE_ENV.DEBUG];
  if (debug) {
    if (!["1", "0", "true", "false"].includes(debug)) {
      throw new ConfigError(`${EDGE_NODE_ENV.DEBUG} must be one of 1, 0, true, false, got '${debug}'`);
    }
    settings.debug = debug === "1" || debug === "true";
  }

  return settings;
}

/**
 * Merge configurations with proper precedence (later arguments win).
 */
export function mergeSettings(...configs: (EdgeNodeSettings | null)[]): EdgeNodeSettings {
  const result: EdgeNodeSettings = {};

  for (const config of configs) {
    if (!config) {continue;}

    if (config.image !== undefined) {result.image = config.image;}
    if (config.remote !== undefined) {result.remote = config.remote;}
    if (config.home !== undefined) {result.home = config.home;}
    if (config.mountPath !== undefined) {result.mountPath = config.mountPath;}
    if (config.minRamGb !== undefined) {result.minRamGb = config.minRamGb;}
    if (config.conflictRetryDelayMs !== undefined) {result.conflictRetryDelayMs = config.conflictRetryDelayMs;}
    if (config.debug !== undefined) {result.debug = config.debug;}
  }

  return result;
}

/**
 * Load edge-node-manager settings.
 *
 * The global file is looked up in the home directory named by the env
 * override (if any), so EDGE_NODE_HOME moves both registry and config.
 *
 * @param projectPath - Directory searched for a project config file.
 * @param env - Environment to read overrides from.
 */
export function loadSettings(projectPath: string, env: NodeJS.ProcessEnv = process.env): EdgeNodeSettings {
  const envSettings = loadEnvSettings(env);
  const globalPath = join(envSettings.home ?? getDefaultHomeDir(), GLOBAL_CONFIG_FILE_NAME);

  const globalConfig = loadConfigFile(globalPath);
  if (globalConfig) {
    log.debug(`Loaded global config: ${globalPath}`);
  }

  return mergeSettings(globalConfig, loadProjectConfig(projectPath), envSettings);
}
