/**
 * Results of `get_startup_config` and `get_config_app`.
 *
 * Both are free-form JSON objects owned by the node image; only the
 * top-level shape is checked.
 */

import { z } from "zod";

import { parseJsonOutput } from "./json.js";

const JsonObject = z.record(z.string(), z.unknown());

export type StartupConfig = Record<string, unknown>;
export type ConfigApp = Record<string, unknown>;

/** @throws ParseError */
export function parseStartupConfig(raw: string): StartupConfig {
  return parseJsonOutput(raw, JsonObject, "get_startup_config");
}

/** @throws ParseError */
export function parseConfigApp(raw: string): ConfigApp {
  return parseJsonOutput(raw, JsonObject, "get_config_app");
}
