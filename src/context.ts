/**
 * Per-invocation wiring for the CLI: settings, runner, registry and handler.
 *
 * Dependency direction:
 *   This module imports from: config, config-file, docker/*, registry, logger
 *   It should NOT import from: cli
 */

import { loadSettings } from "./config-file.js";
import { createSettings, type Settings } from "./config.js";
import { CommandRunner } from "./docker/executor.js";
import { DockerCommandHandler } from "./docker/handler.js";
import { configureLogging } from "./logger.js";
import { ContainerRegistry } from "./registry.js";

/** Flags given on the command line; they override file and env settings. */
export interface GlobalOptions {
  remote?: string;
  debug?: boolean;
  quiet?: boolean;
}

export interface Context {
  settings: Settings;
  runner: CommandRunner;
  registry: ContainerRegistry;
  handler: DockerCommandHandler;
}

/**
 * Resolve settings, apply their logging flags and load the registry.
 *
 * @param projectPath - Directory searched for a project config file.
 */
export async function createContext(
  options: GlobalOptions,
  projectPath: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Promise<Context> {
  const settings = createSettings({
    ...loadSettings(projectPath, env),
    ...(options.remote !== undefined ? { remote: options.remote } : {}),
  });
  configureLogging({ debug: options.debug || settings.debug, quiet: options.quiet });

  const runner = new CommandRunner({ remotePrefix: settings.remote });
  const registry = new ContainerRegistry(settings.registryPath, { runner });
  await registry.load();
  const handler = new DockerCommandHandler({
    runner,
    registry,
    image: settings.image,
    mountPath: settings.mountPath,
    conflictRetryDelayMs: settings.conflictRetryDelayMs,
  });
  return { settings, runner, registry, handler };
}
