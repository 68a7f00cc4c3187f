#!/usr/bin/env node
/**
 * CLI entry point for edge-node-manager.
 *
 * Commander.js-based CLI; every command is a thin shell over one
 * DockerCommandHandler or ContainerRegistry operation.
 */

import { readFile } from "node:fs/promises";

import { Command, InvalidArgumentError } from "commander";

import { generateContainerName, getVolumeName } from "./config.js";
import { DEFAULT_HISTORY_LIMIT, VERSION } from "./constants.js";
import { createContext, type Context, type GlobalOptions } from "./context.js";
import { imageExists } from "./docker/inspect.js";
import { describeError, EdgeNodeError } from "./errors.js";
import { configureLogging, log, style } from "./logger.js";
import { parseAllowedEntries } from "./models/allowed-addresses.js";
import { attempt, type Result } from "./result.js";
import { checkRamForNewNode } from "./system-resources.js";

const program = new Command();

/**
 * Print the error of a failed Result and mark the process as failed.
 *
 * @returns The value, or undefined on failure.
 */
function report<T>(result: Result<T>): T | undefined {
  if (result.ok) {
    return result.value;
  }
  log.error(describeError(result.error));
  log.debug(`${result.error.name}: ${result.error.message}`);
  process.exitCode = 1;
  return undefined;
}

/** Run an action with a fresh context and always join its tasks. */
async function withContext(action: (ctx: Context) => Promise<void>): Promise<void> {
  const ctx = await createContext(program.opts<GlobalOptions>());
  try {
    await action(ctx);
  } finally {
    await ctx.handler.shutdown();
  }
}

function printJson(value: unknown): void {
  log.raw(JSON.stringify(value, null, 2));
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

program
  .name("edge-node")
  .description("Manage Edge Node Docker containers, locally or over SSH")
  .version(VERSION)
  .option("--remote <ssh>", "Run docker through this command prefix (e.g. \"ssh user@host\")")
  .option("-d, --debug", "Show docker commands and debug output")
  .option("-q, --quiet", "Suppress all output (exit code only)")
  .hook("preAction", () => {
    const opts = program.opts<GlobalOptions>();
    configureLogging({ debug: opts.debug, quiet: opts.quiet });
  });

// List command
program
  .command("list")
  .description("List registered nodes and their Docker status")
  .action(async () => withContext(async ({ registry, handler }) => {
    const listed = report(await handler.listContainers(true));
    if (!listed) {return;}

    const byName = new Map(listed.map((entry) => [entry.name, entry]));
    const names = new Set([...registry.listAll().map((c) => c.name), ...byName.keys()]);
    if (names.size === 0) {
      log.dim("No nodes yet. Create one with: edge-node add");
      return;
    }

    for (const name of [...names].sort((a, b) => a.toLowerCase().localeCompare(b.toLowerCase()))) {
      const config = registry.get(name);
      const entry = byName.get(name);
      const status = entry
        ? (entry.running ? style.green("running") : style.yellow("stopped"))
        : style.dim("not created");
      const alias = config?.nodeAlias ? ` (${config.nodeAlias})` : "";
      const volume = config?.volume ? style.dim(` vol=${config.volume}`) : "";
      log.raw(`${style.bold(name)}${alias}  ${status}${volume}`);
    }
  }));

// Add command
program
  .command("add [name]")
  .description("Register a new node and launch it")
  .option("--alias <alias>", "Display name to store for the node")
  .option("--no-start", "Register only, do not launch")
  .option("--skip-ram-check", "Skip the host RAM capacity check")
  .action(async (nameArg: string | undefined, options: { alias?: string; start: boolean; skipRamCheck?: boolean }) => {
    await withContext(async ({ settings, registry, handler }) => {
      const existing = registry.listAll();
      if (!options.skipRamCheck) {
        const ram = checkRamForNewNode(existing.length, { minRamGb: settings.minRamGb });
        if (!ram.canAddNode) {
          log.error(ram.message);
          process.exitCode = 1;
          return;
        }
        log.debug(ram.message);
      }

      const name = nameArg || generateContainerName(existing.map((c) => c.name));
      const added = report(await attempt(() => registry.add(
        { name, volume: getVolumeName(name), ...(options.alias ? { nodeAlias: options.alias } : {}) },
        { overwrite: false }
      )));
      if (!added) {return;}
      log.success(`Registered ${name} with volume ${added.volume}`);

      if (!options.start) {return;}
      const launched = report(await handler.launch(name));
      if (launched) {
        log.dim(`Container ID: ${launched.containerId}`);
      }
    });
  });

// Start command
program
  .command("start <name>")
  .description("Recreate and start a node container")
  .option("--volume <volume>", "Volume to mount (defaults to the registered one)")
  .option("--pull", "Pull the image even if it is present")
  .action(async (name: string, options: { volume?: string; pull?: boolean }) => {
    await withContext(async ({ handler }) => {
      const launched = report(await handler.launch(name, {
        ...(options.volume ? { volume: options.volume } : {}),
        pull: options.pull ? "always" : "missing",
      }));
      if (launched?.retried) {
        log.dim("Name conflict resolved by removing the stale container");
      }
    });
  });

// Stop command
program
  .command("stop <name>")
  .description("Stop a node container")
  .action(async (name: string) => {
    await withContext(async ({ handler }) => {
      const result = await handler.stop(name);
      report(result);
      if (result.ok) {
        log.success(`Stopped ${name}`);
      }
    });
  });

// Remove command
program
  .command("rm <name>")
  .description("Remove a node container and its registry entry")
  .option("-f, --force", "Remove even if running")
  .action(async (name: string, options: { force?: boolean }) => {
    await withContext(async ({ handler }) => {
      const result = await handler.remove(name, options.force ?? false);
      report(result);
      if (result.ok) {
        log.success(`Removed ${name}`);
      }
    });
  });

// Inspect command
program
  .command("inspect <name>")
  .description("Show docker inspect output for a node")
  .action(async (name: string) => {
    await withContext(async ({ handler }) => {
      const info = report(await handler.inspect(name));
      if (info) {printJson(info);}
    });
  });

// Status command
program
  .command("status <name>")
  .description("Show whether a node is running")
  .action(async (name: string) => {
    await withContext(async ({ handler }) => {
      const running = report(await handler.isRunning(name));
      if (running !== undefined) {
        log.raw(running ? style.green("running") : style.yellow("not running"));
      }
    });
  });

// Info command
program
  .command("info <name>")
  .description("Show node address, ETH address and alias")
  .action(async (name: string) => {
    await withContext(async ({ handler }) => {
      const info = report(await handler.getNodeInfo(name));
      if (!info) {return;}
      log.raw(`${style.bold("Address:")}     ${info.address}`);
      log.raw(`${style.bold("ETH address:")} ${info.ethAddress}`);
      log.raw(`${style.bold("Alias:")}       ${info.alias}`);
    });
  });

// History command
program
  .command("history <name>")
  .description("Show resource usage history as JSON")
  .option("--limit <points>", "Most recent points to keep", parsePositiveInt, DEFAULT_HISTORY_LIMIT)
  .action(async (name: string, options: { limit: number }) => {
    await withContext(async ({ handler }) => {
      const history = report(await handler.getNodeHistory(name, { limit: options.limit }));
      if (history) {printJson(history);}
    });
  });

program
  .command("startup-config <name>")
  .description("Show the node's startup configuration")
  .action(async (name: string) => {
    await withContext(async ({ handler }) => {
      const config = report(await handler.getStartupConfig(name));
      if (config) {printJson(config);}
    });
  });

program
  .command("app-config <name>")
  .description("Show the node's application configuration")
  .action(async (name: string) => {
    await withContext(async ({ handler }) => {
      const config = report(await handler.getConfigApp(name));
      if (config) {printJson(config);}
    });
  });

// Rename command
program
  .command("rename <name> <alias>")
  .description("Change the node's alias")
  .action(async (name: string, alias: string) => {
    await withContext(async ({ handler }) => {
      const message = report(await handler.updateNodeName(name, alias));
      if (message !== undefined) {
        log.success(message || `Alias of ${name} set to ${alias}`);
      }
    });
  });

program
  .command("reset-address <name>")
  .description("Discard the node identity so a new address is generated")
  .action(async (name: string) => {
    await withContext(async ({ handler }) => {
      const message = report(await handler.resetAddress(name));
      if (message !== undefined) {
        log.success(message || `Address of ${name} reset; restart the node to apply`);
      }
    });
  });

// Allow-list commands
program
  .command("allowed <name>")
  .description("List addresses allowed to use the node")
  .action(async (name: string) => {
    await withContext(async ({ handler }) => {
      const allowed = report(await handler.getAllowedAddresses(name));
      if (!allowed) {return;}
      const entries = Object.entries(allowed);
      if (entries.length === 0) {
        log.dim("No allowed addresses");
        return;
      }
      for (const [address, alias] of entries) {
        log.raw(alias ? `${address}  ${style.dim(alias)}` : address);
      }
    });
  });

program
  .command("allowed-set <name> <file>")
  .description("Replace the allow-list from a file of '<address> <alias>' lines")
  .action(async (name: string, file: string) => {
    await withContext(async ({ handler }) => {
      const entries = report(await attempt(async () => parseAllowedEntries(await readFile(file, "utf-8"))));
      if (!entries) {return;}
      const ack = report(await handler.updateAllowedBatch(name, entries));
      if (ack) {
        log.success(ack.message || `Sent ${entries.length} allowed address(es)`);
      }
    });
  });

// Image update command
program
  .command("check-updates")
  .description("Pull the node image and report whether it changed")
  .action(async () => withContext(async ({ handler }) => {
    const result = report(await handler.checkAndPullImageUpdates());
    if (!result) {return;}
    if (result.updated) {
      log.success(result.message);
    } else {
      log.info(result.message);
    }
  }));

// Capacity command
program
  .command("capacity")
  .description("Show how many nodes this host's RAM supports")
  .action(async () => withContext(async ({ settings, registry }) => {
    const ram = checkRamForNewNode(registry.listAll().length, { minRamGb: settings.minRamGb });
    log.raw(`${style.bold("Host memory:")} ${ram.totalRam}`);
    if (ram.canAddNode) {
      log.success(ram.message);
    } else {
      log.warn(ram.message);
    }
  }));

// Doctor command
program
  .command("doctor")
  .description("Check Docker, the node image and local configuration")
  .action(async () => withContext(async ({ settings, runner }) => {
    const target = runner.isRemote ? `remote (${runner.remotePrefix.join(" ")})` : "local";
    log.raw(`${style.bold("Docker target:")} ${target}`);
    log.raw(`${style.bold("Registry:")}      ${settings.registryPath}`);
    log.raw(`${style.bold("Image:")}         ${settings.image}`);

    if (!(await runner.checkDockerStatus())) {
      log.error("Docker is not reachable. Is the daemon running?");
      process.exitCode = 1;
      return;
    }
    log.success("Docker daemon is reachable");

    const present = report(await imageExists(runner, settings.image));
    if (present === true) {
      log.success("Node image is present");
    } else if (present === false) {
      log.warn(`Node image is missing; it will be pulled on first start`);
    }
  }));

program.parseAsync().catch((error: unknown) => {
  if (error instanceof EdgeNodeError) {
    log.error(describeError(error));
  } else {
    log.error(error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
});
