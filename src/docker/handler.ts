/**
 * Edge node container orchestration.
 *
 * DockerCommandHandler owns the lifecycle of named node containers: launch
 * (with forced recreate and one conflict retry), stop, remove, inspection,
 * listing, image pulls and the RPC commands the node exposes through
 * `docker exec`. Every operation resolves to a Result and is tracked by the
 * TaskManager; mutating operations are serialized per container name.
 *
 * Dependency direction:
 *   This module imports from: docker/*, models/*, registry, config, validation
 *   It should NOT import from: cli
 */

import { setTimeout as sleep } from "node:timers/promises";

import { getVolumeName } from "../config.js";
import {
  CONFLICT_RETRY_DELAY,
  CONTAINER_PREFIX,
  DEFAULT_IMAGE,
  DEFAULT_MOUNT_PATH,
  DOCKER_RUN_TIMEOUT,
  DOCKER_STOP_TIMEOUT,
  IMAGE_PULL_TIMEOUT,
  RESTART_POLICY,
  RPC,
} from "../constants.js";
import { CommandError, ConflictError, NotFoundError, ValidationError, type EdgeNodeError } from "../errors.js";
import { log } from "../logger.js";
import { formatAllowedBatch, parseAllowedAddresses, type AllowedAddresses, type AllowedEntry } from "../models/allowed-addresses.js";
import type { ContainerInspect, ContainerListEntry } from "../models/containers.js";
import { parseConfigApp, parseStartupConfig, type ConfigApp, type StartupConfig } from "../models/node-config.js";
import { limitHistory, parseNodeHistory, type NodeHistory } from "../models/node-history.js";
import { parseNodeInfo, type NodeInfo } from "../models/node-info.js";
import { getRunPlatform } from "../platform/detection.js";
import type { ContainerRegistry } from "../registry.js";
import { attempt, err, ok, unwrap, type Result } from "../result.js";
import { validateAllowedEntry, validateContainerName, validateNodeAlias } from "../validation.js";
import { removeContainer } from "./cleanup.js";
import { DockerRunCommandBuilder } from "./command-builder.js";
import type { CommandRunner, CommandOutput } from "./executor.js";
import {
  containerExists,
  containerInspectSucceeds,
  getImageId,
  imageExists,
  inspectContainer,
  isContainerRunning,
  listContainers,
} from "./inspect.js";
import { NodeStateMachine, type NodeState } from "./node-state.js";
import { TaskManager, type InFlightOperation, type OperationKind, type Work } from "./task-manager.js";

export interface DockerCommandHandlerOptions {
  runner: CommandRunner;
  registry: ContainerRegistry;
  image?: string;
  mountPath?: string;
  /** Host architecture; defaults to the running machine's. */
  arch?: string;
  conflictRetryDelayMs?: number;
  tasks?: TaskManager;
}

export interface LaunchOptions {
  /** Volume to mount; defaults to the registered one, then the derived name. */
  volume?: string;
  /** "always" pulls even when the image is present. */
  pull?: "missing" | "always";
  onPullProgress?: (line: string) => void;
}

export interface LaunchResult {
  name: string;
  volume: string;
  /** Output of docker run -d: the new container ID. */
  containerId: string;
  /** True when the first attempt hit a name conflict and was retried. */
  retried: boolean;
}

export interface ImageUpdateResult {
  updated: boolean;
  message: string;
}

/** Reply to a write RPC: plain text, or JSON when the node sends it. */
export interface RpcAck {
  message: string;
  data?: Record<string, unknown>;
}

interface ConflictMatch {
  containerId: string | null;
}

const CONFLICT_ID_PATTERN = /by container "([^"]+)"/;

/**
 * Recognise Docker's "name already in use" refusal.
 */
export function parseNameConflict(error: EdgeNodeError): ConflictMatch | null {
  if (!(error instanceof CommandError)) {
    return null;
  }
  const text = error.stderr || error.message;
  if (!text.includes("Conflict") || !text.includes("is already in use")) {
    return null;
  }
  return { containerId: CONFLICT_ID_PATTERN.exec(text)?.[1] ?? null };
}

function isNoSuchContainer(error: EdgeNodeError): boolean {
  return error instanceof CommandError && error.message.toLowerCase().includes("no such container");
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  if (!text.startsWith("{")) {
    return null;
  }
  try {
    const data: unknown = JSON.parse(text);
    return data !== null && typeof data === "object" && !Array.isArray(data)
      ? Object.fromEntries(Object.entries(data))
      : null;
  } catch (e) {
    log.debug(`Reply is not JSON, treating it as text: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
}

function parseAck(stdout: string): RpcAck {
  const text = stdout.trim();
  const data = parseJsonObject(text);
  if (!data) {
    return { message: text };
  }
  return { message: typeof data.message === "string" ? data.message : text, data };
}

export class DockerCommandHandler {
  private readonly runner: CommandRunner;
  private readonly registry: ContainerRegistry;
  private readonly image: string;
  private readonly mountPath: string;
  private readonly arch: string | undefined;
  private readonly conflictRetryDelayMs: number;
  private readonly tasks: TaskManager;
  private readonly states = new NodeStateMachine();

  constructor(options: DockerCommandHandlerOptions) {
    this.runner = options.runner;
    this.registry = options.registry;
    this.image = options.image ?? DEFAULT_IMAGE;
    this.mountPath = options.mountPath ?? DEFAULT_MOUNT_PATH;
    this.arch = options.arch;
    this.conflictRetryDelayMs = options.conflictRetryDelayMs ?? CONFLICT_RETRY_DELAY;
    this.tasks = options.tasks ?? new TaskManager();
  }

  get imageName(): string {
    return this.image;
  }

  private async mutating<T>(name: string, kind: OperationKind, work: Work<T>): Promise<Result<T>> {
    return attempt(() => this.tasks.exclusive(name, kind, work));
  }

  private async reading<T>(name: string, kind: OperationKind, work: Work<T>): Promise<Result<T>> {
    return attempt(() => this.tasks.track(name, kind, work));
  }

  /** Forget a container the daemon says is gone and report it. */
  private notFound(name: string): NotFoundError {
    this.states.set(name, "not_created");
    return new NotFoundError(`Container '${name}' does not exist`);
  }

  // === Lifecycle ===

  /**
   * The exact `docker run` argv a launch would execute.
   */
  getLaunchCommand(name: string, volume?: string): string[] {
    const builder = new DockerRunCommandBuilder(this.image);
    const platform = getRunPlatform(this.arch);
    if (platform) {
      builder.withPlatform(platform);
    }
    builder.withDetached().withName(name).withRestartPolicy(RESTART_POLICY);
    if (volume) {
      builder.withVolume(volume, this.mountPath);
    } else {
      log.warn(`No volume specified for container ${name}`);
    }
    return builder.buildFull();
  }

  /**
   * Create the container fresh and start it.
   *
   * An existing container of the same name is force-removed first. A run
   * refused because the name is still bound to another container removes
   * that container and retries once.
   */
  async launch(name: string, options: LaunchOptions = {}): Promise<Result<LaunchResult>> {
    return this.mutating(name, "launch", async (signal) => {
      validateContainerName(name);
      this.states.assertCan(name, "launch");

      const registered = this.registry.get(name)?.volume ?? "";
      if (options.volume && registered && options.volume !== registered) {
        throw new ValidationError(
          `Container '${name}' already uses volume '${registered}', refusing to switch to '${options.volume}'`
        );
      }
      const volume = options.volume || registered || getVolumeName(name);

      if (await containerInspectSucceeds(this.runner, name)) {
        log.debug(`Container ${name} exists, removing it before launch`);
        const removed = await removeContainer(this.runner, name, true);
        if (!removed.ok) {
          throw new CommandError(`Failed to remove existing container: ${removed.error.message}`, 1);
        }
      }

      const present = unwrap(await imageExists(this.runner, this.image));
      if (!present || options.pull === "always") {
        unwrap(await this.pull(options.onPullProgress, signal));
      }

      if (!(await this.registry.volumeExists(volume))) {
        log.debug(`Volume ${volume} does not exist yet, docker run will create it`);
      }

      const command = this.getLaunchCommand(name, volume);
      log.info(`Launching container ${name} with volume ${volume}`);
      const { output, retried } = await this.runWithConflictRetry(command, signal);

      await this.registry.add({ name, volume });
      this.states.complete(name, "launch");
      log.success(`Container ${name} launched`);

      return { name, volume, containerId: output.stdout.trim(), retried };
    });
  }

  private async runWithConflictRetry(
    command: string[],
    signal: AbortSignal
  ): Promise<{ output: CommandOutput; retried: boolean }> {
    const first = await this.runner.executeAsync(command, { timeout: DOCKER_RUN_TIMEOUT, signal });
    if (first.ok) {
      return { output: first.value, retried: false };
    }

    const conflict = parseNameConflict(first.error);
    if (!conflict) {
      throw first.error;
    }
    if (!conflict.containerId) {
      throw new ConflictError(first.error.message, null);
    }

    log.warn(`Name conflict with container ${conflict.containerId}, removing it and retrying`);
    unwrap(await removeContainer(this.runner, conflict.containerId, true));
    await sleep(this.conflictRetryDelayMs);

    const second = await this.runner.executeAsync(command, { timeout: DOCKER_RUN_TIMEOUT, signal });
    if (second.ok) {
      return { output: second.value, retried: true };
    }
    const again = parseNameConflict(second.error);
    if (again) {
      throw new ConflictError(second.error.message, again.containerId);
    }
    throw second.error;
  }

  /**
   * `docker stop`. Cached alias and addresses stay in the registry.
   */
  async stop(name: string): Promise<Result<void>> {
    return this.mutating(name, "stop", async (signal) => {
      this.states.assertCan(name, "stop");
      const result = await this.runner.executeAsync(["docker", "stop", name], { timeout: DOCKER_STOP_TIMEOUT, signal });
      if (!result.ok) {
        throw isNoSuchContainer(result.error) ? this.notFound(name) : result.error;
      }
      this.states.complete(name, "stop");
      await this.registry.touch(name);
    });
  }

  /**
   * `docker rm [-f]` and drop the registry entry.
   *
   * Always asks Docker, whatever state was cached. A container Docker no
   * longer knows is still dropped from the registry; NotFoundError is
   * returned only when neither knew it.
   */
  async remove(name: string, force = false): Promise<Result<void>> {
    return this.mutating(name, "remove", async () => {
      const result = await removeContainer(this.runner, name, force);
      if (!result.ok && !isNoSuchContainer(result.error)) {
        throw result.error;
      }

      const wasRegistered = await this.registry.remove(name);
      this.states.complete(name, "remove");
      if (!result.ok && !wasRegistered) {
        throw new NotFoundError(`Container '${name}' does not exist`);
      }
    });
  }

  // === Queries ===

  async inspect(name: string): Promise<Result<ContainerInspect>> {
    return this.reading(name, "inspect", async () => {
      const result = await inspectContainer(this.runner, name);
      if (!result.ok) {
        throw result.error instanceof NotFoundError ? this.notFound(name) : result.error;
      }
      this.states.observe(name, result.value.State?.Running ?? false);
      return result.value;
    });
  }

  /** A container Docker does not know is simply not running. */
  async isRunning(name: string): Promise<Result<boolean>> {
    return this.reading(name, "inspect", async () => {
      const running = unwrap(await isContainerRunning(this.runner, name));
      if (running) {
        this.states.observe(name, true);
      }
      return running;
    });
  }

  async containerExists(name: string): Promise<Result<boolean>> {
    return this.reading(name, "inspect", async () => unwrap(await containerExists(this.runner, name)));
  }

  /**
   * Node containers known to Docker: the generated `r1node*` names plus
   * every registered name outside that scheme.
   *
   * @param all - Include stopped containers.
   */
  async listContainers(all = true): Promise<Result<ContainerListEntry[]>> {
    return this.reading(CONTAINER_PREFIX, "list", async () => {
      const custom = this.registry
        .listAll()
        .map((c) => c.name)
        .filter((name) => !name.startsWith(CONTAINER_PREFIX));
      const registered = new Set(custom);
      const listed = unwrap(await listContainers(this.runner, [CONTAINER_PREFIX, ...custom], all));
      const entries = listed.filter((e) => e.name.startsWith(CONTAINER_PREFIX) || registered.has(e.name));
      for (const entry of entries) {
        this.states.observe(entry.name, entry.running);
      }
      return entries;
    });
  }

  getState(name: string): NodeState {
    return this.states.get(name);
  }

  // === Images ===

  private async pull(onLine: ((line: string) => void) | undefined, signal?: AbortSignal): Promise<Result<void>> {
    log.info(`Pulling image ${this.image}`);
    const result = await this.runner.executeAsync(["docker", "pull", this.image], {
      timeout: IMAGE_PULL_TIMEOUT,
      onOutputLine: onLine ?? ((line) => log.progress(line)),
      signal,
    });
    if (!result.ok) {
      const { error } = result;
      return error instanceof CommandError
        ? err(new CommandError(`Failed to pull Docker image: ${error.message}`, error.exitCode, error.stderr))
        : result;
    }
    return ok(undefined);
  }

  /** `docker pull <image>` with progress lines. */
  async pullImage(onLine?: (line: string) => void): Promise<Result<void>> {
    return this.reading(this.image, "pull", async (signal) => unwrap(await this.pull(onLine, signal)));
  }

  /**
   * Pull the image and report whether anything changed.
   *
   * Compares local image IDs before and after `docker pull --quiet`; when
   * either ID is unavailable, falls back to reading the pull output.
   */
  async checkAndPullImageUpdates(): Promise<Result<ImageUpdateResult>> {
    return this.reading(this.image, "update-check", async (signal) => {
      const before = await getImageId(this.runner, this.image);
      const pulled = unwrap(
        await this.runner.executeAsync(["docker", "pull", "--quiet", this.image], { timeout: IMAGE_PULL_TIMEOUT, signal })
      );
      const after = await getImageId(this.runner, this.image);

      const updated = before !== null && after !== null
        ? before !== after
        : pulled.stdout.trim() !== "" && !pulled.stderr.includes("Image is up to date");

      return updated
        ? { updated, message: `Docker image ${this.image} updated successfully` }
        : { updated, message: `No updates available for Docker image ${this.image}` };
    });
  }

  // === Node RPC ===

  private async rpc(name: string, argv: string[], signal: AbortSignal, input?: string): Promise<string> {
    const command = ["docker", "exec"];
    if (input !== undefined) {
      command.push("-i");
    }
    command.push(name, ...argv);

    const result = await this.runner.executeAsync(command, { input, signal });
    if (!result.ok) {
      throw isNoSuchContainer(result.error) ? this.notFound(name) : result.error;
    }
    return result.value.stdout;
  }

  /** Identity of the node; refreshes the registry's cached copy. */
  async getNodeInfo(name: string): Promise<Result<NodeInfo>> {
    return this.reading(name, "exec", async (signal) => {
      const info = parseNodeInfo(await this.rpc(name, [RPC.NODE_INFO], signal));
      await this.registry.update(name, {
        nodeAddress: info.address,
        ethAddress: info.ethAddress,
        ...(info.alias ? { nodeAlias: info.alias } : {}),
      });
      return info;
    });
  }

  /**
   * Resource history, series aligned to timestamps.
   *
   * @param options.limit - Keep only the most recent points.
   */
  async getNodeHistory(name: string, options: { limit?: number } = {}): Promise<Result<NodeHistory>> {
    return this.reading(name, "exec", async (signal) => {
      const history = parseNodeHistory(await this.rpc(name, [RPC.NODE_HISTORY], signal));
      return options.limit !== undefined ? limitHistory(history, options.limit) : history;
    });
  }

  async getStartupConfig(name: string): Promise<Result<StartupConfig>> {
    return this.reading(name, "exec", async (signal) =>
      parseStartupConfig(await this.rpc(name, [RPC.STARTUP_CONFIG], signal))
    );
  }

  async getConfigApp(name: string): Promise<Result<ConfigApp>> {
    return this.reading(name, "exec", async (signal) =>
      parseConfigApp(await this.rpc(name, [RPC.CONFIG_APP], signal))
    );
  }

  /**
   * Rename the node. The reply is returned verbatim (trimmed).
   */
  async updateNodeName(name: string, alias: string): Promise<Result<string>> {
    return this.mutating(name, "exec", async (signal) => {
      const validAlias = validateNodeAlias(alias);
      const message = (await this.rpc(name, [RPC.CHANGE_ALIAS, validAlias], signal)).trim();
      await this.registry.updateField(name, "nodeAlias", validAlias);
      return message;
    });
  }

  /** Make the node discard its identity and generate a new address. */
  async resetAddress(name: string): Promise<Result<string>> {
    return this.mutating(name, "exec", async (signal) =>
      (await this.rpc(name, [RPC.RESET_ADDRESS], signal)).trim()
    );
  }

  async getAllowedAddresses(name: string): Promise<Result<AllowedAddresses>> {
    return this.reading(name, "exec", async (signal) =>
      parseAllowedAddresses(await this.rpc(name, [RPC.GET_ALLOWED], signal))
    );
  }

  /**
   * Send the allow-list on stdin, one `address alias` line per entry.
   */
  async updateAllowedBatch(name: string, entries: readonly AllowedEntry[]): Promise<Result<RpcAck>> {
    return this.mutating(name, "exec", async (signal) => {
      for (const entry of entries) {
        validateAllowedEntry(entry.address, entry.alias);
      }
      const stdout = await this.rpc(name, [RPC.UPDATE_ALLOWED_BATCH], signal, formatAllowedBatch(entries));
      return parseAck(stdout);
    });
  }

  // === Task control ===

  inFlight(): InFlightOperation[] {
    return this.tasks.list();
  }

  /**
   * Stop accepting work and wait for in-flight operations.
   *
   * @param options.cancel - Abort running docker processes instead of waiting them out.
   */
  async shutdown(options: { cancel?: boolean } = {}): Promise<void> {
    await this.tasks.shutdown(options);
  }
}
