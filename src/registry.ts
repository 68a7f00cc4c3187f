/**
 * Container registry for edge-node-manager.
 *
 * Durable name -> ContainerConfig map kept in one JSON file. Every mutation
 * re-reads the file, applies the change and rewrites the whole map through a
 * temp file, under a lock, so two operations finishing together cannot drop
 * each other's writes.
 *
 * Dependency direction:
 *   This module imports from: errors, logger, utils/keyed-mutex, docker/inspect
 *   It should NOT import from: cli, docker/handler
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { z } from "zod";

import type { CommandRunner } from "./docker/executor.js";
import { volumeExists as dockerVolumeExists } from "./docker/inspect.js";
import { DuplicateNameError, ValidationError } from "./errors.js";
import { log } from "./logger.js";
import { KeyedMutex } from "./utils/keyed-mutex.js";

export interface ContainerConfig {
  name: string;
  /** Empty until the first launch. */
  volume: string;
  createdAt: string;
  lastUsed: string;
  nodeAlias?: string;
  nodeAddress?: string;
  ethAddress?: string;
}

/** Input to add(): timestamps are stamped when absent. */
export type NewContainer = Omit<ContainerConfig, "createdAt" | "lastUsed"> &
  Partial<Pick<ContainerConfig, "createdAt" | "lastUsed">>;

export type UpdatableField = "volume" | "nodeAlias" | "nodeAddress" | "ethAddress" | "lastUsed";

const StoredContainerSchema = z.object({
  container_name: z.string().min(1),
  volume_name: z.string().default(""),
  created_at: z.string(),
  last_used: z.string(),
  node_alias: z.string().optional(),
  node_address: z.string().optional(),
  eth_address: z.string().optional(),
});

type StoredContainer = z.infer<typeof StoredContainerSchema>;

function fromStored(stored: StoredContainer): ContainerConfig {
  return {
    name: stored.container_name,
    volume: stored.volume_name,
    createdAt: stored.created_at,
    lastUsed: stored.last_used,
    ...(stored.node_alias !== undefined ? { nodeAlias: stored.node_alias } : {}),
    ...(stored.node_address !== undefined ? { nodeAddress: stored.node_address } : {}),
    ...(stored.eth_address !== undefined ? { ethAddress: stored.eth_address } : {}),
  };
}

function toStored(config: ContainerConfig): StoredContainer {
  return {
    container_name: config.name,
    volume_name: config.volume,
    created_at: config.createdAt,
    last_used: config.lastUsed,
    ...(config.nodeAlias !== undefined ? { node_alias: config.nodeAlias } : {}),
    ...(config.nodeAddress !== undefined ? { node_address: config.nodeAddress } : {}),
    ...(config.ethAddress !== undefined ? { eth_address: config.ethAddress } : {}),
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export interface ContainerRegistryOptions {
  /** Used by volumeExists; without it every volume is reported missing. */
  runner?: CommandRunner;
  /** Clock for timestamps. */
  now?: () => Date;
}

const FILE_LOCK = "registry";

export class ContainerRegistry {
  private readonly storagePath: string;
  private readonly runner: CommandRunner | undefined;
  private readonly now: () => Date;
  private readonly lock = new KeyedMutex();
  private containers = new Map<string, ContainerConfig>();

  constructor(storagePath: string, options: ContainerRegistryOptions = {}) {
    this.storagePath = storagePath;
    this.runner = options.runner;
    this.now = options.now ?? (() => new Date());
  }

  get path(): string {
    return this.storagePath;
  }

  /**
   * Read the file into memory. A missing or corrupt file yields an empty
   * registry; invalid entries are skipped.
   */
  async load(): Promise<void> {
    this.containers = await this.readFromDisk();
  }

  private async readFromDisk(): Promise<Map<string, ContainerConfig>> {
    const result = new Map<string, ContainerConfig>();

    let content: string;
    try {
      content = await readFile(this.storagePath, "utf-8");
    } catch (error) {
      if (!isMissingFile(error)) {
        log.warn(`Could not read container registry ${this.storagePath}: ${String(error)}`);
      }
      return result;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      log.warn(`Container registry ${this.storagePath} is corrupt, starting empty`);
      return result;
    }

    const root = z.record(z.string(), z.unknown()).safeParse(data);
    if (!root.success) {
      log.warn(`Container registry ${this.storagePath} is not a JSON object, starting empty`);
      return result;
    }

    for (const [key, value] of Object.entries(root.data)) {
      const entry = StoredContainerSchema.safeParse(value);
      if (!entry.success) {
        log.debug(`Skipping invalid registry entry '${key}'`);
        continue;
      }
      const config = fromStored(entry.data);
      result.set(config.name, config);
    }
    return result;
  }

  private async writeToDisk(containers: Map<string, ContainerConfig>): Promise<void> {
    const data: Record<string, StoredContainer> = {};
    for (const [name, config] of containers) {
      data[name] = toStored(config);
    }

    await mkdir(dirname(this.storagePath), { recursive: true });
    const tempPath = `${this.storagePath}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(data, null, 2), "utf-8");
    await rename(tempPath, this.storagePath);
  }

  /**
   * Re-read, apply `change`, persist. The in-memory copy follows the file.
   */
  private async mutate<T>(change: (containers: Map<string, ContainerConfig>) => T): Promise<T> {
    return this.lock.runExclusive(FILE_LOCK, async () => {
      const containers = await this.readFromDisk();
      const result = change(containers);
      await this.writeToDisk(containers);
      this.containers = containers;
      return result;
    });
  }

  /**
   * Insert or overwrite an entry.
   *
   * A stored volume survives an incoming empty one; a different non-empty
   * volume is rejected.
   *
   * @throws DuplicateNameError when `overwrite` is false and the name exists.
   * @throws ValidationError when the volume would change.
   */
  async add(container: NewContainer, options: { overwrite?: boolean } = {}): Promise<ContainerConfig> {
    const overwrite = options.overwrite ?? true;
    const stamp = this.now().toISOString();

    return this.mutate((containers) => {
      const existing = containers.get(container.name);
      if (existing && !overwrite) {
        throw new DuplicateNameError(`Container '${container.name}' is already registered`);
      }
      if (existing?.volume && container.volume && existing.volume !== container.volume) {
        throw new ValidationError(
          `Container '${container.name}' already uses volume '${existing.volume}', refusing to switch to '${container.volume}'`
        );
      }

      const config: ContainerConfig = {
        ...existing,
        ...container,
        volume: container.volume || existing?.volume || "",
        createdAt: container.createdAt ?? existing?.createdAt ?? stamp,
        lastUsed: container.lastUsed ?? stamp,
      };
      containers.set(config.name, config);
      return config;
    });
  }

  get(name: string): ContainerConfig | undefined {
    return this.containers.get(name);
  }

  has(name: string): boolean {
    return this.containers.has(name);
  }

  /**
   * Set several fields in one write.
   *
   * @returns false when `name` is not registered (nothing is written).
   * @throws ValidationError when a set volume would change.
   */
  async update(name: string, patch: Partial<Pick<ContainerConfig, UpdatableField>>): Promise<boolean> {
    if (!this.containers.has(name)) {
      // the file may have gained it since load()
      this.containers = await this.readFromDisk();
      if (!this.containers.has(name)) {
        log.debug(`update: '${name}' is not registered, ignoring ${Object.keys(patch).join(", ")}`);
        return false;
      }
    }

    return this.mutate((containers) => {
      const existing = containers.get(name);
      if (!existing) {
        return false;
      }
      if (patch.volume !== undefined && existing.volume && existing.volume !== patch.volume) {
        throw new ValidationError(
          `Container '${name}' already uses volume '${existing.volume}', refusing to switch to '${patch.volume}'`
        );
      }
      containers.set(name, { ...existing, ...patch });
      return true;
    });
  }

  /** Set one field and persist. See update(). */
  async updateField(name: string, field: UpdatableField, value: string): Promise<boolean> {
    const patch: Partial<Record<UpdatableField, string>> = {};
    patch[field] = value;
    return this.update(name, patch);
  }

  /** Set lastUsed to now. */
  async touch(name: string): Promise<boolean> {
    return this.updateField(name, "lastUsed", this.now().toISOString());
  }

  /** @returns false when nothing was registered under `name`. */
  async remove(name: string): Promise<boolean> {
    return this.mutate((containers) => containers.delete(name));
  }

  /** All entries sorted by name, case-insensitively. */
  listAll(): ContainerConfig[] {
    return [...this.containers.values()].sort((a, b) => {
      const left = a.name.toLowerCase();
      const right = b.name.toLowerCase();
      if (left < right) {return -1;}
      if (left > right) {return 1;}
      return 0;
    });
  }

  /** Whether Docker knows the volume. */
  async volumeExists(volume: string): Promise<boolean> {
    if (!this.runner) {
      return false;
    }
    return dockerVolumeExists(this.runner, volume);
  }
}
