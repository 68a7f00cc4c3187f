/**
 * Docker inspection and listing operations.
 *
 * Read-only queries against the Docker daemon for containers, images and
 * volumes. All of them go through the CommandRunner, so they honour the
 * remote prefix.
 */

import { NotFoundError } from "../errors.js";
import { log } from "../logger.js";
import {
  CONTAINER_LIST_FORMAT,
  parseContainerListLine,
  parseInspectOutput,
  type ContainerInspect,
  type ContainerListEntry,
} from "../models/containers.js";
import { attempt, err, ok, type Result } from "../result.js";
import type { CommandRunner } from "./executor.js";
import { listDockerItems, listDockerLines, splitLines } from "./list-operations.js";

function isNoSuchObject(stderr: string): boolean {
  const lower = stderr.toLowerCase();
  return lower.includes("no such object") || lower.includes("no such container");
}

/**
 * `docker inspect <name>`, first element of the returned array.
 *
 * @returns NotFoundError when Docker does not know the name, ParseError for
 *   malformed output.
 */
export async function inspectContainer(runner: CommandRunner, name: string): Promise<Result<ContainerInspect>> {
  const result = await runner.executeAsync(["docker", "inspect", name]);
  if (!result.ok) {
    if (isNoSuchObject(result.error.message)) {
      return err(new NotFoundError(`Container '${name}' does not exist`));
    }
    return result;
  }
  const stdout = result.value.stdout;
  return attempt(async () => parseInspectOutput(stdout));
}

/**
 * Check if a container is running. A missing container is not running.
 */
export async function isContainerRunning(runner: CommandRunner, name: string): Promise<Result<boolean>> {
  const result = await inspectContainer(runner, name);
  if (!result.ok) {
    if (result.error instanceof NotFoundError) {
      log.debug(`Container '${name}' not found, reporting not running`);
      return ok(false);
    }
    return result;
  }
  return ok(result.value.State?.Running ?? false);
}

/**
 * `docker container inspect <name>` exit status: 0 means it exists.
 */
export async function containerInspectSucceeds(runner: CommandRunner, name: string): Promise<boolean> {
  const result = await runner.execute(["docker", "container", "inspect", name], { timeout: runner.defaultTimeout });
  return result.exitCode === 0;
}

/**
 * Exact-name existence check over `docker ps -a`.
 */
export async function containerExists(runner: CommandRunner, name: string): Promise<Result<boolean>> {
  const result = await listDockerLines(runner, ["ps", "-a", "--format", "{{.Names}}", "--filter", `name=${name}`]);
  if (!result.ok) {
    return result;
  }
  return ok(result.value.includes(name));
}

/**
 * List containers whose name matches any of `names`. Docker ORs repeated
 * name filters and matches them as substrings.
 *
 * @param all - Include stopped containers (-a).
 */
export async function listContainers(
  runner: CommandRunner,
  names: readonly string[],
  all = true
): Promise<Result<ContainerListEntry[]>> {
  const args = ["ps"];
  if (all) {
    args.push("-a");
  }
  args.push("--format", CONTAINER_LIST_FORMAT);
  for (const name of names) {
    args.push("-f", `name=${name}`);
  }
  return listDockerItems(runner, args, parseContainerListLine);
}

/**
 * True when `docker images -q <image>` prints an ID.
 */
export async function imageExists(runner: CommandRunner, image: string): Promise<Result<boolean>> {
  const result = await listDockerLines(runner, ["images", "-q", image]);
  if (!result.ok) {
    return result;
  }
  return ok(result.value.length > 0);
}

/**
 * Local image ID, or null when the image is absent or the query fails.
 */
export async function getImageId(runner: CommandRunner, image: string): Promise<string | null> {
  const result = await runner.executeAsync(["docker", "image", "inspect", "--format", "{{.Id}}", image]);
  if (!result.ok) {
    log.debug(`getImageId failed for '${image}': ${result.error.message}`);
    return null;
  }
  return splitLines(result.value.stdout)[0] ?? null;
}

/**
 * `docker volume inspect <volume>` exit status: 0 means it exists.
 */
export async function volumeExists(runner: CommandRunner, volume: string): Promise<boolean> {
  const result = await runner.execute(["docker", "volume", "inspect", volume], { timeout: runner.defaultTimeout });
  return result.exitCode === 0;
}
