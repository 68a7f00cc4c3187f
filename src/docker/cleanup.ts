/**
 * Docker resource cleanup operations.
 */

import { DOCKER_STOP_TIMEOUT } from "../constants.js";
import { mapResult, type Result } from "../result.js";
import type { CommandRunner } from "./executor.js";

/**
 * Remove a Docker container. Runs under the stop limit, since `rm -f`
 * on a running container has to stop it first.
 *
 * @param containerName - Container name or ID to remove.
 * @param force - Add -f so a running container is killed first.
 */
export async function removeContainer(
  runner: CommandRunner,
  containerName: string,
  force = false
): Promise<Result<void>> {
  const args = ["docker", "rm"];
  if (force) {args.push("-f");}
  args.push(containerName);

  const result = await runner.executeAsync(args, { timeout: DOCKER_STOP_TIMEOUT });
  return mapResult(result, () => undefined);
}
