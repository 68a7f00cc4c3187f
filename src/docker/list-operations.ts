/**
 * Generic Docker list operations.
 *
 * Shared parsing for docker commands that print one item per line.
 */

import { ok, type Result } from "../result.js";
import type { CommandRunner } from "./executor.js";

/**
 * Split command output into trimmed, non-empty lines.
 */
export function splitLines(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Parse line-separated output.
 *
 * @param parseItem - Transform each line into the desired type (return null to skip).
 */
export function parseLines<T>(stdout: string, parseItem: (line: string) => T | null): T[] {
  const items: T[] = [];
  for (const line of splitLines(stdout)) {
    const item = parseItem(line);
    if (item !== null) {
      items.push(item);
    }
  }
  return items;
}

/**
 * Generic Docker list operation.
 *
 * Executes a docker command that returns line-separated output and parses results.
 * A failing command is passed through as its Err.
 */
export async function listDockerItems<T>(
  runner: CommandRunner,
  args: string[],
  parseItem: (line: string) => T | null
): Promise<Result<T[]>> {
  const result = await runner.executeAsync(["docker", ...args]);
  if (!result.ok) {
    return result;
  }
  return ok(parseLines(result.value.stdout, parseItem));
}

/**
 * List Docker items as plain strings.
 */
export async function listDockerLines(runner: CommandRunner, args: string[]): Promise<Result<string[]>> {
  return listDockerItems(runner, args, (line) => line);
}
