/**
 * Container records read from `docker ps` and `docker inspect`.
 */

import { z } from "zod";

import { parseJsonOutput } from "./json.js";

export interface ContainerListEntry {
  name: string;
  status: string;
  id: string;
  running: boolean;
}

/** Format string whose output parseContainerListLine understands. */
export const CONTAINER_LIST_FORMAT = "{{.Names}}\t{{.Status}}\t{{.ID}}";

/**
 * Parse one `Names\tStatus\tID` line. Lines without a name yield null.
 */
export function parseContainerListLine(line: string): ContainerListEntry | null {
  const [name = "", status = "", id = ""] = line.split("\t").map((part) => part.trim());
  if (!name) {
    return null;
  }
  return { name, status, id, running: status.includes("Up") };
}

const ContainerStateSchema = z
  .object({
    Status: z.string().optional(),
    Running: z.boolean().optional(),
  })
  .passthrough();

export const ContainerInspectSchema = z
  .object({
    Id: z.string(),
    Name: z.string().optional(),
    State: ContainerStateSchema.optional(),
  })
  .passthrough();

export type ContainerInspect = z.infer<typeof ContainerInspectSchema>;

/**
 * Take the first element of `docker inspect` output.
 *
 * @throws ParseError for malformed JSON or an empty array.
 */
export function parseInspectOutput(raw: string): ContainerInspect {
  const [first] = parseJsonOutput(raw, z.array(ContainerInspectSchema).nonempty(), "docker inspect");
  return first;
}
