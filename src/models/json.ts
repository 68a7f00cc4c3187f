/**
 * Shared helpers for decoding node RPC output.
 */

import type { z } from "zod";

import { ParseError } from "../errors.js";

/**
 * Parse `raw` as JSON and validate it against `schema`.
 *
 * @throws ParseError when the text is not JSON or has the wrong shape.
 */
export function parseJsonOutput<S extends z.ZodTypeAny>(raw: string, schema: S, label: string): z.output<S> {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new ParseError(`${label}: output is not valid JSON (${e instanceof Error ? e.message : String(e)})`, raw);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ParseError(`${label}: unexpected shape${where}: ${issue?.message ?? "invalid"}`, raw);
  }
  return parsed.data;
}
