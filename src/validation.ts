/**
 * Input validation utilities for edge-node-manager.
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts
 *   It should NOT import from: cli, docker/*
 */

import { MAX_ALIAS_LENGTH } from "./constants.js";
import { ValidationError } from "./errors.js";

/** Letters, digits, hyphen and underscore. */
const ALIAS_PATTERN = /^[a-zA-Z0-9_-]+$/;

/** Docker's own container name rule. */
const CONTAINER_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

/**
 * Check a node alias and describe the first problem found.
 *
 * @returns Error message, or null when the alias is valid.
 */
export function getAliasProblem(alias: string): string | null {
  if (!alias) {
    return "Node name cannot be empty";
  }
  if (alias.length > MAX_ALIAS_LENGTH) {
    return `Node name cannot exceed ${MAX_ALIAS_LENGTH} characters (current: ${alias.length})`;
  }
  if (!ALIAS_PATTERN.test(alias)) {
    return "Node name can only contain letters (a-z, A-Z), numbers (0-9), hyphens (-), and underscores (_)";
  }
  return null;
}

/**
 * Validate a node alias, trimming surrounding whitespace first.
 *
 * @returns The trimmed alias.
 * @throws ValidationError if the alias breaks a rule.
 */
export function validateNodeAlias(alias: string): string {
  const trimmed = alias.trim();
  const problem = getAliasProblem(trimmed);
  if (problem) {
    throw new ValidationError(problem);
  }
  return trimmed;
}

/**
 * @throws ValidationError if the name would be rejected by docker run --name.
 */
export function validateContainerName(name: string): void {
  if (!CONTAINER_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `Invalid container name '${name}'. Use letters, digits, '_', '.', '-', starting with a letter or digit.`
    );
  }
}

/**
 * Allow-list entries are sent as `address alias` lines on stdin, so neither
 * part may break the line format.
 *
 * @throws ValidationError for an empty address or embedded whitespace/'#'.
 */
export function validateAllowedEntry(address: string, alias: string): void {
  if (!address || /[\s#]/.test(address)) {
    throw new ValidationError(`Invalid address '${address}': must be non-empty without spaces or '#'`);
  }
  if (/[\r\n#]/.test(alias)) {
    throw new ValidationError(`Invalid alias for ${address}: line breaks and '#' are not allowed`);
  }
}
