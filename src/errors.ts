/**
 * Unified exception hierarchy for edge-node-manager.
 *
 * All custom exceptions inherit from EdgeNodeError. Handler operations do not
 * throw them across the async boundary: they come back inside an Err result,
 * and the CLI turns them into log lines and exit codes.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other modules.
 *   It should NOT import from any other project module.
 */

/**
 * Base exception for all edge-node-manager errors.
 */
export class EdgeNodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EdgeNodeError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - Invalid values in edge-node.yaml
 *   - Unparseable environment overrides
 */
export class ConfigError extends EdgeNodeError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Docker operation errors.
 *
 * Base class for everything that goes wrong while talking to the docker CLI.
 */
export class DockerError extends EdgeNodeError {
  constructor(message: string) {
    super(message);
    this.name = "DockerError";
  }
}

/** Raised when the docker binary (or the remote prefix binary) cannot be started. */
export class SpawnError extends DockerError {
  readonly command: string;

  constructor(message: string, command: string) {
    super(message);
    this.name = "SpawnError";
    this.command = command;
  }
}

/** Docker ran but exited nonzero. The message is the raw stderr. */
export class CommandError extends DockerError {
  readonly exitCode: number;
  readonly stderr: string;

  constructor(message: string, exitCode: number, stderr = message) {
    super(message);
    this.name = "CommandError";
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * Raised when a Docker operation exceeds its time limit.
 *
 * The message always contains "timed out" so callers can match on it.
 */
export class DockerTimeoutError extends DockerError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = "DockerTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Raised when a container name is already bound to another container. */
export class ConflictError extends DockerError {
  readonly containerId: string | null;

  constructor(message: string, containerId: string | null) {
    super(message);
    this.name = "ConflictError";
    this.containerId = containerId;
  }
}

/** Raised when an operation references a container absent from Docker or the registry. */
export class NotFoundError extends DockerError {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

/**
 * Output did not have the expected JSON or plain-text shape.
 *
 * Usually means the node image speaks a different protocol version, so
 * retrying rarely helps.
 */
export class ParseError extends EdgeNodeError {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = "ParseError";
    this.raw = raw;
  }
}

/** Raised when adding a registry entry whose name exists and overwrite is disallowed. */
export class DuplicateNameError extends EdgeNodeError {
  constructor(message: string) {
    super(message);
    this.name = "DuplicateNameError";
  }
}

/**
 * Input validation errors.
 *
 * Examples:
 *   - Node alias with forbidden characters
 *   - Allow-list address containing whitespace
 *   - Changing the volume of an existing node
 */
export class ValidationError extends EdgeNodeError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Raised when a lifecycle operation is not allowed from the container's current state. */
export class InvalidStateError extends EdgeNodeError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

/** Raised when in-flight work is aborted during shutdown. */
export class OperationCancelledError extends EdgeNodeError {
  constructor(message = "Operation was cancelled") {
    super(message);
    this.name = "OperationCancelledError";
  }
}

/** Raised when work is submitted after the task manager has shut down. */
export class ShutdownError extends EdgeNodeError {
  constructor(message = "Task manager is shut down") {
    super(message);
    this.name = "ShutdownError";
  }
}

/**
 * Extract error details from an unknown error for user-friendly messages.
 *
 * Prefers the raw stderr of a CommandError over its formatted message.
 * Truncates output to maxLength to avoid overwhelming log output.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }
  if (error instanceof CommandError && error.stderr) {
    return error.stderr.trim().slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}

/**
 * Check if an error is a timeout error.
 *
 * Matches the typed error and, for errors that crossed a string boundary,
 * the "timed out" marker in the message.
 */
export function isTimeoutError(error: unknown): boolean {
  if (error instanceof DockerTimeoutError) {
    return true;
  }
  const message = error instanceof Error ? error.message : String(error);
  return message.toLowerCase().includes("timed out");
}

/**
 * Turn a failure into one short sentence for the operator.
 *
 * Known patterns get a fixed hint; anything else is the cleaned-up message.
 */
export function describeError(error: unknown): string {
  const raw = extractErrorDetails(error);
  const lower = raw.toLowerCase();

  if (isTimeoutError(error)) {
    return "Operation timed out. Please check your connection and try again.";
  }
  if (error instanceof SpawnError) {
    return "Docker could not be started. Is it installed and in PATH?";
  }
  if (lower.includes("connection") && (lower.includes("refused") || lower.includes("failed"))) {
    return "Unable to connect to the node. Please ensure the container is running.";
  }
  if (lower.includes("permission") || lower.includes("forbidden")) {
    return "Permission denied. Please check your node permissions.";
  }
  if (error instanceof ConflictError || lower.includes("conflict") || lower.includes("already exists")) {
    return "A container with this name already exists. Please choose a different name.";
  }
  if (error instanceof NotFoundError || lower.includes("no such container")) {
    return "Container not found. It may have been removed or not created yet.";
  }

  let cleaned = raw.trim();
  if (cleaned.startsWith("Error:")) {
    cleaned = cleaned.slice("Error:".length).trim();
  }
  if (cleaned.startsWith("Failed to")) {
    cleaned = cleaned.slice("Failed to".length).trim();
  }
  if (cleaned.length > 0) {
    cleaned = cleaned.charAt(0).toUpperCase() + cleaned.slice(1);
  }
  return cleaned || "Unknown error occurred";
}
