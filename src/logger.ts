/**
 * Unified logging abstraction for edge-node-manager.
 *
 * Centralizes all console output with consistent styling and log levels.
 * Uses picocolors for terminal styling.
 *
 * IMPORTANT: All output MUST go through this module.
 * Never use console.log/console.error directly in other modules.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LoggerConfig {
  level: LogLevel;
  /** If true, prefix messages with [edge-node] */
  prefix: boolean;
}

const config: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: false,
};

function canOutput(level: LogLevel): boolean {
  return config.level <= level;
}

function formatMessage(message: string): string {
  return config.prefix ? `[edge-node] ${message}` : message;
}

/**
 * Apply CLI/config flags in one call.
 *
 * `quiet` wins over `debug`: quiet mode silences everything, errors included.
 */
export function configureLogging(opts: { debug?: boolean; quiet?: boolean; prefix?: boolean }): void {
  if (opts.quiet) {
    config.level = LogLevel.SILENT;
  } else if (opts.debug) {
    config.level = LogLevel.DEBUG;
  }
  if (opts.prefix !== undefined) {
    config.prefix = opts.prefix;
  }
}

export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

export function getLogLevel(): LogLevel {
  return config.level;
}

export function isQuiet(): boolean {
  return config.level === LogLevel.SILENT;
}

/**
 * Logger object with level-aware methods.
 *
 * Usage:
 *   log.debug("verbose info")
 *   log.info("normal output")
 *   log.warn("warning message")
 *   log.error("error message")
 *   log.success("completed!")
 *   log.command(["docker", "ps"])
 */
export const log = {
  /** Debug-level message, dim gray. */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      console.log(pc.dim(formatMessage(message)));
    }
  },

  info(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(formatMessage(message));
    }
  },

  /** Yellow, to stderr. */
  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      console.warn(pc.yellow(formatMessage(message)));
    }
  },

  /** Red, to stderr. */
  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      console.error(pc.red(formatMessage(message)));
    }
  },

  success(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.green(formatMessage(message)));
    }
  },

  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.dim(formatMessage(message)));
    }
  },

  /** Progress lines from long-running commands (image pulls). */
  progress(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.cyan(formatMessage(message)));
    }
  },

  /** Command about to be executed (debug level). */
  command(argv: readonly string[]): void {
    if (canOutput(LogLevel.DEBUG)) {
      console.log(pc.dim(formatMessage(`$ ${argv.join(" ")}`)));
    }
  },

  /** Unstyled output for tables and JSON dumps. Respects log level (info). */
  raw(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(message);
    }
  },
};

/**
 * Styled string builders (for complex compositions).
 * These return styled strings without printing.
 *
 * Usage:
 *   log.raw(`${style.green("running")} - ${style.dim("r1node")}`)
 */
export const style = {
  dim: (text: string) => pc.dim(text),
  bold: (text: string) => pc.bold(text),
  green: (text: string) => pc.green(text),
  yellow: (text: string) => pc.yellow(text),
};
