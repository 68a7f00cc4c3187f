/**
 * Docker command execution with consistent error handling.
 *
 * Core execution layer: every docker invocation, local or routed through a
 * remote prefix such as `ssh user@host`, flows through CommandRunner.
 */

import { LOCAL_COMMAND_TIMEOUT, REMOTE_COMMAND_TIMEOUT, SPAWN_FAILURE_EXIT_CODE, TIMEOUT_EXIT_CODE } from "../constants.js";
import { exec, type ExecResult, type ProcessExecutor } from "../exec.js";
import { CommandError, DockerTimeoutError, OperationCancelledError, SpawnError } from "../errors.js";
import { log } from "../logger.js";
import { err, ok, type Result } from "../result.js";

/** Outcome of a blocking command. */
export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ExecuteOptions {
  /** Milliseconds; omitted means no limit. */
  timeout?: number;
  input?: string;
}

export interface ExecuteAsyncOptions {
  /** Receives each stdout line while the command runs. */
  onOutputLine?: (line: string) => void;
  input?: string;
  /** Milliseconds; defaults to the local or remote limit. */
  timeout?: number;
  signal?: AbortSignal;
}

export interface CommandRunnerOptions {
  /** Process layer; tests pass a recording fake. */
  exec?: ProcessExecutor;
  localTimeout?: number;
  remoteTimeout?: number;
  env?: NodeJS.ProcessEnv;
  remotePrefix?: string[] | string | null;
}

function describeCommand(argv: readonly string[]): string {
  return argv.join(" ");
}

/**
 * Executes docker command lines, optionally behind a remote prefix.
 */
export class CommandRunner {
  private readonly run: ProcessExecutor;
  private readonly localTimeout: number;
  private readonly remoteTimeout: number;
  private readonly env: NodeJS.ProcessEnv | undefined;
  private prefix: string[] = [];

  constructor(options: CommandRunnerOptions = {}) {
    this.run = options.exec ?? exec;
    this.localTimeout = options.localTimeout ?? LOCAL_COMMAND_TIMEOUT;
    this.remoteTimeout = options.remoteTimeout ?? REMOTE_COMMAND_TIMEOUT;
    this.env = options.env;
    this.setRemotePrefix(options.remotePrefix ?? null);
  }

  /**
   * Route all following commands through `prefix`.
   * A string is split on whitespace; null or empty clears it.
   */
  setRemotePrefix(prefix: string[] | string | null): void {
    if (prefix === null) {
      this.prefix = [];
      return;
    }
    const parts = typeof prefix === "string" ? prefix.trim().split(/\s+/) : prefix;
    this.prefix = parts.filter((part) => part.length > 0);
  }

  clearRemotePrefix(): void {
    this.prefix = [];
  }

  get isRemote(): boolean {
    return this.prefix.length > 0;
  }

  get remotePrefix(): readonly string[] {
    return this.prefix;
  }

  /** Default limit for executeAsync. */
  get defaultTimeout(): number {
    return this.isRemote ? this.remoteTimeout : this.localTimeout;
  }

  /** The argv that will actually be spawned for `command`. */
  resolve(command: readonly string[]): string[] {
    return [...this.prefix, ...command];
  }

  private async spawn(
    command: readonly string[],
    timeout: number | undefined,
    extra: { input?: string; signal?: AbortSignal; onLine?: (line: string) => void }
  ): Promise<{ argv: string[]; result: ExecResult }> {
    const argv = this.resolve(command);
    const [cmd, ...args] = argv;
    if (cmd === undefined) {
      return {
        argv,
        result: {
          exitCode: undefined,
          stdout: "",
          stderr: "",
          timedOut: false,
          canceled: false,
          spawnFailed: true,
          failureMessage: "Empty command",
        },
      };
    }

    log.command(argv);
    const result = await this.run(cmd, args, {
      timeout,
      env: this.env,
      input: extra.input,
      signal: extra.signal,
      onLine: extra.onLine,
    });
    return { argv, result };
  }

  /**
   * Run a command and wait for it.
   *
   * Never rejects. A process that could not be started reports exit code
   * 127 with the diagnostic in stderr; a timeout reports 124.
   */
  async execute(command: readonly string[], options: ExecuteOptions = {}): Promise<CommandOutput> {
    const { argv, result } = await this.spawn(command, options.timeout, { input: options.input });

    if (result.spawnFailed) {
      return {
        stdout: "",
        stderr: result.failureMessage ?? `Failed to start: ${describeCommand(argv)}`,
        exitCode: SPAWN_FAILURE_EXIT_CODE,
      };
    }
    if (result.timedOut) {
      return {
        stdout: result.stdout,
        stderr: `Command timed out after ${options.timeout ?? 0}ms: ${describeCommand(argv)}`,
        exitCode: TIMEOUT_EXIT_CODE,
      };
    }

    return {
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode ?? SPAWN_FAILURE_EXIT_CODE,
    };
  }

  /**
   * Run a command with a bounded wait and classify the outcome.
   *
   * Resolves exactly once and never rejects; nonzero exits come back as
   * CommandError carrying stderr.
   */
  async executeAsync(command: readonly string[], options: ExecuteAsyncOptions = {}): Promise<Result<CommandOutput>> {
    const timeout = options.timeout ?? this.defaultTimeout;
    let spawned: { argv: string[]; result: ExecResult };
    try {
      spawned = await this.spawn(command, timeout, {
        input: options.input,
        signal: options.signal,
        onLine: options.onOutputLine,
      });
    } catch (error) {
      // Only a throwing line callback or a broken executor gets here.
      const message = error instanceof Error ? error.message : String(error);
      return err(new CommandError(message, SPAWN_FAILURE_EXIT_CODE));
    }

    const { argv, result } = spawned;
    const shown = describeCommand(argv);

    if (result.canceled) {
      return err(new OperationCancelledError(`Command cancelled: ${shown}`));
    }
    if (result.timedOut) {
      return err(new DockerTimeoutError(`Command timed out after ${timeout}ms: ${shown}`, timeout));
    }
    if (result.spawnFailed) {
      return err(new SpawnError(result.failureMessage ?? `Failed to start: ${shown}`, shown));
    }

    const exitCode = result.exitCode ?? SPAWN_FAILURE_EXIT_CODE;
    if (exitCode !== 0) {
      const stderr = result.stderr.trim();
      return err(new CommandError(stderr || `Command failed with exit code ${exitCode}: ${shown}`, exitCode, result.stderr));
    }

    return ok({ stdout: result.stdout, stderr: result.stderr, exitCode });
  }

  /**
   * Check if the Docker daemon (local or remote) is responsive.
   */
  async checkDockerStatus(): Promise<boolean> {
    const result = await this.executeAsync(["docker", "info"]);
    return result.ok;
  }
}
