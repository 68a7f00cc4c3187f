/**
 * Thin wrapper over execa for edge-node-manager.
 *
 * One call spawns one process and always resolves: exit codes, timeouts,
 * cancellation and spawn failures are reported as fields, never thrown.
 */

import { createInterface } from "node:readline";

import { ExecaError, execa } from "execa";

export interface ExecResult {
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  canceled: boolean;
  /** The binary could not be started at all (missing from PATH, not executable). */
  spawnFailed: boolean;
  /** Diagnostic from the process layer when the child never produced an exit code. */
  failureMessage?: string;
}

export interface ExecOptions {
  /** Milliseconds before the child is killed. 0 or undefined disables the limit. */
  timeout?: number;
  env?: NodeJS.ProcessEnv;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  signal?: AbortSignal;
  /** Called for every stdout line as it arrives. */
  onLine?: (line: string) => void;
}

/** Signature shared by the real executor and the test doubles. */
export type ProcessExecutor = (cmd: string, args: string[], opts?: ExecOptions) => Promise<ExecResult>;

/**
 * Execute a command and capture output. Never rejects.
 */
export async function exec(cmd: string, args: string[], opts: ExecOptions = {}): Promise<ExecResult> {
  const subprocess = execa(cmd, args, {
    timeout: opts.timeout && opts.timeout > 0 ? opts.timeout : 0,
    env: opts.env,
    input: opts.input,
    cancelSignal: opts.signal,
    reject: false,
    windowsHide: true,
    maxBuffer: 10 * 1024 * 1024,
  });

  if (opts.onLine) {
    const onLine = opts.onLine;
    const lines = createInterface({ input: subprocess.stdout, crlfDelay: Infinity });
    lines.on("line", (line) => onLine(line));
  }

  const result = await subprocess;
  const exitCode = result.exitCode;
  const spawnFailed = result.failed
    && exitCode === undefined
    && !result.timedOut
    && !result.isCanceled
    && !result.isTerminated;

  return {
    exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    timedOut: result.timedOut,
    canceled: result.isCanceled,
    spawnFailed,
    ...(result instanceof ExecaError ? { failureMessage: result.shortMessage } : {}),
  };
}
