/**
 * In-flight operation registry.
 *
 * Every docker-backed operation is registered here for as long as it runs
 * and removed exactly once when it settles. Mutating operations also take
 * the container's lock, so overlapping launch/stop/rename calls on one
 * container run one after another.
 */

import { OperationCancelledError, ShutdownError } from "../errors.js";
import { log } from "../logger.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";

export type OperationKind =
  | "launch"
  | "stop"
  | "remove"
  | "inspect"
  | "exec"
  | "pull"
  | "list"
  | "update-check";

export interface InFlightOperation {
  readonly id: number;
  readonly container: string;
  readonly kind: OperationKind;
  readonly startedAt: Date;
}

export type Work<T> = (signal: AbortSignal) => Promise<T>;

interface Entry {
  operation: InFlightOperation;
  controller: AbortController;
  done: Promise<void>;
}

export class TaskManager {
  private readonly entries = new Map<number, Entry>();
  private readonly locks = new KeyedMutex();
  private nextId = 1;
  private closed = false;

  /** Run `work` as a tracked operation. */
  async track<T>(container: string, kind: OperationKind, work: Work<T>): Promise<T> {
    if (this.closed) {
      throw new ShutdownError(`Cannot start ${kind} on '${container}': task manager is shut down`);
    }

    const operation: InFlightOperation = { id: this.nextId++, container, kind, startedAt: new Date() };
    const controller = new AbortController();
    let settle: () => void = () => {};
    const done = new Promise<void>((resolve) => {
      settle = resolve;
    });
    this.entries.set(operation.id, { operation, controller, done });
    log.debug(`[task ${operation.id}] ${kind} ${container} started`);

    try {
      return await work(controller.signal);
    } finally {
      this.entries.delete(operation.id);
      settle();
      log.debug(`[task ${operation.id}] ${kind} ${container} finished`);
    }
  }

  /**
   * Run `work` as a tracked operation holding the container's lock.
   * Waiters queue in arrival order.
   */
  async exclusive<T>(container: string, kind: OperationKind, work: Work<T>): Promise<T> {
    return this.track(container, kind, async (signal) => {
      const release = await this.locks.acquire(container);
      try {
        if (signal.aborted) {
          throw new OperationCancelledError(`${kind} on '${container}' was cancelled before it started`);
        }
        return await work(signal);
      } finally {
        release();
      }
    });
  }

  list(): InFlightOperation[] {
    return [...this.entries.values()].map((entry) => entry.operation);
  }

  get size(): number {
    return this.entries.size;
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  /** True while any operation on `container` is running or queued. */
  isBusy(container: string): boolean {
    return this.list().some((op) => op.container === container);
  }

  /**
   * Refuse new work, optionally abort what is running, then wait until
   * every tracked operation has settled.
   */
  async shutdown(options: { cancel?: boolean } = {}): Promise<void> {
    this.closed = true;
    const pending = [...this.entries.values()];
    if (options.cancel) {
      for (const entry of pending) {
        entry.controller.abort(new OperationCancelledError(`${entry.operation.kind} on '${entry.operation.container}' cancelled by shutdown`));
      }
    }
    log.debug(`Waiting for ${pending.length} in-flight operation(s)`);
    await Promise.all(pending.map((entry) => entry.done));
  }
}
