import { describe, expect, it } from "vitest";

import { TaskManager } from "../src/docker/task-manager.js";
import { OperationCancelledError, ShutdownError } from "../src/errors.js";
import { KeyedMutex } from "../src/utils/keyed-mutex.js";

function gate(): { wait: Promise<void>; open: () => void } {
  let open: () => void = () => {};
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}

const tick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 10));

describe("KeyedMutex", () => {
  it("runs holders of one key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const first = gate();

    const a = mutex.runExclusive("r1node", async () => {
      await first.wait;
      order.push("a");
    });
    const b = mutex.runExclusive("r1node", async () => {
      order.push("b");
    });
    await tick();
    expect(order).toEqual([]);
    expect(mutex.isLocked("r1node")).toBe(true);

    first.open();
    await Promise.all([a, b]);

    expect(order).toEqual(["a", "b"]);
    expect(mutex.isLocked("r1node")).toBe(false);
  });

  it("does not block other keys", async () => {
    const mutex = new KeyedMutex();
    const held = gate();
    const blocked = mutex.runExclusive("r1node", () => held.wait);

    await expect(mutex.runExclusive("r1node1", async () => "free")).resolves.toBe("free");

    held.open();
    await blocked;
  });

  it("ignores a second release", async () => {
    const mutex = new KeyedMutex();
    const release = await mutex.acquire("k");
    release();
    release();

    const again = await mutex.acquire("k");
    expect(mutex.isLocked("k")).toBe(true);
    again();
    expect(mutex.isLocked("k")).toBe(false);
  });
});

describe("TaskManager", () => {
  it("lists operations while they run", async () => {
    const tasks = new TaskManager();
    const held = gate();

    const running = tasks.track("r1node", "inspect", () => held.wait);

    expect(tasks.list().map((op) => [op.container, op.kind])).toEqual([["r1node", "inspect"]]);
    expect(tasks.isBusy("r1node")).toBe(true);
    expect(tasks.isBusy("r1node1")).toBe(false);

    held.open();
    await running;
    expect(tasks.size).toBe(0);
  });

  it("removes failed operations", async () => {
    const tasks = new TaskManager();

    await expect(tasks.track("r1node", "exec", async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");
    expect(tasks.list()).toEqual([]);
  });

  it("serializes exclusive work per container", async () => {
    const tasks = new TaskManager();
    const order: string[] = [];
    const held = gate();

    const launch = tasks.exclusive("r1node", "launch", async () => {
      await held.wait;
      order.push("launch");
    });
    const stop = tasks.exclusive("r1node", "stop", async () => {
      order.push("stop");
    });
    const other = tasks.exclusive("r1node1", "stop", async () => {
      order.push("other");
    });

    await other;
    expect(order).toEqual(["other"]);

    held.open();
    await Promise.all([launch, stop]);
    expect(order).toEqual(["other", "launch", "stop"]);
  });

  it("waits for in-flight work on shutdown and refuses new work", async () => {
    const tasks = new TaskManager();
    const held = gate();
    let finished = false;
    const running = tasks.track("r1node", "pull", async () => {
      await held.wait;
      finished = true;
    });

    const shutdown = tasks.shutdown();
    await tick();
    expect(finished).toBe(false);

    held.open();
    await shutdown;
    await running;
    expect(finished).toBe(true);
    expect(tasks.isShutdown).toBe(true);
    await expect(tasks.track("r1node", "inspect", async () => 1)).rejects.toBeInstanceOf(ShutdownError);
  });

  it("aborts running work when cancelling", async () => {
    const tasks = new TaskManager();
    const running = tasks
      .track("r1node", "exec", (signal) =>
        new Promise<never>((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(signal.reason));
        })
      )
      .catch((e: unknown) => e);

    await tasks.shutdown({ cancel: true });

    expect(await running).toBeInstanceOf(OperationCancelledError);
  });

  it("does not start queued exclusive work after cancellation", async () => {
    const tasks = new TaskManager();
    const held = gate();
    let started = false;
    const first = tasks.exclusive("r1node", "launch", () => held.wait);
    const queued = tasks
      .exclusive("r1node", "stop", async () => {
        started = true;
      })
      .catch((e: unknown) => e);
    await tick();

    const shutdown = tasks.shutdown({ cancel: true });
    held.open();
    await shutdown;
    await first;

    expect(await queued).toBeInstanceOf(OperationCancelledError);
    expect(started).toBe(false);
  });
});
