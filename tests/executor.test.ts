import { assert, beforeEach, describe, expect, it } from "vitest";

import { CommandRunner } from "../src/docker/executor.js";
import { CommandError, DockerTimeoutError, OperationCancelledError, SpawnError } from "../src/errors.js";
import { DockerMockRecorder, failure, success } from "./mocks/docker-mock.js";

describe("CommandRunner", () => {
  let docker: DockerMockRecorder;
  let runner: CommandRunner;

  beforeEach(() => {
    docker = new DockerMockRecorder();
    runner = new CommandRunner({ exec: docker.exec });
  });

  describe("remote prefix", () => {
    it("prepends the prefix to every command and drops it when cleared", async () => {
      runner.setRemotePrefix(["ssh", "host"]);
      await runner.execute(["docker", "ps"]);
      await runner.executeAsync(["docker", "stop", "r1node"]);

      runner.clearRemotePrefix();
      await runner.execute(["docker", "ps"]);

      expect(docker.calls.map((c) => c.argv)).toEqual([
        ["ssh", "host", "docker", "ps"],
        ["ssh", "host", "docker", "stop", "r1node"],
        ["docker", "ps"],
      ]);
    });

    it("splits a string prefix on whitespace", () => {
      runner.setRemotePrefix("  ssh   -p 2222 user@host ");
      expect(runner.remotePrefix).toEqual(["ssh", "-p", "2222", "user@host"]);
      expect(runner.isRemote).toBe(true);

      runner.setRemotePrefix("");
      expect(runner.isRemote).toBe(false);
    });

    it("uses the longer default timeout when remote", async () => {
      await runner.executeAsync(["docker", "info"]);
      runner.setRemotePrefix(["ssh", "host"]);
      await runner.executeAsync(["docker", "info"]);

      expect(docker.calls.map((c) => c.options.timeout)).toEqual([10_000, 20_000]);
    });
  });

  describe("execute", () => {
    it("returns output and exit code without throwing on failure", async () => {
      docker.on(["stop"], failure("Error response from daemon: No such container: r1node", 1));

      const result = await runner.execute(["docker", "stop", "r1node"]);

      expect(result).toEqual({
        stdout: "",
        stderr: "Error response from daemon: No such container: r1node",
        exitCode: 1,
      });
    });

    it("reports a spawn failure with empty stdout and exit code 127", async () => {
      docker.on(["docker"], { exitCode: undefined, spawnFailed: true, failureMessage: "spawn docker ENOENT" });

      const result = await runner.execute(["docker", "ps"]);

      expect(result).toEqual({ stdout: "", stderr: "spawn docker ENOENT", exitCode: 127 });
    });

    it("reports a timeout with exit code 124", async () => {
      docker.on(["docker"], { exitCode: undefined, timedOut: true });

      const result = await runner.execute(["docker", "ps"], { timeout: 50 });

      expect(result.exitCode).toBe(124);
      expect(result.stderr).toBe("Command timed out after 50ms: docker ps");
    });
  });

  describe("executeAsync", () => {
    it("resolves Ok with the output on success", async () => {
      docker.on(["ps"], success("r1node\n"));

      const result = await runner.executeAsync(["docker", "ps"]);

      assert(result.ok);
      expect(result.value).toEqual({ stdout: "r1node\n", stderr: "", exitCode: 0 });
    });

    it("classifies a nonzero exit as CommandError carrying stderr", async () => {
      docker.on(["exec"], failure("container r1node is not running\n", 1));

      const result = await runner.executeAsync(["docker", "exec", "r1node", "get_node_info"]);

      assert(!result.ok);
      expect(result.error).toBeInstanceOf(CommandError);
      expect(result.error.message).toBe("container r1node is not running");
    });

    it("classifies a local timeout with a 'timed out' message", async () => {
      docker.on(["exec"], { exitCode: undefined, timedOut: true });

      const result = await runner.executeAsync(["docker", "exec", "r1node", "get_node_info"]);

      assert(!result.ok);
      expect(result.error).toBeInstanceOf(DockerTimeoutError);
      expect(result.error.message).toBe("Command timed out after 10000ms: docker exec r1node get_node_info");
    });

    it("classifies a remote timeout with a 'timed out' message", async () => {
      runner.setRemotePrefix(["ssh", "host"]);
      docker.on(["exec"], { exitCode: undefined, timedOut: true });

      const result = await runner.executeAsync(["docker", "exec", "r1node", "get_node_info"]);

      assert(!result.ok);
      expect(result.error).toBeInstanceOf(DockerTimeoutError);
      expect(result.error.message).toContain("timed out");
      expect(result.error.message).toBe("Command timed out after 20000ms: ssh host docker exec r1node get_node_info");
    });

    it("classifies spawn failures and cancellation", async () => {
      docker.on(["ps"], { exitCode: undefined, spawnFailed: true, failureMessage: "spawn docker ENOENT" });
      docker.on(["pull"], { exitCode: undefined, canceled: true });

      const spawn = await runner.executeAsync(["docker", "ps"]);
      const cancelled = await runner.executeAsync(["docker", "pull", "ratio1/edge_node:mainnet"]);

      assert(!spawn.ok);
      expect(spawn.error).toBeInstanceOf(SpawnError);
      expect(spawn.error.message).toBe("spawn docker ENOENT");
      assert(!cancelled.ok);
      expect(cancelled.error).toBeInstanceOf(OperationCancelledError);
    });

    it("streams stdout lines and forwards stdin", async () => {
      docker.on(["pull"], success("layer 1: Pulling\nlayer 1: Done\n"));
      const lines: string[] = [];

      await runner.executeAsync(["docker", "pull", "img"], { onOutputLine: (line) => lines.push(line) });
      await runner.executeAsync(["docker", "exec", "-i", "r1node", "update_allowed_batch"], { input: "0xA a\n" });

      expect(lines).toEqual(["layer 1: Pulling", "layer 1: Done"]);
      expect(docker.calls[1]?.options.input).toBe("0xA a\n");
    });
  });

  describe("with real processes", () => {
    const node = process.execPath;

    it("times out a slow process", async () => {
      const real = new CommandRunner({ localTimeout: 200 });

      const result = await real.executeAsync([node, "-e", "setTimeout(() => {}, 5000)"]);

      assert(!result.ok);
      expect(result.error).toBeInstanceOf(DockerTimeoutError);
      expect(result.error.message).toContain("timed out after 200ms");
    });

    it("streams lines as the process prints them", async () => {
      const real = new CommandRunner();
      const lines: string[] = [];

      const result = await real.executeAsync([node, "-e", "console.log('first'); console.log('second')"], {
        onOutputLine: (line) => lines.push(line),
      });

      assert(result.ok);
      expect(lines).toEqual(["first", "second"]);
    });

    it("reports a missing binary as a spawn failure", async () => {
      const real = new CommandRunner();

      const blocking = await real.execute(["edge-node-test-missing-binary"]);
      const async = await real.executeAsync(["edge-node-test-missing-binary"]);

      expect(blocking.exitCode).toBe(127);
      expect(blocking.stdout).toBe("");
      expect(blocking.stderr).not.toBe("");
      assert(!async.ok);
      expect(async.error).toBeInstanceOf(SpawnError);
    });
  });
});
