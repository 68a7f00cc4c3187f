/**
 * Docker run command builder for edge nodes.
 *
 * Fluent builder for the detached, restartable node container.
 *
 * Usage:
 *   const cmd = new DockerRunCommandBuilder("ratio1/edge_node:mainnet")
 *     .withDetached()
 *     .withName("r1node")
 *     .withRestartPolicy("unless-stopped")
 *     .withVolume("r1vol", "/edge_node/_local_cache")
 *     .buildFull();
 */

/**
 * Builder for Docker run commands.
 *
 * Flags come out in a fixed order (platform, detach, name, restart, volume)
 * whatever order the `with*` calls were made in.
 */
export class DockerRunCommandBuilder {
  private platform: string | null = null;
  private detached = false;
  private name: string | null = null;
  private restartPolicy: string | null = null;
  private readonly mounts: string[] = [];
  private readonly imageName: string;

  constructor(imageName: string) {
    this.imageName = imageName;
  }

  /** Force an emulated platform, e.g. linux/amd64 on ARM hosts. */
  withPlatform(platform: string): this {
    this.platform = platform;
    return this;
  }

  withDetached(): this {
    this.detached = true;
    return this;
  }

  withName(name: string): this {
    this.name = name;
    return this;
  }

  withRestartPolicy(policy: string): this {
    this.restartPolicy = policy;
    return this;
  }

  /** Mount a named volume. Empty volume names are ignored. */
  withVolume(volume: string, mountPath: string): this {
    if (volume) {
      this.mounts.push(`${volume}:${mountPath}`);
    }
    return this;
  }

  /** Build the final command array (without "docker" prefix). */
  build(): string[] {
    const cmd = ["run"];

    if (this.platform) {
      cmd.push("--platform", this.platform);
    }
    if (this.detached) {
      cmd.push("-d");
    }
    if (this.name) {
      cmd.push("--name", this.name);
    }
    if (this.restartPolicy) {
      cmd.push("--restart", this.restartPolicy);
    }
    for (const mount of this.mounts) {
      cmd.push("-v", mount);
    }

    cmd.push(this.imageName);
    return cmd;
  }

  /** Build the final command array with "docker" prefix. */
  buildFull(): string[] {
    return ["docker", ...this.build()];
  }
}
