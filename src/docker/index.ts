/**
 * Docker operations for edge-node-manager.
 *
 * Facade module that re-exports from specialized sub-modules:
 * - executor.ts: Command execution (CommandRunner)
 * - handler.ts: Node lifecycle and RPC orchestration (DockerCommandHandler)
 * - task-manager.ts: In-flight operation tracking
 * - node-state.ts: Per-container lifecycle states
 * - inspect.ts: Read-only queries
 * - cleanup.ts: Container removal
 */

export {
  CommandRunner,
  type CommandOutput,
  type CommandRunnerOptions,
  type ExecuteAsyncOptions,
  type ExecuteOptions,
} from "./executor.js";

export {
  DockerCommandHandler,
  parseNameConflict,
  type DockerCommandHandlerOptions,
  type ImageUpdateResult,
  type LaunchOptions,
  type LaunchResult,
  type RpcAck,
} from "./handler.js";

export { TaskManager, type InFlightOperation, type OperationKind } from "./task-manager.js";
export { NodeStateMachine, type NodeAction, type NodeState } from "./node-state.js";
export { DockerRunCommandBuilder } from "./command-builder.js";

export {
  containerExists,
  getImageId,
  imageExists,
  inspectContainer,
  isContainerRunning,
  listContainers,
  volumeExists,
} from "./inspect.js";

export { removeContainer } from "./cleanup.js";
