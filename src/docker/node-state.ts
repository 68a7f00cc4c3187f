/**
 * Per-container lifecycle state.
 *
 * The handler records what it last observed or did for each container and
 * checks transitions against this table before issuing docker commands.
 */

import { InvalidStateError, NotFoundError } from "../errors.js";

export type NodeState = "unknown" | "not_created" | "exists_stopped" | "exists_running";

export type NodeAction = "launch" | "stop" | "remove";

const ALLOWED: Record<NodeAction, readonly NodeState[]> = {
  // launch always recreates, so a running container is removed first
  launch: ["unknown", "not_created", "exists_stopped", "exists_running"],
  stop: ["unknown", "exists_running", "exists_stopped"],
  // docker and the registry decide whether there is anything to remove
  remove: ["unknown", "not_created", "exists_running", "exists_stopped"],
};

const RESULT: Record<NodeAction, NodeState> = {
  launch: "exists_running",
  stop: "exists_stopped",
  remove: "not_created",
};

export class NodeStateMachine {
  private readonly states = new Map<string, NodeState>();

  get(name: string): NodeState {
    return this.states.get(name) ?? "unknown";
  }

  set(name: string, state: NodeState): void {
    this.states.set(name, state);
  }

  /**
   * @throws NotFoundError when acting on a container known not to exist.
   * @throws InvalidStateError for any other disallowed transition.
   */
  assertCan(name: string, action: NodeAction): void {
    const state = this.get(name);
    if (ALLOWED[action].includes(state)) {
      return;
    }
    if (state === "not_created") {
      throw new NotFoundError(`Cannot ${action} '${name}': container does not exist`);
    }
    throw new InvalidStateError(`Cannot ${action} '${name}' while ${state}`);
  }

  /** Record the state an action leads to. */
  complete(name: string, action: NodeAction): NodeState {
    const next = RESULT[action];
    this.states.set(name, next);
    return next;
  }

  /** Fold an observed running flag into the table. */
  observe(name: string, running: boolean): void {
    this.states.set(name, running ? "exists_running" : "exists_stopped");
  }
}
