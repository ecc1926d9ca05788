/**
 * State machine for a single prune run.
 *
 * States:
 * - validate: Options and target path are being checked, no scan yet
 * - group-select: Directories scanned, buckets built, keep/delete split
 * - confirm: Waiting on the operator's yes/no answer
 * - execute: Removing the files in the delete set
 * - dry-run: Reporting only, the filesystem is never touched
 * - done: Run finished (deleted, cancelled, or nothing to delete)
 * - error: Run aborted by a fatal error
 */

export type PruneState =
  | "validate"
  | "group-select"
  | "confirm"
  | "execute"
  | "dry-run"
  | "done"
  | "error";

/** Valid state transitions. Each key maps to the set of states it can transition to. */
const VALID_TRANSITIONS: Record<PruneState, ReadonlySet<PruneState>> = {
  validate: new Set(["group-select", "error"]),
  // Force mode skips confirm and goes straight to execute.
  "group-select": new Set(["confirm", "execute", "dry-run", "error"]),
  confirm: new Set(["execute", "done", "error"]),
  execute: new Set(["done", "error"]),
  "dry-run": new Set(["done", "error"]),
  done: new Set(),
  error: new Set(),
};

export interface StateTransitionEvent {
  from: PruneState;
  to: PruneState;
  timestamp: Date;
  reason?: string;
}

export type StateChangeListener = (event: StateTransitionEvent) => void;

export class PruneStateMachine {
  private state: PruneState = "validate";
  private listeners: StateChangeListener[] = [];

  /** Get the current state. */
  getState(): PruneState {
    return this.state;
  }

  /** Check whether a transition to the target state is valid. */
  canTransition(to: PruneState): boolean {
    return VALID_TRANSITIONS[this.state].has(to);
  }

  /** True once the run can no longer move. */
  isTerminal(): boolean {
    return VALID_TRANSITIONS[this.state].size === 0;
  }

  /**
   * Transition to a new state.
   * Throws if the transition is not valid.
   */
  transition(to: PruneState, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new Error(`Invalid state transition: ${this.state} -> ${to}`);
    }

    const event: StateTransitionEvent = {
      from: this.state,
      to,
      timestamp: new Date(),
      reason,
    };

    this.state = to;

    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /** Register a listener for state changes. Returns an unsubscribe function. */
  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}
