import { InvalidTransitionError } from "./errors";

export type BuildState =
  | "validating"
  | "rejected"
  | "allocating-version"
  | "carrying-forward"
  | "materializing"
  | "finalizing"
  | "done"
  | "failed";

export type TerminalBuildState = Extract<BuildState, "done" | "rejected" | "failed">;

const ALLOWED_TRANSITIONS: Record<BuildState, readonly BuildState[]> = {
  validating: ["rejected", "allocating-version", "failed"],
  "allocating-version": ["carrying-forward", "failed"],
  "carrying-forward": ["materializing", "failed"],
  // per-asset failures never fail the build
  materializing: ["finalizing", "failed"],
  finalizing: ["done", "failed"],
  done: [],
  rejected: [],
  failed: [],
};

export function isTerminalState(state: BuildState): state is TerminalBuildState {
  return ALLOWED_TRANSITIONS[state].length === 0;
}

/**
 * Lifecycle of one build run
 *
 * ```
 * validating -> rejected
 * validating -> allocating-version -> carrying-forward -> materializing -> finalizing -> done
 * any non-terminal state -> failed
 * ```
 */
export class BuildStateMachine {
  private current: BuildState = "validating";
  private readonly history: BuildState[] = ["validating"];

  constructor(
    private readonly onTransition?: (from: BuildState, to: BuildState) => void,
  ) {}

  public get state(): BuildState {
    return this.current;
  }

  public canTransition(to: BuildState): boolean {
    return ALLOWED_TRANSITIONS[this.current].includes(to);
  }

  /**
   * @throws InvalidTransitionError when `to` is not reachable from the current state
   */
  public transition(to: BuildState): void {
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    const from = this.current;
    this.current = to;
    this.history.push(to);
    this.onTransition?.(from, to);
  }

  public getHistory(): BuildState[] {
    return [...this.history];
  }
}
