import type { BuildState } from "./build-states";

/**
 * A state change the build lifecycle does not allow
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: BuildState,
    public readonly to: BuildState,
  ) {
    super(`Invalid build state transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class BuildCancelledError extends Error {
  constructor(public readonly context?: Record<string, unknown>) {
    super("Build cancelled");
    this.name = "BuildCancelledError";
  }
}
