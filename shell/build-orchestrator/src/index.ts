export { BuildOrchestrator } from "./orchestrator";
export type {
  BuildOrchestratorDependencies,
  BuildOptions,
  BuildReport,
} from "./orchestrator";

export { BuildStateMachine, isTerminalState } from "./build-states";
export type { BuildState, TerminalBuildState } from "./build-states";

export { buildConfigSchema } from "./config";
export type { BuildConfig, BuildConfigInput } from "./config";

export { InvalidTransitionError, BuildCancelledError } from "./errors";
export { createRuntimeSlides, serializeRuntimeSlides } from "./runtime-slides";
export type { RuntimeSlide } from "./runtime-slides";
export { copyTemplates, TEMPLATE_FILES } from "./templates";
