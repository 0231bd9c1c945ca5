export * from "./types/index.js";
export * from "./core/observability.js";
export * from "./core/effect-concurrency.js";

export * from "./workflow/types.js";
export * from "./workflow/state-machine.js";
export * from "./workflow/dag-validator.js";
export * from "./workflow/plan.js";
export * from "./workflow/plan-codec.js";
export * from "./workflow/executor.js";
export * from "./workflow/planner.js";
export * from "./workflow/step-handler.js";
export * from "./workflow/checkpoint-store.js";

export * from "./state/agent-state.js";
export * from "./backends/index.js";
export * from "./sources/index.js";

export * from "./orchestrator/repo-info.js";
export * from "./orchestrator/strategy.js";
export * from "./orchestrator/reporter.js";
export * from "./orchestrator/orchestrator.js";

export * from "./config/duration.js";
export * from "./config/config.js";
