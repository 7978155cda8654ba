export { ProductOrchestrator } from "./orchestrator.js";
export type { OrchestratorContext, OrchestratorDeps } from "./context.js";
export { map } from "./utils.js";
