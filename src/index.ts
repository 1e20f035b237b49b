export { AgentCatalog, createDefaultCatalog } from "./agents/AgentCatalog.js"
export type { CatalogEntry } from "./agents/AgentCatalog.js"
export { AgentRegistry } from "./agents/AgentRegistry.js"
export { AgentResolver } from "./agents/AgentResolver.js"
export type { ResolvedAgent } from "./agents/AgentResolver.js"
export { BaseAgent } from "./agents/BaseAgent.js"
export type { AgentDependencies } from "./agents/BaseAgent.js"
export { PersonaAgent } from "./agents/PersonaAgent.js"
export * from "./core/errors.js"
export { EventBus } from "./events/EventBus.js"
export type { TaskweaveEvent, TaskweaveEventType } from "./events/types.js"
export { askOracle, createLLMProvider, LLMOracle } from "./llm/index.js"
export { Orchestrator } from "./orchestrator/Orchestrator.js"
export type { OrchestratorOptions } from "./orchestrator/Orchestrator.js"
export { BlueprintStore } from "./persistence/BlueprintStore.js"
export { WorkflowStore } from "./persistence/WorkflowStore.js"
export { createRenderer } from "./renderer/index.js"
export { TaskRouter } from "./router/TaskRouter.js"
export type { RouteOptions } from "./router/TaskRouter.js"
export { createDefaultToolRegistry, ToolRegistry } from "./tools/ToolRegistry.js"
export { FeedbackProcessor } from "./workflow/FeedbackProcessor.js"
export type { FeedbackResult } from "./workflow/FeedbackProcessor.js"
export { formatTaskResult, parseTaskResult } from "./workflow/ResultParser.js"
export { WorkflowEngine } from "./workflow/WorkflowEngine.js"
export type {
    AgentCreationReport,
    WorkflowRunResult,
} from "./workflow/WorkflowEngine.js"
export { WorkflowExecutor } from "./workflow/WorkflowExecutor.js"
export type { ExecuteOptions } from "./workflow/WorkflowExecutor.js"
export { WorkflowPlanner } from "./workflow/WorkflowPlanner.js"
export type * from "./types.js"
