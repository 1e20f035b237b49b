import { AgentCatalog, createDefaultCatalog } from "../agents/AgentCatalog.js"
import { AgentRegistry } from "../agents/AgentRegistry.js"
import { AgentResolver } from "../agents/AgentResolver.js"
import { dataPathOf, getDefaultModel, selectProvider, workspacePathOf } from "../core/Config.js"
import type { PlanningError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import { CostLedger } from "../core/Pricing.js"
import { EventBus } from "../events/EventBus.js"
import type { TaskweaveEvent } from "../events/types.js"
import { createLLMProvider } from "../llm/index.js"
import { LLMOracle } from "../llm/Oracle.js"
import { BlueprintStore } from "../persistence/BlueprintStore.js"
import { WorkflowStore } from "../persistence/WorkflowStore.js"
import { createRenderer } from "../renderer/index.js"
import type { Renderer } from "../renderer/types.js"
import { TaskRouter, type RouteOptions } from "../router/TaskRouter.js"
import { createDefaultToolRegistry } from "../tools/ToolRegistry.js"
import type {
    CostSummary,
    LLMProvider,
    LLMProviderType,
    Oracle,
    Outcome,
    TaskweaveConfig,
    Workflow,
    WorkflowListing,
    WorkflowPlan,
    WorkflowSummary,
} from "../types.js"
import { FeedbackProcessor, type FeedbackResult } from "../workflow/FeedbackProcessor.js"
import {
    type AgentCreationReport,
    type CreateWorkflowOptions,
    WorkflowEngine,
    type WorkflowRunResult,
} from "../workflow/WorkflowEngine.js"
import { type ExecuteOptions, WorkflowExecutor } from "../workflow/WorkflowExecutor.js"
import { WorkflowPlanner } from "../workflow/WorkflowPlanner.js"

export interface OrchestratorOptions {
    /** Replaces the configured LLM oracle, mainly for tests. */
    oracle?: Oracle
    catalog?: AgentCatalog
}

/**
 * Wires configuration into the stores, agents, engine and router, and
 * keeps a running cost total from oracle usage.
 */
export class Orchestrator {
    public readonly eventBus: EventBus
    public readonly engine: WorkflowEngine
    public readonly router: TaskRouter
    public readonly registry: AgentRegistry
    public readonly resolver: AgentResolver
    private readonly config: TaskweaveConfig
    private readonly renderer: Renderer | null
    private readonly costs: CostLedger = new CostLedger()
    private readonly onEvent: (event: TaskweaveEvent) => void

    constructor(config: TaskweaveConfig, options: OrchestratorOptions = {}) {
        this.config = config
        this.eventBus = new EventBus()

        const providerType = selectProvider(config)
        const oracle =
            options.oracle ??
            new LLMOracle({
                provider: resolveProvider(config, providerType),
                model: getDefaultModel(providerType, config),
                eventBus: this.eventBus,
                retryDelays: config.llmRetryDelays,
            })

        const dataPath = dataPathOf(config)
        const store = new WorkflowStore(workspacePathOf(config))
        this.registry = new AgentRegistry(dataPath)
        const tools = createDefaultToolRegistry({
            api: config.apiBaseUrl
                ? { baseUrl: config.apiBaseUrl, apiKey: config.apiKey }
                : undefined,
        })
        this.resolver = new AgentResolver({
            registry: this.registry,
            catalog: options.catalog ?? createDefaultCatalog(),
            blueprints: new BlueprintStore(dataPath),
            oracle,
            tools,
            workingDirectory: config.workingDirectory,
        })

        const executor = new WorkflowExecutor({
            store,
            resolver: this.resolver,
            registry: this.registry,
            eventBus: this.eventBus,
        })
        this.engine = new WorkflowEngine({
            store,
            planner: new WorkflowPlanner(oracle, store),
            executor,
            feedback: new FeedbackProcessor({
                oracle,
                store,
                resolver: this.resolver,
                executor,
                eventBus: this.eventBus,
            }),
            resolver: this.resolver,
            eventBus: this.eventBus,
            maxIterations: config.maxIterations,
        })
        this.router = new TaskRouter({
            oracle,
            registry: this.registry,
            resolver: this.resolver,
            eventBus: this.eventBus,
            maxIterations: config.routerMaxIterations,
            verifyCapabilities: config.verifyCapabilities,
        })

        this.renderer = createRenderer(config.renderer ?? "terminal", {
            verbose: config.verbose ?? false,
        })
        this.renderer?.attach(this.eventBus)

        this.onEvent = (event) => {
            if (event.type !== "oracle:call") return
            this.eventBus.emit({
                type: "cost:update",
                summary: this.costs.record(event.model, event.usage),
            })
        }
        this.eventBus.on(this.onEvent)
        log.app("Orchestrator ready (%s, %s)", providerType, config.workingDirectory)
    }

    public runWorkflow(
        goal: string,
        options: CreateWorkflowOptions = {}
    ): Promise<WorkflowRunResult> {
        return this.engine.run(goal, options)
    }

    public createWorkflow(goal: string, name?: string): Promise<Workflow> {
        return this.engine.createWorkflow(goal, name)
    }

    public plan(workflow: Workflow): Promise<Outcome<WorkflowPlan, PlanningError>> {
        return this.engine.plan(workflow)
    }

    public createAgents(workflow: Workflow): Promise<AgentCreationReport> {
        return this.engine.createAgents(workflow)
    }

    public execute(workflow: Workflow, options: ExecuteOptions = {}): Promise<WorkflowSummary> {
        return this.engine.execute(workflow, options)
    }

    public feedback(
        workflowId: string,
        feedback: string,
        options: ExecuteOptions = {}
    ): Promise<Outcome<FeedbackResult, PlanningError>> {
        return this.engine.processFeedback(workflowId, feedback, options)
    }

    public list(): Promise<WorkflowListing[]> {
        return this.engine.list()
    }

    public open(workflowId: string): Promise<{ workflow: Workflow; summary: WorkflowSummary }> {
        return this.engine.open(workflowId)
    }

    public routeTask(task: string, options: RouteOptions = {}): Promise<string> {
        return this.router.routeTask(task, options)
    }

    public getCostSummary(): CostSummary {
        return this.costs.snapshot()
    }

    /** Stops rendering and drops listeners; the instance is unusable after. */
    public dispose(): void {
        this.renderer?.detach()
        this.eventBus.off(this.onEvent)
    }
}

function resolveProvider(
    config: TaskweaveConfig,
    type: LLMProviderType
): LLMProvider | undefined {
    const injected = config.providers?.[type]
    if (injected) return injected
    const apiKey = type === "openai" ? config.openaiApiKey : config.anthropicApiKey
    if (!apiKey) {
        log.app("No API key for %s; oracle calls will fail", type)
        return undefined
    }
    return createLLMProvider(type, apiKey, type === "openai" ? config.baseUrl : undefined)
}
