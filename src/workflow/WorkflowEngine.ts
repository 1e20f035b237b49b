import type { AgentResolver } from "../agents/AgentResolver.js"
import { errorMessage, type PlanningError, WorkflowError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import { nameFromGoal, sameRole } from "../core/naming.js"
import type { EventBus } from "../events/EventBus.js"
import type { WorkflowStore } from "../persistence/WorkflowStore.js"
import type {
    AgentBinding,
    Outcome,
    Workflow,
    WorkflowListing,
    WorkflowPlan,
    WorkflowSummary,
} from "../types.js"
import type { FeedbackProcessor, FeedbackResult } from "./FeedbackProcessor.js"
import {
    buildWorkflowSummary,
    type ExecuteOptions,
    type WorkflowExecutor,
} from "./WorkflowExecutor.js"
import type { WorkflowPlanner } from "./WorkflowPlanner.js"

export interface AgentCreationFailure {
    role: string
    error: string
}

export interface AgentCreationReport {
    bindings: AgentBinding[]
    failures: AgentCreationFailure[]
}

export type WorkflowRunResult =
    | {
          ok: true
          workflow: Workflow
          summary: WorkflowSummary
          agentFailures: AgentCreationFailure[]
      }
    | { ok: false; workflow: Workflow; error: PlanningError }

export interface CreateWorkflowOptions extends ExecuteOptions {
    name?: string
}

export interface WorkflowEngineOptions {
    store: WorkflowStore
    planner: WorkflowPlanner
    executor: WorkflowExecutor
    feedback: FeedbackProcessor
    resolver: AgentResolver
    eventBus?: EventBus
    maxIterations?: number
}

/** Workflow lifecycle: create, plan, bind agents, execute, revise. */
export class WorkflowEngine {
    private readonly store: WorkflowStore
    private readonly planner: WorkflowPlanner
    private readonly executor: WorkflowExecutor
    private readonly feedback: FeedbackProcessor
    private readonly resolver: AgentResolver
    private readonly eventBus: EventBus | undefined
    private readonly maxIterations: number | undefined

    constructor(options: WorkflowEngineOptions) {
        this.store = options.store
        this.planner = options.planner
        this.executor = options.executor
        this.feedback = options.feedback
        this.resolver = options.resolver
        this.eventBus = options.eventBus
        this.maxIterations = options.maxIterations
    }

    public async createWorkflow(goal: string, name?: string): Promise<Workflow> {
        const trimmedGoal = goal.trim()
        if (!trimmedGoal) throw new WorkflowError("A workflow needs a goal")
        const workflow = await this.store.create(
            name?.trim() || nameFromGoal(trimmedGoal),
            trimmedGoal
        )
        this.eventBus?.emit({
            type: "workflow:created",
            workflowId: workflow.id,
            name: workflow.name,
            goal: workflow.goal,
        })
        return workflow
    }

    public async plan(
        workflow: Workflow
    ): Promise<Outcome<WorkflowPlan, PlanningError>> {
        const outcome = await this.planner.plan(workflow)
        if (outcome.ok) {
            this.eventBus?.emit({
                type: "workflow:planned",
                workflowId: workflow.id,
                taskCount: outcome.value.tasks.length,
                roleCount: outcome.value.roles.length,
            })
        }
        return outcome
    }

    /**
     * Binds an agent to every planned role. A role whose agent cannot be
     * resolved is reported and left unbound; its tasks fail at execution.
     */
    public async createAgents(workflow: Workflow): Promise<AgentCreationReport> {
        const report: AgentCreationReport = { bindings: [], failures: [] }
        for (const role of workflow.roles) {
            try {
                const resolved = await this.resolver.resolveOrCreate(role)
                const binding: AgentBinding = {
                    name: resolved.name,
                    role: role.role,
                    description: role.description,
                    capabilities: role.capabilities,
                    responsibilities: role.responsibilities,
                }
                workflow.agents = workflow.agents.filter(
                    (b) => !sameRole(b.role, role.role)
                )
                workflow.agents.push(binding)
                report.bindings.push(binding)
                this.eventBus?.emit({
                    type: "agent:resolved",
                    workflowId: workflow.id,
                    role: role.role,
                    agentName: resolved.name,
                    created: resolved.created,
                })
            } catch (error) {
                log.workflow("No agent for role %s: %s", role.role, errorMessage(error))
                report.failures.push({ role: role.role, error: errorMessage(error) })
            }
        }
        await this.store.save(workflow)
        return report
    }

    public async execute(
        workflow: Workflow,
        options: ExecuteOptions = {}
    ): Promise<WorkflowSummary> {
        if (workflow.tasks.length === 0) {
            throw new WorkflowError(`Workflow ${workflow.id} has not been planned`)
        }
        return this.executor.execute(workflow, this.withDefaults(options))
    }

    /** Create, plan, bind agents and execute in one call. */
    public async run(
        goal: string,
        options: CreateWorkflowOptions = {}
    ): Promise<WorkflowRunResult> {
        const workflow = await this.createWorkflow(goal, options.name)
        const planned = await this.plan(workflow)
        if (!planned.ok) {
            log.workflow("Planning %s failed: %s", workflow.id, planned.error.message)
            return { ok: false, workflow, error: planned.error }
        }
        const report = await this.createAgents(workflow)
        const summary = await this.execute(workflow, options)
        return { ok: true, workflow, summary, agentFailures: report.failures }
    }

    public async processFeedback(
        workflowId: string,
        feedback: string,
        options: ExecuteOptions = {}
    ): Promise<Outcome<FeedbackResult, PlanningError>> {
        if (!feedback.trim()) throw new WorkflowError("Feedback is empty")
        const workflow = await this.store.load(workflowId)
        return this.feedback.process(workflow, feedback, this.withDefaults(options))
    }

    public list(): Promise<WorkflowListing[]> {
        return this.store.list()
    }

    public async open(
        workflowId: string
    ): Promise<{ workflow: Workflow; summary: WorkflowSummary }> {
        const workflow = await this.store.load(workflowId)
        return { workflow, summary: buildWorkflowSummary(workflow) }
    }

    public load(workflowId: string): Promise<Workflow> {
        return this.store.load(workflowId)
    }

    private withDefaults(options: ExecuteOptions): ExecuteOptions {
        return { maxIterations: options.maxIterations ?? this.maxIterations }
    }
}
