import type { AgentResolver } from "../agents/AgentResolver.js"
import { errorMessage, PlanningError, toError } from "../core/errors.js"
import { extractJsonObject, isRecord, pick, readString, toStringArray } from "../core/json.js"
import { log } from "../core/Logger.js"
import { sameRole } from "../core/naming.js"
import type { EventBus } from "../events/EventBus.js"
import type { WorkflowStore } from "../persistence/WorkflowStore.js"
import type {
    Oracle,
    Outcome,
    UpdatePlan,
    Workflow,
    WorkflowSummary,
    WorkflowTask,
} from "../types.js"
import { normalizeTask } from "./normalize.js"
import { buildFeedbackPrompt } from "./prompts.js"
import { validateTaskGraph } from "./validation.js"
import type { ExecuteOptions, WorkflowExecutor } from "./WorkflowExecutor.js"

export interface FeedbackResult {
    plan: UpdatePlan
    resetTaskIds: string[]
    summary?: WorkflowSummary
}

export interface FeedbackProcessorOptions {
    oracle: Oracle
    store: WorkflowStore
    resolver: AgentResolver
    executor: WorkflowExecutor
    eventBus?: EventBus
}

export class FeedbackProcessor {
    private readonly oracle: Oracle
    private readonly store: WorkflowStore
    private readonly resolver: AgentResolver
    private readonly executor: WorkflowExecutor
    private readonly eventBus: EventBus | undefined

    constructor(options: FeedbackProcessorOptions) {
        this.oracle = options.oracle
        this.store = options.store
        this.resolver = options.resolver
        this.executor = options.executor
        this.eventBus = options.eventBus
    }

    /**
     * Turns user feedback into an update plan, applies it and re-runs the
     * affected tasks. Nothing on the workflow changes unless the whole
     * plan validates.
     */
    public async process(
        workflow: Workflow,
        feedback: string,
        options: ExecuteOptions = {}
    ): Promise<Outcome<FeedbackResult, PlanningError>> {
        let reply: string
        try {
            reply = await this.oracle.complete(buildFeedbackPrompt(workflow, feedback))
        } catch (error) {
            return {
                ok: false,
                error: new PlanningError(
                    `Feedback oracle call failed: ${errorMessage(error)}`,
                    toError(error)
                ),
            }
        }

        const parsed = parseUpdatePlan(reply, workflow)
        if (!parsed.ok) return parsed
        const plan = parsed.value

        const resetTaskIds = dependentClosure(workflow.tasks, plan.tasksToUpdate)
        for (const task of plan.newTasks) {
            workflow.tasks.push(task)
            workflow.workflowSequence.push(task.id)
        }
        for (const task of workflow.tasks) {
            if (resetTaskIds.includes(task.id)) task.status = "pending"
        }

        await this.bindNewRoles(workflow, plan.newTasks)

        workflow.feedbackHistory.push({
            feedback,
            analysis: plan.analysis,
            changesNeeded: plan.changesNeeded,
            tasksToUpdate: plan.tasksToUpdate,
            newTaskIds: plan.newTasks.map((t) => t.id),
            timestamp: new Date().toISOString(),
        })
        workflow.status = "feedback_execution"
        await this.store.save(workflow)

        this.eventBus?.emit({
            type: "feedback:received",
            workflowId: workflow.id,
            resetTaskIds,
            newTaskIds: plan.newTasks.map((t) => t.id),
        })
        log.feedback(
            "%s: reset %d tasks, added %d",
            workflow.id,
            resetTaskIds.length,
            plan.newTasks.length
        )

        if (resetTaskIds.length === 0 && plan.newTasks.length === 0) {
            return { ok: true, value: { plan, resetTaskIds } }
        }
        const summary = await this.executor.execute(workflow, options)
        return { ok: true, value: { plan, resetTaskIds, summary } }
    }

    private async bindNewRoles(
        workflow: Workflow,
        tasks: WorkflowTask[]
    ): Promise<void> {
        for (const task of tasks) {
            if (workflow.agents.some((b) => sameRole(b.role, task.assignedTo))) {
                continue
            }
            let role = workflow.roles.find((r) => sameRole(r.role, task.assignedTo))
            if (!role) {
                role = {
                    role: task.assignedTo,
                    description: task.description,
                    capabilities: [],
                    responsibilities: [task.name],
                }
                workflow.roles.push(role)
            }
            try {
                const resolved = await this.resolver.resolveOrCreate(role)
                workflow.agents.push({
                    name: resolved.name,
                    role: role.role,
                    description: role.description,
                    capabilities: role.capabilities,
                    responsibilities: role.responsibilities,
                })
                this.eventBus?.emit({
                    type: "agent:resolved",
                    workflowId: workflow.id,
                    role: role.role,
                    agentName: resolved.name,
                    created: resolved.created,
                })
            } catch (error) {
                log.feedback(
                    "No agent for new role %s: %s",
                    role.role,
                    errorMessage(error)
                )
            }
        }
    }
}

/** Validates an update plan against the workflow without modifying it. */
export function parseUpdatePlan(
    reply: string,
    workflow: Workflow
): Outcome<UpdatePlan, PlanningError> {
    const document = extractJsonObject(reply)
    if (!document) {
        return {
            ok: false,
            error: new PlanningError("Feedback reply did not contain a JSON object"),
        }
    }

    const existing = new Set(workflow.tasks.map((t) => t.id))
    const tasksToUpdate: string[] = []
    for (const id of toStringArray(pick(document, "tasks_to_update", "tasksToUpdate"))) {
        if (!existing.has(id)) {
            log.feedback("Ignoring update for unknown task %s", id)
        } else if (!tasksToUpdate.includes(id)) {
            tasksToUpdate.push(id)
        }
    }

    const rawNew = pick(document, "new_tasks", "newTasks")
    const newTasks = (Array.isArray(rawNew) ? rawNew.filter(isRecord) : []).map(
        (record, i): WorkflowTask => ({
            ...normalizeTask(record, workflow.tasks.length + i + 1),
            status: "pending",
        })
    )
    const collisions = newTasks.filter((t) => existing.has(t.id)).map((t) => t.id)
    if (collisions.length > 0) {
        return {
            ok: false,
            error: new PlanningError(
                `New tasks reuse existing ids: ${collisions.join(", ")}`
            ),
        }
    }

    const problems = validateTaskGraph(
        [...workflow.tasks, ...newTasks],
        [...workflow.workflowSequence, ...newTasks.map((t) => t.id)]
    )
    if (problems.length > 0) {
        return {
            ok: false,
            error: new PlanningError(`Invalid update plan: ${problems.join("; ")}`),
        }
    }

    return {
        ok: true,
        value: {
            analysis: readString(document, "analysis"),
            changesNeeded: toStringArray(pick(document, "changes_needed", "changesNeeded")),
            tasksToUpdate,
            newTasks,
        },
    }
}

/** The given ids plus every task that transitively depends on one of them, in task order. */
export function dependentClosure(tasks: WorkflowTask[], ids: string[]): string[] {
    const selected = new Set(ids)
    let grew = true
    while (grew) {
        grew = false
        for (const task of tasks) {
            if (!selected.has(task.id) && task.dependsOn.some((d) => selected.has(d))) {
                selected.add(task.id)
                grew = true
            }
        }
    }
    return tasks.filter((t) => selected.has(t.id)).map((t) => t.id)
}
