import { errorMessage, PlanningError, toError } from "../core/errors.js"
import { extractJsonObject, pick, toStringArray } from "../core/json.js"
import { log } from "../core/Logger.js"
import type { WorkflowStore } from "../persistence/WorkflowStore.js"
import type { Oracle, Outcome, Workflow, WorkflowPlan } from "../types.js"
import { normalizeRoles, normalizeTasks } from "./normalize.js"
import { buildPlannerPrompt } from "./prompts.js"
import { topologicalOrder, validateTaskGraph } from "./validation.js"

export class WorkflowPlanner {
    private readonly oracle: Oracle
    private readonly store: WorkflowStore

    constructor(oracle: Oracle, store: WorkflowStore) {
        this.oracle = oracle
        this.store = store
    }

    /**
     * Asks the oracle for roles, tasks and an execution order. On success
     * the plan is written onto the workflow and persisted; on failure the
     * workflow is left as it was.
     */
    public async plan(
        workflow: Workflow
    ): Promise<Outcome<WorkflowPlan, PlanningError>> {
        let reply: string
        try {
            reply = await this.oracle.complete(buildPlannerPrompt(workflow.goal))
        } catch (error) {
            return fail(
                `Planning oracle call failed: ${errorMessage(error)}`,
                toError(error)
            )
        }

        const parsed = parsePlan(reply)
        if (!parsed.ok) return parsed
        const plan = parsed.value

        workflow.roles = plan.roles
        workflow.tasks = plan.tasks
        workflow.workflowSequence = plan.workflowSequence
        workflow.successCriteria = plan.successCriteria
        workflow.status = "agent_creation"
        await this.store.save(workflow)

        log.planner(
            "Planned %s: %d roles, %d tasks",
            workflow.id,
            plan.roles.length,
            plan.tasks.length
        )
        return { ok: true, value: plan }
    }
}

/** Extracts, normalizes and validates a plan from the oracle's reply. */
export function parsePlan(reply: string): Outcome<WorkflowPlan, PlanningError> {
    const document = extractJsonObject(reply)
    if (!document) {
        log.planner("Unparseable plan: %s", reply.slice(0, 200))
        return fail("Planner reply did not contain a JSON object")
    }

    const roles = normalizeRoles(document.roles)
    const tasks = normalizeTasks(document.tasks).map((task) => ({
        ...task,
        status: "pending" as const,
    }))
    if (tasks.length === 0) {
        return fail("Plan contains no tasks")
    }

    let sequence = toStringArray(
        pick(document, "workflow_sequence", "workflowSequence")
    )
    if (sequence.length === 0) {
        const derived = topologicalOrder(tasks)
        if (!derived) return fail("Task dependencies form a cycle")
        sequence = derived
    }

    const problems = validateTaskGraph(tasks, sequence, { roles })
    if (problems.length > 0) {
        return fail(`Invalid plan: ${problems.join("; ")}`)
    }

    return {
        ok: true,
        value: {
            roles,
            tasks,
            workflowSequence: sequence,
            successCriteria: toStringArray(
                pick(document, "success_criteria", "successCriteria")
            ),
        },
    }
}

function fail(message: string, cause?: Error): { ok: false; error: PlanningError } {
    return { ok: false, error: new PlanningError(message, cause) }
}
