import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { PlanningError } from "../../core/errors.js"
import { WorkflowStore } from "../../persistence/WorkflowStore.js"
import type { Workflow } from "../../types.js"
import { parsePlan, WorkflowPlanner } from "../../workflow/WorkflowPlanner.js"
import { ARTICLE_PLAN, planReply } from "../helpers/fixtures.js"
import { createMockOracle, makeTempDir, removeTempDir } from "../helpers/mockOracle.js"

describe("WorkflowPlanner", () => {
    let dir: string
    let store: WorkflowStore
    let workflow: Workflow

    beforeEach(async () => {
        dir = await makeTempDir("planner")
        store = new WorkflowStore(dir)
        workflow = await store.create("Tides", "Write an article about tides")
    })

    afterEach(async () => {
        await removeTempDir(dir)
    })

    it("should write the plan onto the workflow and persist it", async () => {
        const oracle = createMockOracle([planReply()])
        const outcome = await new WorkflowPlanner(oracle, store).plan(workflow)

        expect(outcome.ok).toBe(true)
        expect(oracle.complete.mock.calls[0]?.[0]).toContain(
            "Goal: Write an article about tides"
        )
        expect(workflow.status).toBe("agent_creation")
        expect(workflow.roles.map((r) => r.role)).toEqual(["Researcher", "Writer"])
        expect(workflow.tasks[1]).toEqual({
            id: "task_2",
            name: "Draft",
            description: "Write the article",
            assignedTo: "Writer",
            dependsOn: ["task_1"],
            expectedOutput: "article",
            status: "pending",
        })
        expect(workflow.workflowSequence).toEqual(["task_1", "task_2"])
        expect(workflow.successCriteria).toEqual(["Accurate", "Readable"])

        const stored = await store.load(workflow.id)
        expect(stored.status).toBe("agent_creation")
        expect(stored.tasks).toEqual(workflow.tasks)
    })

    it("should leave the workflow untouched when planning fails", async () => {
        const oracle = createMockOracle(["I cannot plan this."])
        const outcome = await new WorkflowPlanner(oracle, store).plan(workflow)

        expect(outcome.ok).toBe(false)
        expect(!outcome.ok && outcome.error.message).toBe(
            "Planner reply did not contain a JSON object"
        )
        expect(workflow.status).toBe("initialized")
        expect(workflow.tasks).toEqual([])
        expect((await store.load(workflow.id)).status).toBe("initialized")
    })

    it("should report oracle failures as planning errors", async () => {
        const cause = new Error("down")
        const outcome = await new WorkflowPlanner(createMockOracle([cause]), store).plan(
            workflow
        )

        expect(outcome.ok).toBe(false)
        if (!outcome.ok) {
            expect(outcome.error).toBeInstanceOf(PlanningError)
            expect(outcome.error.message).toBe("Planning oracle call failed: down")
            expect(outcome.error.cause).toBe(cause)
        }
    })
})

describe("parsePlan", () => {
    function errorOf(reply: string): string | undefined {
        const outcome = parsePlan(reply)
        return outcome.ok ? undefined : outcome.error.message
    }

    it("should derive the sequence from dependencies when it is missing", () => {
        const outcome = parsePlan(
            JSON.stringify({
                roles: ARTICLE_PLAN.roles,
                tasks: [...ARTICLE_PLAN.tasks].reverse(),
            })
        )
        expect(outcome.ok && outcome.value.workflowSequence).toEqual(["task_1", "task_2"])
    })

    it("should reject plans without tasks", () => {
        expect(errorOf('{"roles": [], "tasks": []}')).toBe("Plan contains no tasks")
    })

    it("should reject dependency cycles", () => {
        expect(
            errorOf(
                JSON.stringify({
                    roles: ARTICLE_PLAN.roles,
                    tasks: [
                        { id: "a", assigned_to: "Writer", depends_on: ["b"] },
                        { id: "b", assigned_to: "Writer", depends_on: ["a"] },
                    ],
                })
            )
        ).toBe("Task dependencies form a cycle")
    })

    it("should list every problem with the task graph", () => {
        expect(
            errorOf(
                JSON.stringify({
                    roles: ARTICLE_PLAN.roles,
                    tasks: [
                        { id: "task_1", assigned_to: "Editor" },
                        { id: "task_2", assigned_to: "Writer", depends_on: ["task_1"] },
                    ],
                    workflow_sequence: ["task_2", "task_1"],
                })
            )
        ).toBe(
            'Invalid plan: Task task_1 is assigned to unknown role "Editor"; Task task_2 runs before its dependency task_1'
        )
    })

    it("should number tasks that arrive without ids", () => {
        const outcome = parsePlan(
            JSON.stringify({
                roles: [{ name: "Writer" }],
                tasks: [{ assigned_to: "writer" }, { assigned_to: "Writer" }],
            })
        )
        expect(outcome.ok && outcome.value.workflowSequence).toEqual(["task_1", "task_2"])
    })
})
