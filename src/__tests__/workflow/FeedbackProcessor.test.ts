import { join } from "node:path"

import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { AgentCatalog } from "../../agents/AgentCatalog.js"
import { AgentRegistry } from "../../agents/AgentRegistry.js"
import { AgentResolver } from "../../agents/AgentResolver.js"
import { EventBus } from "../../events/EventBus.js"
import type { TaskweaveEvent } from "../../events/types.js"
import { BlueprintStore } from "../../persistence/BlueprintStore.js"
import { WorkflowStore } from "../../persistence/WorkflowStore.js"
import { createDefaultToolRegistry } from "../../tools/ToolRegistry.js"
import type { AgentOutput, Oracle, Workflow } from "../../types.js"
import {
    dependentClosure,
    FeedbackProcessor,
    parseUpdatePlan,
} from "../../workflow/FeedbackProcessor.js"
import { WorkflowExecutor } from "../../workflow/WorkflowExecutor.js"
import { bindRoles, makeTask, makeWorkflow, taskReply } from "../helpers/fixtures.js"
import {
    createMockOracle,
    makeTempDir,
    removeTempDir,
    stubAgentEntry,
} from "../helpers/mockOracle.js"

const UPDATE_PLAN = {
    analysis: "Needs more depth",
    changes_needed: ["expand the research"],
    tasks_to_update: ["task_1", "ghost"],
    new_tasks: [
        {
            id: "task_3",
            name: "Edit",
            description: "Polish the article",
            assigned_to: "Editor",
            depends_on: ["task_2"],
        },
    ],
}

function reply(summary: string): (task: string) => Promise<AgentOutput> {
    return () => Promise.resolve(taskReply(summary, `${summary} in full`))
}

describe("FeedbackProcessor", () => {
    let dir: string
    let store: WorkflowStore
    let events: TaskweaveEvent[]
    let workflow: Workflow
    let researcher: ReturnType<typeof stubAgentEntry>
    let editor: ReturnType<typeof stubAgentEntry>

    beforeEach(async () => {
        dir = await makeTempDir("feedback")
        store = new WorkflowStore(join(dir, "workflows"))
        events = []
        researcher = stubAgentEntry("researcher_agent", reply("Deeper facts"))
        editor = stubAgentEntry("editor_agent", reply("Polished"))

        workflow = await store.create("Tides", "Write about tides")
        workflow.tasks = [
            makeTask("task_1", "Researcher", [], "completed"),
            makeTask("task_2", "Writer", ["task_1"], "completed"),
        ]
        workflow.workflowSequence = ["task_1", "task_2"]
        workflow.memory = {
            task_1: { summary: "Facts", result: "f" },
            task_2: { summary: "Draft", result: "d" },
        }
        workflow.status = "completed"
        bindRoles(workflow, ["Researcher", "Writer"])
        await store.save(workflow)
    })

    afterEach(async () => {
        await removeTempDir(dir)
    })

    function makeProcessor(oracle: Oracle): FeedbackProcessor {
        const bus = new EventBus()
        bus.on((event) => events.push(event))
        const registry = new AgentRegistry(dir)
        const resolver = new AgentResolver({
            registry,
            catalog: new AgentCatalog()
                .register("researcher_agent", researcher)
                .register("writer_agent", stubAgentEntry("writer_agent", reply("Redrafted")))
                .register("editor_agent", editor),
            blueprints: new BlueprintStore(dir),
            oracle,
            tools: createDefaultToolRegistry(),
            workingDirectory: dir,
        })
        const executor = new WorkflowExecutor({ store, resolver, registry, eventBus: bus })
        return new FeedbackProcessor({ oracle, store, resolver, executor, eventBus: bus })
    }

    it("should reset affected tasks, add new ones and re-run", async () => {
        const oracle = createMockOracle([JSON.stringify(UPDATE_PLAN)])
        const outcome = await makeProcessor(oracle).process(workflow, "Go deeper")

        expect(outcome.ok).toBe(true)
        if (!outcome.ok) return
        expect(oracle.complete.mock.calls[0]?.[0]).toContain("User feedback:\nGo deeper")
        expect(outcome.value.resetTaskIds).toEqual(["task_1", "task_2"])
        expect(outcome.value.plan.tasksToUpdate).toEqual(["task_1"])
        expect(outcome.value.plan.newTasks.map((t) => t.id)).toEqual(["task_3"])
        expect(outcome.value.summary?.status).toBe("completed")
        expect(outcome.value.summary?.taskResults).toEqual({
            task_1: "Deeper facts",
            task_2: "Redrafted",
            task_3: "Polished",
        })
        expect(researcher.act).toHaveBeenCalledTimes(1)
        expect(editor.act).toHaveBeenCalledTimes(1)
    })

    it("should bind an agent for a new role and record the feedback", async () => {
        await makeProcessor(createMockOracle([JSON.stringify(UPDATE_PLAN)])).process(
            workflow,
            "Go deeper"
        )

        expect(workflow.roles).toEqual([
            {
                role: "Editor",
                description: "Polish the article",
                capabilities: [],
                responsibilities: ["Edit"],
            },
        ])
        expect(workflow.agents.map((b) => [b.role, b.name])).toEqual([
            ["Researcher", "researcher_agent"],
            ["Writer", "writer_agent"],
            ["Editor", "editor_agent"],
        ])
        expect(workflow.workflowSequence).toEqual(["task_1", "task_2", "task_3"])
        expect(workflow.feedbackHistory).toEqual([
            {
                feedback: "Go deeper",
                analysis: "Needs more depth",
                changesNeeded: ["expand the research"],
                tasksToUpdate: ["task_1"],
                newTaskIds: ["task_3"],
                timestamp: expect.any(String),
            },
        ])
        expect(events).toContainEqual({
            type: "feedback:received",
            workflowId: workflow.id,
            resetTaskIds: ["task_1", "task_2"],
            newTaskIds: ["task_3"],
        })
        expect(events).toContainEqual({
            type: "agent:resolved",
            workflowId: workflow.id,
            role: "Editor",
            agentName: "editor_agent",
            created: false,
        })
    })

    it("should not execute when nothing needs redoing", async () => {
        const outcome = await makeProcessor(
            createMockOracle(['{"analysis": "All good", "tasks_to_update": [], "new_tasks": []}'])
        ).process(workflow, "Looks fine")

        expect(outcome.ok && outcome.value.summary).toBeUndefined()
        expect(workflow.tasks.map((t) => t.status)).toEqual(["completed", "completed"])
        expect(workflow.feedbackHistory).toHaveLength(1)
        expect(researcher.act).not.toHaveBeenCalled()
    })

    it("should leave the workflow alone when the plan is invalid", async () => {
        const outcome = await makeProcessor(
            createMockOracle([
                JSON.stringify({
                    tasks_to_update: ["task_1"],
                    new_tasks: [{ id: "task_1", assigned_to: "Writer" }],
                }),
            ])
        ).process(workflow, "Redo")

        expect(!outcome.ok && outcome.error.message).toBe(
            "New tasks reuse existing ids: task_1"
        )
        expect(workflow.tasks.map((t) => t.status)).toEqual(["completed", "completed"])
        expect(workflow.feedbackHistory).toEqual([])
        expect((await store.load(workflow.id)).status).toBe("completed")
    })

    it("should report oracle failures", async () => {
        const outcome = await makeProcessor(createMockOracle([new Error("down")])).process(
            workflow,
            "Redo"
        )
        expect(!outcome.ok && outcome.error.message).toBe("Feedback oracle call failed: down")
    })
})

describe("parseUpdatePlan", () => {
    const workflow = makeWorkflow({
        tasks: [makeTask("task_1", "Writer"), makeTask("task_2", "Writer")],
        workflowSequence: ["task_1", "task_2"],
    })

    function errorOf(reply: string): string | undefined {
        const outcome = parseUpdatePlan(reply, workflow)
        return outcome.ok ? undefined : outcome.error.message
    }

    it("should number new tasks after the existing ones", () => {
        const outcome = parseUpdatePlan('{"new_tasks": [{"assigned_to": "Writer"}]}', workflow)
        expect(outcome.ok && outcome.value.newTasks.map((t) => t.id)).toEqual(["task_3"])
    })

    it("should reject replies without JSON or with broken dependencies", () => {
        expect(errorOf("no idea")).toBe("Feedback reply did not contain a JSON object")
        expect(
            errorOf('{"new_tasks": [{"id": "task_3", "assigned_to": "Writer", "depends_on": ["nope"]}]}')
        ).toBe("Invalid update plan: Task task_3 depends on unknown task nope")
    })
})

describe("dependentClosure", () => {
    const tasks = [
        makeTask("a", "Writer"),
        makeTask("b", "Writer", ["a"]),
        makeTask("c", "Writer", ["b"]),
        makeTask("d", "Writer"),
    ]

    it("should include every transitive dependent in task order", () => {
        expect(dependentClosure(tasks, ["a"])).toEqual(["a", "b", "c"])
        expect(dependentClosure(tasks, ["c", "d"])).toEqual(["c", "d"])
        expect(dependentClosure(tasks, [])).toEqual([])
    })
})
