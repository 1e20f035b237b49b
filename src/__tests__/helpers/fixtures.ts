import type { Workflow, WorkflowTask } from "../../types.js"

/** A two-role, two-task plan in the snake_case shape the planner asks for. */
export const ARTICLE_PLAN = {
    roles: [
        {
            role: "Researcher",
            description: "Finds facts",
            capabilities: ["search"],
            responsibilities: ["research"],
        },
        {
            role: "Writer",
            description: "Writes articles",
            capabilities: ["writing"],
            responsibilities: ["drafting"],
        },
    ],
    tasks: [
        {
            id: "task_1",
            name: "Research",
            description: "Collect facts about tides",
            assigned_to: "Researcher",
            depends_on: [],
            expected_output: "notes",
        },
        {
            id: "task_2",
            name: "Draft",
            description: "Write the article",
            assigned_to: "Writer",
            depends_on: ["task_1"],
            expected_output: "article",
        },
    ],
    workflow_sequence: ["task_1", "task_2"],
    success_criteria: ["Accurate", "Readable"],
}

export function planReply(plan: object = ARTICLE_PLAN): string {
    return `Here is the plan:\n\`\`\`json\n${JSON.stringify(plan, null, 2)}\n\`\`\``
}

export interface ArtifactFixture {
    name?: string
    description?: string
    filename: string
    content: string
}

export function taskReply(
    summary: string,
    result: string,
    artifacts: ArtifactFixture[] = []
): string {
    return JSON.stringify({ output: { summary, result }, artifacts })
}

export function makeTask(
    id: string,
    assignedTo: string,
    dependsOn: string[] = [],
    status: WorkflowTask["status"] = "pending"
): WorkflowTask {
    return {
        id,
        name: `Task ${id}`,
        description: `Do ${id}`,
        assignedTo,
        dependsOn,
        expectedOutput: "",
        status,
    }
}

/** Binds each role to the agent named `<role>_agent`. */
export function bindRoles(workflow: Workflow, roles: string[]): void {
    workflow.agents = roles.map((role) => ({
        name: `${role.toLowerCase()}_agent`,
        role,
        description: role,
        capabilities: [],
        responsibilities: [],
    }))
}

export function makeWorkflow(overrides: Partial<Workflow> = {}): Workflow {
    return {
        id: "w",
        name: "w",
        goal: "g",
        status: "completed",
        createdAt: "",
        updatedAt: "",
        workspace: "",
        roles: [],
        tasks: [],
        workflowSequence: [],
        successCriteria: [],
        agents: [],
        artifacts: [],
        memory: {},
        history: [],
        feedbackHistory: [],
        ...overrides,
    }
}
