import type { Workflow, WorkflowTask } from "../types.js"

export function buildPlannerPrompt(goal: string): string {
    return `You are planning a multi-agent workflow.

Goal: ${goal}

Break the goal into roles and tasks. Each task is handled by exactly one role and may depend on earlier tasks.

Return ONLY a JSON object with this structure:
{
  "roles": [
    {"role": "role name", "description": "what this role does", "capabilities": ["..."], "responsibilities": ["..."]}
  ],
  "tasks": [
    {"id": "task_1", "name": "short name", "description": "what to do", "assigned_to": "role name", "depends_on": [], "expected_output": "what the task produces"}
  ],
  "workflow_sequence": ["task_1"],
  "success_criteria": ["..."]
}

Every task id must appear in workflow_sequence, after all of the tasks it depends on.`
}

export function buildFeedbackPrompt(workflow: Workflow, feedback: string): string {
    const tasks = workflow.tasks
        .map(
            (t) =>
                `- ${t.id}: ${t.name} (assigned to ${t.assignedTo}, ${t.status})`
        )
        .join("\n")
    const artifacts = workflow.artifacts.length
        ? workflow.artifacts
              .map((a) => `- ${a.filename}: ${a.description || a.name}`)
              .join("\n")
        : "(none)"

    return `A workflow has produced results and the user has given feedback.

Goal: ${workflow.goal}

Current tasks:
${tasks || "(none)"}

Artifacts:
${artifacts}

User feedback:
${feedback}

Decide which existing tasks must be redone and which new tasks are needed.

Return ONLY a JSON object with this structure:
{
  "analysis": "how the feedback affects the work",
  "changes_needed": ["..."],
  "tasks_to_update": ["existing task id"],
  "new_tasks": [
    {"id": "new unique id", "name": "short name", "description": "what to do", "assigned_to": "role name", "depends_on": [], "expected_output": "what the task produces"}
  ]
}`
}

export interface TaskPromptContext {
    agentName: string
    workspace: string
    memory: Workflow["memory"]
    artifacts: Workflow["artifacts"]
}

export function buildTaskPrompt(
    task: WorkflowTask,
    context: TaskPromptContext
): string {
    return `# Task Assignment: ${task.name}

You are ${context.agentName}, working on one task of a larger workflow.

## Task Description
${task.description}

## Expected Output
${task.expectedOutput || "Complete the task as described."}

## Workspace Information
Files you create are saved under: ${context.workspace}

## Available Memory
${JSON.stringify(context.memory, null, 2)}

## Available Artifacts
${JSON.stringify(context.artifacts, null, 2)}

## Instructions
Complete the task using the memory and artifacts from earlier tasks where relevant. Put any file you produce in "artifacts" with a filename relative to the workspace.

Respond with ONLY a JSON object:
{
  "output": {"summary": "one or two sentences", "result": "the full result"},
  "artifacts": [
    {"name": "artifact name", "description": "what it is", "filename": "relative/path.ext", "content": "full file content"}
  ]
}`
}
