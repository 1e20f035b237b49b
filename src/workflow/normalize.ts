import {
    isRecord,
    pick,
    readString,
    toStringArray,
    type JsonRecord,
} from "../core/json.js"
import type {
    AgentBinding,
    ArtifactRecord,
    FeedbackEntry,
    HistoryEntry,
    HistoryStatus,
    RoleSpec,
    TaskOutput,
    TaskStatus,
    WorkflowStatus,
    WorkflowTask,
} from "../types.js"

/*
 * Normalizers shared by oracle replies (snake_case) and persisted
 * documents (camelCase). Each accepts either spelling.
 */

const TASK_STATUSES: readonly TaskStatus[] = [
    "pending",
    "completed",
    "failed",
    "skipped",
]

const WORKFLOW_STATUSES: readonly WorkflowStatus[] = [
    "initialized",
    "agent_creation",
    "execution",
    "feedback_execution",
    "completed",
    "partial",
]

export function isTaskStatus(value: unknown): value is TaskStatus {
    return TASK_STATUSES.some((status) => status === value)
}

export function isWorkflowStatus(value: unknown): value is WorkflowStatus {
    return WORKFLOW_STATUSES.some((status) => status === value)
}

function isHistoryStatus(value: unknown): value is HistoryStatus {
    return isTaskStatus(value) && value !== "pending"
}

function str(record: JsonRecord, ...keys: string[]): string {
    const value = pick(record, ...keys)
    if (typeof value === "string") return value.trim()
    if (typeof value === "number") return String(value)
    return ""
}

function list(record: JsonRecord, ...keys: string[]): string[] {
    return toStringArray(pick(record, ...keys))
}

function records(value: unknown): JsonRecord[] {
    return Array.isArray(value) ? value.filter(isRecord) : []
}

/** Null when the role has no name. */
export function normalizeRole(value: unknown): RoleSpec | null {
    if (!isRecord(value)) return null
    const role = str(value, "role", "name")
    if (!role) return null
    return {
        role,
        description: str(value, "description"),
        capabilities: list(value, "capabilities"),
        responsibilities: list(value, "responsibilities"),
    }
}

export function normalizeRoles(value: unknown): RoleSpec[] {
    return records(value)
        .map(normalizeRole)
        .filter((role): role is RoleSpec => role !== null)
}

/** `position` is 1-based and names tasks that arrive without an id. */
export function normalizeTask(
    value: JsonRecord,
    position: number
): WorkflowTask {
    const status = pick(value, "status")
    return {
        id: str(value, "id") || `task_${position}`,
        name: str(value, "name"),
        description: str(value, "description"),
        assignedTo: str(value, "assignedTo", "assigned_to"),
        dependsOn: list(value, "dependsOn", "depends_on"),
        expectedOutput: str(value, "expectedOutput", "expected_output"),
        status: isTaskStatus(status) ? status : "pending",
    }
}

export function normalizeTasks(value: unknown): WorkflowTask[] {
    return records(value).map((task, index) => normalizeTask(task, index + 1))
}

export function normalizeBindings(value: unknown): AgentBinding[] {
    return records(value)
        .map((binding) => ({
            name: str(binding, "name"),
            role: str(binding, "role"),
            description: str(binding, "description"),
            capabilities: list(binding, "capabilities"),
            responsibilities: list(binding, "responsibilities"),
        }))
        .filter((binding) => binding.name && binding.role)
}

export function normalizeArtifacts(value: unknown): ArtifactRecord[] {
    return records(value)
        .map((artifact) => ({
            name: str(artifact, "name"),
            description: str(artifact, "description"),
            filename: str(artifact, "filename"),
            createdBy: str(artifact, "createdBy", "created_by"),
            createdAt: str(artifact, "createdAt", "created_at"),
            taskId: str(artifact, "taskId", "task_id"),
        }))
        .filter((artifact) => artifact.filename)
}

export function normalizeTaskOutput(value: unknown): TaskOutput | null {
    if (!isRecord(value)) return null
    return {
        summary: readString(value, "summary"),
        result: readString(value, "result"),
    }
}

export function normalizeMemory(value: unknown): Record<string, TaskOutput> {
    const memory: Record<string, TaskOutput> = {}
    if (!isRecord(value)) return memory
    for (const [taskId, entry] of Object.entries(value)) {
        const output = normalizeTaskOutput(entry)
        if (output) memory[taskId] = output
    }
    return memory
}

export function normalizeHistory(value: unknown): HistoryEntry[] {
    const entries: HistoryEntry[] = []
    for (const entry of records(value)) {
        const status = pick(entry, "status")
        if (!isHistoryStatus(status)) continue
        const agent = pick(entry, "agent")
        entries.push({
            workflowId: str(entry, "workflowId", "workflow_id"),
            taskId: str(entry, "taskId", "task_id"),
            agent: typeof agent === "string" ? agent : null,
            timestamp: str(entry, "timestamp"),
            status,
            message: str(entry, "message"),
        })
    }
    return entries
}

export function normalizeFeedbackHistory(value: unknown): FeedbackEntry[] {
    return records(value).map((entry) => ({
        feedback: readString(entry, "feedback"),
        analysis: str(entry, "analysis"),
        changesNeeded: list(entry, "changesNeeded", "changes_needed"),
        tasksToUpdate: list(entry, "tasksToUpdate", "tasks_to_update"),
        newTaskIds: list(entry, "newTaskIds", "new_task_ids"),
        timestamp: str(entry, "timestamp"),
    }))
}
