import { formatCost } from "../core/Pricing.js"
import type {
    CostSummary,
    TaskStatus,
    WorkflowListing,
    WorkflowSummary,
} from "../types.js"
import type { FeedbackResult } from "../workflow/FeedbackProcessor.js"

const STATUS_MARK: Record<TaskStatus, string> = {
    pending: "·",
    completed: "✓",
    failed: "✗",
    skipped: "-",
}

export function formatSummary(summary: WorkflowSummary): string {
    const lines = [
        `Workflow ${summary.workflowId}: ${summary.status}`,
        `Goal: ${summary.goal}`,
        `Workspace: ${summary.workspace}`,
    ]
    const taskIds = Object.keys(summary.taskStatuses)
    if (taskIds.length > 0) {
        lines.push("", "Tasks:")
        for (const id of taskIds) {
            const status = summary.taskStatuses[id] ?? "pending"
            const result = summary.taskResults[id]
            lines.push(
                `  ${STATUS_MARK[status]} ${id} [${status}]${result ? ` ${result}` : ""}`
            )
        }
    }
    if (summary.artifacts.length > 0) {
        lines.push("", "Artifacts:")
        for (const artifact of summary.artifacts) {
            lines.push(`  - ${artifact.filename}: ${artifact.fullPath}`)
        }
    }
    return lines.join("\n")
}

export function formatListing(workflows: WorkflowListing[]): string {
    if (workflows.length === 0) return "No workflows yet."
    return workflows
        .map((w) => `${w.id}  ${w.status}  ${w.taskCount} tasks  ${w.name}`)
        .join("\n")
}

export function formatFeedbackResult(result: FeedbackResult): string {
    const lines = [
        `Analysis: ${result.plan.analysis || "(none)"}`,
        `Reset: ${result.resetTaskIds.join(", ") || "none"}`,
        `New tasks: ${result.plan.newTasks.map((t) => t.id).join(", ") || "none"}`,
    ]
    if (result.summary) lines.push("", formatSummary(result.summary))
    return lines.join("\n")
}

export function formatCostLine(summary: CostSummary): string {
    return `Cost: ${formatCost(summary.totalCost.totalCost)} (${summary.totalTokens.totalTokens} tokens, ${summary.calls} calls)`
}
