import type { Orchestrator } from "../orchestrator/Orchestrator.js"
import { formatFeedbackResult, formatListing, formatSummary } from "./format.js"

export type CliCommand =
    | { kind: "create"; goal: string; name?: string; maxIterations?: number }
    | { kind: "feedback"; workflowId: string; text: string }
    | { kind: "list" }
    | { kind: "open"; workflowId: string }
    | { kind: "route"; task: string }

export type CommandTarget = Pick<
    Orchestrator,
    "runWorkflow" | "feedback" | "list" | "open" | "routeTask"
>

/** Runs one command and returns the text to show. Failures are thrown. */
export async function executeCommand(
    target: CommandTarget,
    command: CliCommand
): Promise<string> {
    switch (command.kind) {
        case "create": {
            const result = await target.runWorkflow(command.goal, {
                name: command.name,
                maxIterations: command.maxIterations,
            })
            if (!result.ok) throw result.error
            const failures = result.agentFailures.map(
                (f) => `No agent for role ${f.role}: ${f.error}`
            )
            return [formatSummary(result.summary), ...failures].join("\n")
        }
        case "feedback": {
            const outcome = await target.feedback(command.workflowId, command.text)
            if (!outcome.ok) throw outcome.error
            return formatFeedbackResult(outcome.value)
        }
        case "list":
            return formatListing(await target.list())
        case "open":
            return formatSummary((await target.open(command.workflowId)).summary)
        case "route":
            return target.routeTask(command.task)
    }
}
