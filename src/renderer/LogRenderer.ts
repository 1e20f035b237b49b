import { formatCost } from "../core/Pricing.js"
import type { EventBus } from "../events/EventBus.js"
import type { TaskweaveEvent } from "../events/types.js"
import type { CreateRendererOptions, Renderer } from "./types.js"

/** One line per event, prefixed with the time since the first event. */
export class LogRenderer implements Renderer {
    private readonly write: (text: string) => void
    private readonly verbose: boolean
    private bus: EventBus | null = null
    private handler: ((event: TaskweaveEvent) => void) | null = null
    private startedAt = 0

    constructor(options?: CreateRendererOptions) {
        this.write =
            options?.write ?? ((text: string) => process.stdout.write(text))
        this.verbose = options?.verbose ?? false
    }

    public attach(bus: EventBus): void {
        this.bus = bus
        this.handler = (event: TaskweaveEvent): void => this.handleEvent(event)
        this.bus.on(this.handler)
    }

    public detach(): void {
        if (this.bus && this.handler) {
            this.bus.off(this.handler)
        }
        this.bus = null
        this.handler = null
    }

    private handleEvent(event: TaskweaveEvent): void {
        if (event.type === "oracle:call" && !this.verbose) return
        const line = formatLogLine(event)
        if (line) {
            this.write(`[${this.formatElapsed()}] ${line}\n`)
        }
    }

    private formatElapsed(): string {
        if (!this.startedAt) this.startedAt = Date.now()
        return formatElapsed(Date.now() - this.startedAt)
    }
}

export function formatElapsed(ms: number): string {
    const seconds = ms / 1000
    const minutes = Math.floor(seconds / 60)
    const secs = (seconds % 60).toFixed(1)
    return `${String(minutes).padStart(2, "0")}:${secs.padStart(4, "0")}`
}

export function formatLogLine(event: TaskweaveEvent): string | null {
    switch (event.type) {
        case "workflow:created":
            return `workflow:new    ${event.workflowId}  "${truncate(event.goal, 60)}"`
        case "workflow:planned":
            return `workflow:plan   ${event.workflowId}  ${event.taskCount} tasks  ${event.roleCount} roles`
        case "workflow:start":
            return `workflow:start  ${event.workflowId}  ${event.taskIds.length} tasks`
        case "workflow:complete":
            return `workflow:done   ${event.workflowId}  ${event.status}  ${formatDuration(event.duration)}`
        case "agent:resolved":
            return `agent:resolve   ${pad(event.role)}  ${event.agentName}${event.created ? "  (new)" : ""}`
        case "task:start":
            return `task:start      ${pad(event.taskId)}  ${event.agentName}  "${truncate(event.name, 40)}"`
        case "task:complete":
            return `task:done       ${pad(event.taskId)}  ${formatDuration(event.duration)}  "${truncate(event.summary, 60)}"`
        case "task:failed":
            return `task:failed     ${pad(event.taskId)}  ${truncate(event.error, 80)}`
        case "task:skipped":
            return `task:skipped    ${pad(event.taskId)}  waiting on ${event.missing.join(", ")}`
        case "artifact:saved":
            return `artifact:saved  ${pad(event.taskId)}  ${event.filename}`
        case "executor:iteration_limit":
            return `executor:limit  ${event.maxIterations} iterations  ${event.remaining.length} tasks left`
        case "feedback:received":
            return `feedback        ${event.workflowId}  reset ${event.resetTaskIds.length}  new ${event.newTaskIds.length}`
        case "route:start":
            return `route:start     depth ${event.depth}  "${truncate(event.task, 60)}"`
        case "route:agent":
            return `route:agent     ${event.agentName}${event.created ? "  (new)" : ""}`
        case "route:complete":
            return `route:done      ${event.agentName ?? "oracle"}  ${event.status}`
        case "oracle:call":
            return `oracle:call     ${event.model}  ${formatTokens(event.usage.totalTokens)} tok  ${formatDuration(event.duration)}`
        case "cost:update":
            return `cost:update     total ${formatCost(event.summary.totalCost.totalCost)}`
    }
}

function pad(str: string): string {
    return str.padEnd(16)
}

export function truncate(str: string, maxLen: number): string {
    if (str.length <= maxLen) return str
    return str.slice(0, maxLen - 1) + "…"
}

export function formatDuration(ms: number): string {
    const seconds = ms / 1000
    if (seconds < 60) return `${seconds.toFixed(1)}s`
    const minutes = Math.floor(seconds / 60)
    const remainingSeconds = Math.round(seconds % 60)
    return `${minutes}m${String(remainingSeconds).padStart(2, "0")}s`
}

export function formatTokens(total: number): string {
    if (total < 1000) return String(total)
    return `${(total / 1000).toFixed(1)}k`
}
