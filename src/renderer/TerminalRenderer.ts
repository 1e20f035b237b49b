import chalk from "chalk"
import logUpdate from "log-update"

import { formatCost } from "../core/Pricing.js"
import type { EventBus } from "../events/EventBus.js"
import type { TaskweaveEvent } from "../events/types.js"
import type { CostSummary } from "../types.js"
import { formatDuration, formatTokens, truncate } from "./LogRenderer.js"
import type {
    CreateRendererOptions,
    Renderer,
    RenderNode,
    RenderNodeStatus,
} from "./types.js"

const STATUS_GLYPHS: Record<RenderNodeStatus, string> = {
    pending: chalk.dim("·"),
    running: chalk.blue("⟳"),
    completed: chalk.green("✓"),
    failed: chalk.red("✗"),
    skipped: chalk.yellow("↷"),
}

/** Live task tree for a workflow run or a routed request. */
export class TerminalRenderer implements Renderer {
    private readonly verbose: boolean
    private bus: EventBus | null = null
    private handler: ((event: TaskweaveEvent) => void) | null = null
    private nodes: RenderNode[] = []
    private nodeById: Map<string, RenderNode> = new Map()
    private title = ""
    private startedAt = 0
    private finalStatus: string | null = null
    private notes: string[] = []
    private cost: CostSummary | null = null
    private tickInterval: ReturnType<typeof setInterval> | null = null

    constructor(options?: CreateRendererOptions) {
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
        this.stopTick()
        if (this.nodes.length > 0 || this.title) logUpdate.done()
        this.bus = null
        this.handler = null
    }

    private startTick(): void {
        if (this.tickInterval) return
        this.tickInterval = setInterval(() => this.render(), 1000)
        this.tickInterval.unref()
    }

    private stopTick(): void {
        if (this.tickInterval) {
            clearInterval(this.tickInterval)
            this.tickInterval = null
        }
    }

    private handleEvent(event: TaskweaveEvent): void {
        switch (event.type) {
            case "workflow:created":
            case "workflow:planned":
            case "agent:resolved":
                if (this.verbose) this.note(formatNote(event))
                return
            case "workflow:start":
                this.reset(event.name)
                for (const taskId of event.taskIds) {
                    this.addNode(taskId, taskId)
                }
                this.startTick()
                break
            case "workflow:complete":
                this.finalStatus = event.status
                this.stopTick()
                break
            case "task:start": {
                const node = this.addNode(event.taskId, event.name)
                node.label = event.name
                node.status = "running"
                node.agentName = event.agentName
                node.startedAt = Date.now()
                break
            }
            case "task:complete":
                this.finish(event.taskId, "completed", event.summary)
                break
            case "task:failed":
                this.finish(event.taskId, "failed", event.error)
                break
            case "task:skipped":
                this.finish(
                    event.taskId,
                    "skipped",
                    `waiting on ${event.missing.join(", ")}`
                )
                break
            case "artifact:saved":
                this.nodeById.get(event.taskId)?.artifacts.push(event.filename)
                break
            case "executor:iteration_limit":
                this.note(
                    `iteration limit ${event.maxIterations} reached, ${event.remaining.length} tasks left`
                )
                break
            case "feedback:received":
                this.note(
                    `feedback: ${event.resetTaskIds.length} reset, ${event.newTaskIds.length} new`
                )
                return
            case "route:start": {
                if (event.depth === 0) {
                    this.reset(truncate(event.task, 60))
                    this.startTick()
                }
                const node = this.addNode(
                    `route-${this.nodes.length}`,
                    truncate(event.task, 50)
                )
                node.status = "running"
                node.startedAt = Date.now()
                break
            }
            case "route:agent": {
                const node = this.nodes[this.nodes.length - 1]
                if (node) node.agentName = event.agentName
                break
            }
            case "route:complete": {
                const node = [...this.nodes]
                    .reverse()
                    .find((n) => n.status === "running")
                if (node) {
                    node.status = event.status
                    node.completedAt = Date.now()
                }
                if (!this.nodes.some((n) => n.status === "running")) {
                    this.finalStatus = event.status
                    this.stopTick()
                }
                break
            }
            case "oracle:call":
                return
            case "cost:update":
                this.cost = event.summary
                break
        }
        this.render()
    }

    private reset(title: string): void {
        this.title = title
        this.nodes = []
        this.nodeById.clear()
        this.notes = []
        this.finalStatus = null
        this.startedAt = Date.now()
    }

    private addNode(id: string, label: string): RenderNode {
        const existing = this.nodeById.get(id)
        if (existing) return existing
        const node: RenderNode = {
            id,
            label,
            status: "pending",
            artifacts: [],
        }
        this.nodes.push(node)
        this.nodeById.set(id, node)
        return node
    }

    private finish(
        taskId: string,
        status: RenderNodeStatus,
        summary: string
    ): void {
        const node = this.addNode(taskId, taskId)
        node.status = status
        node.completedAt = Date.now()
        node.summary = summary
    }

    private note(text: string): void {
        this.notes.push(text)
        if (!this.title) process.stdout.write(`${chalk.dim(text)}\n`)
    }

    private render(): void {
        const lines: string[] = []
        lines.push(`${chalk.bold.cyan("taskweave")}  ${chalk.dim(this.title)}`)
        lines.push(chalk.dim("│"))

        this.nodes.forEach((node, i) => {
            const isLast = i === this.nodes.length - 1
            this.renderNode(node, lines, isLast ? "└" : "├", isLast ? " " : "│")
        })

        for (const note of this.notes) {
            lines.push(chalk.yellow(`│  ${note}`))
        }

        const done = this.nodes.filter((n) => n.status === "completed").length
        const elapsed = this.startedAt
            ? formatDuration(Date.now() - this.startedAt)
            : ""
        const costPart = this.cost
            ? `  ·  ${formatTokens(this.cost.totalTokens.totalTokens)} tokens  ·  ${formatCost(this.cost.totalCost.totalCost)}`
            : ""
        lines.push(chalk.dim("│"))
        lines.push(
            chalk.dim(
                `${this.finalStatus ? "├" : "└"}─ ${done}/${this.nodes.length} done${costPart}${elapsed ? `  ·  ${elapsed}` : ""}`
            )
        )
        if (this.finalStatus) {
            const colour =
                this.finalStatus === "completed" ? chalk.green : chalk.red
            lines.push(colour(`╰─ ${this.finalStatus}`))
        }
        logUpdate(lines.join("\n"))
    }

    private renderNode(
        node: RenderNode,
        lines: string[],
        connector: string,
        childPrefix: string
    ): void {
        const elapsed =
            node.startedAt !== undefined
                ? formatDuration((node.completedAt ?? Date.now()) - node.startedAt)
                : ""
        lines.push(
            [
                chalk.dim(`${connector}─`),
                STATUS_GLYPHS[node.status],
                node.label,
                node.agentName ? chalk.magenta(node.agentName) : "",
                elapsed ? chalk.dim(elapsed) : "",
            ]
                .filter(Boolean)
                .join("  ")
        )

        const details: string[] = []
        if (node.summary && (this.verbose || node.status !== "completed")) {
            details.push(truncate(node.summary.replace(/\s+/g, " "), 100))
        } else if (node.summary) {
            details.push(truncate(node.summary.replace(/\s+/g, " "), 60))
        }
        for (const filename of node.artifacts) {
            details.push(`artifact: ${filename}`)
        }
        details.forEach((detail, i) => {
            const branch = i === details.length - 1 ? "└─" : "├─"
            lines.push(chalk.dim(`${childPrefix}  ${branch} ${detail}`))
        })
    }
}

function formatNote(
    event: Extract<
        TaskweaveEvent,
        { type: "workflow:created" | "workflow:planned" | "agent:resolved" }
    >
): string {
    switch (event.type) {
        case "workflow:created":
            return `created ${event.workflowId}`
        case "workflow:planned":
            return `planned ${event.taskCount} tasks across ${event.roleCount} roles`
        case "agent:resolved":
            return `${event.role} → ${event.agentName}${event.created ? " (new)" : ""}`
    }
}
