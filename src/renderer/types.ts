import type { EventBus } from "../events/EventBus.js"

export type RenderNodeStatus =
    | "pending"
    | "running"
    | "completed"
    | "failed"
    | "skipped"

export interface RenderNode {
    id: string
    label: string
    status: RenderNodeStatus
    agentName?: string
    startedAt?: number
    completedAt?: number
    summary?: string
    artifacts: string[]
}

export interface CreateRendererOptions {
    verbose?: boolean
    write?: (text: string) => void
}

export interface Renderer {
    attach(bus: EventBus): void
    detach(): void
}
