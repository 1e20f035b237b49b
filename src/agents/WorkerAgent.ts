import { log } from "../core/Logger.js"
import type { AgentMetadata } from "../types.js"
import { BaseAgent, type AgentDependencies } from "./BaseAgent.js"
import { buildExecutePrompt, buildThinkPrompt } from "./prompts.js"

export const WORKER_METADATA: AgentMetadata = {
    description: "General-purpose agent that analyzes a task, then completes it",
    capabilities: ["general tasks", "writing", "analysis", "problem solving"],
}

export class WorkerAgent extends BaseAgent {
    constructor(deps: AgentDependencies, name = "worker_agent") {
        super(name, WORKER_METADATA, deps)
    }

    public async think(task: string): Promise<string> {
        log.agent("%s thinking about: %s", this.name, task.slice(0, 80))
        return this.oracle.complete(buildThinkPrompt(task))
    }

    public async act(task: string): Promise<string> {
        const analysis = await this.think(task)
        return this.oracle.complete(buildExecutePrompt(task, analysis))
    }
}
