import type { AgentMetadata } from "../types.js"
import { BaseAgent, type AgentDependencies } from "./BaseAgent.js"
import { buildPlanningPrompt } from "./prompts.js"

export const PLANNING_METADATA: AgentMetadata = {
    description: "Expert at planning and breaking tasks into steps",
    capabilities: ["planning", "task decomposition", "workflow", "organization"],
}

export class PlanningAgent extends BaseAgent {
    constructor(deps: AgentDependencies) {
        super("planning_agent", PLANNING_METADATA, deps)
    }

    public async generatePlan(goal: string): Promise<string> {
        const plan = await this.oracle.complete(buildPlanningPrompt(goal))
        return plan.trim()
    }

    public act(goal: string): Promise<string> {
        return this.generatePlan(goal)
    }
}
