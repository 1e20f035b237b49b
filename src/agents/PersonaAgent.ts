import type { AgentBlueprint } from "../types.js"
import { BaseAgent, type AgentDependencies } from "./BaseAgent.js"
import { buildPersonaPrompt } from "./prompts.js"

/** Runs a synthesized blueprint: its instructions prefixed to every task. */
export class PersonaAgent extends BaseAgent {
    private readonly instructions: string

    constructor(blueprint: AgentBlueprint, deps: AgentDependencies) {
        super(
            blueprint.name,
            {
                description: blueprint.description,
                capabilities: blueprint.capabilities,
            },
            deps
        )
        this.instructions = blueprint.instructions
    }

    public act(task: string): Promise<string> {
        return this.oracle.complete(
            buildPersonaPrompt(this.instructions, this.metadata, task)
        )
    }
}
