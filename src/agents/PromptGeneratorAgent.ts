import { errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { AgentMetadata, FinalResponse } from "../types.js"
import { BaseAgent, type AgentDependencies } from "./BaseAgent.js"
import { buildRefinePrompt } from "./prompts.js"

export const PROMPT_GENERATOR_METADATA: AgentMetadata = {
    description: "Rewrites raw requests into clear, well-structured prompts",
    capabilities: ["prompt engineering", "prompt refinement", "clarification"],
}

export interface Refinement {
    prompt: string
    /** False when the oracle failed or replied with nothing. */
    refined: boolean
}

export class PromptGeneratorAgent extends BaseAgent {
    constructor(deps: AgentDependencies) {
        super("prompt_generator_agent", PROMPT_GENERATOR_METADATA, deps)
    }

    public async refine(input: string): Promise<Refinement> {
        try {
            const refined = (await this.oracle.complete(buildRefinePrompt(input))).trim()
            return refined ? { prompt: refined, refined: true } : { prompt: input, refined: false }
        } catch (error) {
            log.agent("Prompt refinement failed: %s", errorMessage(error))
            return { prompt: input, refined: false }
        }
    }

    /** Refined prompt, or the input unchanged when the oracle fails. */
    public async refinePrompt(input: string): Promise<string> {
        return (await this.refine(input)).prompt
    }

    public override async generateFinalResponse(
        input: string
    ): Promise<FinalResponse> {
        if (!input.trim()) {
            return { text: "Error: The input is empty.", elapsedSeconds: 0 }
        }
        return super.generateFinalResponse(await this.refinePrompt(input))
    }

    public async act(task: string): Promise<string> {
        const refined = await this.refinePrompt(task)
        return (await this.oracle.complete(refined)).trim()
    }
}
