import { errorMessage, ToolExecutionError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { ToolRegistry } from "../tools/ToolRegistry.js"
import type {
    Agent,
    AgentMetadata,
    FinalResponse,
    Oracle,
    ToolExecutionResult,
} from "../types.js"

/** What every agent is constructed with. */
export interface AgentDependencies {
    oracle: Oracle
    tools: ToolRegistry
    workingDirectory: string
}

export abstract class BaseAgent implements Agent {
    public readonly name: string
    public readonly metadata: AgentMetadata
    protected readonly oracle: Oracle
    private readonly registry: ToolRegistry
    private readonly workingDirectory: string
    private readonly enabledTools: Set<string> = new Set()

    constructor(name: string, metadata: AgentMetadata, deps: AgentDependencies) {
        this.name = name
        this.metadata = metadata
        this.oracle = deps.oracle
        this.registry = deps.tools
        this.workingDirectory = deps.workingDirectory
    }

    /** Makes a tool from the shared registry available to this agent. */
    protected registerTool(toolName: string): void {
        if (!this.registry.has(toolName)) {
            throw new ToolExecutionError(
                toolName,
                `${this.name} requires tool ${toolName}, which is not registered`
            )
        }
        this.enabledTools.add(toolName)
    }

    /** Runs a tool; an error result is raised as ToolExecutionError. */
    public async useTool(
        toolName: string,
        args: Record<string, unknown>
    ): Promise<ToolExecutionResult> {
        if (!this.enabledTools.has(toolName)) {
            throw new ToolExecutionError(
                toolName,
                `Tool '${toolName}' not found for ${this.name}`
            )
        }
        const result = await this.registry.execute(toolName, args, {
            workingDirectory: this.workingDirectory,
            oracle: this.oracle,
        })
        if (result.isError) {
            throw new ToolExecutionError(toolName, result.content)
        }
        return result
    }

    public async generateFinalResponse(prompt: string): Promise<FinalResponse> {
        if (!prompt.trim()) {
            return { text: "Error: Empty prompt received.", elapsedSeconds: 0 }
        }
        const startedAt = Date.now()
        try {
            const text = await this.oracle.complete(prompt)
            return { text: text.trim(), elapsedSeconds: elapsed(startedAt) }
        } catch (error) {
            log.agent("%s failed to respond: %s", this.name, errorMessage(error))
            return {
                text: `LLM Error: ${errorMessage(error)}`,
                elapsedSeconds: elapsed(startedAt),
            }
        }
    }
}

function elapsed(startedAt: number): number {
    return (Date.now() - startedAt) / 1000
}
