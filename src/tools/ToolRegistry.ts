import { errorMessage, toError, ToolExecutionError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type {
    ToolContext,
    ToolDefinition,
    ToolExecutionResult,
} from "../types.js"
import { BUILTIN_TOOLS, createApiTool, type ApiToolOptions } from "./definitions.js"

export class ToolRegistry {
    private readonly tools: Map<string, ToolDefinition> = new Map()

    constructor(tools: ToolDefinition[] = []) {
        for (const tool of tools) this.register(tool)
    }

    public register(tool: ToolDefinition): void {
        this.tools.set(tool.name, tool)
    }

    public get(name: string): ToolDefinition | undefined {
        return this.tools.get(name)
    }

    public has(name: string): boolean {
        return this.tools.has(name)
    }

    public names(): string[] {
        return [...this.tools.keys()]
    }

    public async execute(
        name: string,
        args: Record<string, unknown>,
        context: ToolContext
    ): Promise<ToolExecutionResult> {
        const tool = this.tools.get(name)
        if (!tool) {
            throw new ToolExecutionError(name, `Unknown tool: ${name}`)
        }
        const startedAt = Date.now()
        try {
            const result = await tool.execute(args, context)
            log.tool(
                "%s finished in %dms%s",
                name,
                Date.now() - startedAt,
                result.isError ? " (error)" : ""
            )
            return result
        } catch (error) {
            log.tool("%s threw: %s", name, errorMessage(error))
            if (error instanceof ToolExecutionError) throw error
            throw new ToolExecutionError(name, errorMessage(error), toError(error))
        }
    }
}

export interface DefaultToolOptions {
    api?: ApiToolOptions
}

export function createDefaultToolRegistry(
    options: DefaultToolOptions = {}
): ToolRegistry {
    const registry = new ToolRegistry(BUILTIN_TOOLS)
    if (options.api) registry.register(createApiTool(options.api))
    return registry
}
