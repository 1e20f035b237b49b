import {
    isProviderType,
    isRendererType,
    loadEnvFile,
    loadRcConfig,
} from "../core/Config.js"
import { ConfigError } from "../core/errors.js"
import type { LLMProviderType, RendererType, TaskweaveConfig } from "../types.js"

export interface CliFlags {
    provider?: string
    model?: string
    renderer?: string
    verbose?: boolean
    maxIterations?: number
}

function parseProvider(value: string | undefined): LLMProviderType | undefined {
    if (value === undefined) return undefined
    if (!isProviderType(value)) {
        throw new ConfigError(`Unknown provider "${value}" (expected openai or anthropic)`)
    }
    return value
}

function parseRenderer(value: string | undefined): RendererType | undefined {
    if (value === undefined) return undefined
    if (!isRendererType(value)) {
        throw new ConfigError(`Unknown renderer "${value}" (expected terminal, log or none)`)
    }
    return value
}

/**
 * Flags, then the environment (with .env filling unset variables), then
 * the rc file, then defaults.
 */
export async function resolveConfig(
    flags: CliFlags,
    cwd: string,
    env: NodeJS.ProcessEnv = process.env
): Promise<TaskweaveConfig> {
    await loadEnvFile(cwd, env)
    const rc = await loadRcConfig(cwd)
    const maxIterations = flags.maxIterations ?? rc.maxIterations
    if (maxIterations !== undefined && (!Number.isInteger(maxIterations) || maxIterations < 1)) {
        throw new ConfigError("maxIterations must be a positive integer")
    }

    return {
        ...rc,
        workingDirectory: cwd,
        openaiApiKey: env.OPENAI_API_KEY || rc.openaiApiKey,
        anthropicApiKey: env.ANTHROPIC_API_KEY || rc.anthropicApiKey,
        baseUrl: env.TASKWEAVE_BASE_URL || rc.baseUrl,
        provider: parseProvider(flags.provider) ?? rc.provider,
        model: flags.model ?? rc.model,
        renderer: parseRenderer(flags.renderer) ?? rc.renderer ?? "terminal",
        verbose: flags.verbose ?? rc.verbose ?? false,
        maxIterations,
    }
}
