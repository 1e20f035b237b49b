import { readFile } from "node:fs/promises"
import { join } from "node:path"

import type {
    LLMProviderType,
    ModelConfig,
    RendererType,
    TaskweaveConfig,
} from "../types.js"
import { ConfigError, errorMessage } from "./errors.js"
import { isRecord } from "./json.js"

export const RC_FILENAME = ".taskweaverc.json"
export const DEFAULT_MAX_ITERATIONS = 10
export const DEFAULT_ROUTER_ITERATIONS = 3
export const DEFAULT_WORKSPACE_DIR = "workspace"
export const DEFAULT_DATA_DIR = ".taskweave"

const DEFAULT_MODELS: Record<LLMProviderType, ModelConfig> = {
    openai: {
        provider: "openai",
        model: "gpt-4o",
        temperature: 0.2,
        maxTokens: 4096,
    },
    anthropic: {
        provider: "anthropic",
        model: "claude-sonnet-4-20250514",
        temperature: 0.2,
        maxTokens: 4096,
    },
}

export function getDefaultModel(
    provider: LLMProviderType,
    overrides?: Pick<TaskweaveConfig, "model" | "temperature" | "maxTokens">
): ModelConfig {
    const base = DEFAULT_MODELS[provider]
    return {
        ...base,
        model: overrides?.model ?? base.model,
        temperature: overrides?.temperature ?? base.temperature,
        maxTokens: overrides?.maxTokens ?? base.maxTokens,
    }
}

/** Explicit provider wins; otherwise the first one with a key, OpenAI first. */
export function selectProvider(config: TaskweaveConfig): LLMProviderType {
    if (config.provider) return config.provider
    if (config.providers?.openai || config.openaiApiKey) return "openai"
    if (config.providers?.anthropic || config.anthropicApiKey) {
        return "anthropic"
    }
    return "openai"
}

export function workspacePathOf(config: TaskweaveConfig): string {
    return (
        config.workspacePath ??
        join(config.workingDirectory, DEFAULT_WORKSPACE_DIR)
    )
}

export function dataPathOf(config: TaskweaveConfig): string {
    return config.dataPath ?? join(config.workingDirectory, DEFAULT_DATA_DIR)
}

export function isProviderType(value: unknown): value is LLMProviderType {
    return value === "openai" || value === "anthropic"
}

export function isRendererType(value: unknown): value is RendererType {
    return value === "terminal" || value === "log" || value === "none"
}

type RcConfig = Omit<TaskweaveConfig, "workingDirectory" | "providers">

const STRING_KEYS = [
    "openaiApiKey",
    "anthropicApiKey",
    "baseUrl",
    "apiBaseUrl",
    "apiKey",
    "model",
    "workspacePath",
    "dataPath",
] as const

const NUMBER_KEYS = [
    "temperature",
    "maxTokens",
    "maxIterations",
    "routerMaxIterations",
] as const

const BOOLEAN_KEYS = ["verifyCapabilities", "verbose"] as const

/** Keeps the recognised, well-typed fields of a parsed rc document. */
export function parseRcConfig(value: unknown, source: string): RcConfig {
    if (!isRecord(value)) {
        throw new ConfigError(`${source} must contain a JSON object`)
    }
    const config: RcConfig = {}
    for (const key of STRING_KEYS) {
        const v = value[key]
        if (typeof v === "string") config[key] = v
    }
    for (const key of NUMBER_KEYS) {
        const v = value[key]
        if (typeof v === "number" && Number.isFinite(v)) config[key] = v
    }
    for (const key of BOOLEAN_KEYS) {
        const v = value[key]
        if (typeof v === "boolean") config[key] = v
    }
    if (isProviderType(value.provider)) config.provider = value.provider
    if (isRendererType(value.renderer)) config.renderer = value.renderer
    return config
}

export async function loadRcConfig(cwd: string): Promise<RcConfig> {
    const rcPath = join(cwd, RC_FILENAME)
    let content: string
    try {
        content = await readFile(rcPath, "utf-8")
    } catch {
        return {}
    }
    let parsed: unknown
    try {
        parsed = JSON.parse(content)
    } catch (parseError) {
        throw new ConfigError(
            `Invalid JSON in ${rcPath}: ${errorMessage(parseError)}`
        )
    }
    return parseRcConfig(parsed, rcPath)
}

export async function loadEnvFile(
    cwd: string,
    env: NodeJS.ProcessEnv = process.env
): Promise<void> {
    let content: string
    try {
        content = await readFile(join(cwd, ".env"), "utf-8")
    } catch {
        /* no .env file, that's fine */
        return
    }
    for (const line of content.split("\n")) {
        const trimmed = line.replace(/^export\s+/, "").trim()
        if (!trimmed || trimmed.startsWith("#")) continue
        const eqIndex = trimmed.indexOf("=")
        if (eqIndex === -1) continue
        const key = trimmed.slice(0, eqIndex).trim()
        const value = trimmed
            .slice(eqIndex + 1)
            .trim()
            .replace(/^(['"])(.*)\1$/, "$2")
        if (env[key] === undefined) env[key] = value
    }
}
