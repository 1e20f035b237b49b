import { errorMessage, OracleError, toError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EventBus } from "../events/EventBus.js"
import type { LLMMessage, LLMProvider, ModelConfig, Oracle } from "../types.js"

export const DEFAULT_RETRY_DELAYS = [1000, 2000, 4000]

const SYSTEM_PROMPT =
    "You are a precise assistant inside a task-orchestration system. " +
    "When a prompt asks for JSON, reply with JSON only."

export interface LLMOracleOptions {
    provider: LLMProvider | undefined
    model: ModelConfig
    eventBus?: EventBus
    retryDelays?: number[]
    systemPrompt?: string
}

/**
 * Single-prompt completion over a chat provider, with retry on transient
 * failures. Raises OracleError when unconfigured, on transport failure or
 * on an empty completion.
 */
export class LLMOracle implements Oracle {
    private readonly provider: LLMProvider | undefined
    private readonly model: ModelConfig
    private readonly eventBus: EventBus | undefined
    private readonly retryDelays: number[]
    private readonly systemPrompt: string

    constructor(options: LLMOracleOptions) {
        this.provider = options.provider
        this.model = options.model
        this.eventBus = options.eventBus
        this.retryDelays = options.retryDelays ?? DEFAULT_RETRY_DELAYS
        this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT
    }

    public async complete(prompt: string): Promise<string> {
        const provider = this.provider
        if (!provider) {
            throw new OracleError(
                `No ${this.model.provider} provider configured (missing API key)`
            )
        }

        const messages: LLMMessage[] = [
            { role: "system", content: this.systemPrompt },
            { role: "user", content: prompt },
        ]
        const maxAttempts = this.retryDelays.length + 1

        for (let attempt = 0; ; attempt++) {
            const startedAt = Date.now()
            try {
                const response = await provider.chat(messages, this.model)
                this.eventBus?.emit({
                    type: "oracle:call",
                    model: response.model || this.model.model,
                    usage: response.usage,
                    duration: Date.now() - startedAt,
                    attempt: attempt + 1,
                })
                const content = response.content?.trim()
                if (!content) {
                    throw new OracleError("LLM returned an empty completion")
                }
                return content
            } catch (error) {
                const delay = this.retryDelays[attempt]
                if (delay === undefined || !isRetryableError(error)) {
                    log.llm(
                        "Completion failed (attempt %d/%d): %s",
                        attempt + 1,
                        maxAttempts,
                        errorMessage(error)
                    )
                    if (error instanceof OracleError) throw error
                    throw new OracleError(errorMessage(error), toError(error))
                }
                log.llm(
                    "Completion failed (attempt %d/%d), retrying in %dms: %s",
                    attempt + 1,
                    maxAttempts,
                    delay,
                    errorMessage(error)
                )
                await sleep(delay)
            }
        }
    }
}

export function isRetryableError(error: unknown): boolean {
    if (!(error instanceof Error)) return false
    const msg = `${error.message} ${error.cause instanceof Error ? error.cause.message : ""}`.toLowerCase()
    if (msg.includes("429") || msg.includes("rate limit")) return true
    if (msg.includes("500") || msg.includes("502") || msg.includes("503")) {
        return true
    }
    return msg.includes("timeout") || msg.includes("econnreset")
}

/** Completion that never throws: failures come back as "LLM Error: ..." text. */
export async function askOracle(oracle: Oracle, prompt: string): Promise<string> {
    try {
        return await oracle.complete(prompt)
    } catch (error) {
        log.llm("Oracle call failed: %s", errorMessage(error))
        return `LLM Error: ${errorMessage(error)}`
    }
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}
