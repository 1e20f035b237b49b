import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { type Mock, vi } from "vitest"

import type { CatalogEntry } from "../../agents/AgentCatalog.js"
import type {
    Agent,
    AgentMetadata,
    AgentOutput,
    LLMMessage,
    LLMProvider,
    LLMResponse,
    ModelConfig,
    Oracle,
} from "../../types.js"

export type MockOracle = Oracle & {
    complete: Mock<(prompt: string) => Promise<string>>
}

/** Replies in order; an Error entry is thrown for that call. */
export function createMockOracle(responses: Array<string | Error>): MockOracle {
    let callIndex = 0
    return {
        complete: vi.fn((_prompt: string): Promise<string> => {
            const response = responses[callIndex]
            callIndex++
            if (response === undefined) {
                return Promise.reject(
                    new Error(`No mock response for call index ${callIndex - 1}`)
                )
            }
            return response instanceof Error
                ? Promise.reject(response)
                : Promise.resolve(response)
        }),
    }
}

export type OracleRule = [match: string | RegExp, reply: string | Error]

/**
 * Replies by prompt content: the first rule whose pattern matches the
 * prompt answers. Unmatched prompts are rejected.
 */
export function createScriptedOracle(rules: OracleRule[]): MockOracle {
    return {
        complete: vi.fn((prompt: string): Promise<string> => {
            const rule = rules.find(([match]) =>
                typeof match === "string" ? prompt.includes(match) : match.test(prompt)
            )
            if (!rule) {
                return Promise.reject(
                    new Error(`No scripted reply for: ${prompt.slice(0, 80)}`)
                )
            }
            const reply = rule[1]
            return reply instanceof Error ? Promise.reject(reply) : Promise.resolve(reply)
        }),
    }
}

type ChatMock = Mock<LLMProvider["chat"]>

export function createMockProvider(
    responses: LLMResponse[]
): LLMProvider & { chat: ChatMock } {
    let callIndex = 0
    const chat: ChatMock = vi.fn(
        (_messages: LLMMessage[], _model: ModelConfig): Promise<LLMResponse> => {
            const response = responses[callIndex]
            if (!response) {
                return Promise.reject(
                    new Error(`No mock response for call index ${callIndex}`)
                )
            }
            callIndex++
            return Promise.resolve(response)
        }
    )
    return { chat }
}

export function mockResponse(content: string | null, model = "gpt-4o"): LLMResponse {
    return {
        content,
        usage: { promptTokens: 100, completionTokens: 50, totalTokens: 150 },
        model,
    }
}

/** A catalog entry whose agent answers every task with `act`. */
export function stubAgentEntry(
    name: string,
    act: (task: string) => Promise<AgentOutput>,
    metadata: AgentMetadata = { description: `Stub ${name}`, capabilities: [] }
): CatalogEntry & { act: Mock<(task: string) => Promise<AgentOutput>> } {
    const actMock = vi.fn(act)
    return {
        metadata,
        act: actMock,
        create: (): Agent => ({
            name,
            metadata,
            act: actMock,
            generateFinalResponse: (prompt) =>
                Promise.resolve({ text: prompt, elapsedSeconds: 0 }),
        }),
    }
}

export async function makeTempDir(prefix: string): Promise<string> {
    return mkdtemp(join(tmpdir(), `taskweave-${prefix}-`))
}

export async function removeTempDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true })
}
