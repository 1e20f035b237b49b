import Anthropic from "@anthropic-ai/sdk"

import { errorMessage, OracleError, toError } from "../core/errors.js"
import type {
    LLMMessage,
    LLMProvider,
    LLMResponse,
    ModelConfig,
} from "../types.js"

export class AnthropicProvider implements LLMProvider {
    private readonly client: Anthropic

    constructor(apiKey: string) {
        this.client = new Anthropic({ apiKey })
    }

    public async chat(
        messages: LLMMessage[],
        model: ModelConfig
    ): Promise<LLMResponse> {
        try {
            const { system, conversation } = splitSystem(messages)
            const response = await this.client.messages.create({
                model: model.model,
                system: system || undefined,
                messages: conversation,
                temperature: model.temperature,
                max_tokens: model.maxTokens ?? 4096,
            })

            let text = ""
            for (const block of response.content) {
                if (block.type === "text") text += block.text
            }

            return {
                content: text || null,
                model: response.model,
                usage: {
                    promptTokens: response.usage.input_tokens,
                    completionTokens: response.usage.output_tokens,
                    totalTokens:
                        response.usage.input_tokens +
                        response.usage.output_tokens,
                },
            }
        } catch (error) {
            throw new OracleError(
                `Anthropic API error: ${errorMessage(error)}`,
                toError(error)
            )
        }
    }
}

function splitSystem(messages: LLMMessage[]): {
    system: string
    conversation: Anthropic.MessageParam[]
} {
    let system = ""
    const conversation: Anthropic.MessageParam[] = []
    for (const msg of messages) {
        if (msg.role === "system") {
            system += (system ? "\n\n" : "") + msg.content
        } else {
            conversation.push({ role: msg.role, content: msg.content })
        }
    }
    return { system, conversation }
}
