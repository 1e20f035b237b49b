import OpenAI from "openai"

import { errorMessage, OracleError, toError } from "../core/errors.js"
import type {
    LLMMessage,
    LLMProvider,
    LLMResponse,
    ModelConfig,
} from "../types.js"

export interface OpenAIProviderOptions {
    apiKey: string
    baseURL?: string
}

export class OpenAIProvider implements LLMProvider {
    private readonly client: OpenAI

    constructor(options: OpenAIProviderOptions) {
        this.client = new OpenAI({
            apiKey: options.apiKey,
            baseURL: options.baseURL,
        })
    }

    public async chat(
        messages: LLMMessage[],
        model: ModelConfig
    ): Promise<LLMResponse> {
        try {
            const response = await this.client.chat.completions.create({
                model: model.model,
                messages: messages.map(toOpenAIMessage),
                temperature: model.temperature,
                max_tokens: model.maxTokens,
            })

            const choice = response.choices[0]
            if (!choice) {
                throw new OracleError("OpenAI returned no choices")
            }

            return {
                content: choice.message.content,
                model: response.model,
                usage: {
                    promptTokens: response.usage?.prompt_tokens ?? 0,
                    completionTokens: response.usage?.completion_tokens ?? 0,
                    totalTokens: response.usage?.total_tokens ?? 0,
                },
            }
        } catch (error) {
            if (error instanceof OracleError) throw error
            throw new OracleError(
                `OpenAI API error: ${errorMessage(error)}`,
                toError(error)
            )
        }
    }
}

function toOpenAIMessage(msg: LLMMessage): OpenAI.ChatCompletionMessageParam {
    switch (msg.role) {
        case "system":
            return { role: "system", content: msg.content }
        case "user":
            return { role: "user", content: msg.content }
        case "assistant":
            return { role: "assistant", content: msg.content }
    }
}
