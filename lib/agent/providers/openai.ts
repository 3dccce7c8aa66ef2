import OpenAI from 'openai'
import type {
    ChatCompletion,
    ChatCompletionCreateParamsNonStreaming,
    ChatCompletionMessageParam,
} from 'openai/resources/chat/completions'
import { CompletionFallbackError } from '../../errors'
import type { LLMProvider, LLMRequest, LLMResponse } from '../provider-interface'

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1'

/** The slice of the OpenAI client this provider calls */
export interface ChatCompletionsClient {
    chat: {
        completions: {
            create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>
        }
    }
}

export interface OpenAIProviderOptions {
    /** OpenAI-compatible endpoint, e.g. OpenRouter */
    baseURL?: string
    client?: ChatCompletionsClient
}

type RequestBody = Omit<ChatCompletionCreateParamsNonStreaming, 'max_tokens' | 'max_completion_tokens'>

function isParameterRejection(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'status' in error && error.status === 400
}

export class OpenAIProvider implements LLMProvider {
    private client: ChatCompletionsClient

    private modelName: string

    constructor(apiKey: string, modelName?: string, options: OpenAIProviderOptions = {}) {
        this.client = options.client ?? new OpenAI({ apiKey, baseURL: options.baseURL })
        this.modelName = modelName || 'gpt-4o'
    }

    async generateResponse(request: LLMRequest): Promise<LLMResponse> {
        const messages: ChatCompletionMessageParam[] = []

        if (request.systemPrompt) {
            messages.push({ role: 'system', content: request.systemPrompt })
        }

        for (const m of request.messages) {
            messages.push({ role: m.role, content: m.content })
        }

        const response = await this.createCompletion(
            { model: this.modelName, messages, temperature: request.temperature },
            request.maxTokens
        )

        const choice = response.choices[0]

        return {
            content: choice?.message.content || '',
            model: response.model,
            usage: {
                inputTokens: response.usage?.prompt_tokens || 0,
                outputTokens: response.usage?.completion_tokens || 0,
            },
            truncated: choice?.finish_reason === 'length',
        }
    }

    /**
     * Sends the token limit as `max_tokens`. Some models reject that name and
     * want `max_completion_tokens`; on a 400 the request is re-issued once with
     * the alternate name. Any other failure propagates unchanged.
     */
    private async createCompletion(body: RequestBody, maxTokens: number | undefined): Promise<ChatCompletion> {
        if (maxTokens === undefined) {
            return this.client.chat.completions.create(body)
        }

        try {
            return await this.client.chat.completions.create({ ...body, max_tokens: maxTokens })
        } catch (primaryError) {
            if (!isParameterRejection(primaryError)) throw primaryError

            console.warn(`[LLM] ${this.modelName} rejected max_tokens, retrying with max_completion_tokens`)
            try {
                return await this.client.chat.completions.create({ ...body, max_completion_tokens: maxTokens })
            } catch (fallbackError) {
                throw new CompletionFallbackError(primaryError, fallbackError)
            }
        }
    }
}
