import Anthropic from '@anthropic-ai/sdk'
import type { LLMProvider, LLMRequest, LLMResponse } from '../provider-interface'

export class AnthropicProvider implements LLMProvider {
    private client: Anthropic

    private modelName: string

    constructor(apiKey: string, modelName?: string) {
        this.client = new Anthropic({ apiKey })
        this.modelName = modelName || 'claude-sonnet-4-5-20250929'
    }

    async generateResponse(request: LLMRequest): Promise<LLMResponse> {
        const response = await this.client.messages.create({
            model: this.modelName,
            max_tokens: request.maxTokens || 1024,
            temperature: request.temperature,
            system: request.systemPrompt,
            messages: request.messages.map(m => ({
                role: m.role,
                content: m.content,
            })),
        })

        const content = response.content
            .map(block => (block.type === 'text' ? block.text : ''))
            .join('')

        return {
            content,
            model: response.model,
            usage: {
                inputTokens: response.usage.input_tokens,
                outputTokens: response.usage.output_tokens,
            },
            truncated: response.stop_reason === 'max_tokens',
        }
    }
}
