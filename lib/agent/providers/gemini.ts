import { FinishReason, GoogleGenerativeAI } from '@google/generative-ai'
import type { LLMProvider, LLMRequest, LLMResponse } from '../provider-interface'

export class GeminiProvider implements LLMProvider {
    private client: GoogleGenerativeAI
    private modelName: string

    constructor(apiKey: string, modelName?: string) {
        this.client = new GoogleGenerativeAI(apiKey)
        this.modelName = modelName || 'gemini-2.5-flash'
    }

    async generateResponse(request: LLMRequest): Promise<LLMResponse> {
        const model = this.client.getGenerativeModel({
            model: this.modelName,
            systemInstruction: request.systemPrompt,
            generationConfig: {
                maxOutputTokens: request.maxTokens || 8192,
                temperature: request.temperature ?? 1.0,
            },
        })

        const history = request.messages.slice(0, -1).map(m => ({
            role: m.role === 'assistant' ? 'model' : 'user',
            parts: [{ text: m.content }],
        }))
        const lastMessage = request.messages[request.messages.length - 1]?.content ?? ''

        const chat = model.startChat({ history })
        const result = await chat.sendMessage(lastMessage)
        const response = result.response

        let text = ''
        try {
            text = response.text()
        } catch (e) {
            // text() throws when the candidate was blocked or carries no text parts
            console.warn('[LLM] Gemini returned no text:', e)
        }

        const finishReason = response.candidates?.[0]?.finishReason
        const usageMetadata = response.usageMetadata

        return {
            content: text,
            model: this.modelName,
            usage: {
                inputTokens: usageMetadata?.promptTokenCount || 0,
                outputTokens: usageMetadata?.candidatesTokenCount || 0,
            },
            truncated: finishReason === FinishReason.MAX_TOKENS,
        }
    }
}
