export interface LLMMessage {
    role: 'user' | 'assistant'
    content: string
}

export interface LLMResponse {
    content: string
    model: string
    usage: {
        inputTokens: number
        outputTokens: number
    }
    /** Generation stopped at the output token limit */
    truncated: boolean
}

export interface LLMRequest {
    messages: LLMMessage[]
    systemPrompt?: string
    maxTokens?: number
    temperature?: number
}

export interface LLMProvider {
    generateResponse(request: LLMRequest): Promise<LLMResponse>
}
