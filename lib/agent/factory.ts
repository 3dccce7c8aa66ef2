import type { LLMProvider } from './provider-interface'
import { GeminiProvider } from './providers/gemini'
import { AnthropicProvider } from './providers/anthropic'
import { OPENROUTER_BASE_URL, OpenAIProvider } from './providers/openai'

export type ProviderName = 'openrouter' | 'openai' | 'anthropic' | 'gemini'

export const PROVIDER_NAMES: readonly ProviderName[] = ['openrouter', 'openai', 'anthropic', 'gemini']

export interface LLMSettings {
    provider: ProviderName
    apiKey: string
    model: string
}

export function createLLMProvider(settings: LLMSettings): LLMProvider {
    switch (settings.provider) {
        case 'anthropic':
            return new AnthropicProvider(settings.apiKey, settings.model)

        case 'openai':
            return new OpenAIProvider(settings.apiKey, settings.model)

        case 'gemini':
            return new GeminiProvider(settings.apiKey, settings.model)

        case 'openrouter':
        default:
            return new OpenAIProvider(settings.apiKey, settings.model, { baseURL: OPENROUTER_BASE_URL })
    }
}
