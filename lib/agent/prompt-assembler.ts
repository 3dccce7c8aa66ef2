/**
 * Prompt Assembler
 *
 * Combines the fixed system prompt, the formatted training context and the
 * user's question into the messages sent to the completion service. The
 * question is passed through verbatim; classification only decides which
 * context is attached.
 */

import { COACH_SYSTEM_PROMPT } from './prompts'
import { type GenerationParams, getGenerationParams, isReasoningModel } from './token-budget'

export const USER_QUESTION_HEADER = '## User Question'

export const TRUNCATION_NOTICE =
    '*Note: This response was cut off because it reached the maximum output length. ' +
    'Ask a more specific question for a complete answer.*'

export interface AssembledPrompt {
    systemPrompt: string
    userPrompt: string
    params: GenerationParams
    reasoningModel: boolean
}

export interface CompletionResult {
    text: string
    truncated: boolean
}

export function buildUserPrompt(context: string, userQuery: string): string {
    return `${context}\n\n${USER_QUESTION_HEADER}\n${userQuery}`
}

export function assemblePrompt(context: string, userQuery: string, modelId: string): AssembledPrompt {
    return {
        systemPrompt: COACH_SYSTEM_PROMPT,
        userPrompt: buildUserPrompt(context, userQuery),
        params: getGenerationParams(modelId),
        reasoningModel: isReasoningModel(modelId),
    }
}

/** Appends the truncation notice when generation hit the length limit */
export function applyTruncationNotice(result: CompletionResult): string {
    return result.truncated ? `${result.text}\n\n${TRUNCATION_NOTICE}` : result.text
}
