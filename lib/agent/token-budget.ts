/**
 * Generation budget for analysis requests
 *
 * Reasoning models spend part of their output budget on hidden reasoning and
 * only accept the default temperature, so they get a larger budget and a
 * fixed temperature of 1.0.
 */

export interface GenerationParams {
  temperature: number
  maxOutputTokens: number
}

export const STANDARD_GENERATION: GenerationParams = {
  temperature: 0.7,
  maxOutputTokens: 4000,
}

export const REASONING_GENERATION: GenerationParams = {
  temperature: 1.0,
  maxOutputTokens: 16000,
}

/**
 * Model-name prefixes (after any `vendor/` segment) of reasoning models
 */
const REASONING_MODEL_PREFIXES = ['o1', 'o3', 'o4']

/**
 * Fragments that mark a reasoning model anywhere in its identifier
 */
const REASONING_MODEL_FRAGMENTS = [
  'gpt-5',
  'deepseek-r1',
  'deepseek-reasoner',
  'qwq',
  'thinking',
  'reasoning',
]

/**
 * @example
 * isReasoningModel('openai/o3-mini')          // true
 * isReasoningModel('deepseek/deepseek-r1')    // true
 * isReasoningModel('google/gemini-2.5-flash') // false
 */
export function isReasoningModel(modelId: string): boolean {
  const id = modelId.toLowerCase()
  const name = id.slice(id.lastIndexOf('/') + 1)

  return REASONING_MODEL_PREFIXES.some(prefix => name.startsWith(prefix))
    || REASONING_MODEL_FRAGMENTS.some(fragment => id.includes(fragment))
}

export function getGenerationParams(modelId: string): GenerationParams {
  return isReasoningModel(modelId) ? { ...REASONING_GENERATION } : { ...STANDARD_GENERATION }
}

/**
 * Estimate token count from text
 *
 * Uses rough approximation: 1 token ≈ 4 characters
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4)
}
