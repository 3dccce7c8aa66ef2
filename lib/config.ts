/**
 * Configuration
 *
 * Reads credentials and settings from the environment (optionally seeded from
 * a .env file) and validates them in one pass so every problem is reported
 * together.
 */

import * as fs from 'fs'
import { z } from 'zod'
import type { LLMSettings, ProviderName } from './agent/factory'
import { ConfigError } from './errors'

export const INTERVALS_BASE_URL = 'https://intervals.icu/api/v1'

export interface AppConfig {
    intervals: {
        apiKey: string
        athleteId: string
        baseUrl: string
    }
    llm: LLMSettings
    defaultDaysLookback: number
    llmLogDir?: string
}

const required = z.string().trim().min(1)

const EnvSchema = z.object({
    INTERVALS_API: required,
    ATHLETE_ID: required,
    LLM_PROVIDER: z.enum(['openrouter', 'openai', 'anthropic', 'gemini']).default('openrouter'),
    LLM_MODEL: required.optional(),
    OPENROUTER: z.string().optional(),
    OPENAI_API_KEY: z.string().optional(),
    ANTHROPIC_API_KEY: z.string().optional(),
    GEMINI_API_KEY: z.string().optional(),
    DEFAULT_DAYS_LOOKBACK: z.coerce.number().int().positive().default(30),
    INTERVALS_BASE_URL: z.string().url().default(INTERVALS_BASE_URL),
    LLM_LOG_DIR: z.string().optional(),
})

type Env = z.infer<typeof EnvSchema>

const API_KEY_VARIABLE = {
    openrouter: 'OPENROUTER',
    openai: 'OPENAI_API_KEY',
    anthropic: 'ANTHROPIC_API_KEY',
    gemini: 'GEMINI_API_KEY',
} as const satisfies Record<ProviderName, keyof Env>

const DEFAULT_MODEL: Record<ProviderName, string> = {
    openrouter: 'google/gemini-2.5-flash',
    openai: 'gpt-4o',
    anthropic: 'claude-sonnet-4-5-20250929',
    gemini: 'gemini-2.5-flash',
}

/**
 * Copies KEY=value lines from an env file into `target`. Variables already
 * set win. Quotes and inline comments are stripped. Returns false when the
 * file does not exist.
 */
export function loadEnvFile(envPath: string, target: NodeJS.ProcessEnv = process.env): boolean {
    if (!fs.existsSync(envPath)) return false

    const lines = fs.readFileSync(envPath, 'utf8').split('\n')
    for (const line of lines) {
        const trimmed = line.trim()
        if (!trimmed || trimmed.startsWith('#')) continue
        const eqIdx = trimmed.indexOf('=')
        if (eqIdx === -1) continue
        const key = trimmed.slice(0, eqIdx).trim()
        const rawVal = trimmed.slice(eqIdx + 1).replace(/\s#.*$/, '').trim()
        const val = rawVal.replace(/^["']|["']$/g, '')
        if (key && target[key] === undefined) target[key] = val
    }
    return true
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env)
    const problems = parsed.success
        ? []
        : parsed.error.issues.map(issue => issue.path.join('.'))

    // The key variable depends on the chosen provider
    const provider = EnvSchema.shape.LLM_PROVIDER.safeParse(env.LLM_PROVIDER)
    if (provider.success) {
        const keyVariable = API_KEY_VARIABLE[provider.data]
        if (!env[keyVariable]?.trim()) problems.push(keyVariable)
    }

    if (!parsed.success || problems.length > 0) {
        throw new ConfigError(
            `Missing or invalid environment variables: ${[...new Set(problems)].join(', ')}\n` +
            'Please add them to your .env file'
        )
    }

    const values = parsed.data
    const llmProvider = values.LLM_PROVIDER

    return {
        intervals: {
            apiKey: values.INTERVALS_API,
            athleteId: values.ATHLETE_ID,
            baseUrl: values.INTERVALS_BASE_URL,
        },
        llm: {
            provider: llmProvider,
            apiKey: values[API_KEY_VARIABLE[llmProvider]]?.trim() ?? '',
            model: values.LLM_MODEL ?? DEFAULT_MODEL[llmProvider],
        },
        defaultDaysLookback: values.DEFAULT_DAYS_LOOKBACK,
        llmLogDir: values.LLM_LOG_DIR || undefined,
    }
}
