/**
 * Training Analyzer
 *
 * question + provider payload -> intent -> scoped activities -> context
 * -> prompt -> one completion call -> text with truncation notice.
 */

import type { TrainingData } from '@/types/training'
import { buildFitnessTrend } from '../context/fitness-trend'
import {
    FULL_ACTIVITY_LIMIT,
    SCOPED_ACTIVITY_LIMIT,
    formatTrainingContext,
} from '../context/context-formatter'
import { writeLLMLog } from '../llm-logger'
import { filterActivities } from '../query/activity-filter'
import { RuleBasedQueryClassifier, type QueryClassifier } from '../query/classifier'
import type { QueryIntent } from '../query/types'
import { applyTruncationNotice, assemblePrompt, type AssembledPrompt } from './prompt-assembler'
import type { LLMProvider } from './provider-interface'
import { estimateTokens, isReasoningModel } from './token-budget'

export interface TrainingAnalyzerOptions {
    classifier?: QueryClassifier
    /** Write each exchange as JSON here; no logs when unset */
    logDir?: string
}

export interface PreparedAnalysis {
    intent: QueryIntent
    scopeDescription: string
    activityCount: number
    context: string
    prompt: AssembledPrompt
}

export interface AnalysisResult {
    text: string
    truncated: boolean
    intent: QueryIntent
    scopeDescription: string
    model: string
}

export class TrainingAnalyzer {
    private classifier: QueryClassifier

    constructor(
        private readonly provider: LLMProvider,
        private readonly modelId: string,
        private readonly options: TrainingAnalyzerOptions = {}
    ) {
        this.classifier = options.classifier ?? new RuleBasedQueryClassifier()
    }

    get reasoningModel(): boolean {
        return isReasoningModel(this.modelId)
    }

    /** Everything up to the completion call; pure apart from the clock */
    prepare(data: TrainingData, query: string, now: Date = new Date()): PreparedAnalysis {
        const intent = this.classifier.classify(query)
        const scoped = filterActivities(data.activities, intent, now)
        const trend = buildFitnessTrend(data.wellness)

        const context = formatTrainingContext(
            {
                profile: data.profile,
                activities: scoped.activities,
                wellness: data.wellness,
                scopeDescription: scoped.description,
                dateRange: data.dateRange,
                fitnessTrend: trend.length > 0 ? trend : undefined,
            },
            { maxActivities: intent.scope === 'all' ? FULL_ACTIVITY_LIMIT : SCOPED_ACTIVITY_LIMIT }
        )

        return {
            intent,
            scopeDescription: scoped.description,
            activityCount: scoped.activities.length,
            context,
            prompt: assemblePrompt(context, query, this.modelId),
        }
    }

    async analyze(data: TrainingData, query: string, now: Date = new Date()): Promise<AnalysisResult> {
        const prepared = this.prepare(data, query, now)
        const { prompt } = prepared

        console.log(
            `[Analyzer] scope=${prepared.intent.scope} activities=${prepared.activityCount} ` +
            `context≈${estimateTokens(prompt.userPrompt)} tokens maxOutput=${prompt.params.maxOutputTokens}`
        )

        const response = await this.provider.generateResponse({
            systemPrompt: prompt.systemPrompt,
            messages: [{ role: 'user', content: prompt.userPrompt }],
            temperature: prompt.params.temperature,
            maxTokens: prompt.params.maxOutputTokens,
        })

        if (response.truncated) {
            console.warn(`[Analyzer] Response truncated at ${response.usage.outputTokens} output tokens`)
        }

        if (this.options.logDir) {
            writeLLMLog(this.options.logDir, 'analysis', {
                model: response.model,
                query,
                intent: prepared.intent,
                params: prompt.params,
                systemPrompt: prompt.systemPrompt,
                userPrompt: prompt.userPrompt,
                response: response.content,
                truncated: response.truncated,
                usage: response.usage,
            })
        }

        return {
            text: applyTruncationNotice({ text: response.content, truncated: response.truncated }),
            truncated: response.truncated,
            intent: prepared.intent,
            scopeDescription: prepared.scopeDescription,
            model: response.model,
        }
    }
}
