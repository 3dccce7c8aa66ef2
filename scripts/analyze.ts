/**
 * Ask a question about recent training.
 *
 *   npm run analyze -- "How did my last 5 runs go?" [--days 60] [--debug]
 *   npm run analyze -- --setup
 */

import path from 'path'
import { parseArgs } from 'util'
import { TrainingAnalyzer } from '@/lib/agent/analyzer'
import { createLLMProvider } from '@/lib/agent/factory'
import { loadConfig, loadEnvFile } from '@/lib/config'
import { ConfigError, errorMessage } from '@/lib/errors'
import { IntervalsClient } from '@/lib/intervals/client'
import { parseLookback } from '@/lib/query/lookback'

const USAGE = `Usage: npm run analyze -- "<question>" [--days N] [--debug]
       npm run analyze -- --setup

Options:
  -d, --days N   Days of history to fetch (overrides any range in the question)
      --setup    Show configuration instructions
      --debug    Print stack traces on failure
  -h, --help     Show this message`

const SETUP_INSTRUCTIONS = `Setup
-----
1. Copy .env.example to .env
2. intervals.icu: Settings -> Developer Settings -> API Key
   INTERVALS_API=<api key>
   ATHLETE_ID=<athlete id, e.g. i123456>
3. Completion service (default openrouter):
   LLM_PROVIDER=openrouter | openai | anthropic | gemini
   OPENROUTER / OPENAI_API_KEY / ANTHROPIC_API_KEY / GEMINI_API_KEY=<key>
   LLM_MODEL=<model id> (optional)
4. Optional: DEFAULT_DAYS_LOOKBACK=30, LLM_LOG_DIR=logs

Example questions:
  "How was today's run?"
  "Analyze my last 5 runs"
  "How did my training go this week?"
  "What does my fitness trend look like over the last 6 weeks?"`

function parseDays(value: string | undefined): number | undefined {
    if (value === undefined) return undefined
    const days = Number.parseInt(value, 10)
    if (!Number.isInteger(days) || days <= 0) {
        throw new Error(`--days must be a positive integer, got "${value}"`)
    }
    return days
}

async function main(): Promise<number> {
    const { values, positionals } = parseArgs({
        allowPositionals: true,
        options: {
            days: { type: 'string', short: 'd' },
            setup: { type: 'boolean', default: false },
            debug: { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false },
        },
    })

    if (values.setup) {
        console.log(SETUP_INSTRUCTIONS)
        return 0
    }

    const query = positionals.join(' ').trim()
    if (values.help || !query) {
        console.log(USAGE)
        return values.help ? 0 : 1
    }

    try {
        loadEnvFile(path.resolve(process.cwd(), '.env'))
        const config = loadConfig()

        const explicitDays = parseDays(values.days)
        const lookback = parseLookback(query, config.defaultDaysLookback)
        const daysBack = explicitDays ?? lookback.daysBack

        console.log(`[Analyze] Fetching ${daysBack} days of training data...`)
        const intervals = new IntervalsClient(
            config.intervals.apiKey,
            config.intervals.athleteId,
            config.intervals.baseUrl
        )
        const data = await intervals.fetchTrainingData(daysBack)
        console.log(
            `[Analyze] ${data.activities.length} activities, ${data.wellness.length} wellness entries ` +
            `(${data.dateRange.start} to ${data.dateRange.end})`
        )

        const provider = createLLMProvider(config.llm)
        const analyzer = new TrainingAnalyzer(provider, config.llm.model, { logDir: config.llmLogDir })
        if (analyzer.reasoningModel) {
            console.log(`[Analyze] ${config.llm.model} is a reasoning model, this may take a while`)
        }

        const result = await analyzer.analyze(data, query)

        console.log(`\nFocus: ${result.scopeDescription}`)
        console.log(`Model: ${result.model}\n`)
        console.log(result.text)
        return 0
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`Configuration error: ${error.message}`)
            console.error('Run with --setup for configuration instructions.')
            return 1
        }
        console.error(`Error: ${errorMessage(error)}`)
        if (values.debug && error instanceof Error && error.stack) {
            console.error(error.stack)
        }
        return 1
    }
}

main()
    .then(code => {
        process.exitCode = code
    })
    .catch((error: unknown) => {
        console.error(error)
        process.exitCode = 1
    })
