import { writeFileSync, mkdirSync } from 'fs'
import { join, resolve } from 'path'

function timestamp() {
    return new Date().toISOString().replace(/:/g, '-')
}

/**
 * Dumps one LLM exchange as JSON under `logDir`. Logging never fails the
 * analysis: write errors are reported and the path is returned as null.
 */
export function writeLLMLog(logDir: string, prefix: string, data: Record<string, unknown>): string | null {
    const dir = resolve(logDir)
    const path = join(dir, `${prefix}-${timestamp()}.json`)
    try {
        mkdirSync(dir, { recursive: true })
        writeFileSync(path, JSON.stringify(data, null, 2))
        console.log(`[LLM Log] ${path}`)
        return path
    } catch (err) {
        console.error(`[LLM Log] Failed to write ${path}:`, err)
        return null
    }
}
