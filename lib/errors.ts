export class ConfigError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'ConfigError'
    }
}

export class IntervalsApiError extends Error {
    constructor(
        message: string,
        readonly status: number,
        readonly url: string
    ) {
        super(message)
        this.name = 'IntervalsApiError'
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}

/**
 * Both the primary completion request and its one fallback failed.
 * Carries the two underlying errors; neither is dropped.
 */
export class CompletionFallbackError extends Error {
    constructor(
        readonly primaryError: unknown,
        readonly fallbackError: unknown
    ) {
        super(
            `Completion request failed: ${errorMessage(primaryError)}; ` +
            `fallback request also failed: ${errorMessage(fallbackError)}`,
            { cause: fallbackError }
        )
        this.name = 'CompletionFallbackError'
    }
}
