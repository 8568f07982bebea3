/**
 * Error taxonomy for the analysis pipeline
 */

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export type CollectionErrorKind = 'TIMEOUT' | 'CONNECTION_ERROR' | 'HTTP_STATUS' | 'ROBOTS_DISALLOWED'

const RETRYABLE_STATUS_CODES = new Set([408, 425, 429, 500, 502, 503, 504])

/**
 * Raised by the collector. Non-fatal to a batch: recorded as a per-URL failure.
 */
export class CollectionError extends PipelineError {
  readonly kind: CollectionErrorKind
  readonly url: string
  readonly statusCode?: number
  readonly retryAfterMs?: number

  constructor(
    kind: CollectionErrorKind,
    url: string,
    message: string,
    options: { statusCode?: number; retryAfterMs?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause })
    this.kind = kind
    this.url = url
    this.statusCode = options.statusCode
    this.retryAfterMs = options.retryAfterMs
  }

  get retryable(): boolean {
    switch (this.kind) {
      case 'TIMEOUT':
      case 'CONNECTION_ERROR':
        return true
      case 'HTTP_STATUS':
        return this.statusCode !== undefined && RETRYABLE_STATUS_CODES.has(this.statusCode)
      case 'ROBOTS_DISALLOWED':
        return false
    }
  }

  static httpStatus(url: string, statusCode: number, retryAfterMs?: number): CollectionError {
    return new CollectionError('HTTP_STATUS', url, `HTTP ${statusCode} for ${url}`, { statusCode, retryAfterMs })
  }

  static robotsDisallowed(url: string): CollectionError {
    return new CollectionError('ROBOTS_DISALLOWED', url, `Blocked by robots.txt: ${url}`)
  }
}

/**
 * Never thrown to callers; the processor records its message as a warning.
 */
export class ProcessingError extends PipelineError {}

export class AnalyzerError extends PipelineError {
  readonly analyzerName: string

  constructor(analyzerName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`Analyzer "${analyzerName}" failed: ${detail}`, { cause })
    this.analyzerName = analyzerName
  }
}

export class UnknownAnalyzerError extends PipelineError {
  readonly analyzerName: string
  readonly available: string[]

  constructor(analyzerName: string, available: string[]) {
    super(`Unknown analyzer "${analyzerName}". Available: ${available.join(', ')}`)
    this.analyzerName = analyzerName
    this.available = available
  }
}

export class ConfigError extends PipelineError {}

export class CacheBackendError extends PipelineError {}
