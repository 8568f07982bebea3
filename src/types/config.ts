import { z } from 'zod'
import { ConfigError } from './errors.js'

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; SeoPageAnalyzer/1.0)'

export const CollectorConfigSchema = z.object({
  requestsPerSecond: z.number().positive().default(2),
  burst: z.number().int().positive().default(1),
  timeoutMs: z.number().int().positive().default(30000),
  maxRetries: z.number().int().min(0).default(2),
  retryDelayMs: z.number().int().min(0).default(1000),
  maxRetryDelayMs: z.number().int().min(0).default(30000),
  headers: z.record(z.string()).default({}),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  verifySsl: z.boolean().default(true),
  respectRobotsTxt: z.boolean().default(true),
  robotsTtlMs: z.number().int().positive().default(60 * 60 * 1000),
  maxRedirects: z.number().int().min(0).default(5),
  maxContentLength: z.number().int().positive().default(10 * 1024 * 1024),
})

export type CollectorConfig = z.infer<typeof CollectorConfigSchema>

export const ProcessorConfigSchema = z.object({
  parser: z.enum(['parse5', 'htmlparser2']).default('parse5'),
  cleanWhitespace: z.boolean().default(true),
  normalizeUrls: z.boolean().default(true),
  removeComments: z.boolean().default(true),
  extractMetadata: z.boolean().default(true),
})

export type ProcessorConfig = z.infer<typeof ProcessorConfigSchema>

export const SeverityWeightsSchema = z.object({
  CRITICAL: z.number().min(0).default(30),
  HIGH: z.number().min(0).default(15),
  MEDIUM: z.number().min(0).default(7),
  LOW: z.number().min(0).default(3),
  INFO: z.number().min(0).default(0),
})

export type SeverityWeights = z.infer<typeof SeverityWeightsSchema>

export const ScoringConfigSchema = z.object({
  severityWeights: SeverityWeightsSchema.default({}),
  // Relative weight of each analyzer in the overall score; unlisted analyzers weigh 1
  analyzerWeights: z.record(z.number().min(0)).default({}),
})

export type ScoringConfig = z.infer<typeof ScoringConfigSchema>

export const CacheConfigSchema = z.object({
  enabled: z.boolean().default(true),
  ttlMs: z.number().int().positive().default(60 * 60 * 1000),
  maxEntries: z.number().int().positive().default(1000),
  sweepIntervalMs: z.number().int().min(0).default(0),
  backendTimeoutMs: z.number().int().positive().default(2000),
  bypassCooldownMs: z.number().int().min(0).default(30000),
})

export type CacheConfig = z.infer<typeof CacheConfigSchema>

export const OrchestratorConfigSchema = z.object({
  workers: z.number().int().positive().default(4),
  // 0 means one per available core
  analyzerConcurrency: z.number().int().min(0).default(0),
  defaultAnalyzers: z.array(z.string()).optional(),
  maxSitePages: z.number().int().positive().default(100),
})

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>

/**
 * Parse a config object against its schema, turning zod issues into a ConfigError
 */
export function parseConfig<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.output<S> {
  const parsed = schema.safeParse(input ?? {})
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid ${label} config: ${details}`, { cause: parsed.error })
  }
  return parsed.data
}

export type CollectorConfigInput = z.input<typeof CollectorConfigSchema>
export type ProcessorConfigInput = z.input<typeof ProcessorConfigSchema>
export type ScoringConfigInput = z.input<typeof ScoringConfigSchema>
export type CacheConfigInput = z.input<typeof CacheConfigSchema>
export type OrchestratorConfigInput = z.input<typeof OrchestratorConfigSchema>
