/**
 * Environment configuration
 *
 * Maps process environment variables onto the engine's config inputs. Unset
 * variables fall through to the schema defaults.
 */

import { z } from 'zod'
import type {
  CacheConfigInput,
  CollectorConfigInput,
  OrchestratorConfigInput,
  ProcessorConfigInput,
  ScoringConfigInput,
} from '../types/config.js'
import { parseConfig } from '../types/config.js'
import type { LogLevel } from '../utils/logger.js'

const emptyToUndefined = (value: unknown): unknown => (value === '' ? undefined : value)

const booleanFlag = z.preprocess(
  emptyToUndefined,
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform((value) => value === 'true' || value === '1' || value === 'yes')
    .optional()
)

const positiveNumber = z.preprocess(emptyToUndefined, z.coerce.number().positive().optional())
const positiveInt = z.preprocess(emptyToUndefined, z.coerce.number().int().positive().optional())
const nonNegativeInt = z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).optional())
const optionalString = z.preprocess(emptyToUndefined, z.string().optional())

export const EnvSchema = z.object({
  REQUESTS_PER_SECOND: positiveNumber,
  REQUEST_TIMEOUT_MS: positiveInt,
  MAX_RETRIES: nonNegativeInt,
  RETRY_DELAY_MS: nonNegativeInt,
  USER_AGENT: optionalString,
  VERIFY_SSL: booleanFlag,
  RESPECT_ROBOTS_TXT: booleanFlag,
  WORKERS: positiveInt,
  CACHE_TTL_SECONDS: positiveInt,
  CACHE_MAX_ENTRIES: positiveInt,
  SUPABASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  SUPABASE_SERVICE_KEY: optionalString,
  LOG_LEVEL: z.preprocess(emptyToUndefined, z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional()),
})

export interface SupabaseSettings {
  url: string
  serviceKey: string
}

export interface EngineConfig {
  collector: CollectorConfigInput
  processor: ProcessorConfigInput
  scoring: ScoringConfigInput
  cache: CacheConfigInput
  orchestrator: OrchestratorConfigInput
  supabase?: SupabaseSettings
  logLevel?: LogLevel
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const vars = parseConfig(EnvSchema, env, 'environment')

  const config: EngineConfig = {
    collector: {
      requestsPerSecond: vars.REQUESTS_PER_SECOND,
      timeoutMs: vars.REQUEST_TIMEOUT_MS,
      maxRetries: vars.MAX_RETRIES,
      retryDelayMs: vars.RETRY_DELAY_MS,
      userAgent: vars.USER_AGENT,
      verifySsl: vars.VERIFY_SSL,
      respectRobotsTxt: vars.RESPECT_ROBOTS_TXT,
    },
    processor: {},
    scoring: {},
    cache: {
      ttlMs: vars.CACHE_TTL_SECONDS === undefined ? undefined : vars.CACHE_TTL_SECONDS * 1000,
      maxEntries: vars.CACHE_MAX_ENTRIES,
    },
    orchestrator: {
      workers: vars.WORKERS,
    },
    logLevel: vars.LOG_LEVEL,
  }

  // Both or neither
  if (vars.SUPABASE_URL && vars.SUPABASE_SERVICE_KEY) {
    config.supabase = { url: vars.SUPABASE_URL, serviceKey: vars.SUPABASE_SERVICE_KEY }
  }

  return config
}
