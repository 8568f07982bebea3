/**
 * Stable JSON contract for AnalysisResult.
 *
 * The serialized form carries per-analyzer findings only; aggregated findings,
 * severity counts and recommendations are rebuilt by the aggregator on the
 * way back in. Durations are milliseconds, timestamps ISO 8601.
 */

import { z } from 'zod'
import {
  SEVERITIES,
  type AnalysisResult,
  type AnalyzerResult,
  type BatchEntryStatus,
  type BatchResult,
  type Finding,
} from '../types/analysis.js'
import type { ResultAggregator } from '../analyzers/result-aggregator.js'
import { PipelineError } from '../types/errors.js'

const SerializedFindingSchema = z.object({
  severity: z.enum(SEVERITIES),
  category: z.string(),
  message: z.string(),
  location: z.string().nullable(),
  remediation: z.string(),
  effort: z.enum(['easy', 'medium', 'hard']).nullable().optional(),
})

const SerializedAnalyzerSchema = z.object({
  score: z.number().min(0).max(100),
  duration: z.number().min(0),
  findings: z.array(SerializedFindingSchema),
})

export const SerializedResultSchema = z.object({
  url: z.string(),
  overall_score: z.number().min(0).max(100),
  analyzers: z.record(SerializedAnalyzerSchema),
  failures: z.array(z.object({ analyzer: z.string(), message: z.string() })).default([]),
  started_at: z.string().datetime({ offset: true }),
  completed_at: z.string().datetime({ offset: true }),
  duration: z.number().min(0),
  status: z.enum(['COMPLETED', 'PARTIAL', 'FAILED']),
})

export type SerializedResult = z.infer<typeof SerializedResultSchema>
export type SerializedFinding = z.infer<typeof SerializedFindingSchema>

export class SerializationError extends PipelineError {}

function serializeFinding(finding: Finding): SerializedFinding {
  return {
    severity: finding.severity,
    category: finding.category,
    message: finding.message,
    location: finding.location ?? null,
    remediation: finding.remediation,
    effort: finding.effort ?? null,
  }
}

export function serializeResult(result: AnalysisResult): SerializedResult {
  const analyzers: SerializedResult['analyzers'] = {}
  for (const [name, analyzer] of Object.entries(result.analyzers)) {
    analyzers[name] = {
      score: analyzer.score,
      duration: analyzer.durationMs,
      findings: analyzer.findings.map(serializeFinding),
    }
  }

  return {
    url: result.url,
    overall_score: result.overallScore,
    analyzers,
    failures: result.failures.map((failure) => ({ analyzer: failure.analyzer, message: failure.message })),
    started_at: result.startedAt.toISOString(),
    completed_at: result.completedAt.toISOString(),
    duration: result.durationMs,
    status: result.status,
  }
}

export function serializeResultToJson(result: AnalysisResult, space?: number): string {
  return JSON.stringify(serializeResult(result), null, space)
}

/**
 * Rebuild an AnalysisResult from its serialized form. Accepts either a JSON
 * string or an already-parsed value. The stored overall score is kept as is.
 */
export function deserializeResult(input: unknown, aggregator: ResultAggregator): AnalysisResult {
  let value = input
  if (typeof input === 'string') {
    try {
      value = JSON.parse(input)
    } catch (error) {
      throw new SerializationError('Serialized result is not valid JSON', { cause: error })
    }
  }

  const parsed = SerializedResultSchema.safeParse(value)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new SerializationError(`Invalid serialized result: ${details}`, { cause: parsed.error })
  }
  const data = parsed.data

  const results: AnalyzerResult[] = Object.entries(data.analyzers).map(([name, analyzer]) => ({
    analyzer: name,
    score: analyzer.score,
    durationMs: analyzer.duration,
    findings: analyzer.findings.map((finding): Finding => {
      const rebuilt: Finding = {
        analyzer: name,
        category: finding.category,
        severity: finding.severity,
        message: finding.message,
        remediation: finding.remediation,
      }
      if (finding.location !== null) rebuilt.location = finding.location
      if (finding.effort) rebuilt.effort = finding.effort
      return rebuilt
    }),
  }))

  const merged = aggregator.merge({
    url: data.url,
    results,
    failures: data.failures,
    startedAt: new Date(data.started_at),
    completedAt: new Date(data.completed_at),
  })

  return Object.freeze({
    ...merged,
    overallScore: data.overall_score,
    durationMs: data.duration,
    status: data.status,
  })
}

export interface SerializedBatchEntry {
  url: string
  status: BatchEntryStatus
  from_cache: boolean
  result?: SerializedResult
  error?: { kind: string; message: string; status_code?: number }
}

export interface SerializedBatch {
  entries: Record<string, SerializedBatchEntry>
  summary: Record<BatchEntryStatus, number>
  started_at: string
  completed_at: string
  duration: number
  cancelled: boolean
}

export function serializeBatch(batch: BatchResult): SerializedBatch {
  const entries: Record<string, SerializedBatchEntry> = {}
  for (const [url, entry] of Object.entries(batch.entries)) {
    const serialized: SerializedBatchEntry = { url: entry.url, status: entry.status, from_cache: entry.fromCache }
    if (entry.result) serialized.result = serializeResult(entry.result)
    if (entry.error) {
      serialized.error = { kind: entry.error.kind, message: entry.error.message }
      if (entry.error.statusCode !== undefined) serialized.error.status_code = entry.error.statusCode
    }
    entries[url] = serialized
  }

  return {
    entries,
    summary: { ...batch.summary },
    started_at: batch.startedAt.toISOString(),
    completed_at: batch.completedAt.toISOString(),
    duration: batch.durationMs,
    cancelled: batch.cancelled,
  }
}
