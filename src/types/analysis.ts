/**
 * Analysis result types shared by analyzers, the aggregator, the cache and
 * the orchestrator.
 */

export const SEVERITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'INFO'] as const

export type Severity = (typeof SEVERITIES)[number]

export type Effort = 'easy' | 'medium' | 'hard'

export interface Finding {
  analyzer: string
  category: string
  severity: Severity
  message: string
  location?: string
  remediation: string
  effort?: Effort
}

/**
 * Deterministic output of a single analyzer run
 */
export interface AnalyzerReport {
  analyzer: string
  score: number
  findings: Finding[]
}

export interface AnalyzerResult extends AnalyzerReport {
  durationMs: number
}

export interface AnalyzerFailure {
  analyzer: string
  message: string
}

export type AnalysisStatus = 'COMPLETED' | 'PARTIAL' | 'FAILED'

export type Priority = 'P0' | 'P1' | 'P2' | 'P3'

export interface Recommendation {
  priority: Priority
  severity: Severity
  analyzer: string
  category: string
  title: string
  remediation: string
  location?: string
  effort: Effort
  quickWin: boolean
}

export type SeverityCounts = Record<Severity, number>

export interface AnalysisResult {
  url: string
  overallScore: number
  analyzers: Record<string, AnalyzerResult>
  failures: AnalyzerFailure[]
  findings: Finding[]
  severityCounts: SeverityCounts
  recommendations: Recommendation[]
  startedAt: Date
  completedAt: Date
  durationMs: number
  status: AnalysisStatus
}

export interface CacheEntry {
  fingerprint: string
  url: string
  payload: AnalysisResult
  createdAt: Date
  expiresAt: Date
}

export type BatchEntryStatus = AnalysisStatus | 'SKIPPED'

export interface BatchEntryError {
  kind: string
  message: string
  statusCode?: number
}

export interface BatchEntry {
  url: string
  status: BatchEntryStatus
  result?: AnalysisResult
  error?: BatchEntryError
  fromCache: boolean
}

export interface BatchResult {
  entries: Record<string, BatchEntry>
  summary: Record<BatchEntryStatus, number>
  startedAt: Date
  completedAt: Date
  durationMs: number
  cancelled: boolean
}
