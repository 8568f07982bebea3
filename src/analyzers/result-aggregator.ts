/**
 * Result Aggregator
 *
 * Merges per-analyzer results into one AnalysisResult:
 * - Overall score: weighted average over analyzers that completed
 * - Findings flattened in analyzer order, plus one INFO finding per failure
 * - Prioritized recommendations for every non-INFO finding
 */

import type {
  AnalysisResult,
  AnalysisStatus,
  AnalyzerFailure,
  AnalyzerResult,
  Effort,
  Finding,
  Priority,
  Recommendation,
  Severity,
  SeverityCounts,
} from '../types/analysis.js'
import { ScoringConfigSchema, parseConfig, type ScoringConfig, type ScoringConfigInput } from '../types/config.js'
import { deepFreeze } from '../utils/deep-freeze.js'

export interface MergeInput {
  url: string
  results: AnalyzerResult[]
  failures: AnalyzerFailure[]
  startedAt: Date
  completedAt: Date
}

export const FAILURE_CATEGORY = 'Analyzer Failure'

const SEVERITY_RANK: Record<Severity, number> = { CRITICAL: 0, HIGH: 1, MEDIUM: 2, LOW: 3, INFO: 4 }
const EFFORT_RANK: Record<Effort, number> = { easy: 0, medium: 1, hard: 2 }
const PRIORITY: Record<Severity, Priority> = { CRITICAL: 'P0', HIGH: 'P1', MEDIUM: 'P2', LOW: 'P3', INFO: 'P3' }

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function failureFinding(failure: AnalyzerFailure): Finding {
  return Object.freeze({
    analyzer: failure.analyzer,
    category: FAILURE_CATEGORY,
    severity: 'INFO',
    message: failure.message,
    remediation: `Check the logs for the "${failure.analyzer}" analyzer error; its score is excluded from the overall score.`,
  })
}

export function countSeverities(findings: readonly Finding[]): SeverityCounts {
  const counts: SeverityCounts = { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0, INFO: 0 }
  for (const finding of findings) {
    counts[finding.severity]++
  }
  return counts
}

export function statusOf(completed: number, failed: number): AnalysisStatus {
  if (completed === 0) return 'FAILED'
  return failed === 0 ? 'COMPLETED' : 'PARTIAL'
}

export class ResultAggregator {
  readonly config: ScoringConfig

  constructor(config: ScoringConfigInput = {}) {
    this.config = parseConfig(ScoringConfigSchema, config, 'scoring')
  }

  weightOf(analyzer: string): number {
    return this.config.analyzerWeights[analyzer] ?? 1
  }

  /**
   * Weighted average of the given scores, rounded to two decimals. Analyzers
   * that failed are simply absent, never counted as zero.
   */
  overallScore(results: readonly Pick<AnalyzerResult, 'analyzer' | 'score'>[]): number {
    if (results.length === 0) return 0

    let totalWeight = 0
    let weighted = 0
    for (const result of results) {
      const weight = this.weightOf(result.analyzer)
      totalWeight += weight
      weighted += weight * result.score
    }

    // Every weight zero: fall back to an unweighted mean
    const score =
      totalWeight > 0 ? weighted / totalWeight : results.reduce((sum, result) => sum + result.score, 0) / results.length
    return Math.round(score * 100) / 100
  }

  /**
   * The returned result is deep-frozen: the cache hands the same object to
   * every caller that hits it.
   */
  merge(input: MergeInput): AnalysisResult {
    const analyzers: Record<string, AnalyzerResult> = {}
    for (const result of input.results) {
      analyzers[result.analyzer] = result
    }

    const findings = [...input.results.flatMap((result) => result.findings), ...input.failures.map(failureFinding)]

    return deepFreeze({
      url: input.url,
      overallScore: this.overallScore(input.results),
      analyzers,
      failures: input.failures,
      findings,
      severityCounts: countSeverities(findings),
      recommendations: this.recommend(findings),
      startedAt: input.startedAt,
      completedAt: input.completedAt,
      durationMs: input.completedAt.getTime() - input.startedAt.getTime(),
      status: statusOf(input.results.length, input.failures.length),
    })
  }

  /**
   * Recommendations sorted by severity, then effort (easy first), then
   * analyzer weight; ties broken by analyzer name and message
   */
  recommend(findings: readonly Finding[]): Recommendation[] {
    return findings
      .filter((finding) => finding.severity !== 'INFO')
      .map((finding): Recommendation => {
        const effort = finding.effort ?? 'medium'
        return {
          priority: PRIORITY[finding.severity],
          severity: finding.severity,
          analyzer: finding.analyzer,
          category: finding.category,
          title: finding.message,
          remediation: finding.remediation,
          location: finding.location,
          effort,
          quickWin: effort === 'easy' && SEVERITY_RANK[finding.severity] <= SEVERITY_RANK.HIGH,
        }
      })
      .sort(
        (a, b) =>
          SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
          EFFORT_RANK[a.effort] - EFFORT_RANK[b.effort] ||
          this.weightOf(b.analyzer) - this.weightOf(a.analyzer) ||
          compareStrings(a.analyzer, b.analyzer) ||
          compareStrings(a.title, b.title)
      )
  }
}
