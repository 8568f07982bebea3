/**
 * Base Analyzer
 *
 * Every analyzer is a pure function of (ParsedDocument, config): it reads the
 * frozen document, never performs I/O and returns a deterministic report.
 * Scoring is uniform: start at 100, deduct the configured weight for each
 * finding's severity, clamp to [0, 100].
 */

import type { z } from 'zod'
import type { AnalyzerReport, Finding } from '../types/analysis.js'
import type { ParsedDocument } from '../types/page-data.js'
import { SeverityWeightsSchema, parseConfig, type SeverityWeights } from '../types/config.js'

export interface Analyzer {
  readonly name: string
  // Validated config, part of the cache fingerprint
  readonly config: unknown
  analyze(doc: ParsedDocument): AnalyzerReport
}

export interface AnalyzerOptions {
  severityWeights?: SeverityWeights
}

export type FindingInput = Omit<Finding, 'analyzer'>

export function clampScore(score: number): number {
  return Math.min(100, Math.max(0, Math.round(score * 100) / 100))
}

export function scoreFindings(findings: readonly Pick<Finding, 'severity'>[], weights: SeverityWeights): number {
  const penalty = findings.reduce((total, finding) => total + weights[finding.severity], 0)
  return clampScore(100 - penalty)
}

export abstract class BaseAnalyzer<S extends z.ZodTypeAny> implements Analyzer {
  readonly name: string
  readonly config: z.output<S>
  protected readonly severityWeights: SeverityWeights

  constructor(name: string, schema: S, config: unknown, options: AnalyzerOptions = {}) {
    this.name = name
    this.config = parseConfig(schema, config, `${name} analyzer`)
    this.severityWeights = options.severityWeights ?? parseConfig(SeverityWeightsSchema, {}, 'severity weights')
  }

  analyze(doc: ParsedDocument): AnalyzerReport {
    const findings = this.detect(doc).map((finding): Finding => Object.freeze({ analyzer: this.name, ...finding }))
    Object.freeze(findings)
    return {
      analyzer: this.name,
      score: scoreFindings(findings, this.severityWeights),
      findings,
    }
  }

  protected abstract detect(doc: ParsedDocument): FindingInput[]
}
