/**
 * Content Analyzer
 *
 * Body text checks: length, readability (Flesch-Kincaid grade level),
 * keyword stuffing and coverage of configured target keywords. Stop words
 * come from data/stop-words.json.
 */

import { z } from 'zod'
import type { ParsedDocument } from '../types/page-data.js'
import { lazyData, readDataFile } from '../utils/data-files.js'
import { BaseAnalyzer, type AnalyzerOptions, type FindingInput } from './base-analyzer.js'

export const ContentConfigSchema = z
  .object({
    minWordCount: z.number().int().min(0).default(300),
    // Densities are percentages of the non-stop-word count
    minKeywordDensity: z.number().min(0).max(100).default(0.5),
    maxKeywordDensity: z.number().min(0).max(100).default(2.5),
    // Below this many content words, single-word density is not judged
    densitySampleSize: z.number().int().positive().default(100),
    maxGradeLevel: z.number().positive().default(12),
    targetKeywords: z.array(z.string().min(1)).default([]),
    stopWords: z.array(z.string()).default([]),
  })
  .refine((config) => config.minKeywordDensity <= config.maxKeywordDensity, {
    message: 'minKeywordDensity must not exceed maxKeywordDensity',
  })

export const getStopWords = lazyData(() => readDataFile('stop-words.json', z.array(z.string())))

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+(?:'[\p{L}]+)?/gu) ?? []
}

export function countSentences(text: string): number {
  return text.split(/(?<=[.!?])\s+/).filter((sentence) => /[\p{L}\p{N}]/u.test(sentence)).length
}

export function countSyllables(word: string): number {
  let count = 0
  let onVowel = false
  for (const char of word.toLowerCase()) {
    const isVowel = 'aeiouy'.includes(char)
    if (isVowel && !onVowel) count++
    onVowel = isVowel
  }
  if (word.endsWith('e')) count--
  if (word.endsWith('le') && word.length > 2) count++
  return Math.max(1, count)
}

/**
 * Flesch-Kincaid grade level, rounded to two decimals
 */
export function gradeLevel(words: readonly string[], sentences: number): number {
  if (words.length === 0 || sentences === 0) return 0
  const syllables = words.reduce((total, word) => total + countSyllables(word), 0)
  const grade = 0.39 * (words.length / sentences) + 11.8 * (syllables / words.length) - 15.59
  return Math.round(grade * 100) / 100
}

function density(count: number, total: number): number {
  return Math.round((count / total) * 10000) / 100
}

function occurrences(haystack: string, needle: string): number {
  let count = 0
  for (let index = haystack.indexOf(needle); index !== -1; index = haystack.indexOf(needle, index + needle.length)) {
    count++
  }
  return count
}

export class ContentAnalyzer extends BaseAnalyzer<typeof ContentConfigSchema> {
  private readonly stopWords: Set<string>

  constructor(config: unknown = {}, options: AnalyzerOptions = {}) {
    super('content', ContentConfigSchema, config, options)
    this.stopWords = new Set([...getStopWords(), ...this.config.stopWords.map((word) => word.toLowerCase())])
  }

  protected detect(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []
    const words = tokenize(doc.text)
    const contentWords = words.filter((word) => word.length > 1 && !this.stopWords.has(word))

    if (contentWords.length === 0) {
      findings.push({
        category: 'Content',
        severity: 'HIGH',
        message: 'Page has no meaningful text content',
        remediation: 'Add descriptive body text that covers the topic of the page.',
        effort: 'hard',
      })
      return findings
    }

    const { minWordCount, maxGradeLevel } = this.config
    if (words.length < minWordCount) {
      findings.push({
        category: 'Content',
        severity: 'MEDIUM',
        message: `Content is ${words.length} words, below the minimum of ${minWordCount}`,
        remediation: `Expand the body text to at least ${minWordCount} words of useful content.`,
        effort: 'hard',
      })
    }

    const grade = gradeLevel(words, countSentences(doc.text))
    if (grade > maxGradeLevel) {
      findings.push({
        category: 'Readability',
        severity: 'LOW',
        message: `Text reads at grade level ${grade}, above the target of ${maxGradeLevel}`,
        remediation: 'Use shorter sentences and simpler words.',
        effort: 'medium',
      })
    }

    findings.push(...this.detectStuffing(contentWords))
    findings.push(...this.detectTargetKeywords(doc.text.toLowerCase(), contentWords.length))
    return findings
  }

  private detectStuffing(contentWords: readonly string[]): FindingInput[] {
    if (contentWords.length < this.config.densitySampleSize) return []

    const counts = new Map<string, number>()
    for (const word of contentWords) {
      if (word.length > 3) counts.set(word, (counts.get(word) ?? 0) + 1)
    }

    return [...counts]
      .map(([word, count]) => ({ word, density: density(count, contentWords.length) }))
      .filter((entry) => entry.density > this.config.maxKeywordDensity)
      .sort((a, b) => b.density - a.density || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0))
      .map(
        (entry): FindingInput => ({
          category: 'Keywords',
          severity: 'MEDIUM',
          message: `"${entry.word}" makes up ${entry.density}% of the content, above ${this.config.maxKeywordDensity}%`,
          location: entry.word,
          remediation: `Use "${entry.word}" less often and vary the wording to avoid keyword stuffing.`,
          effort: 'medium',
        })
      )
  }

  private detectTargetKeywords(text: string, contentWordCount: number): FindingInput[] {
    const missing: string[] = []
    const rare: string[] = []

    for (const keyword of this.config.targetKeywords) {
      const count = occurrences(text, keyword.toLowerCase())
      if (count === 0) {
        missing.push(keyword)
      } else if (density(count, contentWordCount) < this.config.minKeywordDensity) {
        rare.push(keyword)
      }
    }

    const findings: FindingInput[] = []
    if (missing.length > 0) {
      findings.push({
        category: 'Keywords',
        severity: 'MEDIUM',
        message: `Target keywords missing from the content: ${missing.join(', ')}`,
        remediation: 'Work the missing target keywords into the body text and headings.',
        effort: 'medium',
      })
    }
    if (rare.length > 0) {
      findings.push({
        category: 'Keywords',
        severity: 'LOW',
        message: `Target keywords used below ${this.config.minKeywordDensity}% density: ${rare.join(', ')}`,
        remediation: 'Mention these keywords a few more times where they fit naturally.',
        effort: 'easy',
      })
    }
    return findings
  }
}
