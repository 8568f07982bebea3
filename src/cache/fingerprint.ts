/**
 * Cache fingerprint: SHA-256 over a canonical JSON encoding of everything
 * that changes an analysis result for a URL.
 */

import { createHash } from 'crypto'

export interface FingerprintInput {
  url: string
  analyzers: Array<{ name: string; config: unknown }>
  scoring: unknown
  processor: unknown
}

/**
 * Lower-cased scheme and host (via URL), no fragment. The path is kept as
 * URL serializes it: /a and /a/ are different resources.
 */
export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url)
    parsed.hash = ''
    return parsed.toString()
  } catch {
    return url
  }
}

/**
 * JSON with object keys sorted at every level, so equal values always encode
 * to the same string
 */
export function canonicalJson(value: unknown): string {
  if (value === undefined) return 'null'
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null'
  }
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString())
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`
  }
  const entries = Object.entries(value)
    .filter(([, entry]) => entry !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  return `{${entries.map(([key, entry]) => `${JSON.stringify(key)}:${canonicalJson(entry)}`).join(',')}}`
}

export function computeFingerprint(input: FingerprintInput): string {
  const analyzers = [...input.analyzers].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  const canonical = canonicalJson({
    url: normalizeUrl(input.url),
    analyzers: analyzers.map((analyzer) => analyzer.name),
    analyzerConfig: Object.fromEntries(analyzers.map((analyzer) => [analyzer.name, analyzer.config])),
    scoring: input.scoring,
    processor: input.processor,
  })
  return createHash('sha256').update(canonical).digest('hex')
}
