/**
 * Security Analyzer
 *
 * Checks transport security, security headers, form submission targets,
 * reverse tabnabbing and known-vulnerable JavaScript libraries.
 * Vulnerable library versions come from data/outdated-libraries.json.
 */

import { z } from 'zod'
import type { ParsedDocument } from '../types/page-data.js'
import { SEVERITIES } from '../types/analysis.js'
import { lazyData, readDataFile } from '../utils/data-files.js'
import { BaseAnalyzer, type AnalyzerOptions, type FindingInput } from './base-analyzer.js'

export const SecurityConfigSchema = z.object({
  // 180 days
  hstsMinMaxAge: z.number().int().min(0).default(15552000),
  checkOutdatedLibraries: z.boolean().default(true),
  checkInformationDisclosure: z.boolean().default(true),
})

export type SecurityConfig = z.infer<typeof SecurityConfigSchema>

const OutdatedLibrarySchema = z.object({
  name: z.string(),
  patterns: z.array(z.string()),
  minSafeVersion: z.string(),
  severity: z.enum(SEVERITIES),
  reason: z.string(),
})

export type OutdatedLibrary = z.infer<typeof OutdatedLibrarySchema>

export const getOutdatedLibraries = lazyData(() =>
  readDataFile('outdated-libraries.json', z.array(OutdatedLibrarySchema)).map((library) => ({
    ...library,
    regexes: library.patterns.map((pattern) => new RegExp(pattern, 'i')),
  }))
)

/**
 * Compare dotted numeric versions: negative when a < b
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map((part) => parseInt(part, 10) || 0)
  const right = b.split('.').map((part) => parseInt(part, 10) || 0)
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0)
    if (diff !== 0) return diff
  }
  return 0
}

export class SecurityAnalyzer extends BaseAnalyzer<typeof SecurityConfigSchema> {
  constructor(config: unknown = {}, options: AnalyzerOptions = {}) {
    super('security', SecurityConfigSchema, config, options)
  }

  protected detect(doc: ParsedDocument): FindingInput[] {
    const isHttps = doc.finalUrl.startsWith('https://')
    return [
      ...this.checkTransport(doc, isHttps),
      ...this.checkHeaders(doc, isHttps),
      ...this.checkForms(doc, isHttps),
      ...this.checkLinks(doc),
      ...(this.config.checkOutdatedLibraries ? this.checkLibraries(doc) : []),
      ...(this.config.checkInformationDisclosure ? this.checkDisclosure(doc) : []),
    ]
  }

  private checkTransport(doc: ParsedDocument, isHttps: boolean): FindingInput[] {
    const findings: FindingInput[] = []

    // HTTP page (not HTTPS)
    if (!isHttps) {
      findings.push({
        category: 'HTTPS',
        severity: 'CRITICAL',
        message: 'Page is not served over HTTPS',
        location: doc.finalUrl,
        remediation: 'Serve the site over HTTPS with a valid certificate and redirect all HTTP requests to HTTPS.',
        effort: 'medium',
      })
      return findings
    }

    // Mixed content
    const active = [
      ...doc.scripts.flatMap((script) => (script.src ? [script.src] : [])),
      ...doc.stylesheets.map((sheet) => sheet.href),
      ...doc.iframes.map((iframe) => iframe.src),
    ].filter((url) => url.startsWith('http://'))

    if (active.length > 0) {
      findings.push({
        category: 'Mixed Content',
        severity: 'HIGH',
        message: `${active.length} script, stylesheet or frame resource(s) loaded over HTTP`,
        location: active[0],
        remediation: 'Load every script, stylesheet and frame over HTTPS; browsers block active mixed content.',
        effort: 'easy',
      })
    }

    const passive = doc.images.map((image) => image.src).filter((url) => url.startsWith('http://'))
    if (passive.length > 0) {
      findings.push({
        category: 'Mixed Content',
        severity: 'MEDIUM',
        message: `${passive.length} image(s) loaded over HTTP`,
        location: passive[0],
        remediation: 'Reference images with HTTPS URLs.',
        effort: 'easy',
      })
    }

    return findings
  }

  private checkHeaders(doc: ParsedDocument, isHttps: boolean): FindingInput[] {
    const findings: FindingInput[] = []
    const headers = doc.headers

    if (isHttps) {
      const hsts = headers['strict-transport-security']
      if (!hsts) {
        findings.push({
          category: 'Security Headers',
          severity: 'MEDIUM',
          message: 'Missing Strict-Transport-Security header',
          remediation: 'Send "Strict-Transport-Security: max-age=31536000; includeSubDomains" on HTTPS responses.',
          effort: 'easy',
        })
      } else {
        const maxAge = parseInt(hsts.match(/max-age=(\d+)/i)?.[1] ?? '0', 10)
        if (maxAge < this.config.hstsMinMaxAge) {
          findings.push({
            category: 'Security Headers',
            severity: 'LOW',
            message: `HSTS max-age of ${maxAge}s is below ${this.config.hstsMinMaxAge}s`,
            remediation: 'Raise the HSTS max-age to at least six months.',
            effort: 'easy',
          })
        }
      }
    }

    const metaCsp = doc.meta.some((tag) => tag.httpEquiv?.toLowerCase() === 'content-security-policy')
    const csp = headers['content-security-policy']
    if (!csp && !metaCsp) {
      findings.push({
        category: 'Security Headers',
        severity: 'MEDIUM',
        message: 'Missing Content-Security-Policy',
        remediation: 'Define a Content-Security-Policy restricting script, style and frame sources.',
        effort: 'hard',
      })
    }

    if (!headers['x-frame-options'] && !csp?.includes('frame-ancestors')) {
      findings.push({
        category: 'Security Headers',
        severity: 'LOW',
        message: 'Missing X-Frame-Options header (clickjacking protection)',
        remediation: 'Send "X-Frame-Options: SAMEORIGIN" or a CSP frame-ancestors directive.',
        effort: 'easy',
      })
    }

    if (headers['x-content-type-options']?.toLowerCase() !== 'nosniff') {
      findings.push({
        category: 'Security Headers',
        severity: 'LOW',
        message: 'Missing X-Content-Type-Options: nosniff header',
        remediation: 'Send "X-Content-Type-Options: nosniff".',
        effort: 'easy',
      })
    }

    return findings
  }

  private checkForms(doc: ParsedDocument, isHttps: boolean): FindingInput[] {
    const findings: FindingInput[] = []

    // Insecure form action
    const insecure = doc.forms.filter((form) => form.action.startsWith('http://'))
    if (insecure.length > 0) {
      findings.push({
        category: 'Forms',
        severity: 'HIGH',
        message: `${insecure.length} form(s) submit over HTTP`,
        location: insecure[0]?.action,
        remediation: 'Point form actions at HTTPS endpoints.',
        effort: 'easy',
      })
    }

    const hasPassword = doc.forms.some((form) => form.fields.some((field) => field.type === 'password'))
    if (hasPassword && !isHttps) {
      findings.push({
        category: 'Forms',
        severity: 'HIGH',
        message: 'Password field on a page served over HTTP',
        location: doc.finalUrl,
        remediation: 'Only collect credentials on pages served over HTTPS.',
        effort: 'medium',
      })
    }

    return findings
  }

  private checkLinks(doc: ParsedDocument): FindingInput[] {
    const unsafe = doc.links.filter(
      (link) =>
        link.target?.toLowerCase() === '_blank' &&
        !link.internal &&
        !link.rel.includes('noopener') &&
        !link.rel.includes('noreferrer')
    )
    if (unsafe.length === 0) return []

    return [
      {
        category: 'Links',
        severity: 'LOW',
        message: `${unsafe.length} external link(s) open a new tab without rel="noopener"`,
        location: unsafe[0]?.href,
        remediation: 'Add rel="noopener noreferrer" to links using target="_blank".',
        effort: 'easy',
      },
    ]
  }

  private checkLibraries(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []
    const seen = new Set<string>()

    for (const script of doc.scripts) {
      if (!script.src) continue
      for (const library of getOutdatedLibraries()) {
        const version = library.regexes.map((regex) => script.src?.match(regex)?.[1]).find(Boolean)
        if (!version || seen.has(`${library.name}@${version}`)) continue
        seen.add(`${library.name}@${version}`)

        if (compareVersions(version, library.minSafeVersion) < 0) {
          findings.push({
            category: 'Vulnerable Libraries',
            severity: library.severity,
            message: `${library.name} ${version} is outdated: ${library.reason}`,
            location: script.src,
            remediation: `Upgrade ${library.name} to ${library.minSafeVersion} or later.`,
            effort: 'medium',
          })
        }
      }
    }

    return findings
  }

  private checkDisclosure(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []

    for (const header of ['server', 'x-powered-by']) {
      const value = doc.headers[header]
      if (value && /\d+\.\d+/.test(value)) {
        findings.push({
          category: 'Information Disclosure',
          severity: 'LOW',
          message: `${header} header reveals software version: ${value}`,
          remediation: `Remove version details from the ${header} header.`,
          effort: 'easy',
        })
      }
    }

    return findings
  }
}
