/**
 * Analyzer Registry
 *
 * Maps analyzer names to factories. Registries are plain values built at
 * startup and passed to the orchestrator; there is no global instance.
 */

import { UnknownAnalyzerError } from '../types/errors.js'
import type { Analyzer, AnalyzerOptions } from './base-analyzer.js'
import { AccessibilityAnalyzer } from './accessibility-analyzer.js'
import { ContentAnalyzer } from './content-analyzer.js'
import { HeadingStructureAnalyzer } from './heading-structure-analyzer.js'
import { ImageAnalyzer } from './image-analyzer.js'
import { LinkAnalyzer } from './link-analyzer.js'
import { MetaAnalyzer } from './meta-analyzer.js'
import { MobileFriendlyAnalyzer } from './mobile-friendly-analyzer.js'
import { PerformanceAnalyzer } from './performance-analyzer.js'
import { SchemaAnalyzer } from './schema-analyzer.js'
import { SecurityAnalyzer } from './security-analyzer.js'
import { SocialMediaAnalyzer } from './social-media-analyzer.js'
import { TitleAnalyzer } from './title-analyzer.js'

export type AnalyzerFactory = (config: unknown, options: AnalyzerOptions) => Analyzer

export class AnalyzerRegistry {
  private factories = new Map<string, AnalyzerFactory>()

  register(name: string, factory: AnalyzerFactory): this {
    this.factories.set(name, factory)
    return this
  }

  has(name: string): boolean {
    return this.factories.has(name)
  }

  /**
   * Registered names, in registration order
   */
  names(): string[] {
    return [...this.factories.keys()]
  }

  /**
   * Instantiate an analyzer, validating its config
   */
  create(name: string, config: unknown = {}, options: AnalyzerOptions = {}): Analyzer {
    const factory = this.factories.get(name)
    if (!factory) {
      throw new UnknownAnalyzerError(name, this.names())
    }
    return factory(config, options)
  }
}

/**
 * Registry holding every built-in analyzer
 */
export function createDefaultRegistry(): AnalyzerRegistry {
  return new AnalyzerRegistry()
    .register('title', (config, options) => new TitleAnalyzer(config, options))
    .register('meta', (config, options) => new MetaAnalyzer(config, options))
    .register('heading_structure', (config, options) => new HeadingStructureAnalyzer(config, options))
    .register('image', (config, options) => new ImageAnalyzer(config, options))
    .register('link', (config, options) => new LinkAnalyzer(config, options))
    .register('security', (config, options) => new SecurityAnalyzer(config, options))
    .register('performance', (config, options) => new PerformanceAnalyzer(config, options))
    .register('schema', (config, options) => new SchemaAnalyzer(config, options))
    .register('accessibility', (config, options) => new AccessibilityAnalyzer(config, options))
    .register('mobile_friendly', (config, options) => new MobileFriendlyAnalyzer(config, options))
    .register('social_media', (config, options) => new SocialMediaAnalyzer(config, options))
    .register('content', (config, options) => new ContentAnalyzer(config, options))
}
