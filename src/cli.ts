#!/usr/bin/env node
/**
 * Command-line runner: analyze URLs (or whole sites) and print the serialized
 * batch as JSON on stdout. Logs go to stderr.
 */

import 'dotenv/config'
import { writeFile } from 'fs/promises'
import { Command, InvalidArgumentError } from 'commander'
import { createAnalysisEngine } from './index.js'
import { loadEnvConfig } from './config/env.js'
import type { BatchProgress } from './crawler/analysis-orchestrator.js'
import type { BatchResult } from './types/analysis.js'
import { logger } from './utils/logger.js'
import { serializeBatch } from './utils/result-serializer.js'

interface CliOptions {
  site?: boolean
  analyzers?: string[]
  workers?: number
  rps?: number
  deadlineMs?: number
  maxPages?: number
  output?: string
}

function positiveNumber(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.')
  }
  return parsed
}

function positiveInt(value: string): number {
  const parsed = positiveNumber(value)
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

function nameList(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
}

async function run(urls: string[], options: CliOptions): Promise<void> {
  const config = loadEnvConfig(process.env)
  if (options.rps !== undefined) {
    config.collector.requestsPerSecond = options.rps
  }
  if (options.workers !== undefined) {
    config.orchestrator.workers = options.workers
  }

  const engine = createAnalysisEngine(config)
  const controller = new AbortController()
  const onSigint = (): void => {
    logger.warn('Received SIGINT, finishing in-flight pages...')
    controller.abort()
  }
  process.on('SIGINT', onSigint)

  const batchOptions = {
    analyzers: options.analyzers,
    workers: options.workers,
    deadline: options.deadlineMs === undefined ? undefined : Date.now() + options.deadlineMs,
    signal: controller.signal,
    onProgress: ({ url, entry, completed, total }: BatchProgress) =>
      logger.info(`[${completed}/${total}] ${entry.status} ${url}`),
  }

  try {
    let batch: BatchResult
    if (options.site) {
      const [root, ...rest] = urls
      if (root === undefined) {
        throw new InvalidArgumentError('A root URL is required with --site.')
      }
      if (rest.length > 0) {
        logger.warn(`--site analyzes one site; ignoring ${rest.length} extra URLs`)
      }
      batch = await engine.orchestrator.analyzeSite(root, { ...batchOptions, maxPages: options.maxPages })
    } else {
      batch = await engine.orchestrator.analyzeBatch(urls, batchOptions)
    }

    const json = JSON.stringify(serializeBatch(batch), null, 2)
    if (options.output) {
      await writeFile(options.output, json + '\n', 'utf-8')
      logger.info(`Wrote results to ${options.output}`)
    } else {
      process.stdout.write(json + '\n')
    }

    if (batch.summary.FAILED > 0 && batch.summary.COMPLETED + batch.summary.PARTIAL === 0) {
      process.exitCode = 1
    }
  } finally {
    process.off('SIGINT', onSigint)
    await engine.close()
  }
}

const program = new Command()

program
  .name('seo-analyze')
  .description('Analyze web pages for SEO, security, performance and accessibility issues')
  .version('1.0.0')
  .argument('<urls...>', 'URLs to analyze')
  .option('--site', 'Discover pages from the sitemap of the first URL and analyze them')
  .option('--analyzers <names>', 'Comma-separated analyzer names (default: all)', nameList)
  .option('--workers <n>', 'Concurrent page pipelines', positiveInt)
  .option('--rps <n>', 'Requests per second', positiveNumber)
  .option('--deadline-ms <n>', 'Stop starting new pages after this many milliseconds', positiveInt)
  .option('--max-pages <n>', 'Maximum pages for --site', positiveInt)
  .option('--output <file>', 'Write JSON to a file instead of stdout')
  .action(async (urls: string[], options: CliOptions) => {
    try {
      await run(urls, options)
    } catch (error) {
      logger.error('Analysis failed:', error instanceof Error ? error.message : error)
      process.exitCode = 1
    }
  })

program.parseAsync().catch((error: unknown) => {
  logger.error('Fatal error:', error)
  process.exit(1)
})
