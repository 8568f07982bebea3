/**
 * Loads the JSON lookup tables kept under data/ at the package root
 */

import { readFileSync } from 'fs'
import type { z } from 'zod'
import { ConfigError } from '../types/errors.js'

export function readDataFile<S extends z.ZodTypeAny>(fileName: string, schema: S): z.output<S> {
  // Same relative depth from src/utils and dist/utils
  const path = new URL(`../../data/${fileName}`, import.meta.url)
  const parsed = schema.safeParse(JSON.parse(readFileSync(path, 'utf-8')))
  if (!parsed.success) {
    throw new ConfigError(`Invalid data file ${fileName}: ${parsed.error.message}`, { cause: parsed.error })
  }
  return parsed.data
}

/**
 * Wrap a loader so the file is read once, on first use
 */
export function lazyData<T>(load: () => T): () => T {
  let value: { loaded: T } | undefined
  return () => {
    if (!value) {
      value = { loaded: load() }
    }
    return value.loaded
  }
}
