/**
 * Recursively freeze a value. Used for documents shared by analyzers and for
 * results shared through the cache.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key))
    }
  }
  return value
}
