/**
 * General utility helpers for the pipeline engine
 */

/**
 * Sleep for a given number of milliseconds
 * @param ms - Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve()
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Sleep for a number of seconds (fractions allowed) */
export function sleepSeconds(seconds: number): Promise<void> {
  return sleep(seconds * 1000)
}

/**
 * Normalise any thrown value into an Error instance.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value
  if (typeof value === 'string') return new Error(value)
  try {
    return new Error(JSON.stringify(value))
  } catch {
    return new Error(String(value))
  }
}

/**
 * Round a number to a fixed number of decimal places.
 * @param value - Number to round
 * @param places - Decimal places to keep
 */
export function roundTo(value: number, places: number): number {
  const factor = 10 ** places
  return Math.round(value * factor) / factor
}

/**
 * Deep copy of plain data: arrays, plain objects, Dates, Maps and Sets are
 * copied, cycles included. Functions and class instances are shared by
 * reference, so contexts carrying callbacks or clients can still be copied.
 */
export function deepClone<T>(obj: T): T
export function deepClone(obj: unknown): unknown {
  return copyValue(obj, new Map())
}

function copyValue(value: unknown, seen: Map<object, unknown>): unknown {
  if (typeof value !== 'object' || value === null) return value
  if (seen.has(value)) return seen.get(value)

  if (Array.isArray(value)) {
    const out: unknown[] = []
    seen.set(value, out)
    for (const item of value) out.push(copyValue(item, seen))
    return out
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {}
    seen.set(value, out)
    for (const [key, inner] of Object.entries(value)) out[key] = copyValue(inner, seen)
    return out
  }
  if (value instanceof Date) return new Date(value.getTime())
  if (value instanceof Map) {
    const out = new Map<unknown, unknown>()
    seen.set(value, out)
    for (const [key, inner] of value) out.set(copyValue(key, seen), copyValue(inner, seen))
    return out
  }
  if (value instanceof Set) {
    const out = new Set<unknown>()
    seen.set(value, out)
    for (const item of value) out.add(copyValue(item, seen))
    return out
  }
  return value
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Structural equality for JSON-like values (primitives, arrays, plain objects,
 * Dates). Key order is ignored.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime()
  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    return a.every((item, i) => deepEqual(item, b[i]))
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const keysA = Object.keys(a)
    const keysB = Object.keys(b)
    if (keysA.length !== keysB.length) return false
    return keysA.every((key) => Object.hasOwn(b, key) && deepEqual(a[key], b[key]))
  }
  return false
}

/**
 * Format a duration in seconds to a human-readable string
 */
export function formatSeconds(seconds: number): string {
  if (seconds < 1) return `${String(Math.round(seconds * 1000))}ms`
  if (seconds < 60) return `${seconds.toFixed(1)}s`
  const minutes = Math.floor(seconds / 60)
  const rest = Math.floor(seconds % 60)
  return `${String(minutes)}m ${String(rest)}s`
}

/**
 * Settle with `promise`, or reject with `onTimeout()` once `ms` elapses.
 * The timer is cleared as soon as either side settles.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let settled = false
    const timer = setTimeout(() => {
      if (settled) return
      settled = true
      reject(onTimeout())
    }, ms)

    void promise.then(
      (value) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        resolve(value)
      },
      (err: unknown) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        reject(toError(err))
      }
    )
  })
}
