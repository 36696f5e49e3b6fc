import { ConfigurationError } from './errors.ts'

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, '')
}

export function resolveFetch(override?: typeof fetch): typeof fetch {
  const resolved: typeof fetch | undefined = override ?? globalThis.fetch
  if (typeof resolved !== 'function') {
    throw new ConfigurationError(
      'No fetch implementation available. Provide a fetchImplementation option or use Node.js >= 18.',
    )
  }
  return resolved
}

/** True when both URLs address the same host and port. */
export function isSameHost(left: string | URL, right: string | URL): boolean {
  try {
    return new URL(left).host === new URL(right).host
  } catch {
    return false
  }
}

/**
 * Pulls the human-readable message out of an error body. The service answers
 * with `{ message }`, `{ error }` or a JSON:API `{ errors: [{ detail | title }] }`.
 */
export function extractErrorDetail(text: string, json: unknown): string {
  if (isRecord(json)) {
    if (typeof json.message === 'string') return json.message
    if (typeof json.error === 'string') return json.error
    if (Array.isArray(json.errors)) {
      const details = json.errors
        .map((entry: unknown) => {
          if (typeof entry === 'string') return entry
          if (isRecord(entry)) {
            const detail = entry.detail ?? entry.message ?? entry.title
            return typeof detail === 'string' ? detail : undefined
          }
          return undefined
        })
        .filter((detail): detail is string => detail !== undefined)
      if (details.length > 0) return details.join('; ')
    }
  }
  return text.trim()
}

export function createTimeoutSignal(
  timeoutMs: number,
  outerSignal?: AbortSignal,
): { signal: AbortSignal; timeoutSignal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
  timeoutId.unref()
  const signal = outerSignal ? AbortSignal.any([controller.signal, outerSignal]) : controller.signal
  return { signal, timeoutSignal: controller.signal, cleanup: () => clearTimeout(timeoutId) }
}

export function validateRequiredStrings<T extends Record<string, unknown>>(
  options: T,
  keys: Array<keyof T & string>,
): void {
  for (const key of keys) {
    if (!options[key] || typeof options[key] !== 'string') {
      throw new ConfigurationError(`${key} must be a non-empty string`)
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Drops keys whose value is undefined or null, the way the service expects optional fields. */
export function compact<T extends Record<string, unknown>>(payload: T): Partial<T> {
  const result: Partial<T> = {}
  for (const key in payload) {
    const value = payload[key]
    if (value !== undefined && value !== null) result[key] = value
  }
  return result
}
