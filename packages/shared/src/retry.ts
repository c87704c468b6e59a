/**
 * Retry utility with exponential backoff and custom retry conditions.
 */

export type RetryConfig = {
  /** Total number of attempts, including the first (default: 2) */
  attempts?: number
  /** Delay before the first retry in ms (default: 1000) */
  minDelayMs?: number
  /** Upper bound for any single delay in ms (default: 30000) */
  maxDelayMs?: number
}

export type RetryInfo = {
  /** Attempt that just failed (1-based) */
  attempt: number
  maxAttempts: number
  /** Delay before the next attempt in ms */
  delayMs: number
  err: unknown
  label?: string
}

export type RetryOptions = RetryConfig & {
  /** Optional label for logging/debugging */
  label?: string
  /** Decide whether a failure is worth another attempt */
  shouldRetry?: (err: unknown, attempt: number) => boolean
  onRetry?: (info: RetryInfo) => void
  /** Replaceable wait, mostly for tests */
  sleep?: (ms: number) => Promise<void>
}

const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  attempts: 2,
  minDelayMs: 1000,
  maxDelayMs: 30_000,
}

export const sleep = (ms: number): Promise<void> => new Promise(r => setTimeout(r, ms))

const clampNumber = (value: number | undefined, fallback: number, min: number): number => {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback
  }
  return Math.max(value, min)
}

/**
 * Resolve retry config with defaults
 */
export function resolveRetryConfig(overrides?: RetryConfig): Required<RetryConfig> {
  const attempts = Math.round(clampNumber(overrides?.attempts, DEFAULT_RETRY_CONFIG.attempts, 1))
  const minDelayMs = Math.round(clampNumber(overrides?.minDelayMs, DEFAULT_RETRY_CONFIG.minDelayMs, 0))
  const maxDelayMs = Math.max(
    minDelayMs,
    Math.round(clampNumber(overrides?.maxDelayMs, DEFAULT_RETRY_CONFIG.maxDelayMs, 0)),
  )
  return { attempts, minDelayMs, maxDelayMs }
}

/**
 * Retry an async function with exponential backoff.
 *
 * @example
 * ```ts
 * await retryAsync(() => runChecked(runner, ["systemctl", "daemon-reload"]), {
 *   attempts: 2,
 *   label: "daemon-reload",
 *   onRetry: ({ attempt, delayMs }) => logger.warn(`retry ${attempt} in ${delayMs}ms`),
 * })
 * ```
 */
export async function retryAsync<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { attempts: maxAttempts, minDelayMs, maxDelayMs } = resolveRetryConfig(options)
  const shouldRetry = options.shouldRetry ?? (() => true)
  const wait = options.sleep ?? sleep
  let lastErr: unknown

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await fn()
    } catch (err) {
      lastErr = err
      if (attempt >= maxAttempts || !shouldRetry(err, attempt)) {
        break
      }

      const delayMs = Math.min(minDelayMs * 2 ** (attempt - 1), maxDelayMs)
      options.onRetry?.({ attempt, maxAttempts, delayMs, err, label: options.label })
      await wait(delayMs)
    }
  }

  throw lastErr ?? new Error("Retry failed")
}
