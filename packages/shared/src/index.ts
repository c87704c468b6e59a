/**
 * Shared utilities for pyship packages: retry, error formatting and logging.
 *
 * @packageDocumentation
 */

export { retryAsync, resolveRetryConfig, sleep } from "./retry.js"
export type { RetryConfig, RetryInfo, RetryOptions } from "./retry.js"

export { errorMessage, extractErrorCode, formatError, isNotFoundError } from "./errors.js"

export { createConsoleSink, createLogger, createMemorySink } from "./logger.js"
export type { ConsoleSinkOptions, LogContext, LogEntry, Logger, LogLevel, LogSink } from "./logger.js"
