/**
 * Error inspection helpers shared by the controller and the CLI.
 */

/**
 * Extract a Node.js style `code` property from an error-like value.
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object" || !("code" in err)) {
    return undefined
  }
  return typeof err.code === "string" ? err.code : undefined
}

/**
 * Message of an error-like value, without the stack.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message
  }
  return typeof err === "string" ? err : String(err)
}

/**
 * Format an error for logging. Includes the stack when asked to.
 */
export function formatError(err: unknown, withStack = false): string {
  if (err instanceof Error) {
    return withStack && err.stack ? err.stack : err.message
  }
  if (typeof err === "string") {
    return err
  }
  try {
    return JSON.stringify(err)
  } catch {
    return String(err)
  }
}

/**
 * True for errors raised because a file or binary does not exist.
 */
export function isNotFoundError(err: unknown): boolean {
  return extractErrorCode(err) === "ENOENT"
}
