/**
 * Host capability
 *
 * Every read of host state and every mutation goes through a HostContext,
 * so the orchestration can run against an in-memory host in tests.
 */

import type { CommandResult, CommandRunner, RunOptions } from "./executors/command.js"

export interface HostIdentity {
  user: string
  group: string
}

export interface HttpCheckOptions {
  /** `Host` header to send (virtual host routing) */
  host?: string
  timeoutMs: number
}

export interface HttpCheckResult {
  /** HTTP status when a response arrived */
  status?: number
  /** Connection or timeout error otherwise */
  error?: string
}

export interface WriteOptions {
  mode: number
  /** `user:group` */
  owner: string
}

/**
 * Elevated-privilege scope. Must be released on every exit path; use
 * `withPrivileges` rather than calling `acquirePrivileges` directly.
 */
export interface PrivilegedSession {
  run(argv: readonly string[], options?: RunOptions): Promise<CommandResult>
  /** Replace `path` with `content` (overwrite, never append) */
  writeFile(path: string, content: string, options: WriteOptions): Promise<void>
  /** Point `linkPath` at `target`, replacing an existing link */
  symlink(target: string, linkPath: string): Promise<void>
  release(): Promise<void>
}

export interface HostContext {
  readonly runner: CommandRunner
  pathExists(path: string): Promise<boolean>
  isDirectory(path: string): Promise<boolean>
  readTextFile(path: string): Promise<string>
  /** User and group the deploying account runs as */
  identity(): Promise<HostIdentity>
  /** Address the host is reachable on, for access URLs */
  primaryAddress(): Promise<string>
  httpCheck(url: string, options: HttpCheckOptions): Promise<HttpCheckResult>
  sleep(ms: number): Promise<void>
  /** Milliseconds since the epoch */
  now(): number
  acquirePrivileges(): Promise<PrivilegedSession>
}

/**
 * Run `fn` inside a privileged session, releasing it however `fn` exits.
 * If `fn` fails and the release fails as well, `fn`'s error propagates and
 * the release error is handed to `onReleaseError`.
 */
export async function withPrivileges<T>(
  host: HostContext,
  fn: (session: PrivilegedSession) => Promise<T>,
  onReleaseError: (error: unknown) => void,
): Promise<T> {
  const session = await host.acquirePrivileges()
  let result: T
  try {
    result = await fn(session)
  } catch (error) {
    await session.release().catch(onReleaseError)
    throw error
  }
  await session.release()
  return result
}
