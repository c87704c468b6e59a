import { request } from "node:http"
import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises"
import { hostname, tmpdir } from "node:os"
import { join } from "node:path"
import { errorMessage, isNotFoundError, sleep } from "@pyship/shared"
import { type CommandRunner, createCommandRunner, runChecked } from "./executors/command.js"
import type { HostContext, HostIdentity, HttpCheckOptions, HttpCheckResult, PrivilegedSession, WriteOptions } from "./host.js"

export interface NodeHostOptions {
  runner?: CommandRunner
  /** Force or disable sudo; defaults to "not running as root" */
  useSudo?: boolean
}

function parseOwner(owner: string): { user: string; group: string } {
  const [user = "root", group = user] = owner.split(":")
  return { user, group }
}

/**
 * HostContext for the live machine
 */
export class NodeHost implements HostContext {
  readonly runner: CommandRunner
  private readonly useSudo: boolean

  constructor(options: NodeHostOptions = {}) {
    this.runner = options.runner ?? createCommandRunner()
    this.useSudo = options.useSudo ?? process.getuid?.() !== 0
  }

  async pathExists(path: string): Promise<boolean> {
    try {
      await stat(path)
      return true
    } catch (error) {
      if (isNotFoundError(error)) return false
      throw error
    }
  }

  async isDirectory(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory()
    } catch (error) {
      if (isNotFoundError(error)) return false
      throw error
    }
  }

  readTextFile(path: string): Promise<string> {
    return readFile(path, "utf-8")
  }

  async identity(): Promise<HostIdentity> {
    const user = await runChecked(this.runner, ["id", "-un"])
    const group = await runChecked(this.runner, ["id", "-gn"])
    return { user, group }
  }

  async primaryAddress(): Promise<string> {
    const result = await this.runner.run(["hostname", "-I"])
    const [first] = result.stdout.split(/\s+/).filter(Boolean)
    return result.exitCode === 0 && first ? first : hostname()
  }

  httpCheck(url: string, options: HttpCheckOptions): Promise<HttpCheckResult> {
    return new Promise(resolve => {
      const req = request(url, {
        method: "GET",
        headers: options.host ? { host: options.host } : undefined,
        timeout: options.timeoutMs,
      })
      req.on("response", res => {
        res.resume()
        resolve({ status: res.statusCode })
      })
      req.on("timeout", () => {
        req.destroy(new Error(`timed out after ${options.timeoutMs}ms`))
      })
      req.on("error", err => resolve({ error: errorMessage(err) }))
      req.end()
    })
  }

  sleep(ms: number): Promise<void> {
    return sleep(ms)
  }

  now(): number {
    return Date.now()
  }

  async acquirePrivileges(): Promise<PrivilegedSession> {
    const prefix = this.useSudo ? ["sudo", "-n"] : []
    if (this.useSudo) {
      // Cache credentials once; later commands run non-interactively
      await runChecked(this.runner, ["sudo", "-v"], { interactive: true })
    }

    const runner = this.runner
    const elevated = this.useSudo
    let released = false

    return {
      run: (argv, options) => runner.run([...prefix, ...argv], options),

      async writeFile(path: string, content: string, options: WriteOptions) {
        const { user, group } = parseOwner(options.owner)
        const stagingDir = await mkdtemp(join(tmpdir(), "pyship-"))
        const staged = join(stagingDir, "artifact")
        try {
          await writeFile(staged, content, "utf-8")
          await runChecked(runner, [
            ...prefix,
            "install",
            "-D",
            "-m",
            options.mode.toString(8).padStart(4, "0"),
            "-o",
            user,
            "-g",
            group,
            staged,
            path,
          ])
        } finally {
          await rm(stagingDir, { recursive: true, force: true })
        }
      },

      async symlink(target: string, linkPath: string) {
        await runChecked(runner, [...prefix, "ln", "-sfn", target, linkPath])
      },

      async release() {
        if (released) return
        released = true
        if (elevated) {
          await runner.run(["sudo", "-k"])
        }
      },
    }
  }
}
