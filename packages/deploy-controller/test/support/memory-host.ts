import type { CommandResult, CommandRunner } from "../../src/executors/command.js"
import type {
  HostContext,
  HostIdentity,
  HttpCheckOptions,
  HttpCheckResult,
  PrivilegedSession,
  WriteOptions,
} from "../../src/host.js"

type Reply = Partial<CommandResult>
type Handler = (argv: readonly string[]) => Reply

export interface RecordedCommand {
  line: string
  privileged: boolean
}

export interface RecordedWrite extends WriteOptions {
  path: string
  content: string
}

/**
 * HostContext kept entirely in memory. Commands succeed with empty output
 * unless a handler registered with `on` says otherwise; the most recent
 * matching registration wins. `sleep` advances a virtual clock.
 */
export class MemoryHost implements HostContext {
  readonly files = new Map<string, string>()
  readonly directories = new Set<string>()
  readonly links = new Map<string, string>()
  readonly commands: RecordedCommand[] = []
  readonly writes: RecordedWrite[] = []
  readonly httpChecks: Array<{ url: string; host?: string }> = []
  readonly sleeps: number[] = []
  readonly failingWrites = new Set<string>()

  identityResult: HostIdentity = { user: "deploy", group: "deploy" }
  address = "192.0.2.10"
  failAcquire = false
  failRelease = false
  acquired = 0
  released = 0
  clock = 0
  httpResponder: (url: string, options: HttpCheckOptions) => HttpCheckResult = () => ({ status: 200 })

  private readonly handlers: Array<{ prefix: string; handler: Handler }> = []

  readonly runner: CommandRunner = {
    run: async argv => this.exec(argv, false),
  }

  constructor() {
    this.on("systemctl is-active", { stdout: "active" })
  }

  /** Reply to every command whose line starts with `prefix` */
  on(prefix: string, reply: Reply | Handler): this {
    this.handlers.unshift({ prefix, handler: typeof reply === "function" ? reply : () => reply })
    return this
  }

  /** Reply with each entry in turn, repeating the last */
  onSequence(prefix: string, replies: readonly Reply[]): this {
    let call = 0
    return this.on(prefix, () => {
      const reply = replies[Math.min(call, replies.length - 1)] ?? {}
      call++
      return reply
    })
  }

  /** Project directory with its virtual environment */
  addProject(projectPath: string, venvName = "venv"): this {
    this.directories.add(projectPath)
    this.directories.add(`${projectPath}/${venvName}`)
    return this
  }

  /** Command lines run so far, privileged or not */
  lines(): string[] {
    return this.commands.map(c => c.line)
  }

  ran(prefix: string): number {
    return this.commands.filter(c => c.line.startsWith(prefix)).length
  }

  private exec(argv: readonly string[], privileged: boolean): CommandResult {
    const line = argv.join(" ")
    this.commands.push({ line, privileged })
    const match = this.handlers.find(h => line.startsWith(h.prefix))
    const reply = match ? match.handler(argv) : {}
    return { exitCode: reply.exitCode ?? 0, stdout: reply.stdout ?? "", stderr: reply.stderr ?? "" }
  }

  async pathExists(path: string): Promise<boolean> {
    return this.files.has(path) || this.directories.has(path) || this.links.has(path)
  }

  async isDirectory(path: string): Promise<boolean> {
    return this.directories.has(path)
  }

  async readTextFile(path: string): Promise<string> {
    const content = this.files.get(path)
    if (content === undefined) {
      throw Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), { code: "ENOENT" })
    }
    return content
  }

  async identity(): Promise<HostIdentity> {
    return this.identityResult
  }

  async primaryAddress(): Promise<string> {
    return this.address
  }

  async httpCheck(url: string, options: HttpCheckOptions): Promise<HttpCheckResult> {
    this.httpChecks.push({ url, host: options.host })
    return this.httpResponder(url, options)
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms)
    this.clock += ms
  }

  now(): number {
    return this.clock
  }

  async acquirePrivileges(): Promise<PrivilegedSession> {
    if (this.failAcquire) {
      throw new Error("sudo: a password is required")
    }
    this.acquired++
    return {
      run: async argv => this.exec(argv, true),
      writeFile: async (path: string, content: string, options: WriteOptions) => {
        if (this.failingWrites.has(path)) {
          throw new Error(`EACCES: permission denied, open '${path}'`)
        }
        this.files.set(path, content)
        this.writes.push({ path, content, ...options })
      },
      symlink: async (target: string, linkPath: string) => {
        this.links.set(linkPath, target)
      },
      release: async () => {
        this.released++
        if (this.failRelease) {
          throw new Error("sudo: unable to remove timestamp")
        }
      },
    }
  }
}
