import { spawn } from "node:child_process"

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

export interface RunOptions {
  /** Kill the process after this many milliseconds */
  timeoutMs?: number
  /** Extra environment variables */
  env?: Record<string, string>
  /** Let the command read from the terminal (password prompts) */
  interactive?: boolean
}

/**
 * Executes host commands. Never rejects on a non-zero exit status.
 */
export interface CommandRunner {
  run(argv: readonly string[], options?: RunOptions): Promise<CommandResult>
}

/**
 * Error thrown when a checked command exits non-zero
 */
export class CommandError extends Error {
  constructor(
    public readonly argv: readonly string[],
    public readonly exitCode: number,
    public readonly stderr: string,
    public readonly stdout: string,
  ) {
    const output = stderr || stdout
    super(`Command \`${argv.join(" ")}\` failed with exit code ${exitCode}${output ? `: ${output}` : ""}`)
    this.name = "CommandError"
  }
}

/** Exit status reported when a binary cannot be spawned, as a shell would */
export const COMMAND_NOT_FOUND = 127

/**
 * Runner backed by `child_process.spawn`, capturing both streams.
 * Spawn failures (missing binary) resolve with exit code 127.
 */
export function createCommandRunner(): CommandRunner {
  return {
    run(argv, options = {}) {
      const [command, ...args] = argv
      if (!command) {
        return Promise.resolve({ exitCode: COMMAND_NOT_FOUND, stdout: "", stderr: "empty command" })
      }

      return new Promise(resolve => {
        const proc = spawn(command, args, {
          stdio: [options.interactive ? "inherit" : "ignore", "pipe", "pipe"],
          env: { ...process.env, ...options.env },
          timeout: options.timeoutMs,
        })

        let stdout = ""
        let stderr = ""
        let settled = false

        proc.stdout?.on("data", (data: Buffer) => {
          stdout += data.toString()
        })

        proc.stderr?.on("data", (data: Buffer) => {
          stderr += data.toString()
        })

        proc.on("close", (code, signal) => {
          if (settled) return
          settled = true
          // negative codes are spawn errnos
          const exitCode = code === null ? (signal ? 128 : 1) : code < 0 ? COMMAND_NOT_FOUND : code
          resolve({ exitCode, stdout: stdout.trim(), stderr: stderr.trim() })
        })

        proc.on("error", err => {
          if (settled) return
          settled = true
          resolve({ exitCode: COMMAND_NOT_FOUND, stdout: "", stderr: `Failed to spawn ${command}: ${err.message}` })
        })
      })
    },
  }
}

/**
 * Run a command and return its stdout, throwing CommandError on failure
 */
export async function runChecked(
  runner: CommandRunner,
  argv: readonly string[],
  options?: RunOptions,
): Promise<string> {
  const result = await runner.run(argv, options)
  if (result.exitCode !== 0) {
    throw new CommandError(argv, result.exitCode, result.stderr, result.stdout)
  }
  return result.stdout
}
