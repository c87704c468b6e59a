/**
 * pyship command line
 *
 * Usage:
 *   pyship --project-path ./shop --service-name shop --framework flask --port 8000 --venv-name venv
 *   pyship deploy ... --domain shop.example.com --frontend-path ./shop/dist
 *
 * Environment:
 *   PYSHIP_* settings, optionally preloaded from ./.env
 */

import { createInterface } from "node:readline/promises"
import { Command, InvalidArgumentError, Option } from "commander"
import { config as loadDotenv } from "dotenv"
import { createConsoleSink, createLogger, formatError } from "@pyship/shared"
import { type ControllerConfig, loadConfig } from "./config.js"
import { DEFAULTS } from "./constants.js"
import type { HostContext } from "./host.js"
import { NodeHost } from "./node-host.js"
import { DeployOrchestrator } from "./orchestrator.js"
import { type DeploymentInput, type DeployResult, FRAMEWORKS, type Framework } from "./types.js"

export type CliOptions = {
  projectPath: string
  serviceName: string
  framework: Framework
  port: number
  venvName: string
  workers: number
  timeout: number
  domain?: string
  enableDb: boolean
  envFile?: string
  frontendPath?: string
  frontendUrlPrefix: string
  apiUrlPrefix: string
  verbose: boolean
}

function parseInteger(value: string): number {
  const parsed = Number(value)
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.")
  }
  return parsed
}

export function toDeploymentInput(options: CliOptions): DeploymentInput {
  return {
    projectPath: options.projectPath,
    serviceName: options.serviceName,
    framework: options.framework,
    port: options.port,
    venvName: options.venvName,
    workers: options.workers,
    timeout: options.timeout,
    domain: options.domain,
    enableDb: options.enableDb,
    envFile: options.envFile,
    frontendPath: options.frontendPath,
    frontendUrlPrefix: options.frontendUrlPrefix,
    apiUrlPrefix: options.apiUrlPrefix,
    verbose: options.verbose,
  }
}

/**
 * Build the command tree; `onDeploy` receives the parsed input
 */
export function createProgram(onDeploy: (input: DeploymentInput) => Promise<void>): Command {
  const program = new Command().name("pyship").description("Deploy a Python web application behind nginx")

  program
    .command("deploy", { isDefault: true })
    .description("Deploy or redeploy one application")
    .requiredOption("--project-path <path>", "project directory")
    .requiredOption("--service-name <name>", "systemd service name")
    .addOption(new Option("--framework <name>", "web framework").choices(FRAMEWORKS).makeOptionMandatory())
    .requiredOption("--port <number>", "port the workers bind to", parseInteger)
    .requiredOption("--venv-name <name>", "virtual environment directory, relative to the project or absolute")
    .option("--workers <number>", "worker processes", parseInteger, DEFAULTS.WORKERS)
    .option("--timeout <seconds>", "worker timeout in seconds", parseInteger, DEFAULTS.TIMEOUT_SECONDS)
    .option("--domain <domain>", "public domain; requests a certificate")
    .option("--enable-db", "wait for the local PostgreSQL before starting", false)
    .option("--env-file <path>", "dotenv file loaded into the service")
    .option("--frontend-path <path>", "directory of built frontend assets")
    .option("--frontend-url-prefix <prefix>", "URL prefix for the frontend", DEFAULTS.FRONTEND_URL_PREFIX)
    .option("--api-url-prefix <prefix>", "URL prefix for the API", DEFAULTS.API_URL_PREFIX)
    .option("--verbose", "print debug output", false)
    .action(async (_options: unknown, command: Command) => {
      await onDeploy(toDeploymentInput(command.opts<CliOptions>()))
    })

  return program
}

async function confirmInstall(missing: readonly string[]): Promise<boolean> {
  if (!process.stdin.isTTY) {
    return false
  }
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  try {
    const answer = await rl.question(`Install ${missing.join(", ")} with apt-get now? [y/N] `)
    return /^y(es)?$/i.test(answer.trim())
  } finally {
    rl.close()
  }
}

function printResult(result: DeployResult): void {
  if (result.success) {
    return
  }
  console.error()
  console.error(`Deployment of ${result.serviceName} failed at step: ${result.failedStep ?? "unknown"}`)
  console.error(result.error ? formatError(result.error) : "Unknown error")
  for (const message of result.messages) {
    console.error(`  - ${message}`)
  }
}

/**
 * Run one deployment with the live host
 *
 * @returns process exit code
 */
export async function deploy(input: DeploymentInput, config: ControllerConfig, host: HostContext): Promise<number> {
  const logger = createLogger(createConsoleSink({ verbose: input.verbose }))

  console.log("═══════════════════════════════════════════════════════")
  console.log("              PYSHIP DEPLOYMENT")
  console.log("═══════════════════════════════════════════════════════")
  console.log()

  const orchestrator = new DeployOrchestrator({
    host,
    logger,
    paths: config.paths,
    autoInstall: config.autoInstall,
    confirmInstall,
    certbotEmail: config.certbotEmail,
    retryDelayMs: config.retryDelayMs,
    pollIntervalMs: config.pollIntervalMs,
  })

  const result = await orchestrator.deploy(input)
  printResult(result)
  return result.success ? 0 : 1
}

export async function main(argv: readonly string[] = process.argv): Promise<number> {
  loadDotenv()

  let config: ControllerConfig
  try {
    config = loadConfig(process.env)
  } catch (error) {
    console.error(formatError(error))
    return 1
  }

  let exitCode = 1
  const program = createProgram(async input => {
    exitCode = await deploy(input, config, new NodeHost())
  })
  await program.parseAsync([...argv])
  return exitCode
}
