import { errorMessage, type Logger } from "@pyship/shared"
import { MissingDependencyError } from "../errors.js"
import { type HostContext, withPrivileges } from "../host.js"
import type { DeploymentSpec, SystemDependency } from "../types.js"
import { runChecked } from "./command.js"

const aptInstall = (pkg: string): string[] => ["apt-get", "install", "-y", pkg]

/**
 * Host packages a deployment relies on. The certificate tool is only
 * required when a domain is given.
 */
export function dependenciesFor(spec: DeploymentSpec): SystemDependency[] {
  const withDomain = Boolean(spec.domain)
  return [
    { name: "systemd", check: ["systemctl", "--version"], install: aptInstall("systemd"), required: true },
    { name: "nginx", check: ["nginx", "-v"], install: aptInstall("nginx"), required: true },
    { name: "certbot", check: ["certbot", "--version"], install: aptInstall("certbot"), required: withDomain },
    {
      name: "python3-certbot-nginx",
      check: ["dpkg", "-s", "python3-certbot-nginx"],
      install: aptInstall("python3-certbot-nginx"),
      required: withDomain,
    },
  ]
}

export interface EnsureDependenciesOptions {
  /** Install missing required dependencies without asking */
  autoInstall: boolean
  /** Asked before installing when `autoInstall` is off */
  confirm?: (missing: readonly string[]) => Promise<boolean>
  logger: Logger
}

export interface DependencyReport {
  present: string[]
  installed: string[]
  /** Optional dependencies that are absent */
  skipped: string[]
}

async function isPresent(host: HostContext, dependency: SystemDependency): Promise<boolean> {
  const result = await host.runner.run(dependency.check)
  return result.exitCode === 0
}

/**
 * Check each dependency and install missing required ones when allowed.
 *
 * @throws MissingDependencyError naming every required dependency still absent
 */
export async function ensureDependencies(
  host: HostContext,
  dependencies: readonly SystemDependency[],
  options: EnsureDependenciesOptions,
): Promise<DependencyReport> {
  const { logger } = options
  const report: DependencyReport = { present: [], installed: [], skipped: [] }
  const missing: SystemDependency[] = []

  for (const dependency of dependencies) {
    logger.debug(`Checking for ${dependency.name}...`)
    if (await isPresent(host, dependency)) {
      report.present.push(dependency.name)
    } else if (dependency.required) {
      missing.push(dependency)
    } else {
      report.skipped.push(dependency.name)
      logger.debug(`${dependency.name} not found (optional, skipped)`)
    }
  }

  if (missing.length === 0) {
    return report
  }

  const names = missing.map(d => d.name)
  logger.info(`Missing required packages: ${names.join(", ")}`)

  const install = options.autoInstall || (options.confirm ? await options.confirm(names) : false)
  if (!install) {
    throw new MissingDependencyError(names, "Install them manually or enable automatic installation.")
  }

  await withPrivileges(
    host,
    async session => {
      logger.info("Updating package lists...")
      await runChecked(session, ["apt-get", "update"])
      for (const dependency of missing) {
        logger.info(`Installing ${dependency.name}...`)
        const result = await session.run(dependency.install)
        if (result.exitCode !== 0) {
          logger.warn(`Installing ${dependency.name} failed: ${result.stderr || result.stdout}`)
        }
      }
    },
    error => logger.warn("Could not release privileges after the failed package install", error),
  ).catch((error: unknown) => {
    throw new MissingDependencyError(names, `Installation failed: ${errorMessage(error)}`)
  })

  const stillMissing: string[] = []
  for (const dependency of missing) {
    if (await isPresent(host, dependency)) {
      report.installed.push(dependency.name)
    } else {
      stillMissing.push(dependency.name)
    }
  }

  if (stillMissing.length > 0) {
    throw new MissingDependencyError(stillMissing, "Still absent after installation.")
  }
  return report
}
