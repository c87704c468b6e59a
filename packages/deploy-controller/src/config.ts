/**
 * Controller configuration from environment variables
 *
 * @example
 * ```typescript
 * import { loadConfig } from "@pyship/deploy-controller"
 *
 * const config = loadConfig(process.env)
 * const orchestrator = new DeployOrchestrator({ host, paths: config.paths, autoInstall: config.autoInstall })
 * ```
 */

import { z } from "zod"
import { DEFAULTS, PATHS } from "./constants.js"
import { DeploymentError } from "./errors.js"
import type { DeployPaths } from "./types.js"

const pathStr = z.string().min(1).startsWith("/")

const booleanFlag = z
  .enum(["1", "0", "true", "false", "yes", "no"])
  .transform(value => value === "1" || value === "true" || value === "yes")

const millis = z.coerce.number().int().min(0)

export const configSchema = z.object({
  PYSHIP_AUTO_INSTALL: booleanFlag.default("false"),
  PYSHIP_SYSTEMD_DIR: pathStr.default(PATHS.systemdDir),
  PYSHIP_NGINX_DIR: pathStr.default(PATHS.nginxDir),
  PYSHIP_LETSENCRYPT_DIR: pathStr.default(PATHS.letsencryptDir),
  PYSHIP_CERTBOT_EMAIL: z.string().email().optional(),
  PYSHIP_RETRY_DELAY_MS: millis.default(DEFAULTS.RETRY_DELAY_MS),
  PYSHIP_POLL_INTERVAL_MS: millis.default(DEFAULTS.POLL_INTERVAL_MS),
})

export interface ControllerConfig {
  autoInstall: boolean
  paths: DeployPaths
  /** Contact address for certbot; `admin@<domain>` when unset */
  certbotEmail?: string
  retryDelayMs: number
  pollIntervalMs: number
}

/**
 * Parse controller settings. Empty strings count as unset.
 *
 * @throws DeploymentError (CONFIGURATION_INVALID) listing every bad variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ControllerConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""))
  const parsed = configSchema.safeParse(present)

  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(", ")}`)
      .join("; ")
    throw DeploymentError.configurationInvalid(`Invalid environment configuration: ${fields}`)
  }

  const values = parsed.data
  return {
    autoInstall: values.PYSHIP_AUTO_INSTALL,
    paths: {
      systemdDir: values.PYSHIP_SYSTEMD_DIR,
      nginxDir: values.PYSHIP_NGINX_DIR,
      letsencryptDir: values.PYSHIP_LETSENCRYPT_DIR,
    },
    certbotEmail: values.PYSHIP_CERTBOT_EMAIL,
    retryDelayMs: values.PYSHIP_RETRY_DELAY_MS,
    pollIntervalMs: values.PYSHIP_POLL_INTERVAL_MS,
  }
}
