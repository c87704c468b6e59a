import { errorMessage, type Logger, retryAsync } from "@pyship/shared"
import { DEFAULTS, PROXY_HTTP_PORT, TIMEOUTS } from "../constants.js"
import { ActivationError, VerificationError } from "../errors.js"
import { type HostContext, type HttpCheckResult, type PrivilegedSession, withPrivileges } from "../host.js"
import type { AccessInfo, DeploymentSpec } from "../types.js"
import { runChecked } from "./command.js"

export interface ActivateOptions {
  logger: Logger
  /** Certificate already on disk for `spec.domain` */
  certificateExists: boolean
  /** Contact address for certbot (default: admin@<domain>) */
  certbotEmail?: string
  /** Wait before the single retry of a failed step */
  retryDelayMs?: number
}

export interface ActivationOutcome {
  /** A certificate for the domain is installed and the proxy reloaded with it */
  certificateIssued: boolean
  messages: string[]
}

/**
 * Run one activation step, retrying it once before giving up
 */
async function step(
  name: string,
  commands: readonly (readonly string[])[],
  session: PrivilegedSession,
  options: ActivateOptions,
  host: HostContext,
): Promise<void> {
  options.logger.debug(`Activation: ${name}`)
  try {
    await retryAsync(
      async () => {
        for (const argv of commands) {
          await runChecked(session, argv)
        }
      },
      {
        attempts: 2,
        minDelayMs: options.retryDelayMs ?? DEFAULTS.RETRY_DELAY_MS,
        label: name,
        sleep: ms => host.sleep(ms),
        onRetry: ({ err, delayMs }) =>
          options.logger.warn(`${name} failed, retrying once in ${delayMs}ms`, err, { step: "activating" }),
      },
    )
  } catch (error) {
    throw new ActivationError(name, error)
  }
}

/**
 * Register and start the unit, reload nginx, then obtain a certificate when a
 * domain is configured. Steps (a) to (c) are fatal after one retry; a failed
 * certificate only downgrades access to plain HTTP.
 *
 * @throws ActivationError
 */
export async function activateService(
  host: HostContext,
  spec: DeploymentSpec,
  options: ActivateOptions,
): Promise<ActivationOutcome> {
  const { logger } = options
  const messages: string[] = []

  return withPrivileges(
    host,
    async session => {
      await step("reload unit index", [["systemctl", "daemon-reload"]], session, options, host)
      await step(
        "enable and restart service",
        [
          ["systemctl", "enable", spec.serviceName],
          ["systemctl", "restart", spec.serviceName],
        ],
        session,
        options,
        host,
      )
      await step(
        "validate and reload nginx",
        [
          ["nginx", "-t"],
          ["systemctl", "reload", "nginx"],
        ],
        session,
        options,
        host,
      )
      logger.info(`✓ Service ${spec.serviceName} restarted and nginx reloaded`)

      if (!spec.domain) {
        return { certificateIssued: false, messages }
      }

      const domain = spec.domain
      const certbot = options.certificateExists
        ? ["certbot", "renew", "--cert-name", domain, "--non-interactive"]
        : [
            "certbot",
            "--nginx",
            "-d",
            domain,
            "--non-interactive",
            "--agree-tos",
            "--email",
            options.certbotEmail ?? `admin@${domain}`,
            "--redirect",
          ]

      logger.info(
        options.certificateExists ? `Renewing certificate for ${domain}` : `Requesting certificate for ${domain}`,
      )
      try {
        await runChecked(session, certbot)
        await runChecked(session, ["systemctl", "reload", "nginx"])
        logger.info(`✓ Certificate in place for ${domain}`)
        return { certificateIssued: true, messages }
      } catch (error) {
        const message = `Certificate step for ${domain} failed, serving plain HTTP: ${errorMessage(error)}`
        logger.warn(message)
        messages.push(message)
        return { certificateIssued: false, messages }
      }
    },
    error => logger.warn("Could not release privileges after the failed activation", error, { step: "activating" }),
  ).catch((error: unknown) => {
    if (error instanceof ActivationError) throw error
    throw new ActivationError("acquire privileges", error)
  })
}

export interface VerifyOptions {
  logger: Logger
  /** Pause between health polls */
  pollIntervalMs?: number
}

/**
 * Wait for the unit to be active and the workers to answer, bounded by
 * the deployment's timeout, then check that nginx routes to them.
 *
 * @throws VerificationError
 */
export async function verifyDeployment(host: HostContext, spec: DeploymentSpec, options: VerifyOptions): Promise<void> {
  const { logger } = options
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULTS.POLL_INTERVAL_MS
  const deadline = host.now() + spec.timeout * 1000
  const workerUrl = `http://127.0.0.1:${spec.port}/`

  let lastProblem = "not checked"
  for (;;) {
    const state = await host.runner.run(["systemctl", "is-active", spec.serviceName])
    if (state.stdout !== "active") {
      lastProblem = `service state is "${state.stdout || "unknown"}"`
    } else {
      const answer = await host.httpCheck(workerUrl, { timeoutMs: TIMEOUTS.HTTP_CHECK_MS })
      if (answer.status !== undefined) break
      lastProblem = `workers on port ${spec.port} not answering: ${answer.error ?? "no response"}`
    }

    if (host.now() >= deadline) {
      throw new VerificationError(
        `Service ${spec.serviceName} not healthy after ${spec.timeout}s: ${lastProblem}. ` +
          `Check \`journalctl -u ${spec.serviceName} -n 50\`.`,
      )
    }
    logger.debug(`Waiting for ${spec.serviceName}: ${lastProblem}`)
    await host.sleep(pollIntervalMs)
  }
  logger.info(`✓ ${spec.serviceName} is active and answering on port ${spec.port}`)

  // proxy_pass keeps the prefix, so the workers see the same path nginx does
  const routePath = spec.apiUrlPrefix === "/" ? "/" : `${spec.apiUrlPrefix}/`
  const direct = await host.httpCheck(`http://127.0.0.1:${spec.port}${routePath}`, {
    timeoutMs: TIMEOUTS.HTTP_CHECK_MS,
  })
  const proxied = await host.httpCheck(`http://127.0.0.1:${PROXY_HTTP_PORT}${routePath}`, {
    host: spec.domain,
    timeoutMs: TIMEOUTS.HTTP_CHECK_MS,
  })

  const problem = routingProblem(proxied, direct)
  if (problem) {
    throw new VerificationError(`nginx is not routing ${routePath} to ${spec.serviceName}: ${problem}`)
  }
  logger.info(`✓ nginx routes ${routePath} (HTTP ${proxied.status})`)
}

/**
 * Compare what nginx answered for the API route with what the workers
 * answered for the same path. A 404 from nginx while the workers serve the
 * path means another server block took the request.
 */
function routingProblem(proxied: HttpCheckResult, direct: HttpCheckResult): string | undefined {
  if (proxied.status === undefined) return proxied.error ?? "no response"
  if (proxied.status >= 500) return `HTTP ${proxied.status}`
  if (proxied.status === 404 && direct.status !== 404) {
    const workers = direct.status === undefined ? (direct.error ?? "no response") : `HTTP ${direct.status}`
    return `HTTP 404 through nginx but ${workers} from the workers; another server block may be answering`
  }
  return undefined
}

/**
 * Resolve the URLs the deployment is reachable at
 */
export function resolveAccess(spec: DeploymentSpec, address: string, certificateIssued: boolean): AccessInfo {
  const secure = Boolean(spec.domain) && certificateIssued
  const url = secure ? `https://${spec.domain}` : `http://${address}:${spec.port}`
  const endpoints: AccessInfo["endpoints"] = {}

  if (spec.frontendPath && spec.apiUrlPrefix !== "/") {
    endpoints.api = `${url}${spec.apiUrlPrefix}`
    endpoints.frontend = spec.frontendUrlPrefix === "/" ? url : `${url}${spec.frontendUrlPrefix}`
  }

  return { url, secure, endpoints }
}
