import { createConsoleSink, createLogger, formatError, type Logger } from "@pyship/shared"
import { PATHS } from "./constants.js"
import { DeploymentError } from "./errors.js"
import { activateService, resolveAccess, verifyDeployment } from "./executors/activate.js"
import { dependenciesFor, ensureDependencies } from "./executors/dependencies.js"
import { installArtifacts } from "./executors/install.js"
import { certificateDir, renderArtifacts } from "./executors/render.js"
import type { HostContext } from "./host.js"
import { checkSpecPaths, parseDeploymentInput } from "./spec.js"
import { DeployStateMachine } from "./state-machine.js"
import {
  DEPLOY_STATES,
  type DeployPaths,
  type DeployResult,
  type DeployState,
  type DeploymentInput,
  type DeploymentSpec,
} from "./types.js"

export interface DeployOrchestratorOptions {
  host: HostContext
  logger?: Logger
  /** Where artifacts and certificates live (default: Debian layout) */
  paths?: DeployPaths
  /** Install missing required packages without asking */
  autoInstall?: boolean
  /** Asked before installing packages when `autoInstall` is off */
  confirmInstall?: (missing: readonly string[]) => Promise<boolean>
  certbotEmail?: string
  retryDelayMs?: number
  pollIntervalMs?: number
  onStateChange?: (state: DeployState, previous: DeployState) => void
}

const TOTAL_PHASES = 6

/**
 * Python web app deployment orchestrator
 *
 * Runs one deployment through validate → dependencies → render → install →
 * activate → verify. Never throws: every outcome is a DeployResult.
 * There is no rollback; a failure after installing starts is reported as
 * partial state.
 */
export class DeployOrchestrator {
  private readonly host: HostContext
  private readonly logger: Logger
  private readonly paths: DeployPaths

  constructor(private readonly options: DeployOrchestratorOptions) {
    this.host = options.host
    this.logger = options.logger ?? createLogger(createConsoleSink())
    this.paths = options.paths ?? PATHS
  }

  /**
   * Deploy one application
   *
   * @param input - Parameters as declared by the user
   */
  async deploy(input: DeploymentInput): Promise<DeployResult> {
    const machine = new DeployStateMachine({ onStateChange: this.options.onStateChange })
    const logger = this.logger.child({ service: input.serviceName })
    const messages: string[] = []
    let spec: DeploymentSpec | undefined

    logger.info(`=== Deploying ${input.serviceName} (${input.framework}) ===`)

    try {
      // Phase 1: Validation
      logger.info(`[Phase 1/${TOTAL_PHASES}] Validating deployment parameters...`)
      spec = parseDeploymentInput(input)
      const { envVariables } = await checkSpecPaths(this.host, spec)
      if (envVariables !== undefined) {
        logger.debug(`Environment file ${spec.envFile} defines ${envVariables} variable(s)`)
      }
      logger.info(`✓ Project ${spec.projectPath} with virtual environment ${spec.venvName}`)

      // Phase 2: System dependencies
      machine.advance(DEPLOY_STATES.CHECKING_DEPENDENCIES)
      logger.info(`[Phase 2/${TOTAL_PHASES}] Checking system dependencies...`)
      const report = await ensureDependencies(this.host, dependenciesFor(spec), {
        autoInstall: this.options.autoInstall ?? false,
        confirm: this.options.confirmInstall,
        logger,
      })
      if (report.installed.length > 0) {
        messages.push(`Installed system packages: ${report.installed.join(", ")}`)
      }
      logger.info(`✓ Dependencies present: ${[...report.present, ...report.installed].join(", ")}`)

      // Phase 3: Rendering
      machine.advance(DEPLOY_STATES.RENDERING)
      logger.info(`[Phase 3/${TOTAL_PHASES}] Rendering service and proxy configuration...`)
      const identity = await this.host.identity()
      const certificateExists = spec.domain
        ? await this.host.pathExists(certificateDir(this.paths, spec.domain))
        : false
      const artifacts = renderArtifacts(spec, { ...identity, certificateExists }, this.paths)
      logger.info(`✓ Rendered ${artifacts.map(a => a.kind).join(", ")}`)

      // Phase 4: Installing
      machine.advance(DEPLOY_STATES.INSTALLING)
      logger.info(`[Phase 4/${TOTAL_PHASES}] Installing configuration files...`)
      await installArtifacts(this.host, artifacts, { logger })

      // Phase 5: Activation
      machine.advance(DEPLOY_STATES.ACTIVATING)
      logger.info(`[Phase 5/${TOTAL_PHASES}] Activating service...`)
      const activation = await activateService(this.host, spec, {
        logger,
        certificateExists,
        certbotEmail: this.options.certbotEmail,
        retryDelayMs: this.options.retryDelayMs,
      })
      messages.push(...activation.messages)

      // Phase 6: Verification
      machine.advance(DEPLOY_STATES.VERIFYING)
      logger.info(`[Phase 6/${TOTAL_PHASES}] Verifying deployment...`)
      await verifyDeployment(this.host, spec, { logger, pollIntervalMs: this.options.pollIntervalMs })

      const address = await this.host.primaryAddress()
      const access = resolveAccess(spec, address, activation.certificateIssued)
      machine.advance(DEPLOY_STATES.DONE)

      logger.info(`=== Deployment successful: ${spec.serviceName} ===`)
      logger.info(`URL: ${access.url}`)
      if (access.endpoints.api) logger.info(`API: ${access.endpoints.api}`)
      if (access.endpoints.frontend) logger.info(`Frontend: ${access.endpoints.frontend}`)
      logger.info(`Status: systemctl status ${spec.serviceName}`)
      const status = await this.host.runner.run(["systemctl", "status", spec.serviceName, "--no-pager"])
      if (status.stdout) logger.debug(status.stdout, { exitCode: status.exitCode })
      logger.info(`Logs: journalctl -u ${spec.serviceName} -f`)

      return {
        success: true,
        serviceName: spec.serviceName,
        partialState: false,
        messages,
        access,
        transitions: [...machine.history],
      }
    } catch (error) {
      const failedStep = machine.fail()
      const deployError = DeploymentError.unexpected(failedStep, error)
      const note = deployError.partialStateNote

      logger.error(`Deployment failed during ${failedStep}`, deployError, { code: deployError.code })
      if (spec?.verbose ?? input.verbose) {
        logger.debug(formatError(deployError, true))
      }
      if (note) {
        logger.warn(note)
        messages.push(note)
      }

      return {
        success: false,
        serviceName: spec?.serviceName ?? input.serviceName,
        failedStep,
        error: deployError,
        partialState: deployError.leavesPartialState,
        messages,
        transitions: [...machine.history],
      }
    }
  }
}
