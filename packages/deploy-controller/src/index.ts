/**
 * Deploy Controller - Python web app deployment behind nginx
 *
 * Validates a deployment, renders its systemd unit and nginx routes, installs
 * them, activates the service and verifies it answers.
 *
 * @packageDocumentation
 */

export { DeployOrchestrator } from "./orchestrator.js"
export type { DeployOrchestratorOptions } from "./orchestrator.js"
export { DeployStateMachine, isDeployStep } from "./state-machine.js"

export type {
  AccessInfo,
  ArtifactKind,
  DeployPaths,
  DeployResult,
  DeployState,
  DeployStep,
  DeploymentInput,
  DeploymentSpec,
  Framework,
  RenderContext,
  RenderedArtifact,
  SystemDependency,
} from "./types.js"
export { DEPLOY_STATES, FRAMEWORKS } from "./types.js"

export { DEFAULTS, PATHS, PORT_RANGE, TIMEOUTS } from "./constants.js"
export { loadConfig, configSchema } from "./config.js"
export type { ControllerConfig } from "./config.js"
export { checkSpecPaths, deploymentInputSchema, normalizePrefix, parseDeploymentInput } from "./spec.js"

// Host access
export { withPrivileges } from "./host.js"
export type { HostContext, HostIdentity, HttpCheckOptions, HttpCheckResult, PrivilegedSession, WriteOptions } from "./host.js"
export { NodeHost } from "./node-host.js"
export type { NodeHostOptions } from "./node-host.js"

// Individual steps for advanced usage
export { CommandError, COMMAND_NOT_FOUND, createCommandRunner, runChecked } from "./executors/command.js"
export type { CommandResult, CommandRunner, RunOptions } from "./executors/command.js"
export { dependenciesFor, ensureDependencies } from "./executors/dependencies.js"
export type { DependencyReport, EnsureDependenciesOptions } from "./executors/dependencies.js"
export { artifactPaths, certificateDir, launchCommand, matchRoute, renderArtifacts } from "./executors/render.js"
export { installArtifacts } from "./executors/install.js"
export type { InstallOptions } from "./executors/install.js"
export { activateService, resolveAccess, verifyDeployment } from "./executors/activate.js"
export type { ActivateOptions, ActivationOutcome, VerifyOptions } from "./executors/activate.js"

export {
  ActivationError,
  ConflictingRouteError,
  DeploymentError,
  InstallError,
  InvalidSpecError,
  MissingDependencyError,
  VerificationError,
} from "./errors.js"
export type { DeploymentErrorCode } from "./errors.js"
