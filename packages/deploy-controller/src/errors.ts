import type { DeployStep } from "./types.js"

export type DeploymentErrorCode =
  | "INVALID_SPEC"
  | "MISSING_DEPENDENCY"
  | "CONFLICTING_ROUTE"
  | "INSTALL_FAILED"
  | "ACTIVATION_FAILED"
  | "VERIFICATION_FAILED"
  | "CONFIGURATION_INVALID"
  | "UNEXPECTED"

const PARTIAL_STATE_NOTE =
  "Partial state was left on the host (no automatic rollback). Inspect the unit and nginx files before retrying."

export class DeploymentError extends Error {
  readonly code: DeploymentErrorCode
  /** Step the error is attributed to when raised outside the orchestrator's own mapping */
  readonly step?: DeployStep

  constructor(code: DeploymentErrorCode, message: string, options?: { cause?: unknown; step?: DeployStep }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = "DeploymentError"
    this.code = code
    this.step = options?.step
  }

  /** True when the host may hold files or units written before the failure */
  get leavesPartialState(): boolean {
    return this.code === "INSTALL_FAILED" || this.code === "ACTIVATION_FAILED"
  }

  /** Operator-facing note for failures that leave host state behind */
  get partialStateNote(): string | undefined {
    return this.leavesPartialState ? PARTIAL_STATE_NOTE : undefined
  }

  static configurationInvalid(message: string): DeploymentError {
    return new DeploymentError("CONFIGURATION_INVALID", message)
  }

  /** Wrap an error that carries no deployment code, attributing it to `step` */
  static unexpected(step: DeployStep, cause: unknown): DeploymentError {
    if (cause instanceof DeploymentError) return cause
    const reason = cause instanceof Error ? cause.message : String(cause)
    return new DeploymentError("UNEXPECTED", `Unexpected failure while ${step}: ${reason}`, { cause, step })
  }
}

export class InvalidSpecError extends DeploymentError {
  readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super("INVALID_SPEC", `Invalid deployment parameters:\n  - ${issues.join("\n  - ")}`, { step: "validating" })
    this.name = "InvalidSpecError"
    this.issues = issues
  }
}

export class MissingDependencyError extends DeploymentError {
  readonly names: readonly string[]

  constructor(names: readonly string[], detail?: string) {
    const base = `Required system dependencies not found: ${names.join(", ")}`
    super("MISSING_DEPENDENCY", detail ? `${base}. ${detail}` : base, { step: "checking-dependencies" })
    this.name = "MissingDependencyError"
    this.names = names
  }

  /** First missing dependency */
  get dependency(): string {
    return this.names[0] ?? "unknown"
  }
}

export class ConflictingRouteError extends DeploymentError {
  readonly prefix: string

  constructor(prefix: string) {
    super(
      "CONFLICTING_ROUTE",
      `Frontend and API are both routed at "${prefix}"; the frontend route would be unreachable`,
      { step: "rendering" },
    )
    this.name = "ConflictingRouteError"
    this.prefix = prefix
  }
}

export class InstallError extends DeploymentError {
  readonly artifact: string
  readonly destination: string

  constructor(artifact: string, destination: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super("INSTALL_FAILED", `Failed to install ${artifact} at ${destination}: ${reason}`, {
      cause,
      step: "installing",
    })
    this.name = "InstallError"
    this.artifact = artifact
    this.destination = destination
  }

  static privilegesUnavailable(cause: unknown): InstallError {
    return new InstallError("privileged session", "(sudo)", cause)
  }
}

export class ActivationError extends DeploymentError {
  readonly activationStep: string

  constructor(activationStep: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super("ACTIVATION_FAILED", `Activation step "${activationStep}" failed: ${reason}`, {
      cause,
      step: "activating",
    })
    this.name = "ActivationError"
    this.activationStep = activationStep
  }
}

export class VerificationError extends DeploymentError {
  constructor(message: string) {
    super("VERIFICATION_FAILED", message, { step: "verifying" })
    this.name = "VerificationError"
  }
}
