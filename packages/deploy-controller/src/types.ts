import type { DeploymentError } from "./errors.js"

export const FRAMEWORKS = ["flask", "fastapi", "django"] as const

export type Framework = (typeof FRAMEWORKS)[number]

export const DEPLOY_STATES = {
  VALIDATING: "validating",
  CHECKING_DEPENDENCIES: "checking-dependencies",
  RENDERING: "rendering",
  INSTALLING: "installing",
  ACTIVATING: "activating",
  VERIFYING: "verifying",
  DONE: "done",
  FAILED: "failed",
} as const

export type DeployState = (typeof DEPLOY_STATES)[keyof typeof DEPLOY_STATES]

/** Non-terminal states; the ones a failure can be attributed to */
export type DeployStep = Exclude<DeployState, "done" | "failed">

/**
 * Parameters as declared by the user, before validation
 */
export interface DeploymentInput {
  /** Path to the project directory */
  projectPath: string
  /** systemd service name (letters, digits, `-` and `_`) */
  serviceName: string
  framework: Framework
  /** Port the workers bind to */
  port: number
  /** Virtual environment directory name inside the project */
  venvName: string
  /** Worker processes (default: 2) */
  workers?: number
  /** Per-worker timeout in seconds (default: 120) */
  timeout?: number
  /** Public domain; enables the certificate step */
  domain?: string
  /** Wait for the local database before starting workers */
  enableDb?: boolean
  /** dotenv file injected into the unit, relative to the project unless absolute */
  envFile?: string
  /** Directory of built frontend assets */
  frontendPath?: string
  /** URL prefix for the frontend (default: "/") */
  frontendUrlPrefix?: string
  /** URL prefix for the API (default: "/api") */
  apiUrlPrefix?: string
  verbose?: boolean
}

/**
 * Validated, normalized and frozen deployment parameters.
 * Paths are absolute and URL prefixes carry no trailing slash (except "/").
 */
export interface DeploymentSpec {
  readonly projectPath: string
  readonly serviceName: string
  readonly framework: Framework
  readonly port: number
  readonly venvName: string
  /** Absolute path of the virtual environment */
  readonly venvPath: string
  readonly workers: number
  readonly timeout: number
  readonly domain?: string
  readonly enableDb: boolean
  readonly envFile?: string
  readonly frontendPath?: string
  readonly frontendUrlPrefix: string
  readonly apiUrlPrefix: string
  readonly verbose: boolean
}

/**
 * A host package the deployment relies on
 */
export interface SystemDependency {
  name: string
  /** Exits 0 when the dependency is present */
  check: readonly string[]
  /** Installs the dependency (runs privileged) */
  install: readonly string[]
  required: boolean
}

export type ArtifactKind = "process-unit" | "proxy-route" | "frontend-route"

export interface RenderedArtifact {
  kind: ArtifactKind
  /** Absolute destination on the host */
  destination: string
  content: string
  mode: number
  /** `user:group` */
  owner: string
  /** Symlink pointing at `destination`, created after the write */
  link?: string
  /** URL prefix served by a route artifact */
  routePrefix?: string
}

/**
 * Host facts the renderer needs, resolved before rendering
 */
export interface RenderContext {
  user: string
  group: string
  /** A certificate for `spec.domain` is already on disk */
  certificateExists: boolean
}

/**
 * Where artifacts and certificates live on the host
 */
export interface DeployPaths {
  systemdDir: string
  nginxDir: string
  letsencryptDir: string
}

export interface AccessInfo {
  /** Primary URL of the deployment */
  url: string
  /** Served over HTTPS with an issued certificate */
  secure: boolean
  /** API and frontend URLs when both are deployed on separate prefixes */
  endpoints: { api?: string; frontend?: string }
}

/**
 * Result of a deployment run; the orchestrator's only output
 */
export interface DeployResult {
  success: boolean
  serviceName: string
  /** Step the run stopped at (failed runs only) */
  failedStep?: DeployStep
  /** Originating error (failed runs only) */
  error?: DeploymentError
  /** True when files or units may have been left behind */
  partialState: boolean
  /** Diagnostics collected along the way */
  messages: string[]
  /** Access URLs (successful runs only) */
  access?: AccessInfo
  /** States visited, in order */
  transitions: DeployState[]
}
