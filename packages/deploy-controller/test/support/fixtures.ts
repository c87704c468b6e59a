import { parseDeploymentInput } from "../../src/spec.js"
import type { DeployPaths, DeploymentInput, DeploymentSpec, RenderContext } from "../../src/types.js"

export const PROJECT = "/srv/shop"

export const TEST_PATHS: DeployPaths = {
  systemdDir: "/etc/systemd/system",
  nginxDir: "/etc/nginx",
  letsencryptDir: "/etc/letsencrypt/live",
}

export const CONTEXT: RenderContext = { user: "deploy", group: "deploy", certificateExists: false }

export function input(overrides: Partial<DeploymentInput> = {}): DeploymentInput {
  return {
    projectPath: PROJECT,
    serviceName: "shop",
    framework: "flask",
    port: 8000,
    venvName: "venv",
    ...overrides,
  }
}

export function spec(overrides: Partial<DeploymentInput> = {}): DeploymentSpec {
  return parseDeploymentInput(input(overrides))
}
