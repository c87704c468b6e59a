import { basename, isAbsolute, join, resolve } from "node:path"
import { parse as parseDotenv } from "dotenv"
import { z } from "zod"
import { errorMessage } from "@pyship/shared"
import { DEFAULTS, PORT_RANGE } from "./constants.js"
import { InvalidSpecError } from "./errors.js"
import type { HostContext } from "./host.js"
import { type DeploymentInput, type DeploymentSpec, FRAMEWORKS } from "./types.js"

const SERVICE_NAME = /^[A-Za-z0-9_-]+$/
const DOMAIN = /^[a-z0-9.-]+$/i
// Written verbatim into nginx config
const NGINX_UNSAFE_CHARS = /[\s;{}"'\\]/
const NGINX_UNSAFE_MESSAGE = "must not contain whitespace, quotes, ; or braces"

/**
 * Drop trailing slashes, keeping the root prefix as "/"
 */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.replace(/\/+$/, "")
  return trimmed === "" ? "/" : trimmed
}

const urlPrefix = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine(value => value.startsWith("/"), "must start with /")
    .refine(value => !NGINX_UNSAFE_CHARS.test(value), NGINX_UNSAFE_MESSAGE)
    .transform(normalizePrefix)

const optionalPath = z
  .string()
  .optional()
  .transform(value => (value === undefined || value.trim() === "" ? undefined : value))

export const deploymentInputSchema = z.object({
  projectPath: z.string().min(1, "is required"),
  serviceName: z.string().regex(SERVICE_NAME, "may only contain letters, digits, - and _"),
  framework: z.enum(FRAMEWORKS),
  port: z
    .number()
    .int("must be an integer")
    .min(PORT_RANGE.MIN, `must be between ${PORT_RANGE.MIN} and ${PORT_RANGE.MAX}`)
    .max(PORT_RANGE.MAX, `must be between ${PORT_RANGE.MIN} and ${PORT_RANGE.MAX}`),
  venvName: z
    .string()
    .min(1, "is required")
    .refine(value => isAbsolute(value) || !value.split("/").includes(".."), "must stay inside the project"),
  workers: z.number().int("must be an integer").positive("must be positive").default(DEFAULTS.WORKERS),
  timeout: z.number().int("must be an integer").positive("must be positive").default(DEFAULTS.TIMEOUT_SECONDS),
  domain: z
    .string()
    .regex(DOMAIN, "must be a hostname")
    .refine(value => !value.includes("..") && !value.startsWith("."), "must be a hostname")
    .transform(value => value.toLowerCase())
    .optional(),
  enableDb: z.boolean().default(false),
  envFile: optionalPath,
  // Resolved before the check, since the alias directive gets the absolute path
  frontendPath: optionalPath
    .transform(value => value && resolve(value))
    .refine(value => value === undefined || !NGINX_UNSAFE_CHARS.test(value), NGINX_UNSAFE_MESSAGE),
  frontendUrlPrefix: urlPrefix(DEFAULTS.FRONTEND_URL_PREFIX),
  apiUrlPrefix: urlPrefix(DEFAULTS.API_URL_PREFIX),
  verbose: z.boolean().default(false),
})

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const field = issue.path.join(".")
    return field ? `${field} ${issue.message}` : issue.message
  })
}

/**
 * Validate the shape of the input without touching the host.
 *
 * @throws InvalidSpecError
 */
export function parseDeploymentInput(input: DeploymentInput): DeploymentSpec {
  const parsed = deploymentInputSchema.safeParse(input)
  if (!parsed.success) {
    throw new InvalidSpecError(formatIssues(parsed.error))
  }

  const values = parsed.data
  const projectPath = resolve(values.projectPath)

  return Object.freeze({
    projectPath,
    serviceName: values.serviceName,
    framework: values.framework,
    port: values.port,
    venvName: values.venvName,
    venvPath: resolve(projectPath, values.venvName),
    workers: values.workers,
    timeout: values.timeout,
    domain: values.domain,
    enableDb: values.enableDb,
    envFile: values.envFile && (isAbsolute(values.envFile) ? values.envFile : join(projectPath, values.envFile)),
    frontendPath: values.frontendPath,
    frontendUrlPrefix: values.frontendUrlPrefix,
    apiUrlPrefix: values.apiUrlPrefix,
    verbose: values.verbose,
  })
}

/**
 * Check that every path the deployment names exists, reading only.
 * Returns the number of variables in the env file, if one is given.
 *
 * @throws InvalidSpecError listing every missing path
 */
export async function checkSpecPaths(host: HostContext, spec: DeploymentSpec): Promise<{ envVariables?: number }> {
  const issues: string[] = []
  let envVariables: number | undefined

  if (!(await host.isDirectory(spec.projectPath))) {
    issues.push(`projectPath ${spec.projectPath} is not a directory`)
  } else if (!(await host.isDirectory(spec.venvPath))) {
    const where = isAbsolute(spec.venvName) ? `at ${spec.venvPath}` : `in ${spec.projectPath}`
    issues.push(
      `venvName virtual environment "${spec.venvName}" not found ${where}; create it and install the application dependencies first`,
    )
  }

  if (spec.envFile) {
    if (!(await host.pathExists(spec.envFile))) {
      issues.push(`envFile ${spec.envFile} does not exist`)
    } else {
      try {
        envVariables = Object.keys(parseDotenv(await host.readTextFile(spec.envFile))).length
      } catch (error) {
        issues.push(`envFile ${basename(spec.envFile)} could not be read: ${errorMessage(error)}`)
      }
    }
  }

  if (spec.frontendPath && !(await host.isDirectory(spec.frontendPath))) {
    issues.push(`frontendPath ${spec.frontendPath} is not a directory`)
  }

  if (issues.length > 0) {
    throw new InvalidSpecError(issues)
  }

  return { envVariables }
}
