/**
 * Artifact rendering
 *
 * Pure functions from a validated spec (plus resolved host facts) to the text
 * of the systemd unit and nginx routes. Identical input gives identical output:
 * nothing here reads the clock, the environment or the filesystem.
 */

import { basename, join } from "node:path"
import { DEFAULTS, PATHS } from "../constants.js"
import { ConflictingRouteError } from "../errors.js"
import type { DeployPaths, DeploymentSpec, Framework, RenderContext, RenderedArtifact } from "../types.js"

type Launcher = (spec: DeploymentSpec) => string[]

function gunicorn(spec: DeploymentSpec, app: string, extra: string[] = []): string[] {
  return [
    `${spec.venvPath}/bin/gunicorn`,
    "--workers",
    String(spec.workers),
    "--bind",
    `0.0.0.0:${spec.port}`,
    "--timeout",
    String(spec.timeout),
    ...extra,
    app,
  ]
}

/** One entry per framework; adding a framework means adding a line here */
const LAUNCHERS: Record<Framework, Launcher> = {
  flask: spec => gunicorn(spec, "app:app"),
  fastapi: spec => gunicorn(spec, "main:app", ["--worker-class", "uvicorn.workers.UvicornWorker"]),
  django: spec => gunicorn(spec, `${basename(spec.projectPath)}.wsgi:application`),
}

/**
 * Command line that starts the application workers
 */
export function launchCommand(spec: DeploymentSpec): string[] {
  return LAUNCHERS[spec.framework](spec)
}

/**
 * Quote one argument for a unit file: `%` is a specifier, and arguments with
 * whitespace or quotes need double quotes.
 */
export function systemdQuote(arg: string): string {
  const escaped = arg.replace(/%/g, "%%")
  if (!/[\s"'\\]/.test(escaped)) return escaped
  return `"${escaped.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`
}

export function certificateDir(paths: DeployPaths, domain: string): string {
  return join(paths.letsencryptDir, domain)
}

export function artifactPaths(paths: DeployPaths, serviceName: string) {
  return {
    unit: join(paths.systemdDir, `${serviceName}.service`),
    proxy: join(paths.nginxDir, "sites-available", `${serviceName}.conf`),
    proxyLink: join(paths.nginxDir, "sites-enabled", `${serviceName}.conf`),
    frontend: join(paths.nginxDir, "snippets", `${serviceName}-frontend.conf`),
  }
}

function renderUnit(spec: DeploymentSpec, context: RenderContext): string {
  const after = spec.enableDb ? "network.target postgresql.service" : "network.target"
  const systemPath = "/usr/local/sbin:/usr/local/bin:/usr/sbin:/usr/bin:/sbin:/bin"

  const lines = [
    `# Managed by pyship for ${spec.serviceName}. Changes are overwritten on the next deploy.`,
    "[Unit]",
    `Description=${spec.serviceName} (${spec.framework}) service`,
    `After=${after}`,
    ...(spec.enableDb ? ["Wants=postgresql.service"] : []),
    "",
    "[Service]",
    "Type=simple",
    `User=${context.user}`,
    `Group=${context.group}`,
    `WorkingDirectory=${systemdQuote(spec.projectPath)}`,
    `Environment=${systemdQuote(`PATH=${spec.venvPath}/bin:${systemPath}`)}`,
    ...(spec.envFile ? [`EnvironmentFile=${systemdQuote(spec.envFile)}`] : []),
    ...(spec.enableDb
      ? [`ExecStartPre=/usr/bin/pg_isready --quiet --timeout=${DEFAULTS.DB_READY_TIMEOUT_SECONDS}`]
      : []),
    `ExecStart=${launchCommand(spec).map(systemdQuote).join(" ")}`,
    "Restart=always",
    "RestartSec=5",
    "",
    "StandardOutput=journal",
    "StandardError=journal",
    `SyslogIdentifier=${spec.serviceName}`,
    "",
    "KillMode=mixed",
    "TimeoutStopSec=30",
    "",
    "[Install]",
    "WantedBy=multi-user.target",
    "",
  ]
  return lines.join("\n")
}

/**
 * nginx `location` blocks for a prefix. Non-root prefixes match on a path
 * segment boundary: "/api" serves "/api" and "/api/...", never "/apiary".
 */
function locationBlocks(prefix: string, body: string[]): string[] {
  const indented = body.map(line => `        ${line}`)
  if (prefix === "/") {
    return ["    location / {", ...indented, "    }"]
  }
  return [
    `    location = ${prefix} {`,
    `        return 308 ${prefix}/$is_args$args;`,
    "    }",
    "",
    `    location ^~ ${prefix}/ {`,
    ...indented,
    "    }",
  ]
}

function proxyBody(spec: DeploymentSpec): string[] {
  return [
    `proxy_pass http://127.0.0.1:${spec.port};`,
    "proxy_http_version 1.1;",
    "proxy_set_header Host $host;",
    "proxy_set_header X-Real-IP $remote_addr;",
    "proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;",
    "proxy_set_header X-Forwarded-Proto $scheme;",
    `proxy_read_timeout ${spec.timeout}s;`,
  ]
}

function renderFrontendRoute(spec: DeploymentSpec, frontendPath: string): string {
  const prefix = spec.frontendUrlPrefix
  const index = prefix === "/" ? "/index.html" : `${prefix}/index.html`
  const lines = [
    `# Managed by pyship for ${spec.serviceName}: static frontend at ${prefix}`,
    ...locationBlocks(prefix, [
      `alias ${frontendPath}/;`,
      `try_files $uri $uri/ ${index};`,
      "expires 1d;",
      'add_header Cache-Control "public";',
    ]).map(line => line.slice(4)),
    "",
  ]
  return lines.join("\n")
}

function renderProxyRoute(spec: DeploymentSpec, context: RenderContext, paths: DeployPaths): string {
  const serverName = spec.domain ?? "_"
  const routes = [
    "    # API",
    ...locationBlocks(spec.apiUrlPrefix, proxyBody(spec)),
    ...(spec.frontendPath
      ? ["", "    # Frontend", `    include ${artifactPaths(paths, spec.serviceName).frontend};`]
      : []),
  ]
  const header = `# Managed by pyship for ${spec.serviceName}. Changes are overwritten on the next deploy.`

  if (spec.domain && context.certificateExists) {
    const certDir = certificateDir(paths, spec.domain)
    return [
      header,
      "server {",
      "    listen 80;",
      "    listen [::]:80;",
      `    server_name ${serverName};`,
      `    return 301 https://${serverName}$request_uri;`,
      "}",
      "",
      "server {",
      "    listen 443 ssl;",
      "    listen [::]:443 ssl;",
      `    server_name ${serverName};`,
      "",
      `    ssl_certificate ${certDir}/fullchain.pem;`,
      `    ssl_certificate_key ${certDir}/privkey.pem;`,
      "    ssl_protocols TLSv1.2 TLSv1.3;",
      "    ssl_prefer_server_ciphers on;",
      "",
      ...routes,
      "}",
      "",
    ].join("\n")
  }

  // Without a domain this block is the catch-all for requests by address
  const listen = spec.domain ? "" : " default_server"
  return [
    header,
    "server {",
    `    listen 80${listen};`,
    `    listen [::]:80${listen};`,
    `    server_name ${serverName};`,
    "",
    ...routes,
    "}",
    "",
  ].join("\n")
}

/**
 * Render the artifacts for a deployment, in install order:
 * process unit, proxy route, then the frontend route when a frontend is given.
 *
 * @throws ConflictingRouteError when the frontend and API prefixes are equal
 */
export function renderArtifacts(
  spec: DeploymentSpec,
  context: RenderContext,
  paths: DeployPaths = PATHS,
): RenderedArtifact[] {
  // Checked with or without a frontend path
  if (spec.frontendUrlPrefix === spec.apiUrlPrefix) {
    throw new ConflictingRouteError(spec.apiUrlPrefix)
  }

  const destinations = artifactPaths(paths, spec.serviceName)
  const common = { mode: DEFAULTS.ARTIFACT_MODE, owner: DEFAULTS.ARTIFACT_OWNER }

  const artifacts: RenderedArtifact[] = [
    { kind: "process-unit", destination: destinations.unit, content: renderUnit(spec, context), ...common },
    {
      kind: "proxy-route",
      destination: destinations.proxy,
      content: renderProxyRoute(spec, context, paths),
      link: destinations.proxyLink,
      routePrefix: spec.apiUrlPrefix,
      ...common,
    },
  ]

  if (spec.frontendPath) {
    artifacts.push({
      kind: "frontend-route",
      destination: destinations.frontend,
      content: renderFrontendRoute(spec, spec.frontendPath),
      routePrefix: spec.frontendUrlPrefix,
      ...common,
    })
  }

  return artifacts
}

function prefixMatches(prefix: string, path: string): boolean {
  return prefix === "/" || path === prefix || path.startsWith(`${prefix}/`)
}

/**
 * Resolve which route artifact serves a request path: the longest matching
 * prefix wins, so the API prefix always beats a frontend mounted at "/".
 */
export function matchRoute(artifacts: readonly RenderedArtifact[], path: string): RenderedArtifact | undefined {
  let best: RenderedArtifact | undefined
  for (const artifact of artifacts) {
    const prefix = artifact.routePrefix
    if (prefix === undefined || !prefixMatches(prefix, path)) continue
    if (!best?.routePrefix || prefix.length > best.routePrefix.length) {
      best = artifact
    }
  }
  return best
}
