import type { DeployPaths } from "./types.js"

/** Host-standard locations on Debian/Ubuntu */
export const PATHS: DeployPaths = {
  systemdDir: "/etc/systemd/system",
  nginxDir: "/etc/nginx",
  letsencryptDir: "/etc/letsencrypt/live",
}

export const DEFAULTS = {
  WORKERS: 2,
  TIMEOUT_SECONDS: 120,
  FRONTEND_URL_PREFIX: "/",
  API_URL_PREFIX: "/api",
  RETRY_DELAY_MS: 1000,
  POLL_INTERVAL_MS: 1000,
  DB_READY_TIMEOUT_SECONDS: 30,
  ARTIFACT_MODE: 0o644,
  ARTIFACT_OWNER: "root:root",
} as const

/** Registered + ephemeral ports; below 1024 needs root to bind */
export const PORT_RANGE = {
  MIN: 1024,
  MAX: 65535,
} as const

export const TIMEOUTS = {
  /** Single HTTP status check */
  HTTP_CHECK_MS: 5000,
} as const

/** nginx listens here; verification requests the API route through it */
export const PROXY_HTTP_PORT = 80
