import { describe, expect, it } from "vitest"
import { loadConfig } from "../src/config.js"
import { PATHS } from "../src/constants.js"
import { DeploymentError } from "../src/errors.js"

describe("loadConfig", () => {
  it("should fall back to defaults", () => {
    expect(loadConfig({})).toEqual({
      autoInstall: false,
      paths: PATHS,
      certbotEmail: undefined,
      retryDelayMs: 1000,
      pollIntervalMs: 1000,
    })
  })

  it("should read overrides", () => {
    const config = loadConfig({
      PYSHIP_AUTO_INSTALL: "yes",
      PYSHIP_NGINX_DIR: "/opt/nginx",
      PYSHIP_CERTBOT_EMAIL: "ops@example.com",
      PYSHIP_RETRY_DELAY_MS: "50",
    })

    expect(config.autoInstall).toBe(true)
    expect(config.paths.nginxDir).toBe("/opt/nginx")
    expect(config.paths.systemdDir).toBe("/etc/systemd/system")
    expect(config.certbotEmail).toBe("ops@example.com")
    expect(config.retryDelayMs).toBe(50)
  })

  it("should treat empty values as unset", () => {
    expect(loadConfig({ PYSHIP_AUTO_INSTALL: "", PYSHIP_POLL_INTERVAL_MS: "" })).toMatchObject({
      autoInstall: false,
      pollIntervalMs: 1000,
    })
  })

  it("should name every invalid variable", () => {
    let caught: unknown
    try {
      loadConfig({ PYSHIP_AUTO_INSTALL: "maybe", PYSHIP_SYSTEMD_DIR: "relative/dir" })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(DeploymentError)
    expect(caught).toMatchObject({ code: "CONFIGURATION_INVALID" })
    expect(caught instanceof Error && caught.message).toMatch(
      /^Invalid environment configuration: PYSHIP_AUTO_INSTALL: .+; PYSHIP_SYSTEMD_DIR: .+$/,
    )
  })
})
