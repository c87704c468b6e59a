import { createLogger, createMemorySink } from "@pyship/shared"
import { describe, expect, it, vi } from "vitest"
import { MissingDependencyError } from "../src/errors.js"
import { dependenciesFor, ensureDependencies } from "../src/executors/dependencies.js"
import { spec } from "./support/fixtures.js"
import { MemoryHost } from "./support/memory-host.js"

const logger = createLogger(createMemorySink().sink)

describe("dependenciesFor", () => {
  it("should require the certificate tooling only with a domain", () => {
    const without = dependenciesFor(spec())
    const withDomain = dependenciesFor(spec({ domain: "shop.example.com" }))

    expect(without.filter(d => d.required).map(d => d.name)).toEqual(["systemd", "nginx"])
    expect(withDomain.filter(d => d.required).map(d => d.name)).toEqual([
      "systemd",
      "nginx",
      "certbot",
      "python3-certbot-nginx",
    ])
  })
})

describe("ensureDependencies", () => {
  it("should report everything present without elevating", async () => {
    const host = new MemoryHost()
    const report = await ensureDependencies(host, dependenciesFor(spec({ domain: "shop.example.com" })), {
      autoInstall: false,
      logger,
    })

    expect(report).toEqual({
      present: ["systemd", "nginx", "certbot", "python3-certbot-nginx"],
      installed: [],
      skipped: [],
    })
    expect(host.acquired).toBe(0)
  })

  it("should skip absent optional dependencies without installing them", async () => {
    const host = new MemoryHost().on("certbot", { exitCode: 127 }).on("dpkg -s", { exitCode: 1 })

    const report = await ensureDependencies(host, dependenciesFor(spec()), { autoInstall: true, logger })

    expect(report.skipped).toEqual(["certbot", "python3-certbot-nginx"])
    expect(host.ran("apt-get")).toBe(0)
  })

  it("should fail naming the missing dependency when installing is not allowed", async () => {
    const host = new MemoryHost().on("nginx -v", { exitCode: 127 })

    const error = await ensureDependencies(host, dependenciesFor(spec()), { autoInstall: false, logger }).catch(
      (e: unknown) => e,
    )

    expect(error).toBeInstanceOf(MissingDependencyError)
    expect(error).toMatchObject({ names: ["nginx"], code: "MISSING_DEPENDENCY" })
    expect(error instanceof MissingDependencyError && error.dependency).toBe("nginx")
    expect(host.ran("apt-get")).toBe(0)
  })

  it("should ask before installing and respect a refusal", async () => {
    const host = new MemoryHost().on("nginx -v", { exitCode: 127 })
    const confirm = vi.fn(async () => false)

    await expect(
      ensureDependencies(host, dependenciesFor(spec()), { autoInstall: false, confirm, logger }),
    ).rejects.toThrow("Required system dependencies not found: nginx")
    expect(confirm).toHaveBeenCalledWith(["nginx"])
    expect(host.acquired).toBe(0)
  })

  it("should install missing required dependencies under privileges", async () => {
    const host = new MemoryHost().onSequence("nginx -v", [{ exitCode: 127 }, { exitCode: 0 }])

    const report = await ensureDependencies(host, dependenciesFor(spec()), { autoInstall: true, logger })

    expect(report.installed).toEqual(["nginx"])
    expect(host.commands.filter(c => c.privileged).map(c => c.line)).toEqual([
      "apt-get update",
      "apt-get install -y nginx",
    ])
    expect(host.acquired).toBe(1)
    expect(host.released).toBe(1)
  })

  it("should install after confirmation", async () => {
    const host = new MemoryHost().onSequence("certbot --version", [{ exitCode: 127 }, { exitCode: 0 }])
    const confirm = vi.fn(async () => true)

    const report = await ensureDependencies(host, dependenciesFor(spec({ domain: "shop.example.com" })), {
      autoInstall: false,
      confirm,
      logger,
    })

    expect(report.installed).toEqual(["certbot"])
    expect(host.ran("apt-get install -y certbot")).toBe(1)
  })

  it("should fail when a dependency is still absent after installing", async () => {
    const host = new MemoryHost().on("nginx -v", { exitCode: 127 }).on("apt-get install", { exitCode: 100 })

    await expect(ensureDependencies(host, dependenciesFor(spec()), { autoInstall: true, logger })).rejects.toThrow(
      "Required system dependencies not found: nginx. Still absent after installation.",
    )
    expect(host.released).toBe(1)
  })
})
