import { describe, expect, it } from "vitest"
import {
  COMMAND_NOT_FOUND,
  CommandError,
  type CommandRunner,
  createCommandRunner,
  runChecked,
} from "../src/executors/command.js"

function stubRunner(exitCode: number, stdout = "", stderr = ""): CommandRunner {
  return { run: async () => ({ exitCode, stdout, stderr }) }
}

describe("createCommandRunner", () => {
  it("should report a binary that cannot be spawned as exit code 127", async () => {
    const result = await createCommandRunner().run(["pyship-test-no-such-binary", "--version"])

    expect(result.exitCode).toBe(COMMAND_NOT_FOUND)
    expect(result.stderr).toMatch(/^Failed to spawn pyship-test-no-such-binary: /)
  })

  it("should refuse an empty command", async () => {
    await expect(createCommandRunner().run([])).resolves.toEqual({
      exitCode: COMMAND_NOT_FOUND,
      stdout: "",
      stderr: "empty command",
    })
  })
})

describe("runChecked", () => {
  it("should return stdout on success", async () => {
    await expect(runChecked(stubRunner(0, "deploy"), ["id", "-un"])).resolves.toBe("deploy")
  })

  it("should throw with the command and its output on failure", async () => {
    const error = await runChecked(stubRunner(1, "", "unit not found"), ["systemctl", "restart", "shop"]).catch(
      (e: unknown) => e,
    )

    expect(error).toBeInstanceOf(CommandError)
    expect(error).toMatchObject({
      argv: ["systemctl", "restart", "shop"],
      exitCode: 1,
      stderr: "unit not found",
      message: "Command `systemctl restart shop` failed with exit code 1: unit not found",
    })
  })

  it("should fall back to stdout, then to no detail", () => {
    expect(new CommandError(["nginx", "-t"], 1, "", "syntax error").message).toBe(
      "Command `nginx -t` failed with exit code 1: syntax error",
    )
    expect(new CommandError(["false"], 1, "", "").message).toBe("Command `false` failed with exit code 1")
  })
})
