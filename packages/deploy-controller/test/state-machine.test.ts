import { describe, expect, it, vi } from "vitest"
import { DeployStateMachine, isDeployStep } from "../src/state-machine.js"

describe("DeployStateMachine", () => {
  it("should start validating and record each transition", () => {
    const onStateChange = vi.fn()
    const machine = new DeployStateMachine({ onStateChange })

    machine.advance("checking-dependencies")
    machine.advance("rendering")

    expect(machine.current).toBe("rendering")
    expect(machine.history).toEqual(["validating", "checking-dependencies", "rendering"])
    expect(onStateChange).toHaveBeenCalledWith("rendering", "checking-dependencies")
  })

  it("should refuse to skip a step", () => {
    const machine = new DeployStateMachine()

    expect(machine.canTransitionTo("installing")).toBe(false)
    expect(() => machine.advance("installing")).toThrow("Invalid deploy transition: validating → installing")
  })

  it("should remember the step a failure happened in", () => {
    const machine = new DeployStateMachine()
    machine.advance("checking-dependencies")

    expect(machine.fail()).toBe("checking-dependencies")
    expect(machine.failedStep).toBe("checking-dependencies")
    expect(machine.isTerminal()).toBe(true)
    expect(machine.history).toEqual(["validating", "checking-dependencies", "failed"])
  })

  it("should not leave a terminal state", () => {
    const machine = new DeployStateMachine()
    machine.fail()

    expect(() => machine.fail()).toThrow("Cannot fail from terminal state failed")
    expect(() => machine.advance("validating")).toThrow()
  })
})

describe("isDeployStep", () => {
  it("should exclude terminal states", () => {
    expect(isDeployStep("verifying")).toBe(true)
    expect(isDeployStep("done")).toBe(false)
    expect(isDeployStep("failed")).toBe(false)
  })
})
