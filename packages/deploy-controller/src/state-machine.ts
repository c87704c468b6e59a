/**
 * Deployment State Machine
 *
 * Linear lifecycle of a single deploy run:
 * validating → checking-dependencies → rendering → installing → activating → verifying → done,
 * with failed reachable from every non-terminal state.
 */

import { DEPLOY_STATES, type DeployState, type DeployStep } from "./types.js"

const VALID_TRANSITIONS: Record<DeployState, DeployState[]> = {
  [DEPLOY_STATES.VALIDATING]: [DEPLOY_STATES.CHECKING_DEPENDENCIES, DEPLOY_STATES.FAILED],
  [DEPLOY_STATES.CHECKING_DEPENDENCIES]: [DEPLOY_STATES.RENDERING, DEPLOY_STATES.FAILED],
  [DEPLOY_STATES.RENDERING]: [DEPLOY_STATES.INSTALLING, DEPLOY_STATES.FAILED],
  [DEPLOY_STATES.INSTALLING]: [DEPLOY_STATES.ACTIVATING, DEPLOY_STATES.FAILED],
  [DEPLOY_STATES.ACTIVATING]: [DEPLOY_STATES.VERIFYING, DEPLOY_STATES.FAILED],
  [DEPLOY_STATES.VERIFYING]: [DEPLOY_STATES.DONE, DEPLOY_STATES.FAILED],
  // Terminal states - no transitions allowed
  [DEPLOY_STATES.DONE]: [],
  [DEPLOY_STATES.FAILED]: [],
}

export function isDeployStep(state: DeployState): state is DeployStep {
  return state !== DEPLOY_STATES.DONE && state !== DEPLOY_STATES.FAILED
}

export class DeployStateMachine {
  private state: DeployState = DEPLOY_STATES.VALIDATING
  private failedAt: DeployStep | undefined
  private readonly visited: DeployState[] = [DEPLOY_STATES.VALIDATING]
  private readonly onStateChange?: (state: DeployState, previous: DeployState) => void

  constructor(options?: { onStateChange?: (state: DeployState, previous: DeployState) => void }) {
    this.onStateChange = options?.onStateChange
  }

  get current(): DeployState {
    return this.state
  }

  /** Step the run failed in, once failed */
  get failedStep(): DeployStep | undefined {
    return this.failedAt
  }

  get history(): readonly DeployState[] {
    return this.visited
  }

  isTerminal(): boolean {
    return VALID_TRANSITIONS[this.state].length === 0
  }

  canTransitionTo(target: DeployState): boolean {
    return VALID_TRANSITIONS[this.state].includes(target)
  }

  /**
   * Move to the next state. An invalid transition is a programming error.
   */
  advance(target: DeployState): void {
    if (!this.canTransitionTo(target)) {
      throw new Error(`Invalid deploy transition: ${this.state} → ${target}`)
    }
    const previous = this.state
    this.state = target
    this.visited.push(target)
    this.onStateChange?.(target, previous)
  }

  /**
   * Enter the failed state, remembering the step that failed
   *
   * @returns the failed step
   */
  fail(): DeployStep {
    const current = this.state
    if (!isDeployStep(current)) {
      throw new Error(`Cannot fail from terminal state ${current}`)
    }
    this.failedAt = current
    this.advance(DEPLOY_STATES.FAILED)
    return current
  }
}
