import { PublishState, StateTransition, PublishStateData } from './interfaces'

const TERMINAL_STATES: readonly PublishState[] = ['SUCCESS', 'FAILED', 'INTERRUPTED']

/**
 * State machine for tracking the stages of a single publish run
 */
export class PublishStateMachine {
  private currentState: PublishState = 'INITIAL'
  private transitions: StateTransition[] = []
  private ref?: string
  private packageDir?: string
  private failedStage?: PublishState
  private error?: string

  /**
   * Transition to a new state
   */
  transition(to: PublishState, metadata?: Record<string, unknown>): void {
    if (this.isTerminal()) {
      throw new Error(`Cannot transition from terminal state ${this.currentState} to ${to}`)
    }

    const from = this.currentState

    this.transitions.push({
      from,
      to,
      timestamp: new Date(),
      metadata
    })
    this.currentState = to

    if (to === 'FAILED' || to === 'INTERRUPTED') {
      // CLEANING_UP is bookkeeping; the failure belongs to the stage before it
      this.failedStage = from === 'CLEANING_UP' ? this.lastWorkingStage() : from
    }

    if (metadata) {
      if (typeof metadata.ref === 'string') this.ref = metadata.ref
      if (typeof metadata.packageDir === 'string') this.packageDir = metadata.packageDir
      if (typeof metadata.error === 'string') this.error = metadata.error
    }
  }

  getState(): PublishState {
    return this.currentState
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.includes(this.currentState)
  }

  getStateData(): PublishStateData {
    return {
      currentState: this.currentState,
      ref: this.ref,
      packageDir: this.packageDir,
      transitions: [...this.transitions],
      failedStage: this.failedStage,
      error: this.error
    }
  }

  getFailedStage(): PublishState | undefined {
    return this.failedStage
  }

  getLastError(): string | undefined {
    return this.error
  }

  /**
   * Get elapsed time between the first and the last transition
   */
  getElapsedTime(): number {
    if (this.transitions.length === 0) {
      return 0
    }

    const firstTransition = this.transitions[0]
    const lastTransition = this.transitions[this.transitions.length - 1]

    return lastTransition.timestamp.getTime() - firstTransition.timestamp.getTime()
  }

  /**
   * Get transition history as human-readable string
   */
  getHistory(): string {
    return this.transitions
      .map((t) => {
        const time = t.timestamp.toISOString()
        const meta = t.metadata ? ` (${JSON.stringify(t.metadata)})` : ''
        return `${time}: ${t.from} → ${t.to}${meta}`
      })
      .join('\n')
  }

  private lastWorkingStage(): PublishState {
    for (let i = this.transitions.length - 1; i >= 0; i--) {
      const { from } = this.transitions[i]
      if (from !== 'CLEANING_UP') return from
    }
    return 'INITIAL'
  }
}
