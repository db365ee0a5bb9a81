/**
 * Shared types for snapshot-publish
 */

// ============================================================================
// Command Execution
// ============================================================================

export interface ExecResult {
  stdout: string
  stderr: string
  exitCode: number
}

export interface ExecOptions {
  cwd?: string
  env?: Record<string, string>
  /** Capture output instead of inheriting the terminal */
  silent?: boolean
  timeout?: number
  signal?: AbortSignal
}

export interface CommandSpec {
  command: string
  args: string[]
  cwd?: string
}

export interface PipeResult {
  source: ExecResult
  sink: ExecResult
}

// ============================================================================
// Publishing
// ============================================================================

export interface PublishOptions {
  /** Package directory relative to the repository root */
  packagePath?: string
  ref?: string
  dryRun?: boolean
  tag?: string
  access?: 'public' | 'restricted'
  otp?: string
  tempRoot?: string
  skipHooks?: boolean
  /** Aborting this signal interrupts the run */
  signal?: AbortSignal
}

// ============================================================================
// State Management
// ============================================================================

export type PublishState =
  | 'INITIAL'
  | 'PREPARING'
  | 'EXPORTING'
  | 'PRUNING'
  | 'RESOLVING_PACKAGE'
  | 'RUNNING_HOOKS'
  | 'PUBLISHING'
  | 'CLEANING_UP'
  | 'SUCCESS'
  | 'FAILED'
  | 'INTERRUPTED'

export interface StateTransition {
  from: PublishState
  to: PublishState
  timestamp: Date
  metadata?: Record<string, unknown>
}

export interface PublishStateData {
  currentState: PublishState
  ref?: string
  packageDir?: string
  transitions: StateTransition[]
  failedStage?: PublishState
  error?: string
}

// ============================================================================
// Publishing Report
// ============================================================================

export interface PublishReport {
  success: boolean
  exitCode: number
  ref: string
  packageDir: string
  errors: string[]
  warnings: string[]
  suggestedActions: string[]
  duration: number
  state: PublishState
  failedStage?: PublishState
}

// ============================================================================
// Hooks
// ============================================================================

export type HookPhase = 'prePublish'

export interface HookContext {
  phase: HookPhase
  ref: string
  packageDir: string
  workspace: string
  environment: Record<string, string>
  signal?: AbortSignal
}

export interface HookOutput {
  command: string
  stdout: string
  stderr: string
  exitCode: number
  duration: number
}

export interface HookExecutionResult {
  success: boolean
  executedHooks: number
  failedHooks: string[]
  outputs: HookOutput[]
}
