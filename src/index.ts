/**
 * snapshot-publish - Publish a package from the committed HEAD of a git repository
 * @packageDocumentation
 */

// Core exports
export { SnapshotPublisher } from './core/SnapshotPublisher'
export { TempWorkspace } from './core/TempWorkspace'
export { SignalGuard } from './core/SignalGuard'
export { PublishStateMachine } from './core/PublishStateMachine'
export { HookExecutor } from './core/HookExecutor'
export { ConfigLoader } from './core/ConfigLoader'
export { ErrorFactory, PublishError, ErrorCodes } from './core/ErrorHandling'
export { DEFAULT_CONFIG } from './core/PublishConfig'
export { createProgram } from './program'

// Security
export { SafeCommandExecutor } from './security/SafeCommandExecutor'

// Interfaces (type-only exports)
export type {
  ExecResult,
  ExecOptions,
  CommandSpec,
  PipeResult,
  PublishOptions,
  PublishReport,
  PublishState,
  StateTransition,
  PublishStateData,
  HookContext,
  HookOutput,
  HookExecutionResult
} from './core/interfaces'
export type { PublishConfig, HookCommand, PackageManager } from './core/PublishConfig'
export type { ErrorCode } from './core/ErrorHandling'
export type { SignalSource, GuardedSignal } from './core/SignalGuard'
export type { CliDependencies, CliOptions } from './program'
