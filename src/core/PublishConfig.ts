/**
 * Configuration file support for snapshot-publish
 *
 * @file PublishConfig.ts
 * @description Type definitions and defaults for .snapshot-publish.yaml
 */

/**
 * Root configuration object
 */
export interface PublishConfig {
  /**
   * Schema version (required)
   */
  version: string

  /**
   * Temporary workspace settings
   */
  workspace?: WorkspaceConfig

  /**
   * What to export from the repository
   */
  source?: SourceConfig

  /**
   * Publish command settings
   */
  publish?: PublishCommandConfig

  /**
   * Pre-publish hooks (optional)
   */
  hooks?: HooksConfig
}

export interface WorkspaceConfig {
  /**
   * Parent directory of the per-run temporary directory (default: os.tmpdir())
   */
  tempRoot?: string

  /**
   * Prefix of the temporary directory name
   */
  prefix?: string
}

export interface SourceConfig {
  /**
   * Revision to export (default: HEAD)
   */
  ref?: string

  /**
   * Directories at the top of the exported tree that are removed before
   * publishing. Each must exist and be empty.
   */
  prune?: string[]
}

export type PackageManager = 'npm' | 'pnpm' | 'yarn'

export interface PublishCommandConfig {
  /**
   * Package manager used to publish (default: npm)
   */
  command?: PackageManager

  /**
   * Extra arguments appended after `publish`
   */
  args?: string[]

  tag?: string

  access?: 'public' | 'restricted'

  /**
   * Pass --dry-run to the publish command
   */
  dryRun?: boolean
}

/**
 * Hooks configuration
 */
export interface HooksConfig {
  /**
   * Run in the extracted package directory before publishing
   */
  prePublish?: HookCommand[]
}

/**
 * Hook command definition
 */
export interface HookCommand {
  /**
   * Command to execute (${REF}, ${PACKAGE_DIR} and ${WORKSPACE} are expanded)
   */
  command: string

  /**
   * Whitelist of the command names this hook may run
   */
  allowedCommands: string[]

  /**
   * Working directory relative to the package directory
   */
  workingDirectory?: string

  /**
   * Timeout in seconds (default: 300)
   */
  timeout?: number
}

/**
 * Configuration loading options
 */
export interface ConfigLoadOptions {
  /**
   * Directory the project config file is looked up in
   */
  projectPath: string

  /**
   * Explicit config file; replaces the project config lookup
   */
  configPath?: string

  /**
   * CLI arguments (highest priority)
   */
  cliArgs?: PartialConfig

  /**
   * Environment variables
   */
  env?: Record<string, string | undefined>
}

export type PartialConfig = Partial<PublishConfig>

export interface ConfigValidationError {
  field: string
  message: string
  expected?: string
  actual?: string
}

export interface ConfigValidationWarning {
  field: string
  message: string
  suggestion?: string
}

export interface ConfigValidationResult {
  valid: boolean
  errors: ConfigValidationError[]
  warnings: ConfigValidationWarning[]
}

export const SUPPORTED_PACKAGE_MANAGERS: readonly PackageManager[] = ['npm', 'pnpm', 'yarn']

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: PublishConfig = {
  version: '1.0',
  workspace: {
    prefix: 'snapshot-publish-'
  },
  source: {
    ref: 'HEAD',
    prune: ['testdata']
  },
  publish: {
    command: 'npm',
    args: [],
    dryRun: false
  },
  hooks: {
    prePublish: []
  }
}
