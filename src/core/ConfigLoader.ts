/**
 * Configuration file loader for snapshot-publish
 *
 * @file ConfigLoader.ts
 * @description Load, validate, and merge configuration files
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import * as yaml from 'js-yaml'
import * as os from 'os'
import {
  PublishConfig,
  ConfigLoadOptions,
  ConfigValidationResult,
  ConfigValidationError,
  ConfigValidationWarning,
  HookCommand,
  PackageManager,
  DEFAULT_CONFIG,
  SUPPORTED_PACKAGE_MANAGERS
} from './PublishConfig'
import { ErrorFactory } from './ErrorHandling'

type ConfigRecord = Record<string, unknown>

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function asRecord(value: unknown): ConfigRecord {
  return isRecord(value) ? value : {}
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

/**
 * Configuration file loader
 */
export class ConfigLoader {
  static readonly CONFIG_FILENAME = '.snapshot-publish.yaml'
  private static readonly ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)\}/g

  /** Filled in by HookExecutor at run time, never from the environment */
  private static readonly HOOK_VARIABLES: ReadonlySet<string> = new Set(['REF', 'PACKAGE_DIR', 'WORKSPACE'])

  /**
   * Load, validate and normalize configuration from multiple sources
   *
   * Priority (high to low):
   * 1. CLI arguments
   * 2. Environment variables
   * 3. Project config (./.snapshot-publish.yaml, or --config)
   * 4. Global config (~/.snapshot-publish.yaml)
   * 5. Default values
   */
  static async load(options: ConfigLoadOptions): Promise<PublishConfig> {
    const env = options.env || process.env
    const configs: object[] = []

    // 5. Default values (lowest priority)
    configs.push(DEFAULT_CONFIG)

    // 4. Global config
    const globalConfig = await this.loadConfigFile(path.join(os.homedir(), this.CONFIG_FILENAME))
    if (globalConfig) {
      configs.push(globalConfig)
    }

    // 3. Project config
    const projectConfig = options.configPath
      ? await this.loadRequiredConfigFile(path.resolve(options.projectPath, options.configPath))
      : await this.loadConfigFile(path.join(options.projectPath, this.CONFIG_FILENAME))
    if (projectConfig) {
      configs.push(projectConfig)
    }

    // 2. Environment variables
    const envConfig = this.loadEnvConfig(env)
    if (envConfig) {
      configs.push(envConfig)
    }

    // 1. CLI arguments (highest priority)
    if (options.cliArgs) {
      configs.push(options.cliArgs)
    }

    const merged = this.expandEnvVars(this.mergeConfigs(configs), env)

    const validation = this.validate(merged)
    if (!validation.valid) {
      throw ErrorFactory.create('CONFIG_INVALID', {
        message: this.formatValidationResult(validation)
      })
    }
    if (validation.warnings.length > 0) {
      console.warn(this.formatValidationResult(validation))
    }

    return this.normalize(merged)
  }

  /**
   * Load configuration from a YAML file, or null when it does not exist
   */
  private static async loadConfigFile(filePath: string): Promise<ConfigRecord | null> {
    let content: string
    try {
      content = await fs.readFile(filePath, 'utf-8')
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null
      }
      throw error
    }

    return this.parseConfig(content, filePath)
  }

  private static async loadRequiredConfigFile(filePath: string): Promise<ConfigRecord> {
    const config = await this.loadConfigFile(filePath)
    if (!config) {
      throw ErrorFactory.create('CONFIG_INVALID', {
        message: `設定ファイルが見つかりません: ${filePath}`
      })
    }
    return config
  }

  private static parseConfig(content: string, filePath: string): ConfigRecord {
    let parsed: unknown
    try {
      parsed = yaml.load(content)
    } catch (error) {
      throw ErrorFactory.create('CONFIG_INVALID', {
        message: `${filePath} の解析に失敗しました: ${(error as Error).message}`
      })
    }

    // An empty file parses to undefined
    if (parsed === undefined || parsed === null) {
      return {}
    }
    if (!isRecord(parsed)) {
      throw ErrorFactory.create('CONFIG_INVALID', {
        message: `${filePath} のトップレベルはマッピングである必要があります`
      })
    }
    return parsed
  }

  /**
   * Load configuration from environment variables
   */
  private static loadEnvConfig(env: Record<string, string | undefined>): ConfigRecord | null {
    const config: ConfigRecord = {}

    // SNAPSHOT_PUBLISH_TEMP_ROOT -> workspace.tempRoot
    if (env.SNAPSHOT_PUBLISH_TEMP_ROOT) {
      config.workspace = { tempRoot: env.SNAPSHOT_PUBLISH_TEMP_ROOT }
    }

    // SNAPSHOT_PUBLISH_REF -> source.ref
    if (env.SNAPSHOT_PUBLISH_REF) {
      config.source = { ref: env.SNAPSHOT_PUBLISH_REF }
    }

    // SNAPSHOT_PUBLISH_DRY_RUN -> publish.dryRun
    if (env.SNAPSHOT_PUBLISH_DRY_RUN === 'true') {
      config.publish = { dryRun: true }
    }

    return Object.keys(config).length > 0 ? config : null
  }

  /**
   * Merge multiple configurations with priority
   */
  private static mergeConfigs(configs: object[]): ConfigRecord {
    const merged: ConfigRecord = {}

    for (const config of configs) {
      this.deepMerge(merged, config)
    }

    return merged
  }

  /**
   * Deep merge source into target. Arrays and scalars replace.
   */
  private static deepMerge(target: ConfigRecord, source: object): void {
    for (const [key, value] of Object.entries(source)) {
      if (value === undefined) continue

      if (isRecord(value)) {
        const existing = target[key]
        const child: ConfigRecord = isRecord(existing) ? existing : {}
        target[key] = child
        this.deepMerge(child, value)
      } else {
        target[key] = value
      }
    }
  }

  /**
   * Expand ${VAR_NAME} references in string values
   */
  private static expandEnvVars(config: ConfigRecord, env: Record<string, string | undefined>): ConfigRecord {
    const expanded = this.recursiveExpandEnvVars(config, env)
    return asRecord(expanded)
  }

  private static recursiveExpandEnvVars(value: unknown, env: Record<string, string | undefined>): unknown {
    if (typeof value === 'string') {
      return value.replace(this.ENV_VAR_PATTERN, (match, varName: string) => {
        if (this.HOOK_VARIABLES.has(varName)) {
          return match
        }
        const resolved = env[varName]
        if (resolved === undefined) {
          console.warn(`⚠️  環境変数 ${varName} が見つかりませんでした`)
          return match
        }
        return resolved
      })
    }

    if (Array.isArray(value)) {
      return value.map((item) => this.recursiveExpandEnvVars(item, env))
    }

    if (isRecord(value)) {
      const result: ConfigRecord = {}
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.recursiveExpandEnvVars(item, env)
      }
      return result
    }

    return value
  }

  /**
   * Validate configuration
   */
  static validate(config: unknown): ConfigValidationResult {
    const errors: ConfigValidationError[] = []
    const warnings: ConfigValidationWarning[] = []

    if (!isRecord(config)) {
      errors.push({
        field: '(root)',
        message: '設定はマッピングである必要があります',
        expected: 'object',
        actual: typeof config
      })
      return { valid: false, errors, warnings }
    }

    // 1. Check version (required)
    if (!config.version) {
      errors.push({
        field: 'version',
        message: 'バージョンは必須です',
        expected: 'string (e.g., "1.0")',
        actual: 'undefined'
      })
    } else if (config.version !== '1.0') {
      warnings.push({
        field: 'version',
        message: `未知のバージョン: ${String(config.version)}`,
        suggestion: '現在サポートされているバージョンは "1.0" のみです'
      })
    }

    // 2. Validate sections
    this.validateSection(config, 'workspace', errors, (section) =>
      this.validateWorkspace(section, errors)
    )
    this.validateSection(config, 'source', errors, (section) =>
      this.validateSource(section, errors)
    )
    this.validateSection(config, 'publish', errors, (section) =>
      this.validatePublish(section, errors, warnings)
    )
    this.validateSection(config, 'hooks', errors, (section) =>
      this.validateHooks(section, errors)
    )

    return {
      valid: errors.length === 0,
      errors,
      warnings
    }
  }

  private static validateSection(
    config: ConfigRecord,
    name: string,
    errors: ConfigValidationError[],
    validator: (section: ConfigRecord) => void
  ): void {
    const section = config[name]
    if (section === undefined || section === null) return

    if (!isRecord(section)) {
      errors.push({
        field: name,
        message: 'マッピングである必要があります',
        expected: 'object',
        actual: typeof section
      })
      return
    }

    validator(section)
  }

  /**
   * Validate workspace settings
   */
  private static validateWorkspace(workspace: ConfigRecord, errors: ConfigValidationError[]): void {
    if (workspace.tempRoot !== undefined && typeof workspace.tempRoot !== 'string') {
      errors.push({
        field: 'workspace.tempRoot',
        message: 'tempRootは文字列である必要があります',
        expected: 'string',
        actual: typeof workspace.tempRoot
      })
    }

    if (workspace.prefix !== undefined) {
      if (typeof workspace.prefix !== 'string' || /[\\/]/.test(workspace.prefix)) {
        errors.push({
          field: 'workspace.prefix',
          message: 'prefixはパス区切り文字を含まない文字列である必要があります',
          expected: 'string',
          actual: String(workspace.prefix)
        })
      }
    }
  }

  /**
   * Validate source settings
   */
  private static validateSource(source: ConfigRecord, errors: ConfigValidationError[]): void {
    if (source.ref !== undefined && (typeof source.ref !== 'string' || source.ref.trim() === '')) {
      errors.push({
        field: 'source.ref',
        message: 'refは空でない文字列である必要があります',
        expected: 'string',
        actual: typeof source.ref
      })
    }

    if (source.prune === undefined) return

    if (!isStringArray(source.prune)) {
      errors.push({
        field: 'source.prune',
        message: '文字列の配列である必要があります',
        expected: 'string[]',
        actual: typeof source.prune
      })
      return
    }

    source.prune.forEach((dir, i) => {
      const normalized = path.normalize(dir)
      if (path.isAbsolute(dir) || normalized === '.' || normalized.split(path.sep).includes('..')) {
        errors.push({
          field: `source.prune[${i}]`,
          message: '展開したツリー内の相対パスである必要があります（パストラバーサル対策）',
          expected: 'relative path',
          actual: dir
        })
      }
    })
  }

  /**
   * Validate publish command settings
   */
  private static validatePublish(
    publish: ConfigRecord,
    errors: ConfigValidationError[],
    warnings: ConfigValidationWarning[]
  ): void {
    if (publish.command !== undefined && !this.isPackageManager(publish.command)) {
      errors.push({
        field: 'publish.command',
        message: `commandは ${SUPPORTED_PACKAGE_MANAGERS.join(', ')} のいずれかである必要があります`,
        expected: SUPPORTED_PACKAGE_MANAGERS.join(' | '),
        actual: String(publish.command)
      })
    }

    if (publish.args !== undefined && !isStringArray(publish.args)) {
      errors.push({
        field: 'publish.args',
        message: 'argsは文字列の配列である必要があります',
        expected: 'string[]',
        actual: typeof publish.args
      })
    }

    if (publish.tag !== undefined && typeof publish.tag !== 'string') {
      errors.push({
        field: 'publish.tag',
        message: 'tagは文字列である必要があります',
        expected: 'string',
        actual: typeof publish.tag
      })
    }

    if (
      publish.access !== undefined &&
      publish.access !== 'public' &&
      publish.access !== 'restricted'
    ) {
      errors.push({
        field: 'publish.access',
        message: 'accessは "public" または "restricted" である必要があります',
        expected: '"public" | "restricted"',
        actual: String(publish.access)
      })
    }

    if (publish.dryRun !== undefined && typeof publish.dryRun !== 'boolean') {
      errors.push({
        field: 'publish.dryRun',
        message: 'dryRunは真偽値である必要があります',
        expected: 'boolean',
        actual: typeof publish.dryRun
      })
    }

    if (isStringArray(publish.args) && publish.args.some((arg) => arg.startsWith('--otp'))) {
      warnings.push({
        field: 'publish.args',
        message: 'ワンタイムパスワードを設定ファイルに書くべきではありません',
        suggestion: '--otp オプションを使用してください'
      })
    }
  }

  /**
   * Validate hooks configuration
   */
  private static validateHooks(hooks: ConfigRecord, errors: ConfigValidationError[]): void {
    const hookCommands = hooks.prePublish
    if (hookCommands === undefined || hookCommands === null) return

    if (!Array.isArray(hookCommands)) {
      errors.push({
        field: 'hooks.prePublish',
        message: '配列である必要があります',
        expected: 'array',
        actual: typeof hookCommands
      })
      return
    }

    hookCommands.forEach((hook: unknown, i) => {
      const entry = asRecord(hook)

      if (typeof entry.command !== 'string' || entry.command.trim() === '') {
        errors.push({
          field: `hooks.prePublish[${i}].command`,
          message: 'commandは必須です',
          expected: 'string',
          actual: typeof entry.command
        })
      }

      if (!isStringArray(entry.allowedCommands)) {
        errors.push({
          field: `hooks.prePublish[${i}].allowedCommands`,
          message: 'allowedCommandsは必須で配列である必要があります',
          expected: 'string[]',
          actual: typeof entry.allowedCommands
        })
      }

      if (entry.workingDirectory !== undefined && typeof entry.workingDirectory !== 'string') {
        errors.push({
          field: `hooks.prePublish[${i}].workingDirectory`,
          message: 'workingDirectoryは文字列である必要があります',
          expected: 'string',
          actual: typeof entry.workingDirectory
        })
      }

      if (
        entry.timeout !== undefined &&
        (typeof entry.timeout !== 'number' || entry.timeout <= 0)
      ) {
        errors.push({
          field: `hooks.prePublish[${i}].timeout`,
          message: 'timeoutは正の数値（秒）である必要があります',
          expected: 'number',
          actual: String(entry.timeout)
        })
      }
    })
  }

  private static isPackageManager(value: unknown): value is PackageManager {
    return SUPPORTED_PACKAGE_MANAGERS.some((manager) => manager === value)
  }

  /**
   * Build the typed configuration from a validated record
   */
  private static normalize(config: ConfigRecord): PublishConfig {
    const workspace = asRecord(config.workspace)
    const source = asRecord(config.source)
    const publish = asRecord(config.publish)
    const hooks = asRecord(config.hooks)

    const prePublish: HookCommand[] = []
    if (Array.isArray(hooks.prePublish)) {
      for (const item of hooks.prePublish) {
        const hook = asRecord(item)
        if (typeof hook.command !== 'string' || !isStringArray(hook.allowedCommands)) continue
        prePublish.push({
          command: hook.command,
          allowedCommands: hook.allowedCommands,
          workingDirectory: optionalString(hook.workingDirectory),
          timeout: typeof hook.timeout === 'number' ? hook.timeout : undefined
        })
      }
    }

    return {
      version: String(config.version),
      workspace: {
        tempRoot: optionalString(workspace.tempRoot),
        prefix: optionalString(workspace.prefix)
      },
      source: {
        ref: optionalString(source.ref),
        prune: isStringArray(source.prune) ? [...source.prune] : []
      },
      publish: {
        command: this.isPackageManager(publish.command) ? publish.command : undefined,
        args: isStringArray(publish.args) ? [...publish.args] : [],
        tag: optionalString(publish.tag),
        access:
          publish.access === 'public' || publish.access === 'restricted' ? publish.access : undefined,
        dryRun: publish.dryRun === true
      },
      hooks: { prePublish }
    }
  }

  /**
   * Format validation result as human-readable string
   */
  static formatValidationResult(result: ConfigValidationResult): string {
    const lines: string[] = []

    if (result.valid) {
      lines.push('✅ 設定ファイルの検証に成功しました')
    } else {
      lines.push('❌ 設定ファイルにエラーがあります')
    }

    if (result.errors.length > 0) {
      lines.push('\n🔴 エラー:')
      for (const error of result.errors) {
        lines.push(`  - [${error.field}] ${error.message}`)
        if (error.expected && error.actual) {
          lines.push(`    期待される型: ${error.expected}`)
          lines.push(`    実際の値: ${error.actual}`)
        }
      }
    }

    if (result.warnings.length > 0) {
      lines.push('\n🟡 警告:')
      for (const warning of result.warnings) {
        lines.push(`  - [${warning.field}] ${warning.message}`)
        if (warning.suggestion) {
          lines.push(`    提案: ${warning.suggestion}`)
        }
      }
    }

    return lines.join('\n')
  }
}
