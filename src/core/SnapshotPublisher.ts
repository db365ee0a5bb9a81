import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { PublishOptions, PublishReport, PublishState } from './interfaces'
import { PublishStateMachine } from './PublishStateMachine'
import { ErrorFactory, PublishError } from './ErrorHandling'
import { ConfigLoader } from './ConfigLoader'
import { PartialConfig, PublishConfig } from './PublishConfig'
import { HookExecutor } from './HookExecutor'
import { TempWorkspace } from './TempWorkspace'
import { SafeCommandExecutor } from '../security/SafeCommandExecutor'

interface EffectiveOptions {
  packagePath: string
  ref: string
  tempRoot: string
  prefix: string
  prune: string[]
  command: string
  extraArgs: string[]
  dryRun: boolean
  tag?: string
  access?: 'public' | 'restricted'
  otp?: string
  skipHooks: boolean
  signal?: AbortSignal
}

/**
 * Publishes a package from the committed state of a git repository.
 *
 * The configured revision is exported with `git archive`, extracted into a
 * private temporary directory, stripped of the prune directories and then
 * published from there. The temporary directory is removed on every path.
 */
export class SnapshotPublisher {
  private config: PublishConfig | null = null
  private stateMachine = new PublishStateMachine()

  constructor(
    private projectPath: string,
    private executor: SafeCommandExecutor = new SafeCommandExecutor(),
    private hookExecutor: HookExecutor = new HookExecutor()
  ) {}

  /**
   * Load configuration from file, environment and CLI arguments
   */
  async loadConfig(cliArgs?: PartialConfig, configPath?: string): Promise<PublishConfig> {
    this.config = await ConfigLoader.load({
      projectPath: this.projectPath,
      configPath,
      cliArgs
    })
    return this.config
  }

  /**
   * State of the most recent run
   */
  getStateMachine(): PublishStateMachine {
    return this.stateMachine
  }

  /**
   * Export, extract, prune and publish. Never throws for a failed step;
   * the report carries the exit code of whatever failed.
   */
  async publish(options: PublishOptions = {}): Promise<PublishReport> {
    const startTime = Date.now()
    const warnings: string[] = []
    const stateMachine = new PublishStateMachine()
    this.stateMachine = stateMachine

    let effective: EffectiveOptions | undefined

    try {
      if (!this.config) {
        await this.loadConfig()
      }

      effective = this.mergeOptionsWithConfig(options)
      const { signal } = effective

      this.throwIfAborted(signal)
      stateMachine.transition('PREPARING', { ref: effective.ref, packageDir: effective.packagePath })

      const repositoryRoot = await this.resolveRepositoryRoot(signal)
      if (effective.dryRun) {
        warnings.push('dry-run: レジストリには公開されません')
      }

      const opts = effective
      await TempWorkspace.use(opts.tempRoot, opts.prefix, async (workspace) => {
        try {
          console.log(`📁 一時ディレクトリ: ${workspace.dir}`)

          await this.exportTree(repositoryRoot, workspace, opts, stateMachine)
          await this.pruneDirectories(workspace, opts, stateMachine)

          stateMachine.transition('RESOLVING_PACKAGE', { packageDir: opts.packagePath })
          const packageDir = await this.resolvePackageDir(workspace, opts.packagePath)

          await this.runPrePublishHooks(workspace, packageDir, opts, stateMachine)
          await this.runPublish(packageDir, opts, stateMachine)
        } finally {
          stateMachine.transition('CLEANING_UP')
        }
      })
      // A signal that lands during cleanup still fails the run
      this.throwIfAborted(opts.signal)

      stateMachine.transition('SUCCESS')
      console.log('🧹 一時ディレクトリを削除しました')

      return this.buildReport(startTime, effective, options, {
        success: true,
        exitCode: 0,
        errors: [],
        warnings,
        suggestedActions: [],
        state: 'SUCCESS'
      })
    } catch (error) {
      const publishError = this.toPublishError(error, options.signal)
      const state: PublishState = publishError.code === 'INTERRUPTED' ? 'INTERRUPTED' : 'FAILED'
      stateMachine.transition(state, { error: publishError.message })

      return this.buildReport(startTime, effective, options, {
        success: false,
        exitCode: publishError.exitCode,
        errors: [publishError.message],
        warnings,
        suggestedActions: publishError.suggestedActions,
        state,
        failedStage: stateMachine.getFailedStage()
      })
    }
  }

  /**
   * Find the top of the working tree so the export covers the whole repository
   */
  private async resolveRepositoryRoot(signal?: AbortSignal): Promise<string> {
    const result = await this.executor.run('git', ['rev-parse', '--show-toplevel'], {
      cwd: this.projectPath,
      silent: true,
      signal
    })
    this.throwIfAborted(signal)

    if (result.exitCode !== 0 || !result.stdout) {
      throw ErrorFactory.create('NOT_A_REPOSITORY', {
        message: result.stderr || `${this.projectPath} はgitリポジトリではありません`,
        exitCode: result.exitCode || undefined
      })
    }

    return result.stdout
  }

  /**
   * `git archive <ref> | tar -x -C <workspace>`
   */
  private async exportTree(
    repositoryRoot: string,
    workspace: TempWorkspace,
    options: EffectiveOptions,
    stateMachine: PublishStateMachine
  ): Promise<void> {
    this.throwIfAborted(options.signal)
    stateMachine.transition('EXPORTING', { ref: options.ref })
    console.log(`📦 ${options.ref} をエクスポート中...`)

    const result = await this.executor.pipe(
      { command: 'git', args: ['archive', '--format=tar', options.ref], cwd: repositoryRoot },
      { command: 'tar', args: ['-x', '-f', '-', '-C', workspace.dir] },
      { signal: options.signal }
    )
    this.throwIfAborted(options.signal)

    if (result.source.exitCode !== 0) {
      throw ErrorFactory.create('EXPORT_FAILED', {
        message: `git archive ${options.ref} に失敗しました (exit code: ${result.source.exitCode})`,
        exitCode: result.source.exitCode,
        actionArgs: [options.ref]
      })
    }

    if (result.sink.exitCode !== 0) {
      throw ErrorFactory.create('EXTRACT_FAILED', {
        message: `アーカイブの展開に失敗しました (exit code: ${result.sink.exitCode})`,
        exitCode: result.sink.exitCode
      })
    }

    console.log('✅ エクスポート完了')
  }

  /**
   * Remove each prune directory. Only empty directories can be removed,
   * so tracked files under them fail the run.
   */
  private async pruneDirectories(
    workspace: TempWorkspace,
    options: EffectiveOptions,
    stateMachine: PublishStateMachine
  ): Promise<void> {
    stateMachine.transition('PRUNING', { prune: options.prune })

    for (const dir of options.prune) {
      this.throwIfAborted(options.signal)
      const target = workspace.resolve(dir)

      try {
        await fs.rmdir(target)
      } catch (error) {
        throw ErrorFactory.create('PRUNE_FAILED', {
          message: `${dir} を削除できませんでした: ${this.describeRmdirError(error)}`,
          actionArgs: [dir]
        })
      }

      console.log(`🗑️  ${dir} を削除しました`)
    }
  }

  private describeRmdirError(error: unknown): string {
    const code = (error as NodeJS.ErrnoException).code
    switch (code) {
      case 'ENOENT':
        return '存在しません'
      case 'ENOTEMPTY':
      case 'EEXIST':
        return '空ではありません'
      case 'ENOTDIR':
        return 'ディレクトリではありません'
      default:
        return (error as Error).message
    }
  }

  /**
   * Resolve the package directory inside the extracted tree
   */
  private async resolvePackageDir(workspace: TempWorkspace, packagePath: string): Promise<string> {
    const notFound = (reason: string): PublishError =>
      ErrorFactory.create('PACKAGE_NOT_FOUND', {
        message: `${packagePath}: ${reason}`,
        actionArgs: [packagePath]
      })

    if (path.isAbsolute(packagePath)) {
      throw notFound('相対パスで指定してください')
    }

    let packageDir: string
    try {
      packageDir = workspace.resolve(packagePath)
    } catch {
      throw notFound('リポジトリの外を指しています')
    }

    const stat = await fs.stat(packageDir).catch((error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') return null
      throw error
    })
    if (!stat || !stat.isDirectory()) {
      throw notFound('ディレクトリが存在しません')
    }

    return packageDir
  }

  private async runPrePublishHooks(
    workspace: TempWorkspace,
    packageDir: string,
    options: EffectiveOptions,
    stateMachine: PublishStateMachine
  ): Promise<void> {
    const hooks = this.config?.hooks?.prePublish ?? []
    if (options.skipHooks || hooks.length === 0) {
      return
    }

    stateMachine.transition('RUNNING_HOOKS', { hooks: hooks.length })

    const result = await this.hookExecutor.executeHooks(hooks, {
      phase: 'prePublish',
      ref: options.ref,
      packageDir,
      workspace: workspace.dir,
      environment: {},
      signal: options.signal
    })
    this.throwIfAborted(options.signal)

    if (!result.success) {
      const failed = result.outputs.find((output) => output.exitCode !== 0)
      throw ErrorFactory.create('HOOK_FAILED', {
        message: `prePublishフックが失敗しました: ${result.failedHooks.join(', ')}`,
        exitCode: failed?.exitCode ?? 1
      })
    }
  }

  /**
   * Run the package manager's publish command inside the package directory
   */
  private async runPublish(
    packageDir: string,
    options: EffectiveOptions,
    stateMachine: PublishStateMachine
  ): Promise<void> {
    this.throwIfAborted(options.signal)
    const args = this.buildPublishArgs(options)

    stateMachine.transition('PUBLISHING', { command: options.command, args })
    console.log(`📤 ${options.command} ${args.join(' ')}`)

    const result = await this.executor.run(options.command, args, {
      cwd: packageDir,
      signal: options.signal
    })
    this.throwIfAborted(options.signal)

    if (result.exitCode !== 0) {
      throw ErrorFactory.create('PUBLISH_FAILED', {
        message: `${options.command} publish が終了コード ${result.exitCode} で失敗しました`,
        exitCode: result.exitCode
      })
    }

    console.log('✅ 公開コマンドが完了しました')
  }

  private buildPublishArgs(options: Pick<EffectiveOptions, 'extraArgs' | 'tag' | 'access' | 'otp' | 'dryRun'>): string[] {
    const args = ['publish', ...options.extraArgs]

    if (options.tag) {
      args.push('--tag', options.tag)
    }
    if (options.access) {
      args.push('--access', options.access)
    }
    if (options.otp) {
      args.push('--otp', options.otp)
    }
    if (options.dryRun) {
      args.push('--dry-run')
    }

    return args
  }

  /**
   * Merge CLI options with config (CLI takes priority)
   */
  private mergeOptionsWithConfig(options: PublishOptions): EffectiveOptions {
    return {
      packagePath: options.packagePath || '.',
      ref: options.ref || this.config?.source?.ref || 'HEAD',
      tempRoot: options.tempRoot || this.config?.workspace?.tempRoot || os.tmpdir(),
      prefix: this.config?.workspace?.prefix || 'snapshot-publish-',
      prune: this.config?.source?.prune ?? ['testdata'],
      command: this.config?.publish?.command || 'npm',
      extraArgs: this.config?.publish?.args ?? [],
      dryRun: options.dryRun ?? this.config?.publish?.dryRun ?? false,
      tag: options.tag || this.config?.publish?.tag,
      access: options.access || this.config?.publish?.access,
      otp: options.otp,
      skipHooks: !!options.skipHooks,
      signal: options.signal
    }
  }

  private throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw this.interruptedError(signal)
    }
  }

  private interruptedError(signal: AbortSignal): PublishError {
    return signal.reason instanceof PublishError && signal.reason.code === 'INTERRUPTED'
      ? signal.reason
      : ErrorFactory.create('INTERRUPTED')
  }

  private toPublishError(error: unknown, signal?: AbortSignal): PublishError {
    if (signal?.aborted) {
      return this.interruptedError(signal)
    }
    return ErrorFactory.from(error, 'PUBLISH_FAILED')
  }

  private buildReport(
    startTime: number,
    effective: EffectiveOptions | undefined,
    options: PublishOptions,
    result: Pick<PublishReport, 'success' | 'exitCode' | 'errors' | 'warnings' | 'suggestedActions' | 'state' | 'failedStage'>
  ): PublishReport {
    return {
      ...result,
      ref: effective?.ref ?? options.ref ?? 'HEAD',
      packageDir: effective?.packagePath ?? options.packagePath ?? '.',
      duration: Date.now() - startTime
    }
  }
}
