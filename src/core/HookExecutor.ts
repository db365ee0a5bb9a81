import { exec } from 'child_process'
import { promisify } from 'util'
import * as path from 'path'
import { HookCommand } from './PublishConfig'
import { HookContext, HookExecutionResult, HookOutput } from './interfaces'

const execAsync = promisify(exec)

/**
 * Hook Executor - Runs configured hooks inside the extracted package
 *
 * Features:
 * - Command whitelist validation (allowedCommands)
 * - Path traversal prevention (workingDirectory)
 * - Timeout enforcement
 * - Variable expansion (${REF}, ${PACKAGE_DIR}, ${WORKSPACE})
 *
 * Execution stops at the first failing hook; later hooks would run against
 * a tree that is already known to be broken.
 */
export class HookExecutor {
  private static readonly DEFAULT_TIMEOUT_SECONDS = 300

  /**
   * Execute a list of hooks for a specific phase
   */
  async executeHooks(hooks: HookCommand[], context: HookContext): Promise<HookExecutionResult> {
    const result: HookExecutionResult = {
      success: true,
      executedHooks: 0,
      failedHooks: [],
      outputs: []
    }

    if (hooks.length === 0) {
      return result
    }

    console.log(`\n🪝 Executing ${context.phase} hooks (${hooks.length} hooks)...`)

    for (const hook of hooks) {
      try {
        const output = await this.executeHook(hook, context)
        result.outputs.push(output)
        result.executedHooks++

        if (output.exitCode !== 0) {
          result.success = false
          result.failedHooks.push(hook.command)
          console.error(`❌ Hook failed: ${hook.command} (exit code: ${output.exitCode})`)
          break
        }

        console.log(`✅ Hook succeeded: ${hook.command}`)
      } catch (error) {
        result.success = false
        result.failedHooks.push(hook.command)
        console.error(`❌ Hook error: ${hook.command}: ${(error as Error).message}`)
        break
      }
    }

    console.log(`🪝 Hooks completed: ${result.executedHooks} executed, ${result.failedHooks.length} failed\n`)

    return result
  }

  /**
   * Execute a single hook command
   */
  private async executeHook(hook: HookCommand, context: HookContext): Promise<HookOutput> {
    const startTime = Date.now()

    this.validateCommand(hook)

    const expandedCommand = this.expandVars(hook.command, context)
    const workingDir = this.resolveWorkingDirectory(context.packageDir, hook.workingDirectory)
    const timeout = (hook.timeout || HookExecutor.DEFAULT_TIMEOUT_SECONDS) * 1000

    try {
      const { stdout, stderr } = await execAsync(expandedCommand, {
        cwd: workingDir,
        env: { ...process.env, ...context.environment },
        timeout,
        signal: context.signal,
        maxBuffer: 10 * 1024 * 1024 // 10MB
      })

      if (stdout.trim()) console.log(stdout.trim())

      return {
        command: expandedCommand,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        exitCode: 0,
        duration: Date.now() - startTime
      }
    } catch (error: unknown) {
      const err = error as { stdout?: string; stderr?: string; code?: number | string; message?: string; killed?: boolean }

      if (err.killed && !context.signal?.aborted) {
        throw new Error(`Hook timeout after ${timeout}ms: ${expandedCommand}`)
      }

      return {
        command: expandedCommand,
        stdout: err.stdout?.trim() || '',
        stderr: err.stderr?.trim() || err.message || '',
        exitCode: typeof err.code === 'number' ? err.code : 1,
        duration: Date.now() - startTime
      }
    }
  }

  /**
   * Validate command against allowedCommands whitelist
   */
  private validateCommand(hook: HookCommand): void {
    if (hook.allowedCommands.length === 0) {
      throw new Error('allowedCommands is required for hook security')
    }

    const commandName = hook.command.trim().split(/\s+/)[0]

    if (!hook.allowedCommands.includes(commandName)) {
      throw new Error(
        `Command "${commandName}" is not in allowedCommands: [${hook.allowedCommands.join(', ')}]`
      )
    }
  }

  /**
   * Expand variables in command string
   *
   * Supported variables:
   * - ${REF}: Exported revision
   * - ${PACKAGE_DIR}: Package directory inside the workspace
   * - ${WORKSPACE}: Root of the extracted tree
   */
  private expandVars(command: string, context: HookContext): string {
    return command
      .replace(/\$\{REF\}/g, context.ref)
      .replace(/\$\{PACKAGE_DIR\}/g, context.packageDir)
      .replace(/\$\{WORKSPACE\}/g, context.workspace)
  }

  /**
   * Resolve a hook's working directory, refusing paths outside the package
   */
  private resolveWorkingDirectory(baseDir: string, workingDirectory?: string): string {
    const targetDir = workingDirectory || './'
    const resolvedDir = path.resolve(baseDir, targetDir)
    const relative = path.relative(baseDir, resolvedDir)

    if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      throw new Error(
        `Path traversal detected: "${targetDir}" resolves outside package directory`
      )
    }

    return resolvedDir
  }
}
