import { spawn, ChildProcess, StdioOptions } from 'child_process'
import * as os from 'os'
import { CommandSpec, ExecOptions, ExecResult, PipeResult } from '../core/interfaces'

/**
 * Safe command executor with whitelist validation.
 *
 * Commands are spawned directly (no shell), so arguments are passed
 * verbatim and never need quoting.
 */
export class SafeCommandExecutor {
  private static readonly ALLOWED_COMMANDS = ['git', 'tar', 'npm', 'pnpm', 'yarn']

  /** Exit code a shell reports for a command that is not on PATH */
  static readonly COMMAND_NOT_FOUND = 127

  static isAllowed(command: string): boolean {
    return SafeCommandExecutor.ALLOWED_COMMANDS.includes(command)
  }

  /**
   * Run a single command and wait for it to exit.
   * Resolves with the exit code instead of rejecting on failure.
   */
  async run(command: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
    this.assertAllowed(command)

    const stdio: StdioOptions = options.silent ? ['ignore', 'pipe', 'pipe'] : 'inherit'
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio,
      timeout: options.timeout,
      signal: options.signal
    })

    return this.waitFor(child, true)
  }

  /**
   * Run `source | sink`, streaming stdout of the first command into stdin of the second
   */
  async pipe(source: CommandSpec, sink: CommandSpec, options: ExecOptions = {}): Promise<PipeResult> {
    this.assertAllowed(source.command)
    this.assertAllowed(sink.command)

    const env = { ...process.env, ...options.env }
    const errStream = options.silent ? 'pipe' : 'inherit'

    const producer = spawn(source.command, source.args, {
      cwd: source.cwd ?? options.cwd,
      env,
      stdio: ['ignore', 'pipe', errStream],
      timeout: options.timeout,
      signal: options.signal
    })
    const consumer = spawn(sink.command, sink.args, {
      cwd: sink.cwd ?? options.cwd,
      env,
      stdio: ['pipe', errStream, errStream],
      timeout: options.timeout,
      signal: options.signal
    })

    // EPIPE here means the consumer exited early; its exit code is reported below
    consumer.stdin?.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code !== 'EPIPE') {
        consumer.emit('error', error)
      }
    })

    if (producer.stdout && consumer.stdin) {
      producer.stdout.pipe(consumer.stdin)
    }

    const [sourceResult, sinkResult] = await Promise.all([
      this.waitFor(producer, false),
      this.waitFor(consumer, true)
    ])

    return { source: sourceResult, sink: sinkResult }
  }

  private static signalNumber(signal: NodeJS.Signals): number {
    const entry = Object.entries(os.constants.signals).find(([name]) => name === signal)
    return entry ? entry[1] : 0
  }

  private assertAllowed(command: string): void {
    if (!SafeCommandExecutor.isAllowed(command)) {
      throw new Error(
        `Command "${command}" is not allowed. Allowed commands: ${SafeCommandExecutor.ALLOWED_COMMANDS.join(', ')}`
      )
    }
  }

  private waitFor(child: ChildProcess, captureStdout: boolean): Promise<ExecResult> {
    return new Promise((resolve) => {
      let stdout = ''
      let stderr = ''
      let settled = false

      if (captureStdout) {
        child.stdout?.on('data', (chunk: Buffer) => {
          stdout += chunk.toString()
        })
      }
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString()
      })

      const finish = (exitCode: number, fallbackMessage?: string): void => {
        if (settled) return
        settled = true
        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim() || fallbackMessage || '',
          exitCode
        })
      }

      child.on('error', (error: NodeJS.ErrnoException) => {
        // An aborted child still emits 'close' once it is gone
        if (error.name === 'AbortError') return

        const exitCode = error.code === 'ENOENT' ? SafeCommandExecutor.COMMAND_NOT_FOUND : 1
        finish(exitCode, error.message)
      })

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (code !== null) {
          finish(code)
        } else if (signal) {
          finish(128 + SafeCommandExecutor.signalNumber(signal), `terminated by ${signal}`)
        } else {
          finish(1)
        }
      })
    })
  }
}
