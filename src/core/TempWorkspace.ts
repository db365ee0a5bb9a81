import * as fs from 'fs/promises'
import * as path from 'path'
import { ErrorFactory } from './ErrorHandling'

/**
 * A temporary directory owned by a single publish run.
 *
 * Use `TempWorkspace.use()` so the directory is removed on every exit path:
 * normal return, thrown error or an aborted run.
 */
export class TempWorkspace {
  private disposed = false

  private constructor(readonly dir: string) {}

  /**
   * Create a uniquely named directory under `parent`
   */
  static async create(parent: string, prefix: string): Promise<TempWorkspace> {
    try {
      const dir = await fs.mkdtemp(path.join(parent, prefix))
      return new TempWorkspace(dir)
    } catch (error) {
      throw ErrorFactory.create('TEMP_DIR_FAILED', {
        message: `一時ディレクトリを作成できませんでした: ${(error as Error).message}`,
        actionArgs: [parent]
      })
    }
  }

  /**
   * Run `fn` with a fresh workspace and remove it afterwards.
   * When `fn` throws, a failure to remove the workspace is only logged.
   */
  static async use<T>(
    parent: string,
    prefix: string,
    fn: (workspace: TempWorkspace) => Promise<T>
  ): Promise<T> {
    const workspace = await TempWorkspace.create(parent, prefix)
    let failed = false
    try {
      return await fn(workspace)
    } catch (error) {
      failed = true
      throw error
    } finally {
      try {
        await workspace.dispose()
      } catch (error) {
        // Keep the error that ended the run
        if (!failed) throw error
        console.warn(`⚠️  一時ディレクトリを削除できませんでした: ${workspace.dir}: ${(error as Error).message}`)
      }
    }
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  /**
   * Resolve a path inside the workspace.
   * Throws if the result would escape the workspace directory.
   */
  resolve(...segments: string[]): string {
    const resolved = path.resolve(this.dir, ...segments)
    const relative = path.relative(this.dir, resolved)

    if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      throw new Error(`Path traversal detected: "${segments.join('/')}" resolves outside the workspace`)
    }

    return resolved
  }

  /**
   * Remove the workspace. Safe to call more than once.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return
    this.disposed = true
    await fs.rm(this.dir, { recursive: true, force: true })
  }
}
