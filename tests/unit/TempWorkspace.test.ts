import { TempWorkspace } from '../../src/core/TempWorkspace'
import { PublishError } from '../../src/core/ErrorHandling'
import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target)
    return true
  } catch {
    return false
  }
}

describe('TempWorkspace', () => {
  let parent: string

  beforeEach(async () => {
    parent = await fs.mkdtemp(path.join(os.tmpdir(), 'workspace-test-'))
  })

  afterEach(async () => {
    jest.restoreAllMocks()
    await fs.rm(parent, { recursive: true, force: true })
  })

  describe('create', () => {
    it('親ディレクトリの下にプレフィックス付きのディレクトリを作成する', async () => {
      const workspace = await TempWorkspace.create(parent, 'run-')

      expect(path.dirname(workspace.dir)).toBe(parent)
      expect(path.basename(workspace.dir).startsWith('run-')).toBe(true)
      expect((await fs.stat(workspace.dir)).isDirectory()).toBe(true)

      await workspace.dispose()
    })

    it('毎回異なるディレクトリを作成する', async () => {
      const first = await TempWorkspace.create(parent, 'run-')
      const second = await TempWorkspace.create(parent, 'run-')

      expect(first.dir).not.toBe(second.dir)

      await first.dispose()
      await second.dispose()
    })

    it('親ディレクトリが存在しない場合はTEMP_DIR_FAILED', async () => {
      const missingParent = path.join(parent, 'missing')

      const error = await TempWorkspace.create(missingParent, 'run-').catch((e: unknown) => e)

      expect(error).toBeInstanceOf(PublishError)
      expect((error as PublishError).code).toBe('TEMP_DIR_FAILED')
      expect((error as PublishError).exitCode).toBe(1)
      expect((error as PublishError).suggestedActions[0]).toBe(
        `${missingParent} が存在し書き込み可能か確認してください`
      )
    })
  })

  describe('dispose', () => {
    it('中身ごとディレクトリを削除する', async () => {
      const workspace = await TempWorkspace.create(parent, 'run-')
      await fs.mkdir(path.join(workspace.dir, 'nested', 'deeper'), { recursive: true })
      await fs.writeFile(path.join(workspace.dir, 'nested', 'file.txt'), 'content')

      await workspace.dispose()

      expect(await exists(workspace.dir)).toBe(false)
      expect(workspace.isDisposed).toBe(true)
    })

    it('複数回呼び出しても安全', async () => {
      const workspace = await TempWorkspace.create(parent, 'run-')

      await workspace.dispose()
      await expect(workspace.dispose()).resolves.toBeUndefined()
    })
  })

  describe('use', () => {
    it('正常終了後にディレクトリを削除する', async () => {
      let seen = ''

      const result = await TempWorkspace.use(parent, 'run-', async (workspace) => {
        seen = workspace.dir
        expect(await exists(workspace.dir)).toBe(true)
        return 42
      })

      expect(result).toBe(42)
      expect(await exists(seen)).toBe(false)
      expect(await fs.readdir(parent)).toEqual([])
    })

    it('例外が発生してもディレクトリを削除する', async () => {
      let seen = ''

      await expect(
        TempWorkspace.use(parent, 'run-', async (workspace) => {
          seen = workspace.dir
          await fs.writeFile(path.join(workspace.dir, 'partial'), 'x')
          throw new Error('step failed')
        })
      ).rejects.toThrow('step failed')

      expect(seen).not.toBe('')
      expect(await exists(seen)).toBe(false)
    })

    it('処理が失敗した後の削除エラーは警告にとどめ、元のエラーを返す', async () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation()
      jest.spyOn(TempWorkspace.prototype, 'dispose').mockRejectedValue(new Error('EBUSY: resource busy'))
      let seen = ''

      await expect(
        TempWorkspace.use(parent, 'run-', async (workspace) => {
          seen = workspace.dir
          throw new Error('publish failed')
        })
      ).rejects.toThrow('publish failed')

      expect(warn).toHaveBeenCalledWith(
        `⚠️  一時ディレクトリを削除できませんでした: ${seen}: EBUSY: resource busy`
      )
    })

    it('処理が成功した後の削除エラーはそのまま返す', async () => {
      jest.spyOn(TempWorkspace.prototype, 'dispose').mockRejectedValue(new Error('EBUSY: resource busy'))

      await expect(TempWorkspace.use(parent, 'run-', async () => 'done')).rejects.toThrow(
        'EBUSY: resource busy'
      )
    })

    it('作成に失敗した場合はコールバックを呼ばない', async () => {
      const callback = jest.fn(async () => undefined)

      await expect(
        TempWorkspace.use(path.join(parent, 'missing'), 'run-', callback)
      ).rejects.toBeInstanceOf(PublishError)

      expect(callback).not.toHaveBeenCalled()
    })
  })

  describe('resolve', () => {
    it('ワークスペース内のパスを解決する', async () => {
      const workspace = await TempWorkspace.create(parent, 'run-')

      expect(workspace.resolve('packages/web')).toBe(path.join(workspace.dir, 'packages', 'web'))
      expect(workspace.resolve('.')).toBe(workspace.dir)
      expect(workspace.resolve('..shared/pkg')).toBe(path.join(workspace.dir, '..shared', 'pkg'))

      await workspace.dispose()
    })

    it('ワークスペース外を指すパスはエラー', async () => {
      const workspace = await TempWorkspace.create(parent, 'run-')

      expect(() => workspace.resolve('../elsewhere')).toThrow('Path traversal detected')
      expect(() => workspace.resolve('/etc')).toThrow('Path traversal detected')

      await workspace.dispose()
    })
  })
})
