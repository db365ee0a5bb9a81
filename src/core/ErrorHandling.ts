/**
 * Standardized error handling for snapshot-publish
 */

export class PublishError extends Error {
  constructor(
    public code: ErrorCode,
    public stage: string,
    message: string,
    public exitCode: number = 1,
    public recoverable: boolean = false,
    public suggestedActions: string[] = []
  ) {
    super(message)
    this.name = 'PublishError'
    Error.captureStackTrace(this, this.constructor)
  }
}

interface ErrorDefinition {
  stage: string
  message: string
  exitCode: number
  recoverable: boolean
  actions: readonly string[]
}

/**
 * Error codes with standardized messages, exit codes and recovery actions
 */
export const ErrorCodes = {
  // Usage errors
  USAGE_ERROR: {
    stage: 'cli',
    message: '引数が多すぎます',
    exitCode: 1,
    recoverable: true,
    actions: ['パッケージのディレクトリは1つだけ指定してください']
  },
  CONFIG_INVALID: {
    stage: 'config',
    message: '設定ファイルの検証に失敗しました',
    exitCode: 1,
    recoverable: true,
    actions: ['.snapshot-publish.yaml を確認してください']
  },

  // Environment errors
  NOT_A_REPOSITORY: {
    stage: 'prepare',
    message: 'gitリポジトリが見つかりませんでした',
    exitCode: 128,
    recoverable: true,
    actions: ['gitリポジトリの中で実行してください']
  },
  TEMP_DIR_FAILED: {
    stage: 'prepare',
    message: '一時ディレクトリを作成できませんでした',
    exitCode: 1,
    recoverable: true,
    actions: ['{0} が存在し書き込み可能か確認してください', '--temp-root で別の場所を指定できます']
  },

  // Extraction errors
  EXPORT_FAILED: {
    stage: 'export',
    message: 'git archive に失敗しました',
    exitCode: 1,
    recoverable: true,
    actions: ['{0} が存在するリビジョンか確認してください']
  },
  EXTRACT_FAILED: {
    stage: 'export',
    message: 'アーカイブの展開に失敗しました',
    exitCode: 1,
    recoverable: true,
    actions: ['tar がインストールされているか確認してください', '一時ディレクトリの空き容量を確認してください']
  },

  // Precondition errors
  PRUNE_FAILED: {
    stage: 'prune',
    message: 'ディレクトリを削除できませんでした',
    exitCode: 1,
    recoverable: true,
    actions: [
      '{0} がコミット済みのツリーに存在するか確認してください',
      '{0} にコミットされたファイルが無いか確認してください'
    ]
  },
  PACKAGE_NOT_FOUND: {
    stage: 'publish',
    message: 'パッケージのディレクトリが見つかりません',
    exitCode: 1,
    recoverable: true,
    actions: ['{0} がコミット済みのツリーに存在するか確認してください']
  },

  // Publishing errors
  HOOK_FAILED: {
    stage: 'hooks',
    message: 'prePublishフックが失敗しました',
    exitCode: 1,
    recoverable: true,
    actions: ['フックの出力を確認してください', '--skip-hooks でフックを無効にできます']
  },
  PUBLISH_FAILED: {
    stage: 'publish',
    message: '公開処理に失敗しました',
    exitCode: 1,
    recoverable: true,
    actions: [
      'エラーメッセージを確認してください',
      '同じバージョンが既に公開されていないか確認してください'
    ]
  },

  // Signals
  INTERRUPTED: {
    stage: 'signal',
    message: 'シグナルを受信したため中断しました',
    exitCode: 1,
    recoverable: false,
    actions: []
  }
} as const satisfies Record<string, ErrorDefinition>

export type ErrorCode = keyof typeof ErrorCodes

export interface ErrorOptions {
  message?: string
  exitCode?: number
  /** Values substituted for {0}, {1}, ... in the suggested actions */
  actionArgs?: unknown[]
}

/**
 * Error factory for creating standardized errors
 */
export class ErrorFactory {
  static create(errorCode: ErrorCode, options: ErrorOptions = {}): PublishError {
    const errorDef: ErrorDefinition = ErrorCodes[errorCode]
    const finalMessage = options.message || errorDef.message
    const actionArgs = options.actionArgs ?? []

    const actions = errorDef.actions.map((action) => {
      return actionArgs.length > 0 ? this.formatAction(action, actionArgs) : action
    })

    return new PublishError(
      errorCode,
      errorDef.stage,
      `[${errorDef.stage}] ${finalMessage}`,
      options.exitCode ?? errorDef.exitCode,
      errorDef.recoverable,
      actions
    )
  }

  /**
   * Wrap an unknown thrown value, keeping PublishErrors as they are
   */
  static from(error: unknown, fallback: ErrorCode): PublishError {
    if (error instanceof PublishError) {
      return error
    }
    const message = error instanceof Error ? error.message : String(error)
    return this.create(fallback, { message })
  }

  private static formatAction(action: string, args: unknown[]): string {
    let formatted = action
    args.forEach((arg, index) => {
      formatted = formatted.split(`{${index}}`).join(String(arg))
    })
    return formatted
  }
}
