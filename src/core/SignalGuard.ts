import { ErrorFactory } from './ErrorHandling'

export type GuardedSignal = 'SIGINT' | 'SIGTERM' | 'SIGQUIT'

/**
 * Minimal surface of `process` needed to listen for signals
 */
export interface SignalSource {
  on(event: GuardedSignal, listener: (signal: NodeJS.Signals) => void): unknown
  off(event: GuardedSignal, listener: (signal: NodeJS.Signals) => void): unknown
}

/**
 * Turns SIGINT, SIGTERM and SIGQUIT into an aborted AbortSignal.
 *
 * While installed, the default terminate-on-signal behaviour is replaced,
 * so the publish run can unwind and remove its workspace before exiting.
 */
export class SignalGuard {
  static readonly SIGNALS: readonly GuardedSignal[] = ['SIGINT', 'SIGTERM', 'SIGQUIT']

  private controller = new AbortController()
  private received: NodeJS.Signals | undefined
  private installed = false

  private readonly listener = (signal: NodeJS.Signals): void => {
    if (this.received) return
    this.received = signal
    console.error(`\n⚠️  ${signal} を受信しました。クリーンアップしています...`)
    this.controller.abort(
      ErrorFactory.create('INTERRUPTED', { message: `${signal} を受信したため中断しました` })
    )
  }

  constructor(private source: SignalSource = process) {}

  get signal(): AbortSignal {
    return this.controller.signal
  }

  get receivedSignal(): NodeJS.Signals | undefined {
    return this.received
  }

  install(): AbortSignal {
    if (!this.installed) {
      for (const name of SignalGuard.SIGNALS) {
        this.source.on(name, this.listener)
      }
      this.installed = true
    }
    return this.controller.signal
  }

  dispose(): void {
    if (!this.installed) return
    for (const name of SignalGuard.SIGNALS) {
      this.source.off(name, this.listener)
    }
    this.installed = false
  }
}
