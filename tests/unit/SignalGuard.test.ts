import { EventEmitter } from 'events'
import { SignalGuard } from '../../src/core/SignalGuard'
import { PublishError } from '../../src/core/ErrorHandling'

describe('SignalGuard', () => {
  let source: EventEmitter
  let guard: SignalGuard

  beforeEach(() => {
    source = new EventEmitter()
    guard = new SignalGuard(source)
    jest.spyOn(console, 'error').mockImplementation()
  })

  afterEach(() => {
    guard.dispose()
    jest.restoreAllMocks()
  })

  it('SIGINT、SIGTERM、SIGQUITを監視する', () => {
    guard.install()

    expect(source.listenerCount('SIGINT')).toBe(1)
    expect(source.listenerCount('SIGTERM')).toBe(1)
    expect(source.listenerCount('SIGQUIT')).toBe(1)
  })

  it('二重にインストールしてもリスナーは1つ', () => {
    guard.install()
    guard.install()

    expect(source.listenerCount('SIGINT')).toBe(1)
  })

  it.each(['SIGINT', 'SIGTERM', 'SIGQUIT'] as const)('%sを受信するとabortする', (name) => {
    const signal = guard.install()
    expect(signal.aborted).toBe(false)

    source.emit(name, name)

    expect(signal.aborted).toBe(true)
    expect(guard.receivedSignal).toBe(name)
    expect(signal.reason).toBeInstanceOf(PublishError)
    expect((signal.reason as PublishError).code).toBe('INTERRUPTED')
    expect((signal.reason as PublishError).exitCode).toBe(1)
  })

  it('最初に受信したシグナルを保持する', () => {
    guard.install()

    source.emit('SIGTERM', 'SIGTERM')
    source.emit('SIGINT', 'SIGINT')

    expect(guard.receivedSignal).toBe('SIGTERM')
    expect(console.error).toHaveBeenCalledTimes(1)
  })

  it('disposeでリスナーを解除する', () => {
    guard.install()
    guard.dispose()

    expect(source.listenerCount('SIGINT')).toBe(0)
    expect(source.listenerCount('SIGTERM')).toBe(0)
    expect(source.listenerCount('SIGQUIT')).toBe(0)

    source.emit('SIGINT', 'SIGINT')
    expect(guard.signal.aborted).toBe(false)
  })
})
