/**
 * Cancellation and serialization primitives
 *
 * Long-running ledger operations (imports, key allocation, password changes)
 * hand back a {@link TaskHandle}. Work is cancellable until its storage unit
 * commits; after that, cancellation is a no-op.
 */

import { AppError, ErrorCodes, TimeoutError } from './errors'

/**
 * A cancellation token that can be passed to async operations
 */
export interface CancellationToken {
  signal: AbortSignal
  throwIfCancelled: () => void
  isCancelled: boolean
}

/**
 * Controller for managing cancellation of async operations
 */
export class CancellationController {
  private controller: AbortController

  constructor() {
    this.controller = new AbortController()
  }

  /**
   * Get a token to pass to cancellable operations
   */
  get token(): CancellationToken {
    return {
      signal: this.controller.signal,
      throwIfCancelled: () => {
        if (this.controller.signal.aborted) {
          throw new CancellationError('Operation was cancelled')
        }
      },
      get isCancelled() {
        return this.signal.aborted
      }
    }
  }

  cancel(): void {
    this.controller.abort()
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted
  }
}

/**
 * Error thrown when an operation is cancelled
 */
export class CancellationError extends AppError {
  readonly isCancellation = true

  constructor(message = 'Operation was cancelled') {
    super(message, ErrorCodes.CANCELLED)
    this.name = 'CancellationError'
  }
}

/**
 * Check if an error is a cancellation error
 */
export function isCancellationError(error: unknown): error is CancellationError {
  return (
    error instanceof CancellationError ||
    (typeof error === 'object' && error !== null && 'isCancellation' in error)
  )
}

/**
 * Promise-chain mutex. Every contender queues behind all prior holders.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve()
  private holders = 0

  /**
   * Acquire the mutex. Returns a release function that must be called when done.
   */
  async acquire(): Promise<() => void> {
    const prev = this.tail
    let release: () => void = () => undefined
    this.tail = new Promise<void>(resolve => {
      release = () => {
        this.holders--
        resolve()
      }
    })
    this.holders++
    await prev
    return release
  }

  /**
   * Run `fn` while holding the mutex
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  /** True while a holder or waiter exists */
  get isLocked(): boolean {
    return this.holders > 0
  }
}

/**
 * Lazily created mutexes addressed by key
 */
export class KeyedMutex<K> {
  private readonly mutexes = new Map<K, AsyncMutex>()

  get(key: K): AsyncMutex {
    let mutex = this.mutexes.get(key)
    if (!mutex) {
      mutex = new AsyncMutex()
      this.mutexes.set(key, mutex)
    }
    return mutex
  }

  run<T>(key: K, fn: () => Promise<T>): Promise<T> {
    return this.get(key).run(fn)
  }

  isLocked(key?: K): boolean {
    if (key !== undefined) {
      return this.mutexes.get(key)?.isLocked ?? false
    }
    for (const mutex of this.mutexes.values()) {
      if (mutex.isLocked) return true
    }
    return false
  }
}

/**
 * Handle for submitted work. Awaitable directly, or with a bound via `wait()`.
 */
export class TaskHandle<T> implements PromiseLike<T> {
  private readonly controller = new CancellationController()
  private readonly promise: Promise<T>
  private finished = false

  constructor(
    work: (token: CancellationToken) => Promise<T>,
    private readonly label: string = 'task'
  ) {
    const token = this.controller.token
    // Deferred a tick so a cancel() straight after submission is honoured
    this.promise = Promise.resolve().then(() => {
      token.throwIfCancelled()
      return work(token)
    })
    void this.promise.then(
      () => { this.finished = true },
      () => { this.finished = true }
    )
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.promise.then(onfulfilled, onrejected)
  }

  /**
   * Wait for the result, failing with TimeoutError after `timeoutMs`.
   * The work itself keeps running after a timeout.
   */
  wait(timeoutMs?: number): Promise<T> {
    if (timeoutMs === undefined) return this.promise

    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TimeoutError(this.label, timeoutMs)), timeoutMs)
    })
    return Promise.race([this.promise, timeout]).finally(() => clearTimeout(timer))
  }

  /**
   * Request cancellation. Returns false when the work has already finished,
   * in which case the caller must treat it as completed.
   */
  cancel(): boolean {
    if (this.finished) return false
    this.controller.cancel()
    return true
  }

  get done(): boolean {
    return this.finished
  }

  get isCancelled(): boolean {
    return this.controller.isCancelled
  }
}

/**
 * Submit work and get a handle for it
 */
export function runTask<T>(label: string, work: (token: CancellationToken) => Promise<T>): TaskHandle<T> {
  return new TaskHandle(work, label)
}

/**
 * A handle for work that completed synchronously with nothing to do
 */
export function completedTask<T>(label: string, value: T): TaskHandle<T> {
  return new TaskHandle(async () => value, label)
}
