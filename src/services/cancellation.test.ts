import { describe, it, expect } from 'vitest'
import {
  AsyncMutex,
  CancellationController,
  CancellationError,
  KeyedMutex,
  completedTask,
  isCancellationError,
  runTask
} from './cancellation'
import { TimeoutError } from './errors'

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined
  const promise = new Promise<T>(r => { resolve = r })
  return { promise, resolve }
}

describe('Cancellation Service', () => {
  describe('CancellationController', () => {
    it('should create a controller with uncancelled state', () => {
      const controller = new CancellationController()
      expect(controller.isCancelled).toBe(false)
      expect(controller.token.isCancelled).toBe(false)
    })

    it('token.throwIfCancelled should throw when cancelled', () => {
      const controller = new CancellationController()
      const token = controller.token
      controller.cancel()
      expect(token.isCancelled).toBe(true)
      expect(() => token.throwIfCancelled()).toThrow(CancellationError)
    })
  })

  describe('isCancellationError', () => {
    it('should recognise cancellation errors only', () => {
      expect(isCancellationError(new CancellationError())).toBe(true)
      expect(isCancellationError(new Error('other'))).toBe(false)
      expect(isCancellationError(null)).toBe(false)
    })
  })

  describe('AsyncMutex', () => {
    it('should run holders one at a time in order', async () => {
      const mutex = new AsyncMutex()
      const order: string[] = []
      const gate = deferred<void>()

      const first = mutex.run(async () => {
        order.push('first:start')
        await gate.promise
        order.push('first:end')
      })
      const second = mutex.run(async () => {
        order.push('second')
      })

      await Promise.resolve()
      expect(mutex.isLocked).toBe(true)
      gate.resolve()
      await Promise.all([first, second])

      expect(order).toEqual(['first:start', 'first:end', 'second'])
      expect(mutex.isLocked).toBe(false)
    })

    it('should release after a failing holder', async () => {
      const mutex = new AsyncMutex()
      await expect(mutex.run(async () => { throw new Error('boom') })).rejects.toThrow('boom')
      await expect(mutex.run(async () => 'next')).resolves.toBe('next')
    })
  })

  describe('KeyedMutex', () => {
    it('should not serialize different keys', async () => {
      const mutexes = new KeyedMutex<string>()
      const gate = deferred<void>()
      const held = mutexes.run('a', () => gate.promise)

      await expect(mutexes.run('b', async () => 'free')).resolves.toBe('free')
      expect(mutexes.isLocked('a')).toBe(true)
      expect(mutexes.isLocked('b')).toBe(false)

      gate.resolve()
      await held
      expect(mutexes.isLocked()).toBe(false)
    })
  })

  describe('TaskHandle', () => {
    it('should resolve with the work result', async () => {
      const handle = runTask('sum', async () => 1 + 2)
      await expect(handle).resolves.toBe(3)
      expect(handle.done).toBe(true)
    })

    it('should not start work cancelled straight after submission', async () => {
      let started = false
      const handle = runTask('never', async () => { started = true })

      expect(handle.cancel()).toBe(true)
      await expect(handle.wait()).rejects.toBeInstanceOf(CancellationError)
      expect(started).toBe(false)
      expect(handle.isCancelled).toBe(true)
    })

    it('should pass cancellation to running work', async () => {
      const gate = deferred<void>()
      const handle = runTask('cooperative', async token => {
        await gate.promise
        token.throwIfCancelled()
        return 'finished'
      })

      await Promise.resolve()
      handle.cancel()
      gate.resolve()
      await expect(handle.wait()).rejects.toBeInstanceOf(CancellationError)
    })

    it('should report false when cancelling finished work', async () => {
      const handle = completedTask('noop', 'value')
      await handle
      expect(handle.cancel()).toBe(false)
      expect(handle.isCancelled).toBe(false)
    })

    it('should time out a wait without stopping the work', async () => {
      const gate = deferred<string>()
      const handle = runTask('slow', () => gate.promise)

      await expect(handle.wait(10)).rejects.toBeInstanceOf(TimeoutError)
      gate.resolve('late')
      await expect(handle.wait()).resolves.toBe('late')
    })
  })
})
