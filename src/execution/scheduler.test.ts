/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { describe, test, expect, vi } from 'vitest'
import { ExecutionScheduler } from './scheduler.js'

interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined
  const promise = new Promise<T>((settle) => {
    resolve = settle
  })
  return { promise, resolve }
}

const never = () => new Promise<never>(() => undefined)

describe('ExecutionScheduler', () => {
  describe('outcomes', () => {
    test('should report completed tasks with their value', async () => {
      const scheduler = new ExecutionScheduler()

      await expect(scheduler.submit({ id: 1, run: () => 42 })).resolves.toEqual({ status: 'completed', value: 42 })
    })

    test('should report thrown errors as failures', async () => {
      const scheduler = new ExecutionScheduler()

      const outcome = await scheduler.submit({
        id: 1,
        run: async () => {
          throw new Error('boom')
        }
      })

      expect(outcome.status).toBe('failed')
      expect(outcome.status === 'failed' && outcome.error.message).toBe('boom')
    })

    test('should wrap thrown non-errors', async () => {
      const scheduler = new ExecutionScheduler()

      const outcome = await scheduler.submit({
        id: 1,
        run: () => {
          throw 'plain text'
        }
      })

      expect(outcome.status === 'failed' && outcome.error.message).toBe('plain text')
    })

    test('should time out tasks and abort their signal', async () => {
      const scheduler = new ExecutionScheduler({ defaultTimeoutMs: 1000 })
      let seen: AbortSignal | undefined

      const outcome = await scheduler.submit({
        id: 'slow',
        timeoutMs: 20,
        run: (signal) => {
          seen = signal
          return never()
        }
      })

      expect(outcome).toEqual({ status: 'timed_out', timeoutMs: 20 })
      expect(seen?.aborted).toBe(true)
      expect(seen?.reason).toBe('Timed out after 20ms')
      expect(scheduler.activeCount).toBe(0)
      expect(scheduler.inFlightCount).toBe(0)
    })

    test('should use the default timeout when the task has none', async () => {
      const scheduler = new ExecutionScheduler({ defaultTimeoutMs: 15 })

      await expect(scheduler.submit({ id: 1, run: never })).resolves.toEqual({ status: 'timed_out', timeoutMs: 15 })
    })
  })

  describe('cancellation', () => {
    test('should cancel a running task with the given reason', async () => {
      const scheduler = new ExecutionScheduler()
      const started = deferred<AbortSignal>()

      const outcome = scheduler.submit({
        id: 7,
        run: (signal) => {
          started.resolve(signal)
          return never()
        }
      })
      const signal = await started.promise

      expect(scheduler.cancel(7, 'user aborted')).toBe(true)
      await expect(outcome).resolves.toEqual({ status: 'cancelled', reason: 'user aborted' })
      expect(signal.aborted).toBe(true)
    })

    test('should ignore unknown ids', () => {
      const scheduler = new ExecutionScheduler()

      expect(scheduler.cancel('nope')).toBe(false)
    })

    test('should remove a queued task without running it', async () => {
      const scheduler = new ExecutionScheduler({ maxConcurrency: 1 })
      const gate = deferred<string>()
      const queuedRun = vi.fn(() => 'queued')

      const first = scheduler.submit({ id: 1, run: () => gate.promise })
      const second = scheduler.submit({ id: 2, run: queuedRun })
      await vi.waitFor(() => expect(scheduler.pendingCount).toBe(1))

      scheduler.cancel(2)
      await expect(second).resolves.toEqual({ status: 'cancelled' })
      expect(scheduler.pendingCount).toBe(0)

      gate.resolve('first')
      await expect(first).resolves.toEqual({ status: 'completed', value: 'first' })
      expect(queuedRun).not.toHaveBeenCalled()
    })

    test('should cancel everything in flight', async () => {
      const scheduler = new ExecutionScheduler()

      const outcomes = [scheduler.submit({ id: 1, run: never }), scheduler.submit({ id: 2, run: never })]
      await vi.waitFor(() => expect(scheduler.activeCount).toBe(2))
      scheduler.cancelAll('Server shutting down')

      await expect(Promise.all(outcomes)).resolves.toEqual([
        { status: 'cancelled', reason: 'Server shutting down' },
        { status: 'cancelled', reason: 'Server shutting down' }
      ])
    })
  })

  describe('concurrency', () => {
    test('should never run more than maxConcurrency handlers', async () => {
      const scheduler = new ExecutionScheduler({ maxConcurrency: 2 })
      const gates = [deferred<number>(), deferred<number>(), deferred<number>(), deferred<number>()]
      let running = 0
      let peak = 0

      const outcomes = gates.map((gate, index) =>
        scheduler.submit({
          id: index,
          run: async () => {
            running++
            peak = Math.max(peak, running)
            const value = await gate.promise
            running--
            return value
          }
        })
      )

      await vi.waitFor(() => expect(scheduler.activeCount).toBe(2))
      expect(scheduler.pendingCount).toBe(2)

      gates.forEach((gate, index) => gate.resolve(index * 10))
      const settled = await Promise.all(outcomes)

      expect(settled.map((outcome) => outcome.status === 'completed' && outcome.value)).toEqual([0, 10, 20, 30])
      expect(peak).toBe(2)
      expect(scheduler.activeCount).toBe(0)
    })

    test('should complete many concurrent tasks', async () => {
      const scheduler = new ExecutionScheduler({ maxConcurrency: 4 })

      const outcomes = await Promise.all(
        Array.from({ length: 25 }, (_, index) =>
          scheduler.submit({ id: index, run: async () => index * 2 })
        )
      )

      expect(outcomes.every((outcome) => outcome.status === 'completed')).toBe(true)
      expect(outcomes[24]).toEqual({ status: 'completed', value: 48 })
    })

    test('should serialize tasks sharing an exclusive key', async () => {
      const scheduler = new ExecutionScheduler({ maxConcurrency: 4 })
      const events: string[] = []
      const gate = deferred<void>()

      const first = scheduler.submit({
        id: 'a',
        exclusiveKey: 'tool:wait',
        run: async () => {
          events.push('a:start')
          await gate.promise
          events.push('a:end')
        }
      })
      const second = scheduler.submit({
        id: 'b',
        exclusiveKey: 'tool:wait',
        run: () => {
          events.push('b:start')
        }
      })
      const other = scheduler.submit({ id: 'c', run: () => { events.push('c:start') } })

      await other
      await vi.waitFor(() => expect(events).toContain('a:start'))
      expect(events).not.toContain('b:start')

      gate.resolve()
      await Promise.all([first, second])
      expect(events.filter((event) => !event.startsWith('c:'))).toEqual(['a:start', 'a:end', 'b:start'])
    })

    test('should hold an exclusive key until a timed-out handler returns', async () => {
      const scheduler = new ExecutionScheduler({ maxConcurrency: 4 })
      const gate = deferred<void>()
      const events: string[] = []

      const first = scheduler.submit({
        id: 1,
        exclusiveKey: 'tool:wait',
        timeoutMs: 10,
        run: async () => {
          events.push('first:start')
          await gate.promise
          events.push('first:end')
        }
      })
      const second = scheduler.submit({
        id: 2,
        exclusiveKey: 'tool:wait',
        run: () => {
          events.push('second:start')
        }
      })

      await expect(first).resolves.toEqual({ status: 'timed_out', timeoutMs: 10 })
      await new Promise((resolve) => setTimeout(resolve, 30))
      expect(events).toEqual(['first:start'])

      gate.resolve()
      await expect(second).resolves.toEqual({ status: 'completed', value: undefined })
      expect(events).toEqual(['first:start', 'first:end', 'second:start'])
    })

    test('should let a task waiting on an exclusive key be cancelled', async () => {
      const scheduler = new ExecutionScheduler()
      const gate = deferred<void>()
      const events: string[] = []

      const first = scheduler.submit({ id: 1, exclusiveKey: 'k', run: () => gate.promise })
      const second = scheduler.submit({ id: 2, exclusiveKey: 'k', run: () => { events.push('second') } })
      const third = scheduler.submit({ id: 3, exclusiveKey: 'k', run: () => { events.push('third') } })

      scheduler.cancel(2, 'changed my mind')
      await expect(second).resolves.toEqual({ status: 'cancelled', reason: 'changed my mind' })
      expect(events).toEqual([])

      gate.resolve()
      await first
      await third
      expect(events).toEqual(['third'])
    })
  })

  describe('drain', () => {
    test('should resolve true when nothing is in flight', async () => {
      await expect(new ExecutionScheduler().drain(0)).resolves.toBe(true)
    })

    test('should wait for in-flight tasks to settle', async () => {
      const scheduler = new ExecutionScheduler()
      const gate = deferred<string>()
      const outcome = scheduler.submit({ id: 1, run: () => gate.promise })

      const drained = scheduler.drain(1000)
      gate.resolve('done')

      await expect(drained).resolves.toBe(true)
      await expect(outcome).resolves.toEqual({ status: 'completed', value: 'done' })
    })

    test('should give up after the grace period', async () => {
      const scheduler = new ExecutionScheduler()
      const pending = scheduler.submit({ id: 1, run: never })

      await expect(scheduler.drain(10)).resolves.toBe(false)
      expect(scheduler.inFlightCount).toBe(1)

      scheduler.cancelAll('test over')
      await expect(pending).resolves.toEqual({ status: 'cancelled', reason: 'test over' })
    })
  })
})
