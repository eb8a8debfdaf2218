/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { handleCaughtError } from '../errors.js'
import { createChildLogger } from '../logger.js'
import type { RequestId } from '../types.js'

export interface SchedulerConfig {
  /** Maximum number of handlers awaited at the same time */
  maxConcurrency: number
  /** Applied to tasks that do not carry their own timeout */
  defaultTimeoutMs: number
}

export interface ScheduledTask<T> {
  readonly id: RequestId
  readonly run: (signal: AbortSignal) => Promise<T> | T
  readonly timeoutMs?: number
  /** Tasks sharing a key never run concurrently */
  readonly exclusiveKey?: string
}

export type ExecutionOutcome<T> =
  | { readonly status: 'completed'; readonly value: T }
  | { readonly status: 'failed'; readonly error: Error }
  | { readonly status: 'timed_out'; readonly timeoutMs: number }
  | { readonly status: 'cancelled'; readonly reason?: string }

const DEFAULT_CONFIG: SchedulerConfig = {
  maxConcurrency: 8,
  defaultTimeoutMs: 30000
}

type Release = () => void

interface Execution<T> {
  /** What the caller is told: the handler's result, or why it stopped waiting */
  readonly outcome: Promise<ExecutionOutcome<T>>
  /** Settles when the handler returns, even after it was abandoned */
  readonly settled: Promise<unknown>
}

/**
 * Runs handlers off the read loop with a concurrency limit, per-task
 * timeouts and cooperative cancellation.
 *
 * A timed-out or cancelled task is abandoned: its signal is aborted and the
 * scheduler stops waiting, but the handler is not forcibly stopped and may
 * still complete its side effects. Its exclusive key stays held until it returns.
 */
export class ExecutionScheduler {
  private readonly config: SchedulerConfig
  private readonly controllers = new Map<RequestId, AbortController>()
  private readonly inFlight = new Set<Promise<unknown>>()
  private readonly waiters: Array<() => void> = []
  private readonly exclusiveTails = new Map<string, Promise<void>>()
  private active = 0
  private readonly logger = createChildLogger('execution-scheduler')

  constructor(config: Partial<SchedulerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config }
  }

  get activeCount(): number {
    return this.active
  }

  get pendingCount(): number {
    return this.waiters.length
  }

  get inFlightCount(): number {
    return this.controllers.size
  }

  submit<T>(task: ScheduledTask<T>): Promise<ExecutionOutcome<T>> {
    const controller = new AbortController()
    this.controllers.set(task.id, controller)

    const outcome: Promise<ExecutionOutcome<T>> = this.schedule(task, controller).finally(() => {
      this.controllers.delete(task.id)
      this.inFlight.delete(outcome)
    })
    this.inFlight.add(outcome)
    return outcome
  }

  /**
   * Abort a queued or running task. Returns false if the id is unknown.
   */
  cancel(id: RequestId, reason?: string): boolean {
    const controller = this.controllers.get(id)
    if (!controller) {
      return false
    }

    this.logger.debug({ requestId: id, reason }, 'Cancelling task')
    controller.abort(reason)
    return true
  }

  cancelAll(reason: string): void {
    for (const controller of this.controllers.values()) {
      controller.abort(reason)
    }
  }

  /**
   * Wait for in-flight tasks to settle.
   *
   * @returns true when everything settled, false when the grace period elapsed first
   */
  async drain(graceMs: number): Promise<boolean> {
    if (this.inFlight.size === 0) {
      return true
    }

    let expire: (drained: boolean) => void = () => undefined
    const expired = new Promise<boolean>((resolve) => {
      expire = resolve
    })
    const timer = setTimeout(() => expire(false), graceMs)
    const settled = Promise.allSettled(Array.from(this.inFlight)).then(() => true)

    try {
      return await Promise.race([settled, expired])
    } finally {
      clearTimeout(timer)
    }
  }

  private async schedule<T>(task: ScheduledTask<T>, controller: AbortController): Promise<ExecutionOutcome<T>> {
    let unlock: Release = () => undefined
    if (task.exclusiveKey !== undefined) {
      const lock = await this.lockExclusive(task.exclusiveKey, controller.signal)
      if (!lock) {
        return cancelledOutcome(controller.signal)
      }
      unlock = lock
    }

    let handlerSettled: Promise<unknown> = Promise.resolve()
    try {
      const acquired = await this.acquireSlot(controller.signal)
      if (!acquired) {
        return cancelledOutcome(controller.signal)
      }

      try {
        const execution = this.execute(task, controller)
        handlerSettled = execution.settled
        return await execution.outcome
      } finally {
        this.releaseSlot()
      }
    } finally {
      // The slot is freed once the scheduler stops waiting; the exclusive
      // lock only once the handler itself has returned
      void handlerSettled.then(unlock)
    }
  }

  private execute<T>(task: ScheduledTask<T>, controller: AbortController): Execution<T> {
    const { signal } = controller
    if (signal.aborted) {
      return { outcome: Promise.resolve(cancelledOutcome(signal)), settled: Promise.resolve() }
    }

    const timeoutMs = task.timeoutMs ?? this.config.defaultTimeoutMs
    let abandon: (outcome: ExecutionOutcome<T>) => void = () => undefined
    const abandoned = new Promise<ExecutionOutcome<T>>((resolve) => {
      abandon = resolve
    })

    // Resolve before aborting so a timeout is not reported as a cancellation
    const timer = setTimeout(() => {
      abandon({ status: 'timed_out', timeoutMs })
      controller.abort(`Timed out after ${timeoutMs}ms`)
    }, timeoutMs)
    const onAbort = () => abandon(cancelledOutcome(signal))
    signal.addEventListener('abort', onAbort, { once: true })

    const running = Promise.resolve()
      .then(() => task.run(signal))
      .then(
        (value): ExecutionOutcome<T> => ({ status: 'completed', value }),
        (error: unknown): ExecutionOutcome<T> => ({ status: 'failed', error: handleCaughtError(error) })
      )

    const outcome = Promise.race([running, abandoned]).finally(() => {
      clearTimeout(timer)
      signal.removeEventListener('abort', onAbort)
    })
    return { outcome, settled: running }
  }

  private acquireSlot(signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) {
      return Promise.resolve(false)
    }
    if (this.active < this.config.maxConcurrency) {
      this.active++
      return Promise.resolve(true)
    }

    return new Promise((resolve) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(grant)
        if (index >= 0) {
          this.waiters.splice(index, 1)
        }
        resolve(false)
      }
      const grant = () => {
        signal.removeEventListener('abort', onAbort)
        this.active++
        resolve(true)
      }

      this.waiters.push(grant)
      signal.addEventListener('abort', onAbort, { once: true })
    })
  }

  private releaseSlot(): void {
    this.active--
    this.waiters.shift()?.()
  }

  /**
   * Queue behind the previous holder of `key`. Resolves null if the signal
   * aborts first; the queue position is then given up without blocking
   * later holders.
   */
  private async lockExclusive(key: string, signal: AbortSignal): Promise<Release | null> {
    const previous = this.exclusiveTails.get(key) ?? Promise.resolve()
    let unlock: Release = () => undefined
    const current = new Promise<void>((resolve) => {
      unlock = () => resolve()
    })
    const tail = previous.then(() => current)
    this.exclusiveTails.set(key, tail)

    const release = () => {
      unlock()
      if (this.exclusiveTails.get(key) === tail) {
        this.exclusiveTails.delete(key)
      }
    }

    if (!(await waitUnlessAborted(previous, signal))) {
      // The previous holder may still be running, so the tail stays until it is done
      unlock()
      void tail.then(() => {
        if (this.exclusiveTails.get(key) === tail) {
          this.exclusiveTails.delete(key)
        }
      })
      return null
    }
    return release
  }
}

function waitUnlessAborted(turn: Promise<void>, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) {
    return Promise.resolve(false)
  }

  return new Promise((resolve) => {
    const onAbort = () => resolve(false)
    signal.addEventListener('abort', onAbort, { once: true })
    void turn.then(() => {
      signal.removeEventListener('abort', onAbort)
      resolve(true)
    })
  })
}

function cancelledOutcome(signal: AbortSignal): { status: 'cancelled'; reason?: string } {
  const reason: unknown = signal.reason
  return typeof reason === 'string' ? { status: 'cancelled', reason } : { status: 'cancelled' }
}
