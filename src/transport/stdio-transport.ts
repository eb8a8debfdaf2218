/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import type { Readable, Writable } from 'stream'
import { TransportError } from '../errors.js'
import { createChildLogger } from '../logger.js'

/**
 * A bidirectional, framed message stream. No protocol knowledge.
 */
export interface Transport {
  /** Next complete frame, or null once the stream has ended */
  receive(): Promise<string | null>
  send(frame: string): Promise<void>
  close(): Promise<void>
}

/**
 * Splits a character stream into newline-delimited frames
 */
export class LineFramer {
  private buffer = ''

  push(chunk: string): string[] {
    this.buffer += chunk
    const lines = this.buffer.split('\n')
    this.buffer = lines.pop() ?? ''

    return lines
      .map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line))
      .filter((line) => line.trim().length > 0)
  }

  /**
   * Discard and return whatever unterminated text is left
   */
  takeRemainder(): string {
    const remainder = this.buffer
    this.buffer = ''
    return remainder
  }
}

interface PendingReceive {
  resolve: (frame: string | null) => void
  reject: (error: Error) => void
}

/**
 * Newline-delimited transport over a pair of streams, stdin/stdout by default.
 *
 * Any stream error is fatal to the session.
 */
export class StdioTransport implements Transport {
  private readonly framer = new LineFramer()
  private readonly frames: string[] = []
  private readonly pending: PendingReceive[] = []
  private started = false
  private ended = false
  private failure: TransportError | null = null
  private readonly logger = createChildLogger('stdio-transport')

  constructor(
    private readonly input: Readable = process.stdin,
    private readonly output: Writable = process.stdout
  ) {}

  private readonly onData = (chunk: string | Buffer): void => {
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8')
    for (const frame of this.framer.push(text)) {
      this.deliver(frame)
    }
  }

  private readonly onEnd = (): void => {
    const remainder = this.framer.takeRemainder()
    if (remainder.trim().length > 0) {
      this.logger.warn({ bytes: Buffer.byteLength(remainder) }, 'Discarding unterminated frame at end of stream')
    }
    this.finish()
  }

  private readonly onError = (error: Error): void => {
    this.logger.error({ err: error }, 'Transport stream failed')
    const failure = new TransportError(`Transport stream failed: ${error.message}`, error)
    this.failure = failure
    this.detach()
    for (const waiter of this.pending.splice(0)) {
      waiter.reject(failure)
    }
  }

  private start(): void {
    if (this.started) {
      return
    }
    this.started = true
    this.input.setEncoding('utf8')
    this.input.on('data', this.onData)
    this.input.on('end', this.onEnd)
    this.input.on('close', this.onEnd)
    this.input.on('error', this.onError)
  }

  private deliver(frame: string): void {
    const waiter = this.pending.shift()
    if (waiter) {
      waiter.resolve(frame)
    } else {
      this.frames.push(frame)
    }
  }

  private finish(): void {
    if (this.ended) {
      return
    }
    this.ended = true
    this.detach()
    for (const waiter of this.pending.splice(0)) {
      waiter.resolve(null)
    }
  }

  // Leaves the error listener attached: a late stream error is still logged
  private detach(): void {
    this.input.off('data', this.onData)
    this.input.off('end', this.onEnd)
    this.input.off('close', this.onEnd)
    this.input.pause()
  }

  receive(): Promise<string | null> {
    this.start()

    const frame = this.frames.shift()
    if (frame !== undefined) {
      return Promise.resolve(frame)
    }
    if (this.failure) {
      return Promise.reject(this.failure)
    }
    if (this.ended) {
      return Promise.resolve(null)
    }

    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject })
    })
  }

  send(frame: string): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure)
    }
    if (this.output.writableEnded || this.output.destroyed) {
      return Promise.reject(new TransportError('Cannot send: output stream is closed'))
    }

    // The callback fires once the chunk is handed off, which also waits out back-pressure
    return new Promise((resolve, reject) => {
      this.output.write(`${frame}\n`, (error) => {
        if (error) {
          reject(new TransportError(`Failed to write frame: ${error.message}`, error))
        } else {
          resolve()
        }
      })
    })
  }

  async close(): Promise<void> {
    this.finish()
  }
}
