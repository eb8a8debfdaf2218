/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import { Writable } from 'stream'
import { mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  createChildLogger,
  createLogger,
  generateCorrelationId,
  getLogger,
  setDefaultLogger,
  type Logger
} from './logger.js'
import { isRecord } from './validation/schema-validator.js'

// Captures each log line written by pino
class CapturingStream extends Writable {
  public chunks: string[] = []

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString())
    callback()
  }

  records(): Array<Record<string, unknown>> {
    return this.chunks.map((line) => {
      const parsed: unknown = JSON.parse(line)
      return isRecord(parsed) ? parsed : {}
    })
  }
}

describe('Logger', () => {
  let captureStream: CapturingStream

  beforeEach(() => {
    captureStream = new CapturingStream()
  })

  describe('Logger Creation', () => {
    test('should create logger with default configuration', () => {
      const logger = createLogger()

      expect(logger.level).toBe('info')
      expect(typeof logger.child).toBe('function')
    })

    test('should create logger with custom level', () => {
      const logger = createLogger({ level: 'debug', stream: captureStream })

      expect(logger.level).toBe('debug')
    })
  })

  describe('Log File', () => {
    let directory: string

    beforeEach(() => {
      directory = mkdtempSync(join(tmpdir(), 'mcp-logger-'))
    })

    afterEach(() => {
      rmSync(directory, { recursive: true, force: true })
    })

    test('should append records to the configured file', async () => {
      const file = join(directory, 'runtime.log')
      const logger = createLogger({ level: 'info', file })

      logger.info({ requestId: 3 }, 'Written to file')

      await vi.waitFor(() => {
        const [line] = readFileSync(file, 'utf8').split('\n')
        const record: unknown = JSON.parse(line ?? '')
        expect(record).toMatchObject({ requestId: 3, msg: 'Written to file' })
      })
    })
  })

  describe('Log Levels', () => {
    test('should respect log level hierarchy', () => {
      const logger = createLogger({ level: 'warn', stream: captureStream })

      logger.warn('Warning message')
      logger.error('Error message')
      logger.info('Info message')
      logger.debug('Debug message')

      const messages = captureStream.records().map((record) => record.msg)
      expect(messages).toEqual(['Warning message', 'Error message'])
    })
  })

  describe('Structured Logging', () => {
    test('should log structured data as JSON', () => {
      const logger = createLogger({ level: 'info', stream: captureStream })

      logger.info({ method: 'tools/call', requestId: 7, durationMs: 150 }, 'Request completed')

      const [record] = captureStream.records()
      expect(record).toMatchObject({
        method: 'tools/call',
        requestId: 7,
        durationMs: 150,
        msg: 'Request completed',
        level: 30
      })
      expect(typeof record?.time).toBe('number')
    })

    test('should serialize errors under err', () => {
      const logger = createLogger({ level: 'info', stream: captureStream })

      logger.error({ err: new Error('boom') }, 'Handler failed')

      const [record] = captureStream.records()
      expect(record?.err).toMatchObject({ type: 'Error', message: 'boom' })
    })
  })

  describe('Correlation IDs', () => {
    test('should generate distinct correlation IDs', () => {
      const first = generateCorrelationId()
      const second = generateCorrelationId()

      expect(first).toMatch(/^\d+-[a-z0-9]+$/)
      expect(first).not.toBe(second)
    })

    describe('with a replaced default logger', () => {
      let previous: Logger

      beforeEach(() => {
        previous = getLogger()
        setDefaultLogger(createLogger({ level: 'info', stream: captureStream }))
      })

      afterEach(() => {
        setDefaultLogger(previous)
      })

      test('should bind a component name to child loggers', () => {
        createChildLogger('stdio-transport').info('Frame received')

        const [record] = captureStream.records()
        expect(record?.component).toBe('stdio-transport')
        expect(record?.correlationId).toBeUndefined()
        expect(record?.msg).toBe('Frame received')
      })

      test('should generate a correlation ID when none is given', () => {
        createChildLogger().info('Anonymous message')

        const [record] = captureStream.records()
        expect(record?.correlationId).toEqual(expect.stringMatching(/^\d+-/))
        expect(record?.component).toBeUndefined()
      })
    })
  })
})
