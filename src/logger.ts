/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import pino from 'pino'
import { createWriteStream } from 'fs'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LoggerConfig {
  level?: LogLevel
  structured?: boolean
  /** Append to this file instead of stderr */
  file?: string
  stream?: NodeJS.WritableStream
}

export type Logger = pino.Logger

const STDERR_FD = 2

/**
 * Open a log file for appending. Write failures are reported on stderr.
 */
function openLogFile(path: string): NodeJS.WritableStream {
  const fileStream = createWriteStream(path, { flags: 'a' })
  fileStream.on('error', (error) => {
    process.stderr.write(`Log file ${path} unavailable: ${error.message}\n`)
  })
  return fileStream
}

/**
 * Create a structured logger with Pino
 *
 * Stdout carries protocol frames, so output goes to stderr unless a stream
 * or a file is given. Pretty printing is used when `structured` is false.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const { level = 'info', structured = true } = config
  const stream = config.stream ?? (config.file === undefined ? undefined : openLogFile(config.file))

  const pinoOptions: pino.LoggerOptions = {
    level,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err
    }
  }

  if (stream) {
    return pino(pinoOptions, stream)
  }

  if (!structured) {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: STDERR_FD
      }
    }
    return pino(pinoOptions)
  }

  return pino(pinoOptions, pino.destination(STDERR_FD))
}

let defaultLogger: Logger | null = null

/**
 * Get the default logger instance, creating one on first use
 */
export function getLogger(): Logger {
  defaultLogger ??= createLogger()
  return defaultLogger
}

/**
 * Replace the default logger, e.g. once configuration has been loaded
 */
export function setDefaultLogger(logger: Logger): void {
  defaultLogger = logger
}

/**
 * Generate a correlation ID for tracking one message across components
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`
}

/**
 * Create a child logger bound to a component name, or to a fresh correlation ID
 */
export function createChildLogger(component?: string): Logger {
  const logger = getLogger()

  return component === undefined
    ? logger.child({ correlationId: generateCorrelationId() })
    : logger.child({ component })
}
