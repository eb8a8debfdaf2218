/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import dotenv from 'dotenv'

// Configuration precedence: environment variables > .env file > schema defaults
dotenv.config()

type EnvironmentValueParser<T> = (value: string | undefined) => T | undefined

const parseStringValue: EnvironmentValueParser<string> = (value) => value ?? undefined

const parseNonEmptyStringValue: EnvironmentValueParser<string> = (value) => (value ? value : undefined)

const parseSimpleBooleanValue: EnvironmentValueParser<boolean> = (value) => {
  return value ? value.toLowerCase() === 'true' : undefined
}

// Non-numeric input is passed through as NaN so that validation can name the field
const parseNumericValue: EnvironmentValueParser<number> = (value) => {
  if (!value) return undefined
  const trimmed = value.trim()
  return /^-?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : Number.NaN
}

export class EnvironmentConfigurationSource {
  private static getEnvironmentVariable(key: string): string | undefined {
    return process.env[key]
  }

  static extractServerIdentity() {
    return {
      name: parseStringValue(this.getEnvironmentVariable('SERVER_NAME')),
      version: parseStringValue(this.getEnvironmentVariable('SERVER_VERSION')),
      instructions: parseStringValue(this.getEnvironmentVariable('SERVER_INSTRUCTIONS'))
    }
  }

  static extractExecutionPolicy() {
    return {
      requestTimeoutMs: parseNumericValue(this.getEnvironmentVariable('MCP_REQUEST_TIMEOUT_MS')),
      maxConcurrency: parseNumericValue(this.getEnvironmentVariable('MCP_MAX_CONCURRENCY')),
      shutdownGraceMs: parseNumericValue(this.getEnvironmentVariable('MCP_SHUTDOWN_GRACE_MS'))
    }
  }

  static extractObservabilitySettings() {
    return {
      level: parseStringValue(this.getEnvironmentVariable('LOG_LEVEL')),
      structured: parseSimpleBooleanValue(this.getEnvironmentVariable('LOG_STRUCTURED')),
      file: parseNonEmptyStringValue(this.getEnvironmentVariable('MCP_LOG_FILE'))
    }
  }
}
