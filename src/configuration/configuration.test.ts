/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { test, expect, beforeEach, afterEach, describe } from 'vitest'
import { ConfigError, ErrorCode } from '../errors.js'
import { getApplicationConfiguration, loadConfiguration } from './index.js'

const setEnvVars = (vars: Record<string, string>) => {
  Object.entries(vars).forEach(([key, value]) => {
    process.env[key] = value
  })
}

const captureConfigError = (): ConfigError => {
  try {
    loadConfiguration()
  } catch (error) {
    if (error instanceof ConfigError) {
      return error
    }
    throw error
  }
  throw new Error('Expected configuration to be rejected')
}

describe('Configuration Loading', () => {
  const testEnvVars = [
    'SERVER_NAME', 'SERVER_VERSION', 'SERVER_INSTRUCTIONS',
    'MCP_REQUEST_TIMEOUT_MS', 'MCP_MAX_CONCURRENCY', 'MCP_SHUTDOWN_GRACE_MS',
    'LOG_LEVEL', 'LOG_STRUCTURED', 'MCP_LOG_FILE'
  ] as const

  const cleanupEnv = () => {
    testEnvVars.forEach(key => delete process.env[key])
    getApplicationConfiguration().resetConfigurationForTesting()
  }

  beforeEach(cleanupEnv)
  afterEach(cleanupEnv)

  describe('Valid Configuration Loading', () => {
    test('should use default values when nothing is set', () => {
      const config = loadConfiguration()

      expect(config).toEqual({
        server: { name: 'mcp-stdio-runtime', version: '0.1.0' },
        execution: { requestTimeoutMs: 30000, maxConcurrency: 8, shutdownGraceMs: 5000 },
        logging: { level: 'info', structured: true }
      })
    })

    test('should load configuration from environment variables', () => {
      setEnvVars({
        SERVER_NAME: 'calculator',
        SERVER_VERSION: '2.1.0',
        SERVER_INSTRUCTIONS: 'Use add_numbers for arithmetic',
        MCP_REQUEST_TIMEOUT_MS: '1500',
        MCP_MAX_CONCURRENCY: '2',
        MCP_SHUTDOWN_GRACE_MS: '0',
        LOG_LEVEL: 'DEBUG',
        LOG_STRUCTURED: 'false',
        MCP_LOG_FILE: '/var/log/mcp-runtime.log'
      })

      const config = loadConfiguration()

      expect(config.server).toEqual({
        name: 'calculator',
        version: '2.1.0',
        instructions: 'Use add_numbers for arithmetic'
      })
      expect(config.execution).toEqual({ requestTimeoutMs: 1500, maxConcurrency: 2, shutdownGraceMs: 0 })
      expect(config.logging).toEqual({ level: 'debug', structured: false, file: '/var/log/mcp-runtime.log' })
    })

    test('should treat an empty log file path as unset', () => {
      process.env.MCP_LOG_FILE = ''

      expect(loadConfiguration().logging.file).toBeUndefined()
    })
  })

  describe('Invalid Configuration', () => {
    test('should reject non-numeric timeouts', () => {
      process.env.MCP_REQUEST_TIMEOUT_MS = 'soon'

      const error = captureConfigError()

      expect(error.code).toBe(ErrorCode.INVALID_CONFIG)
      expect(error.message).toBe('Configuration validation failed: execution.requestTimeoutMs: Expected number, received nan')
      expect(error.details?.field).toBe('execution.requestTimeoutMs')
    })

    test('should reject a concurrency limit below one', () => {
      process.env.MCP_MAX_CONCURRENCY = '0'

      const error = captureConfigError()

      expect(error.message).toBe('Configuration validation failed: execution.maxConcurrency: MCP_MAX_CONCURRENCY must be at least 1')
    })

    test('should reject an empty server name', () => {
      process.env.SERVER_NAME = ''

      const error = captureConfigError()

      expect(error.details?.field).toBe('server.name')
      expect(error.details?.validationError).toBe('SERVER_NAME cannot be empty')
    })

    test('should reject unknown log levels', () => {
      process.env.LOG_LEVEL = 'verbose'

      const error = captureConfigError()

      expect(error.details?.field).toBe('logging.level')
      expect(error.message).toMatch(/Invalid enum value/)
    })
  })

  describe('Configuration Manager', () => {
    test('should cache configuration until reset', () => {
      const manager = getApplicationConfiguration()
      process.env.MCP_MAX_CONCURRENCY = '3'
      expect(manager.getExecutionPolicy().maxConcurrency).toBe(3)

      process.env.MCP_MAX_CONCURRENCY = '5'
      expect(manager.getExecutionPolicy().maxConcurrency).toBe(3)

      manager.resetConfigurationForTesting()
      expect(manager.getExecutionPolicy().maxConcurrency).toBe(5)
    })

    test('should expose each configuration section', () => {
      const manager = getApplicationConfiguration()

      expect(manager.getServerIdentity().name).toBe('mcp-stdio-runtime')
      expect(manager.getObservabilityConfiguration().level).toBe('info')
      expect(manager.getCompleteConfiguration().execution.shutdownGraceMs).toBe(5000)
    })
  })
})
