/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { z } from 'zod'

export const ServerIdentitySchema = z.object({
  name: z.string().min(1, 'SERVER_NAME cannot be empty').default('mcp-stdio-runtime'),
  version: z.string().min(1, 'SERVER_VERSION cannot be empty').default('0.1.0'),
  instructions: z.string().optional()
})

export const ExecutionPolicySchema = z.object({
  requestTimeoutMs: z.number().int().min(1, 'MCP_REQUEST_TIMEOUT_MS must be positive').default(30000),
  maxConcurrency: z.number().int().min(1, 'MCP_MAX_CONCURRENCY must be at least 1').max(1024, 'MCP_MAX_CONCURRENCY must be <= 1024').default(8),
  shutdownGraceMs: z.number().int().min(0, 'MCP_SHUTDOWN_GRACE_MS must be non-negative').default(5000)
})

export const ObservabilityConfigurationSchema = z.object({
  level: z.string().toLowerCase().pipe(z.enum(['debug', 'info', 'warn', 'error'])).default('info'),
  structured: z.boolean().default(true),
  file: z.string().min(1).optional()
})

export const ApplicationConfigurationSchema = z.object({
  server: ServerIdentitySchema,
  execution: ExecutionPolicySchema,
  logging: ObservabilityConfigurationSchema
})

export type ApplicationConfiguration = z.infer<typeof ApplicationConfigurationSchema>
export type ServerIdentity = z.infer<typeof ServerIdentitySchema>
export type ExecutionPolicy = z.infer<typeof ExecutionPolicySchema>
export type ObservabilityConfiguration = z.infer<typeof ObservabilityConfigurationSchema>
