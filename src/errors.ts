/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

/**
 * Error handling system for the MCP runtime
 *
 * Provides typed error classes with MCP protocol serialization support.
 * Follows JSON-RPC 2.0 error code conventions with application-specific extensions.
 */

export enum ErrorCode {
  // JSON-RPC 2.0 standard error codes
  PARSE_ERROR = -32700,
  INVALID_REQUEST = -32600,
  METHOD_NOT_FOUND = -32601,
  INVALID_PARAMS = -32602,
  INTERNAL_ERROR = -32603,

  // Server-defined protocol errors (JSON-RPC reserved range)
  SHUTTING_DOWN = -32000,
  TIMEOUT = -32001,
  CAPABILITY_NOT_FOUND = -32002,
  NOT_READY = -32003,

  // Local error codes (positive numbers), never sent as a response code
  DUPLICATE_CAPABILITY = 1001,
  REGISTRY_CLOSED = 1002,
  INVALID_CONFIG = 1004,
  TRANSPORT_FAILED = 1005,
  TOOL_EXECUTION_FAILED = 1006
}

/**
 * MCP protocol error structure for JSON-RPC responses
 */
export interface McpError {
  readonly code: ErrorCode
  readonly message: string
  readonly data?: {
    readonly type: string
    readonly [key: string]: unknown
  }
}

/**
 * Base error class for all runtime errors
 *
 * Carries an error code, optional details and a cause chain.
 */
export class BaseError extends Error {
  public readonly code: ErrorCode
  public readonly details?: Record<string, unknown> | undefined
  public readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode,
    details?: Record<string, unknown> | undefined,
    cause?: Error | undefined
  ) {
    super(message)
    this.name = this.constructor.name
    this.code = code
    this.details = details
    this.cause = cause

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Tool-level failure raised by a tool handler
 *
 * Reported to the caller inside a successful response with `isError: true`,
 * never as a protocol error.
 */
export class ToolError extends BaseError {
  public readonly toolName: string

  constructor(
    message: string,
    toolName: string,
    details?: Record<string, unknown> | undefined,
    cause?: Error | undefined
  ) {
    super(message, ErrorCode.TOOL_EXECUTION_FAILED, details, cause)
    this.toolName = toolName
  }
}

/**
 * Configuration-related errors
 */
export class ConfigError extends BaseError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_CONFIG,
    details?: Record<string, unknown> | undefined,
    cause?: Error | undefined
  ) {
    super(message, code, details, cause)
  }
}

/**
 * Input validation errors
 *
 * Always names the offending field and the reason it was rejected.
 */
export class ValidationError extends BaseError {
  public readonly field: string
  public readonly reason: string

  constructor(field: string, reason: string) {
    super(`Invalid params: ${field}: ${reason}`, ErrorCode.INVALID_PARAMS, { field, reason })
    this.field = field
    this.reason = reason
  }
}

export class DuplicateCapabilityError extends BaseError {
  constructor(kind: string, name: string) {
    super(`${capitalize(kind)} '${name}' is already registered`, ErrorCode.DUPLICATE_CAPABILITY, { kind, name })
  }
}

export class RegistryClosedError extends BaseError {
  constructor(kind: string, name: string) {
    super(
      `Cannot register ${kind} '${name}': the registry is closed once the session is ready`,
      ErrorCode.REGISTRY_CLOSED,
      { kind, name }
    )
  }
}

export class CapabilityNotFoundError extends BaseError {
  constructor(kind: string, name: string) {
    super(`${capitalize(kind)} '${name}' not found`, ErrorCode.CAPABILITY_NOT_FOUND, { kind, name })
  }
}

export class NotReadyError extends BaseError {
  constructor(method: string) {
    super(`Server not initialized: '${method}' received before initialize`, ErrorCode.NOT_READY, { method })
  }
}

export class ShuttingDownError extends BaseError {
  constructor() {
    super('Server shutting down', ErrorCode.SHUTTING_DOWN)
  }
}

/**
 * The scheduler stopped waiting for a handler. The handler itself may still
 * complete and apply its side effects.
 */
export class HandlerTimeoutError extends BaseError {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, ErrorCode.TIMEOUT, { timeoutMs })
  }
}

/**
 * Fatal stream failures; the session ends and nothing is retried
 */
export class TransportError extends BaseError {
  constructor(message: string, cause?: Error | undefined) {
    super(message, ErrorCode.TRANSPORT_FAILED, undefined, cause)
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}

/**
 * Serialize an error for an MCP JSON-RPC error response
 *
 * Converts any Error instance to the wire format with structured data
 * for debugging.
 */
export function createMcpError(error: Error): McpError {
  if (error instanceof BaseError) {
    const data: { type: string; [key: string]: unknown } = {
      type: error.constructor.name
    }

    if (error instanceof ToolError) {
      data.toolName = error.toolName
    }

    if (error.details) {
      data.details = error.details
    }

    if (error.cause) {
      data.cause = error.cause.message
    }

    return {
      code: error.code,
      message: error.message,
      data
    }
  }

  return {
    code: ErrorCode.INTERNAL_ERROR,
    message: error.message,
    data: {
      type: error.constructor.name
    }
  }
}

export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError
}

/**
 * Type-safe error handling for catch blocks
 */
export function handleCaughtError(error: unknown): Error {
  if (error instanceof Error) {
    return error
  }
  if (typeof error === 'string') {
    return new Error(error)
  }
  return new Error('Unknown error occurred')
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'Unknown error occurred'
}
