/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import type { McpError } from './errors.js'

export type RequestId = string | number

export interface ServerCapabilities {
  readonly tools: {
    readonly listChanged: boolean
  }
  readonly resources: {
    readonly subscribe: boolean
    readonly listChanged: boolean
  }
  readonly prompts: {
    readonly listChanged: boolean
  }
}

export interface McpRequest {
  readonly jsonrpc: '2.0'
  readonly id: RequestId
  readonly method: string
  readonly params?: Record<string, unknown>
}

export interface McpNotification {
  readonly jsonrpc: '2.0'
  readonly method: string
  readonly params?: Record<string, unknown>
}

export interface McpSuccessResponse {
  readonly jsonrpc: '2.0'
  readonly id: RequestId
  readonly result: Record<string, unknown>
}

export interface McpErrorResponse {
  readonly jsonrpc: '2.0'
  readonly id: RequestId
  readonly error: McpError
}

export type McpResponse = McpSuccessResponse | McpErrorResponse

export const McpMethod = {
  INITIALIZE: 'initialize',
  PING: 'ping',
  TOOLS_LIST: 'tools/list',
  TOOLS_CALL: 'tools/call',
  RESOURCES_LIST: 'resources/list',
  RESOURCES_READ: 'resources/read',
  PROMPTS_LIST: 'prompts/list',
  PROMPTS_GET: 'prompts/get',
  SHUTDOWN: 'shutdown',
  INITIALIZED: 'notifications/initialized',
  CANCELLED: 'notifications/cancelled'
} as const

export type McpMethodName = (typeof McpMethod)[keyof typeof McpMethod]

const KNOWN_METHODS: ReadonlySet<string> = new Set(Object.values(McpMethod))

export function isKnownMethod(method: string): method is McpMethodName {
  return KNOWN_METHODS.has(method)
}

export const LATEST_PROTOCOL_VERSION = '2025-06-18'

export const SUPPORTED_PROTOCOL_VERSIONS: readonly string[] = [
  LATEST_PROTOCOL_VERSION,
  '2025-03-26',
  '2024-11-05'
]

// Content carried by tool results and prompt messages

export interface TextContent {
  readonly type: 'text'
  readonly text: string
}

export interface ImageContent {
  readonly type: 'image'
  readonly data: string
  readonly mimeType: string
}

export interface EmbeddedResource {
  readonly type: 'resource'
  readonly resource: ResourceContents
}

export type ContentBlock = TextContent | ImageContent | EmbeddedResource

export interface ToolResult {
  readonly content: readonly ContentBlock[]
  readonly isError?: boolean
}

export interface TextResourceContents {
  readonly uri: string
  readonly mimeType: string
  readonly text: string
}

export interface BlobResourceContents {
  readonly uri: string
  readonly mimeType: string
  readonly blob: string
}

export type ResourceContents = TextResourceContents | BlobResourceContents

export interface PromptMessage {
  readonly role: 'user' | 'assistant'
  readonly content: ContentBlock
}

export interface PromptResult {
  readonly description?: string
  readonly messages: readonly PromptMessage[]
}

export interface ImplementationInfo {
  readonly name: string
  readonly version: string
}
