/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import type { Logger } from '../logger.js'
import type {
  ContentBlock,
  PromptMessage,
  PromptResult,
  RequestId,
  ToolResult
} from '../types.js'
import type { JsonSchema, ObjectSchema } from '../validation/schema-validator.js'

export type CapabilityKind = 'tool' | 'resource' | 'prompt'

/**
 * Passed to every handler invocation.
 *
 * `signal` aborts when the request is cancelled or times out. Handlers that
 * perform I/O should pass it on or check it between steps; the runtime stops
 * waiting either way but cannot stop work that ignores it.
 */
export interface HandlerContext {
  readonly requestId: RequestId
  readonly signal: AbortSignal
  readonly logger: Logger
}

type Awaitable<T> = T | Promise<T>

export interface ToolAnnotations {
  readonly title?: string
  readonly readOnlyHint?: boolean
  readonly destructiveHint?: boolean
  readonly idempotentHint?: boolean
  readonly openWorldHint?: boolean
}

export interface ToolDefinition {
  readonly name: string
  readonly title?: string
  readonly description: string
  readonly inputSchema: ObjectSchema
  readonly annotations?: ToolAnnotations
}

export type ToolOutput = string | readonly ContentBlock[] | ToolResult

export type ToolHandler = (args: Record<string, unknown>, context: HandlerContext) => Awaitable<ToolOutput>

export interface ToolOptions {
  /** Calls to this tool never overlap */
  readonly nonReentrant?: boolean
  /** Overrides the server's default request timeout */
  readonly timeoutMs?: number
}

export interface ToolCapability extends ToolOptions {
  readonly kind: 'tool'
  readonly definition: ToolDefinition
  readonly handler: ToolHandler
}

export interface ResourceDefinition {
  readonly uri: string
  readonly name: string
  readonly description?: string
  readonly mimeType?: string
}

export type ResourceOutput =
  | string
  | { readonly text: string; readonly mimeType?: string }
  | { readonly blob: string; readonly mimeType?: string }

export type ResourceHandler = (context: HandlerContext) => Awaitable<ResourceOutput>

export interface ResourceCapability {
  readonly kind: 'resource'
  readonly definition: ResourceDefinition
  readonly handler: ResourceHandler
  readonly timeoutMs?: number
}

export interface PromptArgument {
  readonly name: string
  readonly description?: string
  readonly required?: boolean
}

export interface PromptDefinition {
  readonly name: string
  readonly title?: string
  readonly description?: string
  readonly arguments?: readonly PromptArgument[]
}

export type PromptOutput = string | readonly PromptMessage[] | PromptResult

export type PromptHandler = (args: Record<string, string>, context: HandlerContext) => Awaitable<PromptOutput>

export interface PromptCapability {
  readonly kind: 'prompt'
  readonly definition: PromptDefinition
  /** Derived from the definition's arguments with promptArgumentsSchema() */
  readonly inputSchema: ObjectSchema
  readonly handler: PromptHandler
  readonly timeoutMs?: number
}

export interface CapabilityByKind {
  tool: ToolCapability
  resource: ResourceCapability
  prompt: PromptCapability
}

export type Capability = CapabilityByKind[CapabilityKind]

/**
 * The name a capability is looked up by: the URI for resources, the name otherwise
 */
export function capabilityKey(capability: Capability): string {
  return capability.kind === 'resource' ? capability.definition.uri : capability.definition.name
}

/**
 * Input schema for a prompt: its arguments are strings, unknown names are rejected
 */
export function promptArgumentsSchema(definition: PromptDefinition): ObjectSchema {
  const promptArguments = definition.arguments ?? []
  const properties: Record<string, JsonSchema> = {}
  for (const argument of promptArguments) {
    properties[argument.name] = { type: 'string', description: argument.description }
  }

  return {
    type: 'object',
    properties,
    required: promptArguments.filter((argument) => argument.required === true).map((argument) => argument.name)
  }
}
