/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { CapabilityRegistry } from '../capabilities/capability-registry.js'
import {
  promptArgumentsSchema,
  type CapabilityKind,
  type PromptDefinition,
  type PromptHandler,
  type PromptOutput,
  type ResourceDefinition,
  type ResourceHandler,
  type ResourceOutput,
  type ToolDefinition,
  type ToolHandler,
  type ToolOptions,
  type ToolOutput
} from '../capabilities/capability.js'
import { getApplicationConfiguration, type ExecutionPolicy } from '../configuration/index.js'
import {
  BaseError,
  CapabilityNotFoundError,
  ErrorCode,
  HandlerTimeoutError,
  NotReadyError,
  ShuttingDownError,
  ValidationError,
  createMcpError,
  handleCaughtError
} from '../errors.js'
import { ExecutionScheduler, type ExecutionOutcome, type ScheduledTask } from '../execution/scheduler.js'
import { createChildLogger, generateCorrelationId, type Logger } from '../logger.js'
import { decode } from '../protocol/codec.js'
import {
  CALL_TOOL_PARAMS_SCHEMA,
  GET_PROMPT_PARAMS_SCHEMA,
  INITIALIZE_PARAMS_SCHEMA,
  READ_RESOURCE_PARAMS_SCHEMA
} from '../protocol/params.js'
import {
  LATEST_PROTOCOL_VERSION,
  McpMethod,
  SUPPORTED_PROTOCOL_VERSIONS,
  isKnownMethod,
  type ContentBlock,
  type ImplementationInfo,
  type McpNotification,
  type McpRequest,
  type McpResponse,
  type PromptMessage,
  type RequestId,
  type ResourceContents,
  type ServerCapabilities
} from '../types.js'
import { isRecord, validateObject, type ObjectSchema } from '../validation/schema-validator.js'
import { Session, SessionPhase } from './session.js'

export interface McpServerOptions {
  name?: string
  version?: string
  instructions?: string
  execution?: Partial<ExecutionPolicy>
}

type McpResult = Record<string, unknown>

const SERVER_CAPABILITIES: ServerCapabilities = {
  tools: { listChanged: false },
  resources: { subscribe: false, listChanged: false },
  prompts: { listChanged: false }
}

function isContentList(output: ToolOutput): output is readonly ContentBlock[] {
  return Array.isArray(output)
}

function isMessageList(output: PromptOutput): output is readonly PromptMessage[] {
  return Array.isArray(output)
}

function toToolResult(output: ToolOutput): McpResult {
  if (typeof output === 'string') {
    return { content: [{ type: 'text', text: output }] }
  }
  if (isContentList(output)) {
    return { content: output }
  }
  return output.isError === undefined
    ? { content: output.content }
    : { content: output.content, isError: output.isError }
}

function toToolFailure(error: Error): McpResult {
  return { content: [{ type: 'text', text: error.message }], isError: true }
}

function toResourceContents(definition: ResourceDefinition, output: ResourceOutput): ResourceContents {
  const { uri } = definition
  if (typeof output === 'string') {
    return { uri, mimeType: definition.mimeType ?? 'text/plain', text: output }
  }
  if ('blob' in output) {
    return { uri, mimeType: output.mimeType ?? definition.mimeType ?? 'application/octet-stream', blob: output.blob }
  }
  return { uri, mimeType: output.mimeType ?? definition.mimeType ?? 'text/plain', text: output.text }
}

function toPromptResult(definition: PromptDefinition, output: PromptOutput): McpResult {
  if (typeof output === 'string') {
    const messages: PromptMessage[] = [{ role: 'user', content: { type: 'text', text: output } }]
    return { ...(definition.description !== undefined && { description: definition.description }), messages }
  }
  if (isMessageList(output)) {
    return { ...(definition.description !== undefined && { description: definition.description }), messages: output }
  }
  const description = output.description ?? definition.description
  return { ...(description !== undefined && { description }), messages: output.messages }
}

function requireString(params: Record<string, unknown>, field: string): string {
  const value = params[field]
  if (typeof value !== 'string') {
    throw new ValidationError(field, 'Expected string')
  }
  return value
}

function readClientInfo(value: unknown): ImplementationInfo | null {
  if (isRecord(value) && typeof value.name === 'string' && typeof value.version === 'string') {
    return { name: value.name, version: value.version }
  }
  return null
}

/**
 * A handler failure for anything other than a tool becomes an error response.
 * Local error codes are never put on the wire.
 */
function toHandlerError(kind: CapabilityKind, name: string, error: Error): BaseError {
  if (error instanceof BaseError && error.code < 0) {
    return error
  }
  return new BaseError(`${kind} '${name}' failed: ${error.message}`, ErrorCode.INTERNAL_ERROR, undefined, error)
}

/**
 * MCP protocol engine: session state machine, capability routing and
 * handler execution.
 *
 * Capabilities are registered before the client's `initialize` request;
 * the registry is closed as soon as the session is ready.
 */
export class McpServer {
  readonly registry = new CapabilityRegistry()
  readonly session = new Session()
  private readonly scheduler: ExecutionScheduler
  private readonly identity: { name: string; version: string; instructions?: string | undefined }
  private readonly policy: ExecutionPolicy
  private readonly logger = createChildLogger('mcp-server')
  private readonly closeListeners: Array<() => void> = []
  private shutdownPromise: Promise<void> | null = null

  constructor(options: McpServerOptions = {}) {
    const configuration = getApplicationConfiguration()
    const configuredIdentity = configuration.getServerIdentity()

    this.identity = {
      name: options.name ?? configuredIdentity.name,
      version: options.version ?? configuredIdentity.version,
      instructions: options.instructions ?? configuredIdentity.instructions
    }
    this.policy = { ...configuration.getExecutionPolicy(), ...options.execution }
    this.scheduler = new ExecutionScheduler({
      maxConcurrency: this.policy.maxConcurrency,
      defaultTimeoutMs: this.policy.requestTimeoutMs
    })
  }

  get name(): string {
    return this.identity.name
  }

  get version(): string {
    return this.identity.version
  }

  get phase(): SessionPhase {
    return this.session.phase
  }

  getCapabilities(): ServerCapabilities {
    return SERVER_CAPABILITIES
  }

  tool(definition: ToolDefinition, handler: ToolHandler, options: ToolOptions = {}): this {
    this.registry.register({ kind: 'tool', definition, handler, ...options })
    return this
  }

  resource(definition: ResourceDefinition, handler: ResourceHandler, options: { timeoutMs?: number } = {}): this {
    this.registry.register({ kind: 'resource', definition, handler, ...options })
    return this
  }

  prompt(definition: PromptDefinition, handler: PromptHandler, options: { timeoutMs?: number } = {}): this {
    this.registry.register({
      kind: 'prompt',
      definition,
      inputSchema: promptArgumentsSchema(definition),
      handler,
      ...options
    })
    return this
  }

  /**
   * Called once the session has closed
   */
  onClose(listener: () => void): void {
    this.closeListeners.push(listener)
  }

  /**
   * Decode and handle one raw frame
   */
  async handleFrame(frame: string): Promise<McpResponse | null> {
    const decoded = decode(frame)

    switch (decoded.kind) {
      case 'request':
      case 'notification':
        return this.handleMessage(decoded.message)
      case 'response':
        this.logger.debug({ requestId: decoded.id }, 'Ignoring response sent by the client')
        return null
      case 'invalid': {
        const { failure } = decoded
        this.logger.warn({ code: failure.code, requestId: failure.id }, failure.message)

        if (failure.id === undefined) {
          return null
        }
        if (this.session.isOpen(failure.id)) {
          this.logger.warn({ requestId: failure.id }, 'Not answering malformed frame: its id is already in flight')
          return null
        }
        return {
          jsonrpc: '2.0',
          id: failure.id,
          error: { code: failure.code, message: failure.message }
        }
      }
    }
  }

  async handleMessage(message: McpRequest | McpNotification): Promise<McpResponse | null> {
    const correlationId = generateCorrelationId()

    if (!('id' in message)) {
      this.handleNotification(message, this.logger.child({ correlationId, method: message.method }))
      return null
    }

    const request = message
    const requestLogger = this.logger.child({ correlationId, requestId: request.id, method: request.method })

    if (!this.session.begin(request.id)) {
      requestLogger.warn('Dropping request: a request with the same id is already in flight')
      return null
    }

    requestLogger.debug({ params: request.params }, 'Handling MCP request')

    try {
      const result = await this.dispatch(request, requestLogger)
      if (result === null) {
        requestLogger.info('Request cancelled; no response is sent')
        return null
      }
      return { jsonrpc: '2.0', id: request.id, result }
    } catch (caught) {
      const error = handleCaughtError(caught)
      if (error instanceof BaseError && error.code !== ErrorCode.INTERNAL_ERROR) {
        requestLogger.warn({ code: error.code }, error.message)
      } else {
        requestLogger.error({ err: error }, 'Unexpected error handling MCP request')
      }
      return { jsonrpc: '2.0', id: request.id, error: createMcpError(error) }
    } finally {
      this.session.finish(request.id)
    }
  }

  private async dispatch(request: McpRequest, logger: Logger): Promise<McpResult | null> {
    if (this.session.isShuttingDown) {
      throw new ShuttingDownError()
    }

    const { method, params } = request
    if (!isKnownMethod(method)) {
      throw new BaseError(`Method not found: ${method}`, ErrorCode.METHOD_NOT_FOUND, { method })
    }

    switch (method) {
      case McpMethod.INITIALIZE:
        return this.initialize(params, logger)
      case McpMethod.PING:
        return {}
      case McpMethod.SHUTDOWN:
        this.beginShutdown('shutdown request')
        return {}
      default:
        break
    }

    if (!this.session.isReady) {
      throw new NotReadyError(method)
    }

    switch (method) {
      case McpMethod.TOOLS_LIST:
        return { tools: this.registry.list('tool').map((tool) => tool.definition) }
      case McpMethod.TOOLS_CALL:
        return this.callTool(request.id, params, logger)
      case McpMethod.RESOURCES_LIST:
        return { resources: this.registry.list('resource').map((resource) => resource.definition) }
      case McpMethod.RESOURCES_READ:
        return this.readResource(request.id, params, logger)
      case McpMethod.PROMPTS_LIST:
        return { prompts: this.registry.list('prompt').map((prompt) => prompt.definition) }
      case McpMethod.PROMPTS_GET:
        return this.getPrompt(request.id, params, logger)
      default:
        throw new BaseError(`Method not found: '${method}' is a notification`, ErrorCode.METHOD_NOT_FOUND, { method })
    }
  }

  private initialize(params: Record<string, unknown> | undefined, logger: Logger): McpResult {
    if (this.session.phase !== SessionPhase.UNINITIALIZED) {
      throw new BaseError('Server already initialized', ErrorCode.INVALID_REQUEST)
    }

    const validated = this.validateParams(INITIALIZE_PARAMS_SCHEMA, params)
    const requestedVersion = requireString(validated, 'protocolVersion')
    const protocolVersion = SUPPORTED_PROTOCOL_VERSIONS.includes(requestedVersion)
      ? requestedVersion
      : LATEST_PROTOCOL_VERSION

    this.session.protocolVersion = protocolVersion
    this.session.clientInfo = readClientInfo(validated.clientInfo)
    this.registry.close()
    this.session.transition(SessionPhase.READY)

    logger.info({
      requestedVersion,
      protocolVersion,
      client: this.session.clientInfo,
      tools: this.registry.size('tool'),
      resources: this.registry.size('resource'),
      prompts: this.registry.size('prompt')
    }, 'Session initialized')

    return {
      protocolVersion,
      capabilities: this.getCapabilities(),
      serverInfo: { name: this.identity.name, version: this.identity.version },
      ...(this.identity.instructions !== undefined && { instructions: this.identity.instructions }),
      manifest: {
        tools: this.registry.list('tool').map((tool) => tool.definition),
        resources: this.registry.list('resource').map((resource) => resource.definition),
        prompts: this.registry.list('prompt').map((prompt) => prompt.definition)
      }
    }
  }

  private async callTool(id: RequestId, params: Record<string, unknown> | undefined, logger: Logger): Promise<McpResult | null> {
    const validated = this.validateParams(CALL_TOOL_PARAMS_SCHEMA, params)
    const name = requireString(validated, 'name')

    const tool = this.registry.lookup('tool', name)
    if (!tool) {
      throw new CapabilityNotFoundError('tool', name)
    }

    const args = this.validateParams(tool.definition.inputSchema, validated.arguments ?? {})
    const toolLogger = logger.child({ tool: name })
    toolLogger.info('Executing tool')

    const outcome = await this.scheduler.submit({
      id,
      timeoutMs: tool.timeoutMs,
      exclusiveKey: tool.nonReentrant === true ? `tool:${name}` : undefined,
      run: (signal) => tool.handler(args, { requestId: id, signal, logger: toolLogger })
    })

    switch (outcome.status) {
      case 'completed':
        toolLogger.debug('Tool execution completed')
        return toToolResult(outcome.value)
      case 'failed':
        toolLogger.warn({ err: outcome.error }, 'Tool reported a failure')
        return toToolFailure(outcome.error)
      case 'timed_out':
        throw new HandlerTimeoutError(outcome.timeoutMs)
      case 'cancelled':
        return null
    }
  }

  private async readResource(id: RequestId, params: Record<string, unknown> | undefined, logger: Logger): Promise<McpResult | null> {
    const validated = this.validateParams(READ_RESOURCE_PARAMS_SCHEMA, params)
    const uri = requireString(validated, 'uri')

    const resource = this.registry.lookup('resource', uri)
    if (!resource) {
      throw new CapabilityNotFoundError('resource', uri)
    }

    const resourceLogger = logger.child({ resource: uri })
    const output = await this.execute('resource', uri, {
      id,
      timeoutMs: resource.timeoutMs,
      run: (signal) => resource.handler({ requestId: id, signal, logger: resourceLogger })
    })

    return output === null ? null : { contents: [toResourceContents(resource.definition, output)] }
  }

  private async getPrompt(id: RequestId, params: Record<string, unknown> | undefined, logger: Logger): Promise<McpResult | null> {
    const validated = this.validateParams(GET_PROMPT_PARAMS_SCHEMA, params)
    const name = requireString(validated, 'name')

    const prompt = this.registry.lookup('prompt', name)
    if (!prompt) {
      throw new CapabilityNotFoundError('prompt', name)
    }

    const args = this.validateParams(prompt.inputSchema, validated.arguments ?? {})
    const promptArgs: Record<string, string> = {}
    for (const [key, value] of Object.entries(args)) {
      if (typeof value === 'string') {
        promptArgs[key] = value
      }
    }

    const promptLogger = logger.child({ prompt: name })
    const output = await this.execute('prompt', name, {
      id,
      timeoutMs: prompt.timeoutMs,
      run: (signal) => prompt.handler(promptArgs, { requestId: id, signal, logger: promptLogger })
    })

    return output === null ? null : toPromptResult(prompt.definition, output)
  }

  /**
   * Run a resource or prompt handler. Resolves null when the request was cancelled.
   */
  private async execute<T>(kind: CapabilityKind, name: string, task: ScheduledTask<T>): Promise<T | null> {
    const outcome: ExecutionOutcome<T> = await this.scheduler.submit(task)

    switch (outcome.status) {
      case 'completed':
        return outcome.value
      case 'failed':
        throw toHandlerError(kind, name, outcome.error)
      case 'timed_out':
        throw new HandlerTimeoutError(outcome.timeoutMs)
      case 'cancelled':
        return null
    }
  }

  private validateParams(schema: ObjectSchema, params: unknown): Record<string, unknown> {
    const result = validateObject(schema, params ?? {})
    if (!result.ok) {
      throw new ValidationError(result.error.field, result.error.reason)
    }
    return result.value
  }

  private handleNotification(notification: McpNotification, logger: Logger): void {
    switch (notification.method) {
      case McpMethod.INITIALIZED:
        logger.debug('Client reported initialization complete')
        return
      case McpMethod.CANCELLED: {
        const requestId = notification.params?.requestId
        const reason = notification.params?.reason
        if (typeof requestId !== 'string' && typeof requestId !== 'number') {
          logger.warn('Ignoring cancellation without a valid requestId')
          return
        }
        const cancelled = this.scheduler.cancel(requestId, typeof reason === 'string' ? reason : undefined)
        logger.info({ targetRequestId: requestId, cancelled }, 'Processed cancellation notification')
        return
      }
      case McpMethod.SHUTDOWN:
        this.beginShutdown('shutdown notification')
        return
      default:
        logger.warn('Ignoring unknown notification')
    }
  }

  private beginShutdown(reason: string): void {
    this.shutdown(reason).catch((error: unknown) => {
      this.logger.error({ err: error }, 'Shutdown failed')
    })
  }

  /**
   * Stop accepting requests, wait for in-flight work up to the grace period,
   * then close. Work still running after that is cancelled and never answered.
   */
  shutdown(reason = 'shutdown requested', graceMs = this.policy.shutdownGraceMs): Promise<void> {
    this.shutdownPromise ??= this.performShutdown(reason, graceMs)
    return this.shutdownPromise
  }

  private async performShutdown(reason: string, graceMs: number): Promise<void> {
    if (!this.session.isShuttingDown) {
      this.session.transition(SessionPhase.SHUTTING_DOWN)
    }
    this.logger.info({ reason, inFlight: this.scheduler.inFlightCount }, 'Shutting down MCP server')

    const drained = await this.scheduler.drain(graceMs)
    if (!drained) {
      this.logger.warn({ inFlight: this.scheduler.inFlightCount }, 'Grace period elapsed; abandoning in-flight requests')
      this.scheduler.cancelAll('Server shutting down')
    }

    this.session.transition(SessionPhase.CLOSED)
    this.logger.info('MCP server closed')

    for (const listener of this.closeListeners) {
      listener()
    }
  }
}
