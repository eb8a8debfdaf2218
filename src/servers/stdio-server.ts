/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { BaseError, ErrorCode, createMcpError, getErrorMessage } from '../errors.js'
import { createChildLogger } from '../logger.js'
import { encode } from '../protocol/codec.js'
import { StdioTransport, type Transport } from '../transport/stdio-transport.js'
import type { McpResponse } from '../types.js'
import type { McpServer } from './server.js'

/**
 * Connects an McpServer to a transport and runs the session's read loop.
 *
 * Frames are dispatched without being awaited, so a slow handler never
 * blocks later requests or cancellations. End of input starts a graceful
 * shutdown; a transport failure ends the session at once.
 */
class McpStdioServer {
  private readonly pending = new Set<Promise<void>>()
  private readonly logger = createChildLogger('stdio-server')

  constructor(
    private readonly mcpServer: McpServer,
    private readonly transport: Transport = new StdioTransport()
  ) {
    // Input stays attached after close; late requests are answered with SHUTTING_DOWN until end of input
    this.mcpServer.onClose(() => {
      this.logger.info('Session closed; reading until end of input')
    })
  }

  /**
   * Resolves once the session has ended and every response has been written
   */
  async run(): Promise<void> {
    this.logger.info({ serverName: this.mcpServer.name, version: this.mcpServer.version }, 'MCP stdio server listening')

    try {
      let frame = await this.transport.receive()
      while (frame !== null) {
        this.track(this.processFrame(frame))
        frame = await this.transport.receive()
      }
    } catch (error) {
      this.logger.error({ err: error }, 'Transport failed; ending session')
      await this.mcpServer.shutdown('transport failure', 0)
      await Promise.allSettled(Array.from(this.pending))
      throw error
    }

    this.logger.info('Read loop finished; shutting down')
    await this.mcpServer.shutdown('end of input')
    await Promise.allSettled(Array.from(this.pending))
    await this.transport.close()
  }

  private track(work: Promise<void>): void {
    this.pending.add(work)
    void work.finally(() => this.pending.delete(work))
  }

  private async processFrame(frame: string): Promise<void> {
    try {
      const response = await this.mcpServer.handleFrame(frame)
      if (response !== null) {
        await this.transport.send(this.serialize(response))
      }
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to deliver response')
    }
  }

  private serialize(response: McpResponse): string {
    try {
      return encode(response)
    } catch (error) {
      this.logger.error({ err: error, requestId: response.id }, 'Response could not be serialized')
      const failure = new BaseError(`Failed to serialize response: ${getErrorMessage(error)}`, ErrorCode.INTERNAL_ERROR)
      return encode({ jsonrpc: '2.0', id: response.id, error: createMcpError(failure) })
    }
  }
}

export default McpStdioServer
