/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { reviewCode, reviewCodePrompt } from './prompts/index.js'
import { createServerInfoHandler, serverInfoResource } from './resources/index.js'
import { McpServer, type McpServerOptions } from './servers/index.js'
import { createBuiltinTools, registerTools } from './tools/index.js'

/**
 * Register the capabilities that ship with the binary
 */
export function registerBuiltinCapabilities(server: McpServer): McpServer {
  registerTools(server, createBuiltinTools())
  server.resource(serverInfoResource, createServerInfoHandler(server))
  server.prompt(reviewCodePrompt, reviewCode)
  return server
}

export function createServer(options: McpServerOptions = {}): McpServer {
  return registerBuiltinCapabilities(new McpServer(options))
}
