/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import type { McpServer } from '../servers/server.js'
import type { Tool } from './base/index.js'
import { AddNumbersTool } from './math/index.js'
import { WaitTool } from './runtime/index.js'

export * from './base/index.js'
export * from './math/index.js'
export * from './runtime/index.js'

export function createBuiltinTools(): Tool[] {
  return [new AddNumbersTool(), new WaitTool()]
}

export function registerTools(server: McpServer, tools: readonly Tool[]): void {
  for (const tool of tools) {
    server.tool(tool.definition, (args, context) => tool.execute(args, context), tool.options)
  }
}
