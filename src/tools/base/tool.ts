/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import type { HandlerContext, ToolDefinition, ToolOptions, ToolOutput } from '../../capabilities/capability.js'

/**
 * A tool bundled with the server binary
 */
export abstract class Tool {
  abstract readonly definition: ToolDefinition
  readonly options: ToolOptions = {}

  abstract execute(args: Record<string, unknown>, context: HandlerContext): Promise<ToolOutput>
}
