/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import type { HandlerContext, ToolDefinition, ToolOutput } from '../../capabilities/capability.js'
import { ToolError } from '../../errors.js'
import { Tool } from '../base/index.js'

export class AddNumbersTool extends Tool {
  readonly definition: ToolDefinition = {
    name: 'add_numbers',
    title: 'Add Numbers',
    description: 'Add two integers and return the sum as text',
    inputSchema: {
      type: 'object',
      properties: {
        a: { type: 'integer', description: 'First addend' },
        b: { type: 'integer', description: 'Second addend' }
      },
      required: ['a', 'b']
    },
    annotations: {
      readOnlyHint: true,
      idempotentHint: true,
      openWorldHint: false
    }
  }

  async execute(args: Record<string, unknown>, context: HandlerContext): Promise<ToolOutput> {
    const { a, b } = args
    if (typeof a !== 'number' || typeof b !== 'number') {
      throw new ToolError('Both addends must be integers', this.definition.name)
    }

    const sum = a + b
    if (!Number.isSafeInteger(sum)) {
      throw new ToolError(`Sum of ${a} and ${b} is outside the safe integer range`, this.definition.name, { a, b })
    }

    context.logger.debug({ a, b, sum }, 'Computed sum')
    return String(sum)
  }
}
