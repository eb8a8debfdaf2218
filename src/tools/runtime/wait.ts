/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import type { HandlerContext, ToolDefinition, ToolOutput, ToolOptions } from '../../capabilities/capability.js'
import { ToolError } from '../../errors.js'
import { Tool } from '../base/index.js'

export const MAX_WAIT_MS = 600_000

/**
 * Sleeps for the requested time. Calls are serialized, and the sleep ends
 * early when the request is cancelled or times out.
 */
export class WaitTool extends Tool {
  readonly definition: ToolDefinition = {
    name: 'wait',
    title: 'Wait',
    description: 'Wait for the given number of milliseconds, then report how long was waited',
    inputSchema: {
      type: 'object',
      properties: {
        ms: {
          type: 'integer',
          minimum: 0,
          maximum: MAX_WAIT_MS,
          description: `Milliseconds to wait, at most ${MAX_WAIT_MS}`
        }
      },
      required: ['ms']
    },
    annotations: {
      readOnlyHint: true,
      openWorldHint: false
    }
  }

  override readonly options: ToolOptions = { nonReentrant: true }

  async execute(args: Record<string, unknown>, context: HandlerContext): Promise<ToolOutput> {
    const { ms } = args
    if (typeof ms !== 'number') {
      throw new ToolError('ms must be an integer', this.definition.name)
    }

    await sleep(ms, context.signal)
    return `Waited ${ms}ms`
  }
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new ToolError('Wait aborted', 'wait'))
      return
    }

    const onAbort = (): void => {
      clearTimeout(timer)
      reject(new ToolError('Wait aborted', 'wait'))
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal.addEventListener('abort', onAbort, { once: true })
  })
}
