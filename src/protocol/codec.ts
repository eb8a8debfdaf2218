/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { z } from 'zod'
import { ErrorCode } from '../errors.js'
import type { McpNotification, McpRequest, McpResponse, RequestId } from '../types.js'
import { isRecord } from '../validation/schema-validator.js'

const RequestIdSchema = z.union([z.string(), z.number().int()])

const EnvelopeSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: RequestIdSchema.optional(),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional()
})

/**
 * A frame that could not be turned into a request or notification.
 * `id` is set when it could be recovered; without it no reply is possible.
 */
export interface ParseFailure {
  readonly code: ErrorCode.PARSE_ERROR | ErrorCode.INVALID_REQUEST
  readonly message: string
  readonly id?: RequestId
}

export type DecodedMessage =
  | { readonly kind: 'request'; readonly message: McpRequest }
  | { readonly kind: 'notification'; readonly message: McpNotification }
  | { readonly kind: 'response'; readonly id: RequestId }
  | { readonly kind: 'invalid'; readonly failure: ParseFailure }

// Value of an "id" member, read from just after its key
const ID_VALUE_PATTERN = /\s*:\s*("(?:[^"\\]|\\.)*"|-?\d+)(?=\s*[,}])/y

/** Index just past the string literal opening at `start`, or the end of the text */
function skipString(frame: string, start: number): number {
  let index = start + 1
  while (index < frame.length) {
    const char = frame[index]
    if (char === '\\') {
      index += 2
    } else if (char === '"') {
      return index + 1
    } else {
      index++
    }
  }
  return frame.length
}

/**
 * Raw token of the first "id" member of the outermost object. Members of
 * nested objects and text inside string literals are skipped.
 */
function findTopLevelIdToken(frame: string): string | undefined {
  let depth = 0
  let index = 0
  while (index < frame.length) {
    const char = frame[index]
    if (char === '"') {
      const end = skipString(frame, index)
      if (depth === 1 && frame.slice(index, end) === '"id"') {
        ID_VALUE_PATTERN.lastIndex = end
        const match = ID_VALUE_PATTERN.exec(frame)
        if (match) {
          return match[1]
        }
      }
      index = end
      continue
    }
    if (char === '{' || char === '[') {
      depth++
    } else if (char === '}' || char === ']') {
      depth--
    }
    index++
  }
  return undefined
}

/**
 * Best-effort recovery of a request id from a frame that failed to parse
 */
export function recoverRequestId(frame: string): RequestId | undefined {
  const token = findTopLevelIdToken(frame)
  if (token === undefined) {
    return undefined
  }

  try {
    const candidate: unknown = JSON.parse(token)
    const parsed = RequestIdSchema.safeParse(candidate)
    return parsed.success ? parsed.data : undefined
  } catch {
    return undefined
  }
}

function invalid(code: ParseFailure['code'], message: string, id: RequestId | undefined): DecodedMessage {
  return { kind: 'invalid', failure: id === undefined ? { code, message } : { code, message, id } }
}

/**
 * Decode one frame into a protocol envelope.
 *
 * Unknown methods decode successfully; rejecting them is the dispatcher's job.
 */
export function decode(frame: string): DecodedMessage {
  let payload: unknown
  try {
    payload = JSON.parse(frame)
  } catch {
    return invalid(ErrorCode.PARSE_ERROR, 'Parse error', recoverRequestId(frame))
  }

  if (!isRecord(payload)) {
    const reason = Array.isArray(payload) ? 'Batch requests are not supported' : 'Message must be a JSON object'
    return invalid(ErrorCode.INVALID_REQUEST, `Invalid request: ${reason}`, undefined)
  }

  const id = RequestIdSchema.safeParse(payload.id)
  const recoveredId = id.success ? id.data : undefined

  if (!('method' in payload) && ('result' in payload || 'error' in payload) && recoveredId !== undefined) {
    return { kind: 'response', id: recoveredId }
  }

  const envelope = EnvelopeSchema.safeParse(payload)
  if (!envelope.success) {
    const [issue] = envelope.error.issues
    const reason = issue ? `${issue.path.join('.') || 'message'}: ${issue.message}` : 'malformed envelope'
    return invalid(ErrorCode.INVALID_REQUEST, `Invalid request: ${reason}`, recoveredId)
  }

  const { jsonrpc, method, params } = envelope.data
  const base = params === undefined ? { jsonrpc, method } : { jsonrpc, method, params }

  if (envelope.data.id === undefined) {
    return { kind: 'notification', message: base }
  }
  return { kind: 'request', message: { ...base, id: envelope.data.id } }
}

/**
 * Serialize a response as a single line (framing is added by the transport)
 */
export function encode(response: McpResponse): string {
  return JSON.stringify(response)
}
