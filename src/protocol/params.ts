/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import type { ObjectSchema } from '../validation/schema-validator.js'

// Envelope params of each method. Extra members such as `_meta` are allowed.

export const INITIALIZE_PARAMS_SCHEMA: ObjectSchema = {
  type: 'object',
  properties: {
    protocolVersion: { type: 'string' },
    capabilities: { type: 'object', additionalProperties: true },
    clientInfo: {
      type: 'object',
      properties: {
        name: { type: 'string' },
        version: { type: 'string' }
      },
      required: ['name', 'version'],
      additionalProperties: true
    }
  },
  required: ['protocolVersion'],
  additionalProperties: true
}

export const CALL_TOOL_PARAMS_SCHEMA: ObjectSchema = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    arguments: { type: 'object', additionalProperties: true }
  },
  required: ['name'],
  additionalProperties: true
}

export const READ_RESOURCE_PARAMS_SCHEMA: ObjectSchema = {
  type: 'object',
  properties: {
    uri: { type: 'string' }
  },
  required: ['uri'],
  additionalProperties: true
}

export const GET_PROMPT_PARAMS_SCHEMA: ObjectSchema = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    arguments: { type: 'object', additionalProperties: true }
  },
  required: ['name'],
  additionalProperties: true
}
