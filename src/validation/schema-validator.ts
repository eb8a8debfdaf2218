/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { z } from 'zod'

/**
 * The JSON Schema subset accepted for capability inputs.
 *
 * Schemas are published verbatim in `tools/list` and compiled to zod
 * validators for checking call arguments.
 */
interface SchemaBase {
  readonly description?: string
}

export interface StringSchema extends SchemaBase {
  readonly type: 'string'
  readonly enum?: readonly string[]
}

export interface NumberSchema extends SchemaBase {
  readonly type: 'number' | 'integer'
  readonly minimum?: number
  readonly maximum?: number
}

export interface BooleanSchema extends SchemaBase {
  readonly type: 'boolean'
}

export interface NullSchema extends SchemaBase {
  readonly type: 'null'
}

export interface ArraySchema extends SchemaBase {
  readonly type: 'array'
  readonly items?: JsonSchema
}

export interface ObjectSchema extends SchemaBase {
  readonly type: 'object'
  readonly properties?: Readonly<Record<string, JsonSchema>>
  readonly required?: readonly string[]
  /** Unknown properties are rejected unless this is true */
  readonly additionalProperties?: boolean
}

export type JsonSchema =
  | StringSchema
  | NumberSchema
  | BooleanSchema
  | NullSchema
  | ArraySchema
  | ObjectSchema

export const ROOT_FIELD = '(root)'

export interface SchemaViolation {
  readonly field: string
  readonly reason: string
}

export type SchemaValidationResult<T = unknown> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: SchemaViolation }

const compiledSchemas = new WeakMap<JsonSchema, z.ZodTypeAny>()

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Compile a schema to a zod validator, reusing the result for the same schema object
 */
export function compileSchema(schema: JsonSchema): z.ZodTypeAny {
  const cached = compiledSchemas.get(schema)
  if (cached) {
    return cached
  }

  const compiled = buildValidator(schema)
  compiledSchemas.set(schema, compiled)
  return compiled
}

function buildValidator(schema: JsonSchema): z.ZodTypeAny {
  switch (schema.type) {
    case 'string': {
      const allowed = schema.enum
      if (!allowed) {
        return z.string()
      }
      return z.string().refine((value) => allowed.includes(value), {
        message: `Expected one of: ${allowed.join(', ')}`
      })
    }
    case 'number':
    case 'integer': {
      let validator = schema.type === 'integer' ? z.number().int() : z.number()
      if (schema.minimum !== undefined) {
        validator = validator.min(schema.minimum)
      }
      if (schema.maximum !== undefined) {
        validator = validator.max(schema.maximum)
      }
      return validator
    }
    case 'boolean':
      return z.boolean()
    case 'null':
      return z.null()
    case 'array':
      return z.array(schema.items ? compileSchema(schema.items) : z.unknown())
    case 'object':
      return buildObjectValidator(schema)
  }
}

function buildObjectValidator(schema: ObjectSchema): z.ZodTypeAny {
  const required = new Set(schema.required ?? [])
  const shape: Record<string, z.ZodTypeAny> = {}

  for (const [key, propertySchema] of Object.entries(schema.properties ?? {})) {
    const validator = compileSchema(propertySchema)
    shape[key] = required.has(key) ? validator : validator.optional()
  }

  // Required names without a declared shape accept any present value
  for (const key of required) {
    shape[key] ??= z.unknown().refine((value) => value !== undefined, { message: 'Required' })
  }

  const validator = z.object(shape)
  return schema.additionalProperties === true ? validator.passthrough() : validator.strict()
}

function describeIssue(issue: z.ZodIssue): SchemaViolation {
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    const path = [...issue.path, issue.keys[0] ?? '']
    return { field: path.join('.'), reason: 'Unknown field' }
  }

  return {
    field: issue.path.length > 0 ? issue.path.join('.') : ROOT_FIELD,
    reason: issue.message
  }
}

/**
 * Check a value against a schema.
 *
 * Only the first violation is reported.
 */
export function validate(schema: JsonSchema, params: unknown): SchemaValidationResult {
  const outcome = compileSchema(schema).safeParse(params)
  if (outcome.success) {
    const value: unknown = outcome.data
    return { ok: true, value }
  }

  const [issue] = outcome.error.issues
  return {
    ok: false,
    error: issue ? describeIssue(issue) : { field: ROOT_FIELD, reason: 'Invalid value' }
  }
}

export function validateObject(schema: ObjectSchema, params: unknown): SchemaValidationResult<Record<string, unknown>> {
  const result = validate(schema, params)
  if (!result.ok) {
    return result
  }
  if (!isRecord(result.value)) {
    return { ok: false, error: { field: ROOT_FIELD, reason: 'Expected object' } }
  }
  return { ok: true, value: result.value }
}
