/**
 * Type descriptors: a JSON Schema derived from an example value, registered
 * together with the example itself.
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Options } from 'zod-to-json-schema';

import { EncodeError, SchemaError } from './errors';
import type { TypeDescriptor } from './types';

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return typeof Reflect.get(value, 'toJSON') === 'function';
}

function derivePrimitive(value: unknown, path: string): z.ZodTypeAny {
  switch (typeof value) {
    case 'string':
      return z.string();
    case 'number':
      return Number.isInteger(value) ? z.number().int() : z.number();
    case 'boolean':
      return z.boolean();
    case 'undefined':
    case 'function':
      throw new SchemaError(`no serializable value at ${path}`, { path });
    default:
      throw new SchemaError(`cannot derive a schema for ${typeof value} at ${path}`, { path });
  }
}

function derive(value: unknown, path: string, seen: Set<object>): z.ZodTypeAny {
  if (value === null) {
    return z.null();
  }
  if (typeof value !== 'object') {
    return derivePrimitive(value, path);
  }
  if (value instanceof Date) {
    return z.string().datetime();
  }
  if (seen.has(value)) {
    throw new SchemaError(`circular reference at ${path}`, { path });
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      const first: unknown = value[0];
      return z.array(first === undefined ? z.unknown() : derive(first, `${path}[0]`, seen));
    }
    if (!isPlainObject(value) && hasToJSON(value)) {
      return derive(value.toJSON(), path, seen);
    }
    const shape: Record<string, z.ZodTypeAny> = {};
    for (const [field, fieldValue] of Object.entries(value)) {
      // JSON drops these, so the schema does too
      if (fieldValue === undefined || typeof fieldValue === 'function') {
        continue;
      }
      shape[field] = derive(fieldValue, `${path}.${field}`, seen);
    }
    return z.object(shape);
  } finally {
    seen.delete(value);
  }
}

/**
 * Build a zod schema describing the shape (not the values) of `example`.
 *
 * Arrays take the element schema of their first element; empty arrays accept
 * anything.
 *
 * @throws {SchemaError} If the example holds bigints, symbols or cycles
 *
 * @example
 * ```typescript
 * deriveSchema({ insecureTransport: false, requestTimeout: 10000 });
 * // z.object({ insecureTransport: z.boolean(), requestTimeout: z.number() })
 * ```
 */
export function deriveSchema(example: unknown): z.ZodTypeAny {
  return derive(example, '$', new Set());
}

/**
 * Render a zod schema as a draft-07 JSON Schema document.
 */
export function toJsonSchema(schema: z.ZodTypeAny): object {
  const options: Partial<Options<'jsonSchema7'>> = { target: 'jsonSchema7', $refStrategy: 'none' };
  return zodToJsonSchema<'jsonSchema7'>(schema, options);
}

/**
 * Serialize a value as JSON text.
 *
 * @throws {EncodeError} If the value cannot be represented as JSON
 */
export function encodeJson(value: unknown, what: string): string {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EncodeError(`cannot encode ${what}: ${reason}`, { cause: error });
  }
  if (text === undefined) {
    throw new EncodeError(`cannot encode ${what}: value has no JSON representation`);
  }
  return text;
}

/**
 * Build the registration payload for item type `key`.
 *
 * The schema is derived from `example` unless one is supplied; the example is
 * sent as the type's prototype.
 *
 * @throws {SchemaError} If no schema can be derived from the example
 * @throws {EncodeError} If the example cannot be serialized
 */
export function createTypeDescriptor(key: string, example: unknown, schema?: z.ZodTypeAny): TypeDescriptor {
  const jsonSchema = toJsonSchema(schema ?? deriveSchema(example));
  const proto = encodeJson(example, `example for type '${key}'`);
  return {
    key,
    schema: Buffer.from(encodeJson(jsonSchema, `schema for type '${key}'`)).toString('base64'),
    proto: Buffer.from(proto).toString('base64'),
  };
}
