/**
 * Populates caller-supplied prototypes from decoded JSON.
 *
 * The prototype's initialised fields define the expected shape: a decoded
 * field whose JSON kind differs from the prototype's is rejected, fields the
 * prototype does not declare are copied across, and `null` fits any field.
 */

import { DecodeError, UsageError } from './errors';

type Kind = 'null' | 'array' | 'object' | 'string' | 'number' | 'boolean' | 'bigint' | 'function' | 'symbol' | 'undefined';

function kindOf(value: unknown): Kind {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mismatch(path: string, expected: string, incoming: unknown): DecodeError {
  return new DecodeError(`cannot decode ${kindOf(incoming)} into ${expected} field ${path}`, { path });
}

function merge(current: unknown, incoming: unknown, path: string): unknown {
  if (incoming === null || current === undefined || current === null) {
    return incoming;
  }
  if (current instanceof Date) {
    if (typeof incoming !== 'string') {
      throw mismatch(path, 'date', incoming);
    }
    const parsed = new Date(incoming);
    if (Number.isNaN(parsed.getTime())) {
      throw new DecodeError(`invalid date "${incoming}" for field ${path}`, { path });
    }
    return parsed;
  }
  const expected = kindOf(current);
  if (expected !== kindOf(incoming)) {
    throw mismatch(path, expected, incoming);
  }
  if (typeof current === 'object' && isRecord(incoming) && !Array.isArray(current)) {
    assignFields(current, incoming, path);
    return current;
  }
  return incoming;
}

// Writing these would reach the prototype chain instead of the instance
const RESERVED_FIELDS = new Set(['__proto__', 'constructor', 'prototype']);

function assignFields(target: object, source: Record<string, unknown>, path: string): void {
  for (const [field, incoming] of Object.entries(source)) {
    const fieldPath = `${path}.${field}`;
    if (RESERVED_FIELDS.has(field)) {
      throw new DecodeError(`cannot decode reserved field ${fieldPath}`, { path: fieldPath });
    }
    const current: unknown = Object.hasOwn(target, field) ? Reflect.get(target, field) : undefined;
    if (!Reflect.set(target, field, merge(current, incoming, fieldPath))) {
      throw new DecodeError(`field ${fieldPath} is read-only on the prototype`, { path: fieldPath });
    }
  }
}

/**
 * Throw a UsageError unless `prototype` is an object that can be written to.
 */
export function checkPrototype(prototype: object): void {
  if (typeof prototype !== 'object' || prototype === null) {
    throw new UsageError('prototype must be an object instance', { argument: 'prototype' });
  }
  if (!Object.isExtensible(prototype) || Object.isFrozen(prototype)) {
    throw new UsageError('prototype must be a writable object instance', { argument: 'prototype' });
  }
}

/**
 * Write `decoded` into `prototype` and return the same instance.
 *
 * @throws {UsageError} If the prototype is not a writable object
 * @throws {DecodeError} If the decoded value does not fit the prototype
 */
export function populate<T extends object>(prototype: T, decoded: unknown): T {
  checkPrototype(prototype);
  if (Array.isArray(prototype)) {
    if (!Array.isArray(decoded)) {
      throw mismatch('$', 'array', decoded);
    }
    prototype.splice(0, prototype.length, ...decoded);
    return prototype;
  }
  if (!isRecord(decoded)) {
    throw mismatch('$', 'object', decoded);
  }
  assignFields(prototype, decoded, '$');
  return prototype;
}
