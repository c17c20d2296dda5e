/**
 * Opaque items returned by the source server and their typed conversion.
 */

import { z } from 'zod';

import { DecodeError } from './errors';
import { populate } from './typed';
import type { ItemFactory, ItemRecord } from './types';

export const itemRecordSchema = z.object({
  key: z.string(),
  type: z.string(),
  value: z.string().nullable().default(null),
  updated: z.string(),
});

const itemListSchema = z.array(itemRecordSchema).nullable();

function describeIssue(error: z.ZodError): { message: string; path: string } {
  const issue = error.issues[0];
  const path = ['$', ...(issue?.path ?? [])].join('.');
  return { message: `${path}: ${issue?.message ?? 'invalid value'}`, path };
}

/**
 * A stored configuration item before it is interpreted as a concrete type.
 *
 * The payload stays encoded until `typed()`, `parse()` or `json()` is called.
 *
 * @example
 * ```typescript
 * const raw = await client.loadRaw('OPT_1');
 * const options = raw.typed(new Options());
 * ```
 */
export class Item {
  /** Unique key within the store */
  readonly key: string;
  /** Name of the registered type */
  readonly type: string;
  /** JSON-encoded item payload */
  readonly value: Buffer;
  /** Time of the last write, set by the server */
  readonly updatedAt: Date;

  constructor(init: { key: string; type: string; value: Uint8Array; updatedAt: Date }) {
    this.key = init.key;
    this.type = init.type;
    this.value = Buffer.from(init.value);
    this.updatedAt = init.updatedAt;
    Object.freeze(this);
  }

  /**
   * Build an item from a decoded response body.
   *
   * @throws {DecodeError} If the body is not an item record
   */
  static fromRecord(body: unknown): Item {
    const result = itemRecordSchema.safeParse(body);
    if (!result.success) {
      const { message, path } = describeIssue(result.error);
      throw new DecodeError(`cannot decode item: ${message}`, { path, cause: result.error });
    }
    const record = result.data;
    const updatedAt = new Date(record.updated);
    if (Number.isNaN(updatedAt.getTime())) {
      throw new DecodeError(`cannot decode item '${record.key}': invalid timestamp "${record.updated}"`, {
        path: '$.updated',
      });
    }
    return new Item({
      key: record.key,
      type: record.type,
      value: record.value === null ? Buffer.alloc(0) : Buffer.from(record.value, 'base64'),
      updatedAt,
    });
  }

  /**
   * Decode the payload as plain JSON.
   *
   * @throws {DecodeError} If the payload is not valid JSON
   */
  json(): unknown {
    try {
      return JSON.parse(this.value.toString('utf8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DecodeError(`cannot decode value of item '${this.key}': ${reason}`, { cause: error });
    }
  }

  /**
   * Decode the payload into `prototype` and return it.
   *
   * The prototype must be a fresh, default-initialised instance of the target
   * type; it is populated in place.
   *
   * @throws {UsageError} If the prototype is not a writable object
   * @throws {DecodeError} If the payload does not fit the prototype
   */
  typed<T extends object>(prototype: T): T {
    return populate(prototype, this.json());
  }

  /**
   * Decode the payload through a zod schema.
   *
   * @throws {DecodeError} If the payload does not match the schema
   */
  parse<S extends z.ZodTypeAny>(schema: S): z.output<S> {
    const result = schema.safeParse(this.json());
    if (!result.success) {
      const { message, path } = describeIssue(result.error);
      throw new DecodeError(`cannot decode value of item '${this.key}': ${message}`, {
        path,
        cause: result.error,
      });
    }
    return result.data;
  }

  toJSON(): ItemRecord {
    return {
      key: this.key,
      type: this.type,
      value: this.value.toString('base64'),
      updated: this.updatedAt.toISOString(),
    };
  }
}

/**
 * Items in the order the server returned them.
 */
export class ItemList implements Iterable<Item> {
  readonly items: readonly Item[];

  constructor(items: readonly Item[] = []) {
    this.items = items;
  }

  /**
   * Build a list from a decoded response body. `null` is an empty list.
   *
   * @throws {DecodeError} If the body is not a list of item records
   */
  static fromBody(body: unknown): ItemList {
    const result = itemListSchema.safeParse(body);
    if (!result.success) {
      const { message, path } = describeIssue(result.error);
      throw new DecodeError(`cannot decode item list: ${message}`, { path, cause: result.error });
    }
    return new ItemList((result.data ?? []).map((record) => Item.fromRecord(record)));
  }

  get length(): number {
    return this.items.length;
  }

  keys(): string[] {
    return this.items.map((item) => item.key);
  }

  [Symbol.iterator](): Iterator<Item> {
    return this.items[Symbol.iterator]();
  }

  /**
   * Convert every item, each into a fresh instance from `factory`.
   *
   * Fails as a whole on the first item that does not decode.
   *
   * @example
   * ```typescript
   * const list = await client.loadItemsByTypeRaw('AAA');
   * const all = list.typed(() => new Options());
   * ```
   */
  typed<T extends object>(factory: ItemFactory<T>): T[] {
    return this.items.map((item) => item.typed(factory()));
  }

  /**
   * Convert every item through a zod schema; fails as a whole.
   */
  parse<S extends z.ZodTypeAny>(schema: S): z.output<S>[] {
    return this.items.map((item) => item.parse(schema));
  }
}
