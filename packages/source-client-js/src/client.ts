/**
 * Source Client
 *
 * Main client class for reading and writing configuration items on a source
 * server. Items are saved as JSON under a key and a registered type, and come
 * back as opaque items the caller converts into its own types.
 */

import type { z } from 'zod';

import { normalizeHost, validateOptions, validateRetry } from './config';
import { UsageError, ValidationError } from './errors';
import { RequestExecutor } from './executor';
import type { PathParam, RequestSpec } from './executor';
import { Item, ItemList } from './item';
import { resolveKey } from './keys';
import { silentLogger } from './logger';
import { createTypeDescriptor, encodeJson } from './schema';
import { basicToken, createTransport } from './transport';
import { checkPrototype } from './typed';
import type { ClientOptions, ItemFactory, SourceClientConfig, Validatable } from './types';
import { checkItem, requireArgument } from './validation';
import { VERSION } from './version';

/**
 * User-Agent sent with every request.
 */
export const USER_AGENT = `SOURCE-CLIENT-JS-${VERSION}`;

/**
 * Source Client
 *
 * Every method sends at most one logical request, retried on transient
 * failure within the configured request timeout. An instance holds only its
 * host, credentials and connection pool, so it can serve concurrent calls.
 *
 * @example
 * ```typescript
 * import { SourceClient } from 'source-client';
 *
 * const client = new SourceClient({
 *   host: 'http://127.0.0.1:8080',
 *   user: 'admin',
 *   password: 'test-secret',
 * });
 *
 * await client.registerType('AAA', new Options());
 * await client.save('OPT_1', 'AAA', new Options());
 * const options = await client.load('OPT_1', new Options());
 * ```
 */
export class SourceClient {
  private readonly executor: RequestExecutor;
  private readonly config: {
    host: string;
    options: ClientOptions;
  };

  /**
   * Create a new source client.
   *
   * @param config - Configuration options
   * @throws {ValidationError} If the host, user or options are invalid
   *
   * @example
   * ```typescript
   * const client = new SourceClient({
   *   host: 'https://source.internal',
   *   user: 'admin',
   *   password: 'test-secret',
   *   options: { insecureTransport: false, requestTimeout: 120000 },
   *   retry: { maxRetries: 5 },
   * });
   * ```
   */
  constructor(config: SourceClientConfig) {
    const host = normalizeHost(config.host);
    if (!config.user) {
      throw new ValidationError('user is required', { field: 'user' });
    }
    const options = validateOptions(config.options);

    this.config = { host, options };
    this.executor = new RequestExecutor({
      host,
      token: basicToken(config.user, config.password),
      userAgent: USER_AGENT,
      timeout: options.requestTimeout,
      retry: validateRetry(config.retry),
      transport: config.transport ?? createTransport(options),
      logger: config.logger ?? silentLogger,
    });
  }

  // ============================================================
  // Types
  // ============================================================

  /**
   * Register an item type.
   *
   * The JSON Schema is derived from the shape of `example` unless `schema` is
   * given; the example itself is stored as the type's prototype.
   *
   * @param key - Type name
   * @param example - Any serializable instance of the type
   * @param schema - Explicit zod schema to register instead of the derived one
   * @throws {SchemaError} If no schema can be derived from the example
   * @throws {RemoteError} If the server rejects the type
   *
   * @example
   * ```typescript
   * await client.registerType('AAA', { insecureTransport: false, requestTimeout: 10000 });
   * ```
   */
  async registerType(key: string, example: unknown, schema?: z.ZodTypeAny): Promise<void> {
    requireArgument(key, 'key', 'a type key is required');
    const descriptor = createTypeDescriptor(key, example, schema);
    await this.executor.execute({
      method: 'PUT',
      route: '/type',
      body: encodeJson(descriptor, `type '${key}'`),
      action: 'set type',
    });
  }

  // ============================================================
  // Items
  // ============================================================

  /**
   * Save an item under a key, validated by the server against `itemType`.
   *
   * A `?` in the key is replaced with a UTC timestamp, so repeated saves with
   * the same pattern create ordered keys.
   *
   * @returns The key the item was saved under
   * @throws {ValidationError} If the item's validate() rejects it; nothing is sent
   * @throws {UsageError} If the key or type is empty or the item is not a value
   * @throws {EncodeError} If the item cannot be serialized
   * @throws {RemoteError} If the server rejects the item
   *
   * @example
   * ```typescript
   * const key = await client.save('ITEM_?', 'AAA', new Options());
   * // 'ITEM_20240131093015.042'
   * ```
   */
  async save(key: string, itemType: string, item: Validatable): Promise<string> {
    checkItem(item);
    requireArgument(key, 'key', 'an item key is required');
    requireArgument(itemType, 'itemType', 'item type is required to validate the item data');

    const resolved = resolveKey(key);
    await this.executor.execute({
      method: 'PUT',
      route: '/item/{}',
      params: [resolved],
      body: encodeJson(item, `item '${resolved}'`),
      itemType,
      action: 'save item',
    });
    return resolved;
  }

  /**
   * Load the raw item identified by key.
   */
  async loadRaw(itemKey: string): Promise<Item> {
    requireArgument(itemKey, 'itemKey', 'an item key is required');
    return Item.fromRecord(
      await this.executor.executeJson({ method: 'GET', route: '/item/{}', params: [itemKey], action: 'get item' }),
    );
  }

  /**
   * Load an item and decode it into `prototype`, a fresh instance of the
   * target type.
   *
   * @throws {UsageError} If the prototype is not a writable object
   * @throws {DecodeError} If the stored value does not fit the prototype
   * @throws {RemoteError} If the item does not exist
   *
   * @example
   * ```typescript
   * const options = await client.load('OPT_1', new Options());
   * ```
   */
  async load<T extends object>(itemKey: string, prototype: T): Promise<T> {
    checkPrototype(prototype);
    const item = await this.loadRaw(itemKey);
    return item.typed(prototype);
  }

  /**
   * Delete the item identified by key.
   */
  async delete(key: string): Promise<void> {
    requireArgument(key, 'key', 'an item key is required');
    await this.executor.execute({ method: 'DELETE', route: '/item/{}', params: [key], action: 'delete item' });
  }

  // ============================================================
  // Queries
  // ============================================================

  /**
   * Load the items carrying any of the given tags.
   */
  async loadItemsByTagRaw(...tags: string[]): Promise<ItemList> {
    if (tags.length === 0 || tags.some((tag) => !tag)) {
      throw new UsageError('at least one non-empty tag is required', { argument: 'tags' });
    }
    return this.loadList({ method: 'GET', route: '/item/tag/{}', params: [tags], action: 'get tagged items' });
  }

  /**
   * Load the items carrying any of the given tags, each decoded into an
   * instance from `factory`.
   *
   * @example
   * ```typescript
   * const dev = await client.loadItemsByTag(() => new Options(), 'status|dev');
   * ```
   */
  async loadItemsByTag<T extends object>(factory: ItemFactory<T>, ...tags: string[]): Promise<T[]> {
    const items = await this.loadItemsByTagRaw(...tags);
    return items.typed(factory);
  }

  /**
   * Load every item of a type.
   */
  async loadItemsByTypeRaw(itemType: string): Promise<ItemList> {
    requireArgument(itemType, 'itemType', 'an item type is required');
    return this.loadList({
      method: 'GET',
      route: '/item/type/{}',
      params: [itemType],
      action: `get items for type '${itemType}'`,
    });
  }

  /**
   * Load every item of a type, each decoded into an instance from `factory`.
   *
   * @example
   * ```typescript
   * const all = await client.loadItemsByType(() => new Options(), 'AAA');
   * ```
   */
  async loadItemsByType<T extends object>(factory: ItemFactory<T>, itemType: string): Promise<T[]> {
    const items = await this.loadItemsByTypeRaw(itemType);
    return items.typed(factory);
  }

  /**
   * Load the items linked from `itemKey`.
   */
  async loadChildrenRaw(itemKey: string): Promise<ItemList> {
    requireArgument(itemKey, 'itemKey', 'an item key is required');
    return this.loadList({
      method: 'GET',
      route: '/item/{}/children',
      params: [itemKey],
      action: 'get children for item',
    });
  }

  async loadChildren<T extends object>(factory: ItemFactory<T>, itemKey: string): Promise<T[]> {
    const items = await this.loadChildrenRaw(itemKey);
    return items.typed(factory);
  }

  /**
   * Load the items that link to `itemKey`.
   */
  async loadParentsRaw(itemKey: string): Promise<ItemList> {
    requireArgument(itemKey, 'itemKey', 'an item key is required');
    return this.loadList({
      method: 'GET',
      route: '/item/{}/parents',
      params: [itemKey],
      action: 'get parents for item',
    });
  }

  async loadParents<T extends object>(factory: ItemFactory<T>, itemKey: string): Promise<T[]> {
    const items = await this.loadParentsRaw(itemKey);
    return items.typed(factory);
  }

  // ============================================================
  // Queues
  // ============================================================

  /**
   * Remove and return the oldest item of a type.
   *
   * @returns The item, or `null` when there is none
   */
  async popOldestRaw(itemType: string): Promise<Item | null> {
    return this.pop('oldest', itemType);
  }

  /**
   * Remove the oldest item of a type and decode it into `prototype`.
   *
   * The prototype is checked before the request, so a bad one never costs an
   * item.
   *
   * @returns The populated prototype, or `null` when there is no item
   * @throws {UsageError} If the prototype is not a writable object
   *
   * @example
   * ```typescript
   * const next = await client.popOldest('JOB', new Job());
   * if (next === null) {
   *   // queue is empty
   * }
   * ```
   */
  async popOldest<T extends object>(itemType: string, prototype: T): Promise<T | null> {
    checkPrototype(prototype);
    const item = await this.popOldestRaw(itemType);
    return item === null ? null : item.typed(prototype);
  }

  /**
   * Remove and return the newest item of a type.
   *
   * @returns The item, or `null` when there is none
   */
  async popNewestRaw(itemType: string): Promise<Item | null> {
    return this.pop('newest', itemType);
  }

  /**
   * Remove the newest item of a type and decode it into `prototype`.
   *
   * @returns The populated prototype, or `null` when there is no item
   */
  async popNewest<T extends object>(itemType: string, prototype: T): Promise<T | null> {
    checkPrototype(prototype);
    const item = await this.popNewestRaw(itemType);
    return item === null ? null : item.typed(prototype);
  }

  // ============================================================
  // Tags and links
  // ============================================================

  /**
   * Attach a tag to an item, with an optional value.
   *
   * @throws {UsageError} If the tag name is empty
   *
   * @example
   * ```typescript
   * await client.tag('OPT_1', 'status', 'dev');
   * await client.tag('OPT_1', 'reviewed');
   * ```
   */
  async tag(itemKey: string, name: string, value?: string): Promise<void> {
    requireArgument(itemKey, 'itemKey', 'an item key is required');
    requireArgument(name, 'name', 'a tag name is required');
    const tag: PathParam = value ? [name, value] : name;
    await this.executor.execute({
      method: 'PUT',
      route: '/item/{}/tag/{}',
      params: [itemKey, tag],
      action: 'tag item',
    });
  }

  /**
   * Remove a tag from an item.
   *
   * @throws {UsageError} If the tag name is empty
   */
  async untag(itemKey: string, name: string): Promise<void> {
    requireArgument(itemKey, 'itemKey', 'an item key is required');
    requireArgument(name, 'name', 'a tag name is required');
    await this.executor.execute({
      method: 'DELETE',
      route: '/item/{}/tag/{}',
      params: [itemKey, name],
      action: 'untag item',
    });
  }

  /**
   * Link two items; `toKey` becomes a child of `fromKey`.
   */
  async link(fromKey: string, toKey: string): Promise<void> {
    requireArgument(fromKey, 'fromKey', 'a from key is required');
    requireArgument(toKey, 'toKey', 'a to key is required');
    await this.executor.execute({
      method: 'PUT',
      route: '/link/{}/to/{}',
      params: [fromKey, toKey],
      action: 'link items',
    });
  }

  /**
   * Remove the link between two items.
   */
  async unlink(fromKey: string, toKey: string): Promise<void> {
    requireArgument(fromKey, 'fromKey', 'a from key is required');
    requireArgument(toKey, 'toKey', 'a to key is required');
    await this.executor.execute({
      method: 'DELETE',
      route: '/link/{}/to/{}',
      params: [fromKey, toKey],
      action: 'unlink items',
    });
  }

  /**
   * Get the configured host.
   */
  get host(): string {
    return this.config.host;
  }

  /**
   * Get the effective transport options.
   */
  get options(): Readonly<ClientOptions> {
    return this.config.options;
  }

  get userAgent(): string {
    return USER_AGENT;
  }

  // ============================================================
  // Private methods
  // ============================================================

  private async loadList(spec: RequestSpec): Promise<ItemList> {
    return ItemList.fromBody(await this.executor.executeJson(spec));
  }

  private async pop(end: 'oldest' | 'newest', itemType: string): Promise<Item | null> {
    requireArgument(itemType, 'itemType', 'an item type is required');
    const body = await this.executor.executeJson({
      method: 'DELETE',
      route: `/item/pop/${end}/{}`,
      params: [itemType],
      action: `pop ${end} item`,
      notFoundAsEmpty: true,
    });
    return body === undefined ? null : Item.fromRecord(body);
  }
}

/**
 * Create a new source client instance.
 *
 * @example
 * ```typescript
 * import { createClient, configFromEnv } from 'source-client';
 *
 * const client = createClient(configFromEnv());
 * ```
 */
export function createClient(config: SourceClientConfig): SourceClient {
  return new SourceClient(config);
}
