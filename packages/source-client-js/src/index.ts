/**
 * Source Client TypeScript/JavaScript SDK
 *
 * Typed access to a source configuration server: register item types, save
 * and load items under string keys, link items into a graph, tag them, and
 * pop them from per-type queues.
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { createClient, ValidationError } from 'source-client';
 *
 * class Options {
 *   insecureTransport = false;
 *   requestTimeout = 60000;
 *
 *   validate(): void {
 *     if (this.requestTimeout < 30000) {
 *       throw new ValidationError('timeout too short', { field: 'requestTimeout' });
 *     }
 *   }
 * }
 *
 * const client = createClient({
 *   host: 'http://127.0.0.1:8080',
 *   user: 'admin',
 *   password: 'test-secret',
 * });
 *
 * // Register the type once; its schema comes from the example's shape
 * await client.registerType('AAA', new Options());
 *
 * // Save under a generated, time-ordered key
 * const key = await client.save('OPT_?', 'AAA', new Options());
 *
 * // Load it back into a fresh instance
 * const options = await client.load(key, new Options());
 *
 * // Tag it
 * await client.tag(key, 'status', 'dev');
 * ```
 */

// Main client
export { SourceClient, createClient, USER_AGENT } from './client';

// Items and typed conversion
export { Item, ItemList } from './item';
export { checkPrototype, populate } from './typed';

// Type descriptors
export { deriveSchema, toJsonSchema, createTypeDescriptor } from './schema';

// Keys
export { resolveKey, formatSequence, KEY_WILDCARD } from './keys';

// Request execution
export { RequestExecutor, isRetryableStatus } from './executor';
export type { RequestSpec, PathParam, ExecutedResponse, ExecutorSettings } from './executor';
export { createTransport, basicToken } from './transport';

// Configuration
export { DEFAULTS, configFromEnv, normalizeHost, validateOptions, validateRetry } from './config';

// Logging
export { consoleLogger, silentLogger } from './logger';
export type { Logger, LogContext } from './logger';

// Types
export type {
  ClientOptions,
  RetryConfig,
  SourceClientConfig,
  HttpMethod,
  HttpRequestInit,
  HttpResponse,
  HttpTransport,
  ItemRecord,
  TypeDescriptor,
  Validatable,
  ItemFactory,
} from './types';

// Errors - Classes
export {
  SourceError,
  UsageError,
  ValidationError,
  SchemaError,
  EncodeError,
  DecodeError,
  TransportError,
  RemoteError,
} from './errors';

// Errors - Type guards
export {
  isSourceError,
  isUsageError,
  isValidationError,
  isSchemaError,
  isEncodeError,
  isDecodeError,
  isTransportError,
  isRemoteError,
} from './errors';

// Version
export { VERSION } from './version';
