/**
 * Source Client TypeScript Types
 *
 * Wire shapes mirror the JSON the source server reads and writes; the rest
 * describe client configuration and the contracts callers implement.
 */

import type { Logger } from './logger';

// ============================================================
// Configuration
// ============================================================

/**
 * Transport options recognised by the client.
 */
export interface ClientOptions {
  /** Skip TLS certificate verification (default: true) */
  insecureTransport: boolean;
  /** Timeout in milliseconds covering a call and all its retries (min 30000, default 60000) */
  requestTimeout: number;
}

/**
 * Retry configuration for failed requests.
 */
export interface RetryConfig {
  /** Maximum number of retries after the first attempt (default: 20) */
  maxRetries?: number;
  /** Base delay in milliseconds for exponential backoff (default: 1000) */
  baseDelay?: number;
  /** Maximum delay in milliseconds between retries (default: 30000) */
  maxDelay?: number;
}

/**
 * Configuration for the source client.
 */
export interface SourceClientConfig {
  /** Base URL of the source server (e.g., 'http://127.0.0.1:8080') */
  host: string;
  /** Basic-auth user */
  user: string;
  /** Basic-auth password */
  password: string;
  /** Transport options */
  options?: Partial<ClientOptions>;
  /** Retry configuration */
  retry?: RetryConfig;
  /** Receives request and retry diagnostics; silent when omitted */
  logger?: Logger;
  /** Replaces the pooled undici transport */
  transport?: HttpTransport;
}

// ============================================================
// Transport
// ============================================================

export type HttpMethod = 'GET' | 'PUT' | 'DELETE';

export interface HttpRequestInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

/**
 * The part of a fetch `Response` the executor reads.
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  text(): Promise<string>;
}

/**
 * Sends one HTTP request. Rejects only on transport failure; any status
 * resolves.
 */
export type HttpTransport = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

// ============================================================
// Wire types
// ============================================================

/**
 * A stored item as the server sends it. `value` is base64 of the JSON item.
 */
export interface ItemRecord {
  key: string;
  type: string;
  value: string | null;
  updated: string;
}

/**
 * Type registration payload. `schema` and `proto` are base64 of JSON documents.
 */
export interface TypeDescriptor {
  key: string;
  schema: string;
  proto: string;
}

// ============================================================
// Contracts
// ============================================================

/**
 * Implemented by every value handed to `save()`. Throw to reject the value;
 * throwing a `ValidationError` passes it to the caller unchanged.
 *
 * @example
 * ```typescript
 * class Options implements Validatable {
 *   insecureTransport = false;
 *   requestTimeout = 60000;
 *
 *   validate(): void {
 *     if (this.requestTimeout < 30000) {
 *       throw new ValidationError('timeout too short', { field: 'requestTimeout' });
 *     }
 *   }
 * }
 * ```
 */
export interface Validatable {
  validate(): void;
}

/**
 * Produces a fresh, default-initialised instance to decode one item into.
 */
export type ItemFactory<T extends object> = () => T;
