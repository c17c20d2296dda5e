/**
 * Resilient request execution shared by every client operation.
 *
 * One call to `execute()` builds a single authenticated request, sends it with
 * bounded exponential backoff, and maps the final status onto success, an
 * empty result or a RemoteError. The request timeout bounds the whole
 * sequence, sleeps included.
 */

import { DecodeError, RemoteError, SourceError, TransportError, UsageError } from './errors';
import type { Logger } from './logger';
import type { HttpMethod, HttpRequestInit, HttpTransport, RetryConfig } from './types';

/**
 * A path parameter. Arrays are joined with `|` after each part is encoded.
 */
export type PathParam = string | readonly string[];

export interface RequestSpec {
  method: HttpMethod;
  /** Route template with one `{}` per path parameter, e.g. `/item/{}/tag/{}` */
  route: string;
  params?: readonly PathParam[];
  /** JSON request body */
  body?: string;
  /** Sent as the Source-Type header */
  itemType?: string;
  /** Describes the operation in error messages, e.g. `save item` */
  action: string;
  /** Resolve a 404 to `null` instead of failing */
  notFoundAsEmpty?: boolean;
}

export interface ExecutedResponse {
  status: number;
  statusText: string;
  body: string;
}

export interface ExecutorSettings {
  host: string;
  /** Precomputed Authorization header value */
  token: string;
  userAgent: string;
  /** Milliseconds allowed for one call including retries */
  timeout: number;
  retry: Required<RetryConfig>;
  transport: HttpTransport;
  logger: Logger;
}

/**
 * Statuses worth another attempt: throttling and server faults other than 501.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status !== 501);
}

function encodeParam(param: PathParam): string {
  if (typeof param === 'string') {
    return encodeURIComponent(param);
  }
  return param.map((part) => encodeURIComponent(part)).join('|');
}

// Visible ASCII or Latin-1 with inner spaces and tabs, as fetch accepts
const HEADER_VALUE = /^[\x21-\x7e\x80-\xff](?:[\t\x20-\x7e\x80-\xff]*[\x21-\x7e\x80-\xff])?$/;

/**
 * Errors a fetch implementation raises while building the request, before
 * anything reaches the network. Network failures carry a cause.
 */
function isRequestConstructionError(error: unknown): boolean {
  return error instanceof TypeError && error.cause === undefined;
}

function statusLine(response: { status: number; statusText: string }): string {
  return `${response.status} ${response.statusText}`.trim();
}

function reasonOf(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

export class RequestExecutor {
  private readonly settings: ExecutorSettings;

  constructor(settings: ExecutorSettings) {
    this.settings = settings;
  }

  /**
   * Expand a route template into an absolute URL.
   *
   * @throws {UsageError} If the parameter count does not match the template or the URL is malformed
   */
  buildUrl(route: string, params: readonly PathParam[] = []): string {
    const parts = route.split('{}');
    if (parts.length - 1 !== params.length) {
      throw new UsageError(`route ${route} takes ${parts.length - 1} parameter(s), got ${params.length}`, {
        argument: 'params',
      });
    }
    const path = parts.reduce((acc, part, index) => acc + encodeParam(params[index - 1] ?? '') + part);
    const url = `${this.settings.host}${path}`;
    try {
      new URL(url);
    } catch (error) {
      throw new UsageError(`cannot build request url ${url}: ${reasonOf(error)}`, { argument: 'host' });
    }
    return url;
  }

  /**
   * Send a request and classify the response.
   *
   * @returns The response, or `null` for a 404 when `notFoundAsEmpty` is set
   * @throws {RemoteError} If the server answers with a status above 299
   * @throws {TransportError} If the server cannot be reached in time
   */
  async execute(spec: RequestSpec): Promise<ExecutedResponse | null> {
    const url = this.buildUrl(spec.route, spec.params);
    const headers: Record<string, string> = {
      Authorization: this.settings.token,
      'User-Agent': this.settings.userAgent,
    };
    if (spec.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (spec.itemType) {
      if (!HEADER_VALUE.test(spec.itemType)) {
        throw new UsageError(
          `cannot ${spec.action}: item type ${JSON.stringify(spec.itemType)} is not a valid header value`,
          { argument: 'itemType' },
        );
      }
      headers['Source-Type'] = spec.itemType;
    }

    const response = await this.send(url, spec, headers);

    if (response.status <= 299) {
      return response;
    }
    if (response.status === 404 && spec.notFoundAsEmpty) {
      return null;
    }
    const detail = response.body.length > 0 ? `, ${response.body}` : '';
    throw new RemoteError(`cannot ${spec.action}, source server responded with: ${statusLine(response)}${detail}`, {
      statusCode: response.status,
      statusText: response.statusText,
      body: response.body.length > 0 ? response.body : undefined,
    });
  }

  /**
   * Send a request and decode its JSON body.
   *
   * @returns The decoded body, or `undefined` for a 404 when `notFoundAsEmpty` is set
   * @throws {DecodeError} If the body is not JSON
   */
  async executeJson(spec: RequestSpec): Promise<unknown> {
    const response = await this.execute(spec);
    if (response === null) {
      return undefined;
    }
    try {
      return JSON.parse(response.body);
    } catch (error) {
      throw new DecodeError(`cannot ${spec.action}: cannot decode response body: ${reasonOf(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Make an HTTP request with retry logic.
   */
  private async send(url: string, spec: RequestSpec, headers: Record<string, string>): Promise<ExecutedResponse> {
    const { maxRetries } = this.settings.retry;
    const deadline = Date.now() + this.settings.timeout;

    for (let attempt = 0; ; attempt++) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw this.timedOut(url, spec);
      }
      this.settings.logger.debug('sending request', { method: spec.method, url, attempt: attempt + 1 });

      let reason: string;
      try {
        const response = await this.attempt(url, spec, headers, remaining);
        if (!isRetryableStatus(response.status) || attempt >= maxRetries) {
          return response;
        }
        reason = statusLine(response);
      } catch (error) {
        // Timeouts are already final
        if (error instanceof SourceError) {
          throw error;
        }
        if (isRequestConstructionError(error)) {
          throw new UsageError(`cannot ${spec.action}: ${reasonOf(error)}`, { argument: 'request' });
        }
        if (attempt >= maxRetries) {
          throw new TransportError(
            `cannot ${spec.action}: giving up after ${attempt + 1} attempt(s): ${reasonOf(error)}`,
            { url, cause: error },
          );
        }
        reason = reasonOf(error);
      }

      const delay = this.backoff(attempt);
      if (Date.now() + delay >= deadline) {
        throw this.timedOut(url, spec);
      }
      this.settings.logger.warn('retrying request', {
        method: spec.method,
        url,
        attempt: attempt + 1,
        delay,
        reason,
      });
      await this.sleep(delay);
    }
  }

  /**
   * Make a single HTTP request, reading the whole body before the timer stops.
   */
  private async attempt(
    url: string,
    spec: RequestSpec,
    headers: Record<string, string>,
    remaining: number,
  ): Promise<ExecutedResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), remaining);
    const init: HttpRequestInit = {
      method: spec.method,
      headers,
      body: spec.body,
      signal: controller.signal,
    };

    try {
      const response = await this.settings.transport(url, init);
      const body = await response.text();
      return { status: response.status, statusText: response.statusText, body };
    } catch (error) {
      if (controller.signal.aborted) {
        throw this.timedOut(url, spec, error);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private timedOut(url: string, spec: RequestSpec, cause?: unknown): TransportError {
    return new TransportError(`cannot ${spec.action}: request timed out after ${this.settings.timeout}ms`, {
      url,
      timedOut: true,
      cause,
    });
  }

  /**
   * Exponential backoff with jitter: a random delay in the upper half of
   * `min(maxDelay, baseDelay * 2^attempt)`.
   */
  private backoff(attempt: number): number {
    const { baseDelay, maxDelay } = this.settings.retry;
    const ceiling = Math.min(baseDelay * Math.pow(2, attempt), maxDelay);
    return Math.floor(ceiling / 2 + Math.random() * (ceiling / 2));
  }

  /**
   * Sleep for a specified number of milliseconds.
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
