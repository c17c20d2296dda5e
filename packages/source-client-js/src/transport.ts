/**
 * Pooled HTTP transport and credentials.
 */

import { Agent, fetch } from 'undici';

import type { ClientOptions, HttpTransport } from './types';

/**
 * Create a transport backed by one undici connection pool. Safe to share
 * between concurrent calls.
 */
export function createTransport(options: Pick<ClientOptions, 'insecureTransport'>): HttpTransport {
  const dispatcher = new Agent({
    connect: {
      rejectUnauthorized: !options.insecureTransport,
    },
  });

  return (url, init) =>
    fetch(url, {
      method: init.method,
      headers: init.headers,
      body: init.body,
      signal: init.signal,
      dispatcher,
    });
}

/**
 * Build the `Authorization` header value for basic authentication.
 */
export function basicToken(user: string, password: string): string {
  return `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
}
