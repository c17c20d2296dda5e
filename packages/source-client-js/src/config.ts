/**
 * Client configuration: defaults, validation and environment loading.
 */

import { z } from 'zod';

import { ValidationError } from './errors';
import type { ClientOptions, RetryConfig, SourceClientConfig } from './types';

/**
 * Default configuration values.
 */
export const DEFAULTS = {
  insecureTransport: true,
  requestTimeout: 60000,
  minRequestTimeout: 30000,
  maxRetries: 20,
  baseDelay: 1000,
  maxDelay: 30000,
} as const;

const clientOptionsSchema = z.object({
  insecureTransport: z.boolean().default(DEFAULTS.insecureTransport),
  requestTimeout: z
    .number()
    .int()
    .min(DEFAULTS.minRequestTimeout, {
      message: `timeout must be at least ${DEFAULTS.minRequestTimeout / 1000} secs`,
    })
    .default(DEFAULTS.requestTimeout),
});

const retrySchema = z.object({
  maxRetries: z.number().int().min(0).default(DEFAULTS.maxRetries),
  baseDelay: z.number().min(0).default(DEFAULTS.baseDelay),
  maxDelay: z.number().min(0).default(DEFAULTS.maxDelay),
});

function toValidationError(error: z.ZodError, prefix?: string): ValidationError {
  const issue = error.issues[0];
  const field = [prefix, ...(issue?.path ?? [])].filter((part) => part !== undefined).join('.');
  return new ValidationError(issue?.message ?? 'invalid configuration', { field, cause: error });
}

/**
 * Fill in option defaults and check them.
 *
 * @throws {ValidationError} If requestTimeout is under 30 seconds or a field has the wrong type
 */
export function validateOptions(options: Partial<ClientOptions> = {}): ClientOptions {
  const result = clientOptionsSchema.safeParse(options);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

export function validateRetry(retry: RetryConfig = {}): Required<RetryConfig> {
  const result = retrySchema.safeParse(retry);
  if (!result.success) {
    throw toValidationError(result.error, 'retry');
  }
  return result.data;
}

/**
 * Check the host URL and strip a trailing slash.
 */
export function normalizeHost(host: string): string {
  if (!host) {
    throw new ValidationError('host is required', { field: 'host' });
  }
  let url: URL;
  try {
    url = new URL(host);
  } catch (error) {
    throw new ValidationError(`host is not a valid URL: ${host}`, { field: 'host', value: host, cause: error });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ValidationError(`host must use http or https: ${host}`, { field: 'host', value: host });
  }
  return host.replace(/\/+$/, '');
}

/**
 * Build a client configuration from environment variables.
 *
 * Reads SOURCE_HOST, SOURCE_USER and SOURCE_PASSWORD (required) and
 * SOURCE_INSECURE and SOURCE_TIMEOUT_MS (optional).
 *
 * @example
 * ```typescript
 * const client = createClient(configFromEnv());
 * ```
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): SourceClientConfig {
  const required = (name: string): string => {
    const value = env[name];
    if (!value) {
      throw new ValidationError(`${name} is not set`, { field: name });
    }
    return value;
  };

  const options: Partial<ClientOptions> = {};
  const insecure = env.SOURCE_INSECURE;
  if (insecure !== undefined && insecure !== '') {
    if (insecure !== 'true' && insecure !== 'false') {
      throw new ValidationError('SOURCE_INSECURE must be "true" or "false"', {
        field: 'SOURCE_INSECURE',
        value: insecure,
      });
    }
    options.insecureTransport = insecure === 'true';
  }
  const timeout = env.SOURCE_TIMEOUT_MS;
  if (timeout !== undefined && timeout !== '') {
    const parsed = Number(timeout);
    if (!Number.isInteger(parsed)) {
      throw new ValidationError('SOURCE_TIMEOUT_MS must be an integer', {
        field: 'SOURCE_TIMEOUT_MS',
        value: timeout,
      });
    }
    options.requestTimeout = parsed;
  }

  return {
    host: required('SOURCE_HOST'),
    user: required('SOURCE_USER'),
    password: required('SOURCE_PASSWORD'),
    options,
  };
}
