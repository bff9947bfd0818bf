import { isAxiosError } from 'axios';

/**
 * Pipeline error taxonomy
 *
 * - ConfigurationError: missing credentials, malformed config files, invalid
 *   options. Fatal, raised before any batch work starts.
 * - PreconditionError: the judgment is not in the state a stage requires.
 *   The item is skipped and the batch continues.
 * - TransientUpstreamError: network failure, rate limit or 5xx from an
 *   upstream API. Retried where the stage allows it.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class PreconditionError extends Error {
  constructor(
    message: string,
    public readonly itemId: string
  ) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export class TransientUpstreamError extends Error {
  constructor(
    message: string,
    public readonly service: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransientUpstreamError';
  }
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
]);

function readProperty(value: unknown, key: string): unknown {
  if (typeof value === 'object' && value !== null && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

/**
 * HTTP status carried by an axios, OpenAI or Anthropic error, if any
 */
export function errorStatus(error: unknown): number | undefined {
  if (isAxiosError(error)) {
    return error.response?.status;
  }
  const status = readProperty(error, 'status');
  return typeof status === 'number' ? status : undefined;
}

export function isRateLimitError(error: unknown): boolean {
  if (errorStatus(error) === 429) {
    return true;
  }
  const code = readProperty(error, 'code');
  return code === 'rate_limit_exceeded';
}

/**
 * True for failures worth retrying: network errors, 408, 429 and 5xx
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientUpstreamError) {
    return true;
  }
  if (error instanceof ConfigurationError || error instanceof PreconditionError) {
    return false;
  }

  const status = errorStatus(error);
  if (status !== undefined) {
    return status === 408 || status === 429 || status >= 500;
  }

  const code = readProperty(error, 'code');
  if (typeof code === 'string' && TRANSIENT_NETWORK_CODES.has(code)) {
    return true;
  }

  // openai / anthropic SDK connection errors carry no status
  const name = readProperty(error, 'name');
  return name === 'APIConnectionError' || name === 'APIConnectionTimeoutError';
}

/**
 * Wrap transient failures so callers can branch on a single class
 */
export function toUpstreamError(service: string, error: unknown): Error {
  if (isTransientError(error) && !(error instanceof TransientUpstreamError)) {
    return new TransientUpstreamError(
      `${service} request failed: ${errorMessage(error)}`,
      service,
      errorStatus(error),
      { cause: error }
    );
  }
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
