/**
 * Errors that end a discovery run. Anything not listed here is contained where it happens.
 */

export class InvalidDomainError extends Error {
  constructor(public readonly input: string) {
    super(`Invalid domain: ${JSON.stringify(input)}`);
    this.name = 'InvalidDomainError';
  }
}

export type TransportErrorKind = 'status' | 'parse' | 'exhausted';

export interface TransportErrorDetails {
  url: string;
  attempts?: number;
  status?: number;
  lastError?: string;
}

/**
 * Fatal outcome of one logical HTTP request:
 * - `status`: a non-transient, non-2xx response
 * - `parse`: a 2xx body that is not the expected JSON
 * - `exhausted`: every attempt failed transiently
 */
export class TransportError extends Error {
  readonly url: string;
  readonly attempts?: number;
  readonly status?: number;
  readonly lastError?: string;

  constructor(public readonly kind: TransportErrorKind, message: string, details: TransportErrorDetails) {
    super(message);
    this.name = 'TransportError';
    this.url = details.url;
    this.attempts = details.attempts;
    this.status = details.status;
    this.lastError = details.lastError;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name === 'AbortError' || err.name === 'TimeoutError' ? 'timeout' : err.message;
  }
  return String(err);
}
