/**
 * Error kinds surfaced by the completion engine.
 */

/** Misconfiguration the caller must fix. Never retried. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface ProviderErrorOptions {
  /** Raw HTTP response handle, when the backend exposed one */
  response?: unknown;
  /** Raw response body text */
  body?: string;
  attempts?: number;
  cause?: unknown;
}

/**
 * The one engine-level error for transport, auth and malformed-response failures.
 * Adapters wrap whatever their backend throws into this.
 */
export class ProviderError extends Error {
  readonly response?: unknown;
  readonly body?: string;
  readonly attempts?: number;

  constructor(message: string, options: ProviderErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ProviderError';
    this.response = options.response;
    this.body = options.body;
    this.attempts = options.attempts;
  }

  static from(err: unknown, label?: string): ProviderError {
    if (err instanceof ProviderError) return err;
    const message = errorMessage(err);
    const prefixed = label ? `${label}: ${message}` : message;
    if (err instanceof Error) {
      return new ProviderError(prefixed, {
        cause: err,
        response: 'response' in err ? err.response : undefined,
        body: 'body' in err && typeof err.body === 'string' ? err.body : undefined,
      });
    }
    return new ProviderError(prefixed, { cause: err });
  }
}

export interface ParticipantFailure {
  name: string;
  message: string;
}

/** Every round-table participant failed. */
export class RoundTableError extends ProviderError {
  readonly failures: readonly ParticipantFailure[];

  constructor(failures: readonly ParticipantFailure[]) {
    super(`All round table models failed: ${failures.map((f) => `${f.name}: ${f.message}`).join('; ')}`);
    this.name = 'RoundTableError';
    this.failures = failures;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** User-facing error text: kind, message and the raw body when one came back. */
export function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  let text = `${err.name}: ${err.message}`;
  if (err instanceof ProviderError && err.body && !err.message.includes(err.body)) {
    text += `\nResponse body: ${err.body}`;
  }
  return text;
}
