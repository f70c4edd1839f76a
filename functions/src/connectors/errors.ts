/**
 * Transport-level failure while talking to a source: HTTP error status,
 * timeout or network error. Never retried inside the connector.
 */
export class SourceFetchError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(message: string, options: { url: string; status?: number | null; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'SourceFetchError';
    this.url = options.url;
    this.status = options.status ?? null;
  }
}

export function isSourceFetchError(error: unknown): error is SourceFetchError {
  return error instanceof SourceFetchError;
}
