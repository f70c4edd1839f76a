import { SourceFetchError } from './errors';
import type { FetchFn } from './types';

export const DEFAULT_TIMEOUT_MS = 30_000;

const USER_AGENT = 'EventCurationBot/1.0 (+https://example.org/event-curation)';

export interface RequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  fetchImpl?: FetchFn;
}

/**
 * Single GET with a fixed timeout. Every failure surfaces as a
 * SourceFetchError; callers decide whether that fails the source.
 */
export async function fetchResponse(url: string, options: RequestOptions = {}): Promise<Response> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, {
      signal: controller.signal,
      redirect: 'follow',
      headers: {
        'User-Agent': USER_AGENT,
        ...options.headers,
      },
    });

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new SourceFetchError(`HTTP ${response.status} from ${url}: ${body.slice(0, 200)}`, {
        url,
        status: response.status,
      });
    }

    return response;
  } catch (error) {
    if (error instanceof SourceFetchError) {
      throw error;
    }
    const reason = controller.signal.aborted
      ? `timed out after ${timeoutMs}ms`
      : error instanceof Error ? error.message : String(error);
    throw new SourceFetchError(`Request to ${url} failed: ${reason}`, { url, cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}

export async function fetchHtml(url: string, options: RequestOptions = {}): Promise<string> {
  const response = await fetchResponse(url, {
    ...options,
    headers: { Accept: 'text/html,application/xhtml+xml', ...options.headers },
  });
  return response.text();
}

export async function fetchJson(url: string, options: RequestOptions = {}): Promise<unknown> {
  const response = await fetchResponse(url, {
    ...options,
    headers: { Accept: 'application/json', ...options.headers },
  });
  try {
    return (await response.json()) as unknown;
  } catch (error) {
    throw new SourceFetchError(`Invalid JSON from ${url}`, { url, status: response.status, cause: error });
  }
}
