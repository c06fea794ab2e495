import { SinkDeliveryError } from './errors.js';

export const DEFAULT_HTTP_TIMEOUT_MS = 5000;

export interface HttpSinkOptions {
  /** Per-request timeout. */
  timeoutMs?: number | undefined;
  /** Injected for tests; defaults to the global fetch. */
  fetch?: typeof fetch | undefined;
}

/**
 * Issues one request with a timeout and returns the response body.
 * Non-2xx responses become a {@link SinkDeliveryError} carrying the body.
 */
export async function requestText(
  url: string,
  init: RequestInit,
  options: HttpSinkOptions,
  description: string,
): Promise<string> {
  const fetchFn = options.fetch ?? fetch;
  const response = await fetchFn(url, {
    ...init,
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS),
  });
  const body = await response.text();

  if (!response.ok) {
    throw new SinkDeliveryError(
      `${description} failed with status ${response.status}`,
      response.status,
      body,
    );
  }
  return body;
}

/** JSON.parse that yields `undefined` for malformed input. */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}
