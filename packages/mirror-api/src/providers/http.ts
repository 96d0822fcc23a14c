/**
 * Provider HTTP plumbing: timeouts and transient/permanent classification
 */

import { PermanentFetchError, TransientFetchError } from '../utils/errors.js';

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function networkCode(err: Error): string | undefined {
  const cause: unknown = err.cause;
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

/**
 * fetch + JSON decode. Throws TransientFetchError or PermanentFetchError, never a raw error.
 */
export async function requestJson(
  provider: string,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
      throw new TransientFetchError(`${provider} request timed out after ${timeoutMs}ms`, { url });
    }
    const message = err instanceof Error ? err.message : String(err);
    const code = err instanceof Error ? networkCode(err) : undefined;
    // fetch only rejects on network-level failures
    throw new TransientFetchError(`${provider} request failed: ${message}`, { url, code });
  }

  if (!response.ok) {
    const body = await response.text().catch(() => '');
    const message = `${provider} HTTP ${response.status}: ${body.slice(0, 200)}`;
    if (isTransientStatus(response.status)) {
      throw new TransientFetchError(message, { url, status: response.status });
    }
    throw new PermanentFetchError(message, { url, status: response.status });
  }

  try {
    return await response.json();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PermanentFetchError(`${provider} returned invalid JSON: ${message}`, { url });
  }
}
