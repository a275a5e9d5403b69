import { errorMessage, ProviderUnavailableError, type ProviderName } from '../errors.js';

export type FetchOutcome = { ok: true; data: unknown } | { ok: false; error: ProviderUnavailableError };

export function buildUrl(base: string, pathname: string, query: Record<string, string | number | undefined> = {}): URL {
  // Keep any path prefix on the base (e.g. "/v1.1").
  const url = new URL(base.replace(/\/+$/, '') + '/' + pathname.replace(/^\/+/, ''));

  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    url.searchParams.set(key, String(value));
  }

  return url;
}

/**
 * One GET per call, bounded by `timeoutMs`. Network errors, timeouts,
 * non-2xx statuses and unparseable bodies all come back as a failed outcome.
 */
export async function getJson(
  provider: ProviderName,
  url: URL,
  headers: Record<string, string>,
  timeoutMs: number
): Promise<FetchOutcome> {
  let res: Response;
  try {
    res = await fetch(url, {
      method: 'GET',
      headers: { Accept: 'application/json', ...headers },
      signal: AbortSignal.timeout(timeoutMs)
    });
  } catch (err) {
    const timedOut = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
    const message = timedOut
      ? `${provider} request timed out after ${timeoutMs}ms`
      : `${provider} request failed: ${errorMessage(err)}`;
    return { ok: false, error: new ProviderUnavailableError(provider, message, { cause: err }) };
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    return {
      ok: false,
      error: new ProviderUnavailableError(provider, `${provider} request failed (${res.status}): ${text.slice(0, 200)}`, {
        upstreamStatus: res.status
      })
    };
  }

  try {
    return { ok: true, data: await res.json() };
  } catch (err) {
    return {
      ok: false,
      error: new ProviderUnavailableError(provider, `${provider} returned a malformed payload`, { cause: err })
    };
  }
}

export function missingKey(provider: ProviderName, variable: string): ProviderUnavailableError {
  return new ProviderUnavailableError(provider, `${variable} is not configured`);
}
