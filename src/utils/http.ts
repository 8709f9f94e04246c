import { ApiRequestError } from '../errors';

export type QueryValue = string | number | boolean | Array<string | number>;

export function buildUrl(base: string, params: Record<string, QueryValue>): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    if (Array.isArray(value)) {
      value.forEach(v => url.searchParams.append(key, String(v)));
    } else {
      url.searchParams.append(key, String(value));
    }
  }
  return url.toString();
}

/**
 * GET a JSON document. Non-2xx responses and network failures become an
 * ApiRequestError; the body is returned unvalidated.
 */
export async function fetchJson(url: string, timeoutMs: number): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { 'Accept': 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ApiRequestError(`Request failed: ${reason}`, url);
  }

  if (!response.ok) {
    throw new ApiRequestError(`HTTP ${response.status} ${response.statusText}`, url, response.status);
  }

  return response.json();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asNumberArray(value: unknown): Array<number | null> | null {
  if (!Array.isArray(value)) return null;
  return value.map(v => (typeof v === 'number' && Number.isFinite(v) ? v : null));
}
