import type { ApiEndpoint } from "../config.js";
import { errorMessage, logger } from "../logger.js";
import { sleep } from "../utils.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpOptions = {
  timeoutMs: number;
  retries: number;
  fetchFn?: FetchFn;
  /** Base backoff; doubles per attempt. */
  backoffMs?: number;
};

export class HttpStatusError extends Error {
  constructor(readonly status: number, readonly url: string) {
    super(`HTTP ${status}`);
    this.name = "HttpStatusError";
  }
}

/** A 2xx response whose body is not JSON. */
export class MalformedBodyError extends Error {
  constructor(readonly url: string) {
    super("response is not JSON");
    this.name = "MalformedBodyError";
  }
}

export async function fetchWithTimeout(
  url: string,
  init: RequestInit | undefined,
  timeoutMs: number,
  fetchFn: FetchFn = fetch
): Promise<Response> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetchFn(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(t);
  }
}

export async function fetchWithRetry(url: string, init: RequestInit | undefined, opts: HttpOptions): Promise<Response> {
  const backoffMs = opts.backoffMs ?? 500;

  let lastErr: unknown = null;
  for (let attempt = 0; attempt <= opts.retries; attempt++) {
    try {
      const res = await fetchWithTimeout(url, init, opts.timeoutMs, opts.fetchFn);
      // Retry common transient statuses.
      if (res.status === 429 || (res.status >= 500 && res.status <= 599)) {
        throw new HttpStatusError(res.status, url);
      }
      return res;
    } catch (err) {
      lastErr = err;
      if (attempt >= opts.retries) break;
      logger.debug("http.retry", { url, attempt: attempt + 1, error: errorMessage(err) });
      // Exponential backoff: 0.5s, 1s, 2s...
      await sleep(backoffMs * Math.pow(2, attempt));
    }
  }
  throw lastErr instanceof Error ? lastErr : new Error(String(lastErr));
}

export function buildUrl(endpoint: string, params: ApiEndpoint["params"]): string {
  const url = new URL(endpoint);
  for (const [k, v] of Object.entries(params)) {
    url.searchParams.set(k, String(v));
  }
  return url.toString();
}

/** RapidAPI-style auth: key header plus the endpoint's host. */
export function rapidApiHeaders(endpoint: string, key: string): Record<string, string> {
  return {
    "x-rapidapi-key": key,
    "x-rapidapi-host": new URL(endpoint).host,
    accept: "application/json"
  };
}

/**
 * GET an API endpoint and return the decoded JSON body.
 * Throws HttpStatusError on a non-2xx response and MalformedBodyError when
 * the body does not decode.
 */
export async function getJson(api: ApiEndpoint, opts: HttpOptions): Promise<unknown> {
  const url = buildUrl(api.endpoint, api.params);
  const res = await fetchWithRetry(url, { headers: rapidApiHeaders(api.endpoint, api.key) }, opts);
  if (!res.ok) throw new HttpStatusError(res.status, url);
  const text = await res.text();
  try {
    const json: unknown = JSON.parse(text);
    return json;
  } catch {
    throw new MalformedBodyError(url);
  }
}
