import { fetch } from 'undici';

export type JsonResponse = {
  status: number;
  body: unknown;
};

export type FetchJsonOptions = {
  query?: Record<string, string>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
};

/** Transport used by rate providers; swapped for a stub in tests */
export type HttpGetJson = (url: string, opts?: FetchJsonOptions) => Promise<JsonResponse>;

export class HttpStatusError extends Error {
  constructor(readonly url: string, readonly status: number, readonly statusText: string) {
    super(`GET ${url} failed: ${status} ${statusText}`.trim());
    this.name = 'HttpStatusError';
  }
}

/**
 * GET a JSON document. Non-2xx responses throw HttpStatusError;
 * an empty body resolves to `undefined`.
 */
export const fetchJson: HttpGetJson = async (url, opts = {}) => {
  const target = new URL(url);
  for (const [key, value] of Object.entries(opts.query ?? {})) {
    target.searchParams.set(key, value);
  }

  const res = await fetch(target.toString(), {
    method: 'GET',
    headers: { Accept: 'application/json', ...(opts.headers ?? {}) },
    signal: opts.signal,
  });

  if (!res.ok) {
    throw new HttpStatusError(target.origin + target.pathname, res.status, res.statusText);
  }

  const text = await res.text();
  return { status: res.status, body: text ? JSON.parse(text) : undefined };
};
