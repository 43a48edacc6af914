/**
 * Minimal fetch signature used by the HTTP clients.
 *
 * Narrower than `typeof fetch` so tests can supply a plain function.
 *
 * @module net/fetch
 */

export interface FetchInit {
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

export type FetchLike = (url: string, init?: FetchInit) => Promise<Response>;

/**
 * The global fetch, called without a receiver.
 */
export const defaultFetch: FetchLike = (url, init) => fetch(url, init);
