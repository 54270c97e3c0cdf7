/**
 * Shared HTTP client for tax authority calls
 * Uses native fetch; connection reuse is left to Node's global dispatcher.
 */

export type FetchFn = (url: string | URL, options?: RequestInit) => Promise<Response>

/**
 * Pooled fetch function
 * Falls back to native fetch
 */
export async function pooledFetch(
  url: string | URL,
  options?: RequestInit
): Promise<Response> {
  return fetch(url, options)
}
