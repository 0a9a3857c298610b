export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
    baseUrl: string;
    timeoutMs: number;
    fetchImpl?: FetchLike;
}

/**
 * Issue a request that is aborted after `timeoutMs`. Network failures and
 * timeouts reject; any HTTP status resolves.
 */
export async function fetchWithTimeout(
    fetchImpl: FetchLike,
    url: string,
    init: RequestInit,
    timeoutMs: number,
): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
        return await fetchImpl(url, { ...init, signal: controller.signal });
    } finally {
        clearTimeout(timer);
    }
}

export function trimBaseUrl(baseUrl: string): string {
    return baseUrl.replace(/\/$/, '');
}
