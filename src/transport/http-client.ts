import type { HttpClient, HttpRequest, QueryValue, RequestParams } from "./types";

export interface FetchHttpClientConfig {
  /** e.g. https://api.exchange.test */
  baseUrl: string;
  /** Sent with every request */
  headers?: Record<string, string>;
  fetch?: typeof fetch;
}

const METHODS_WITHOUT_BODY = new Set<HttpRequest["method"]>(["GET", "DELETE"]);

const definedEntries = (params: RequestParams = {}): [string, QueryValue][] => {
  const entries: [string, QueryValue][] = [];
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      entries.push([key, value]);
    }
  }
  return entries;
};

const parseBody = (text: string): unknown => {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    // Plain-text bodies (HTML error pages, "Too Many Requests") are kept as-is
    return text;
  }
};

/**
 * Creates an HttpClient on top of the global fetch.
 *
 * GET and DELETE params go to the query string; other methods send them as a
 * JSON body.
 *
 * @example
 * ```typescript
 * const httpClient = createFetchHttpClient({ baseUrl: "https://api.exchange.test" });
 * const response = await httpClient(
 *   { method: "GET", path: "/api/v3/depth", params: { symbol: "BTCUSDT" } },
 *   AbortSignal.timeout(5000),
 * );
 * ```
 */
export const createFetchHttpClient = (config: FetchHttpClientConfig): HttpClient => {
  const { headers = {}, fetch: fetchImpl = fetch } = config;
  const baseUrl = config.baseUrl.replace(/\/+$/, "");

  return async (request, signal) => {
    const url = new URL(`${baseUrl}${request.path}`);
    const hasBody = !METHODS_WITHOUT_BODY.has(request.method);
    const params = definedEntries(request.params);

    if (!hasBody) {
      for (const [key, value] of params) {
        url.searchParams.append(key, String(value));
      }
    }

    const response = await fetchImpl(url, {
      method: request.method,
      headers: {
        accept: "application/json",
        ...(hasBody && { "content-type": "application/json" }),
        ...headers,
      },
      ...(hasBody && { body: JSON.stringify(Object.fromEntries(params)) }),
      signal,
    });

    const text = await response.text();

    return {
      status: response.status,
      headers: Object.fromEntries(
        [...response.headers.entries()].map(([name, value]) => [name.toLowerCase(), value]),
      ),
      body: parseBody(text),
    };
  };
};
