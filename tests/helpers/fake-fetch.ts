import { vi } from "vitest";

export function jsonBody(body: unknown, status = 200): () => Response {
  return () =>
    new Response(JSON.stringify(body), {
      status,
      headers: { "content-type": "application/json" },
    });
}

export function textBody(body: string, status: number): () => Response {
  return () => new Response(body, { status });
}

/**
 * A fetch stand-in that answers by URL path (including the query string).
 * Unrouted paths fail the way an unreachable host does.
 */
export function createFakeFetch(routes: Record<string, () => Response>) {
  return vi.fn(async (input: string | URL, _init?: RequestInit): Promise<Response> => {
    const url = new URL(input);
    const route = routes[`${url.pathname}${url.search}`];
    if (!route) {
      throw new TypeError("fetch failed", {
        cause: new Error(`getaddrinfo ENOTFOUND ${url.hostname}`),
      });
    }
    return route();
  });
}
