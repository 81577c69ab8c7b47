import { vi } from "vitest";

export interface StubRoute {
  status?: number;
  body?: string | null;
  stream?: ReadableStream<Uint8Array>;
  headers?: Record<string, string>;
  delayMs?: number;
  hang?: boolean;
  error?: Error;
}

export interface StubCall {
  url: string;
  method: string;
}

/**
 * Replaces global fetch with a route table keyed by absolute URL. Unknown
 * URLs reject the way undici does for a refused connection. Every pending
 * response honours the request's abort signal.
 */
export function stubFetch(routes: Record<string, StubRoute>): { calls: StubCall[] } {
  const calls: StubCall[] = [];

  const fetchMock = vi.fn((input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    calls.push({ url, method: init?.method ?? "GET" });
    const route = routes[url];
    const signal = init?.signal ?? undefined;

    return new Promise<Response>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const onAbort = () => {
        clearTimeout(timer);
        reject(signal?.reason);
      };

      if (!route) {
        reject(new TypeError("fetch failed", { cause: { code: "ECONNREFUSED" } }));
        return;
      }
      if (route.error) {
        reject(route.error);
        return;
      }

      signal?.addEventListener("abort", onAbort, { once: true });
      if (route.hang) {
        return;
      }

      timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve(
          new Response(route.stream ?? route.body ?? null, {
            status: route.status ?? 200,
            headers: route.headers,
          })
        );
      }, route.delayMs ?? 0);
    });
  });

  vi.stubGlobal("fetch", fetchMock);
  return { calls };
}
