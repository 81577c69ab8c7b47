import { afterEach, describe, expect, test, vi } from "vitest";
import { fetchPage } from "../lib/http.js";
import { stubFetch } from "./fetch-stub.js";

const LIMITS = { timeoutMs: 1_000, maxBytes: 1024, maxRedirects: 1 };

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("fetchPage", () => {
  test("returns the decoded body and response metadata", async () => {
    stubFetch({
      "https://ok.example/page": {
        body: "<p>x</p>",
        headers: { "content-type": "text/html; charset=utf-8" },
      },
    });

    const result = await fetchPage("https://ok.example/page", LIMITS);

    expect(result.ok).toBe(true);
    expect(result.status).toBe(200);
    expect(result.body).toBe("<p>x</p>");
    expect(result.bytesRead).toBe(8);
    expect(result.contentType).toBe("text/html; charset=utf-8");
    expect(result.finalUrl).toBe("https://ok.example/page");
    expect(result.failure).toBeUndefined();
  });

  test("classifies non-2xx responses as HTTP errors with their status", async () => {
    stubFetch({ "https://ok.example/missing": { status: 404, body: "nope" } });

    const result = await fetchPage("https://ok.example/missing", LIMITS);

    expect(result.ok).toBe(false);
    expect(result.status).toBe(404);
    expect(result.failure).toEqual({
      kind: "FetchHTTPError",
      status: 404,
      message: "HTTP 404 for https://ok.example/missing",
    });
  });

  test("follows one relative redirect", async () => {
    const { calls } = stubFetch({
      "https://ok.example/old": { status: 301, headers: { location: "/new" } },
      "https://ok.example/new": { body: "done" },
    });

    const result = await fetchPage("https://ok.example/old", LIMITS);

    expect(result.ok).toBe(true);
    expect(result.body).toBe("done");
    expect(result.finalUrl).toBe("https://ok.example/new");
    expect(calls.map((call) => call.url)).toEqual(["https://ok.example/old", "https://ok.example/new"]);
  });

  test("stops at the redirect limit and reports the redirect status", async () => {
    const { calls } = stubFetch({
      "https://ok.example/a": { status: 302, headers: { location: "https://ok.example/b" } },
      "https://ok.example/b": { status: 302, headers: { location: "https://ok.example/c" } },
      "https://ok.example/c": { body: "never" },
    });

    const result = await fetchPage("https://ok.example/a", LIMITS);

    expect(result.ok).toBe(false);
    expect(result.failure?.kind).toBe("FetchHTTPError");
    expect(result.failure?.status).toBe(302);
    expect(calls).toHaveLength(2);
  });

  test("does not follow redirects when the limit is zero", async () => {
    stubFetch({
      "https://ok.example/a": { status: 301, headers: { location: "https://ok.example/b" } },
    });

    const result = await fetchPage("https://ok.example/a", { ...LIMITS, maxRedirects: 0 });

    expect(result.failure).toEqual({
      kind: "FetchHTTPError",
      status: 301,
      message: "HTTP 301 for https://ok.example/a",
    });
  });

  test("times out a request that never answers", async () => {
    stubFetch({ "https://ok.example/slow": { hang: true } });

    const result = await fetchPage("https://ok.example/slow", { ...LIMITS, timeoutMs: 20 });

    expect(result.ok).toBe(false);
    expect(result.failure).toEqual({
      kind: "FetchTimeout",
      message: "Timed out after 20ms: https://ok.example/slow",
    });
  });

  test("classifies network failures as connection errors with the cause code", async () => {
    stubFetch({
      "https://nowhere.example/": {
        error: new TypeError("fetch failed", { cause: { code: "ENOTFOUND" } }),
      },
    });

    const result = await fetchPage("https://nowhere.example/", LIMITS);

    expect(result.failure).toEqual({
      kind: "FetchConnectionError",
      message: "fetch failed (ENOTFOUND): https://nowhere.example/",
    });
  });

  test("rejects bodies over the size cap", async () => {
    stubFetch({ "https://ok.example/big": { body: "abcdefghij" } });

    const result = await fetchPage("https://ok.example/big", { ...LIMITS, maxBytes: 5 });

    expect(result.failure).toEqual({
      kind: "FetchConnectionError",
      message: "Response too large for https://ok.example/big: 10 bytes > 5 bytes",
    });
  });

  test("stops reading a streamed body once it passes the size cap", async () => {
    const encoder = new TextEncoder();
    const chunks = ["aaaa", "bbbb", "cccc"];
    const delivered: string[] = [];
    let cancelled = false;
    const stream = new ReadableStream<Uint8Array>(
      {
        pull(controller) {
          const next = chunks.shift();
          if (next === undefined) {
            controller.close();
            return;
          }
          delivered.push(next);
          controller.enqueue(encoder.encode(next));
        },
        cancel() {
          cancelled = true;
        },
      },
      { highWaterMark: 0 }
    );
    stubFetch({ "https://ok.example/stream": { stream } });

    const result = await fetchPage("https://ok.example/stream", { ...LIMITS, maxBytes: 6 });

    expect(result.failure).toEqual({
      kind: "FetchConnectionError",
      message: "Response too large for https://ok.example/stream: 8 bytes > 6 bytes",
    });
    expect(cancelled).toBe(true);
    expect(delivered).toEqual(["aaaa", "bbbb"]);
  });

  test("sends HEAD without reading a body", async () => {
    const { calls } = stubFetch({ "https://ok.example/head": {} });

    const result = await fetchPage("https://ok.example/head", { ...LIMITS, method: "HEAD" });

    expect(result.ok).toBe(true);
    expect(result.body).toBeUndefined();
    expect(result.bytesRead).toBe(0);
    expect(calls).toEqual([{ url: "https://ok.example/head", method: "HEAD" }]);
  });
});
