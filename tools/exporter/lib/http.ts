import {
  FetchConnectionError,
  FetchHttpError,
  FetchTimeoutError,
  UrlError,
} from "../pipeline/errors.js";
import { emitAgentEvent } from "../pipeline/events.js";
import type { FetchFailure } from "../pipeline/types.js";

export interface FetchPageOptions {
  timeoutMs: number;
  maxBytes: number;
  maxRedirects: number;
  method?: "GET" | "HEAD";
  signal?: AbortSignal;
}

export interface FetchPageResult {
  ok: boolean;
  status?: number;
  statusText?: string;
  contentType?: string;
  finalUrl?: string;
  bytesRead: number;
  durationMs: number;
  body?: string;
  failure?: FetchFailure;
}

const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; sitemap-text-export/1.0)";
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * Single-attempt request with a hard timeout. Failures are returned as a
 * classified {@link FetchFailure}, never thrown.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<FetchPageResult> {
  const startedAt = Date.now();
  const method = options.method ?? "GET";
  emitAgentEvent({
    level: "info",
    eventType: "http.request",
    message: "HTTP request start",
    phase: "start",
    action: method,
    url,
  });

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const forwardAbort = () => controller.abort(options.signal?.reason);
  options.signal?.addEventListener("abort", forwardAbort, { once: true });

  try {
    const { response, finalUrl } = await requestWithRedirects(
      url,
      method,
      options.maxRedirects,
      controller.signal
    );

    const contentType = response.headers.get("content-type") ?? undefined;

    if (!response.ok) {
      await response.body?.cancel();
      throw new FetchHttpError(
        `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""} for ${url}`,
        response.status
      );
    }

    let body: string | undefined;
    let bytesRead = 0;
    if (method === "GET") {
      const declared = Number(response.headers.get("content-length") ?? Number.NaN);
      if (Number.isFinite(declared) && declared > options.maxBytes) {
        await response.body?.cancel();
        throw tooLarge(url, declared, options.maxBytes);
      }
      const bytes = await readBodyWithLimit(response, url, options.maxBytes);
      bytesRead = bytes.byteLength;
      body = decodeContent(bytes);
    }

    const durationMs = Date.now() - startedAt;
    emitAgentEvent({
      level: "info",
      eventType: "http.response",
      message: "HTTP request success",
      phase: "end",
      url,
      durationMs,
      statusCode: response.status,
      bytes: bytesRead,
    });

    return {
      ok: true,
      status: response.status,
      statusText: response.statusText,
      contentType,
      finalUrl,
      bytesRead,
      durationMs,
      body,
    };
  } catch (error) {
    const classified = classifyFetchError(url, error, timedOut, options.timeoutMs);
    const durationMs = Date.now() - startedAt;
    const failure = classified.toFailure();
    emitAgentEvent({
      level: "warn",
      eventType: "http.response",
      message: "HTTP request failed",
      phase: "fail",
      url,
      durationMs,
      statusCode: failure.status,
      errorCode: classified.code,
      errorMessage: classified.message,
    });
    return {
      ok: false,
      status: failure.status,
      bytesRead: 0,
      durationMs,
      failure,
    };
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", forwardAbort);
  }
}

async function requestWithRedirects(
  url: string,
  method: "GET" | "HEAD",
  maxRedirects: number,
  signal: AbortSignal
): Promise<{ response: Response; finalUrl: string }> {
  let current = url;
  for (let hops = 0; ; hops++) {
    const response = await fetch(current, {
      method,
      headers: {
        "User-Agent": DEFAULT_USER_AGENT,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      },
      redirect: "manual",
      signal,
    });

    const location = response.headers.get("location");
    if (!REDIRECT_STATUSES.has(response.status) || !location || hops >= maxRedirects) {
      return { response, finalUrl: current };
    }

    await response.body?.cancel();
    current = new URL(location, current).toString();
    emitAgentEvent({
      level: "debug",
      eventType: "http.request",
      message: "Following redirect",
      phase: "progress",
      url: current,
      statusCode: response.status,
    });
  }
}

export function classifyFetchError(
  url: string,
  error: unknown,
  timedOut: boolean,
  timeoutMs: number
): UrlError {
  if (error instanceof UrlError) {
    return error;
  }

  if (isAbortError(error)) {
    if (timedOut) {
      return new FetchTimeoutError(url, timeoutMs);
    }
    return new FetchConnectionError(`Request aborted: ${url}`, error);
  }

  if (error instanceof Error) {
    const code = causeCode(error);
    return new FetchConnectionError(
      `${error.message}${code ? ` (${code})` : ""}: ${url}`,
      error
    );
  }

  return new FetchConnectionError(`${String(error)}: ${url}`, error);
}

function isAbortError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

function causeCode(error: Error): string | undefined {
  const cause = error.cause;
  if (typeof cause === "object" && cause !== null && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
}

/** Reads the body chunk by chunk and cancels the stream once it passes `maxBytes`. */
async function readBodyWithLimit(response: Response, url: string, maxBytes: number): Promise<Uint8Array> {
  if (!response.body) {
    return new Uint8Array(0);
  }
  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw tooLarge(url, total, maxBytes);
    }
    chunks.push(value);
  }
  return Buffer.concat(chunks, total);
}

function tooLarge(url: string, bytes: number, maxBytes: number): FetchConnectionError {
  return new FetchConnectionError(
    `Response too large for ${url}: ${bytes} bytes > ${maxBytes} bytes`
  );
}

function decodeContent(buffer: Uint8Array): string {
  const utf8 = new TextDecoder("utf-8", { fatal: true });
  try {
    return utf8.decode(buffer);
  } catch {
    return new TextDecoder("windows-1252", { fatal: false }).decode(buffer);
  }
}
