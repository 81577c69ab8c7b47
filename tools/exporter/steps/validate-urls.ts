import { fetchPage } from "../lib/http.js";
import { InvalidUrlError } from "../pipeline/errors.js";
import { emitAgentEvent } from "../pipeline/events.js";
import type { FetchFailure, UrlRecord } from "../pipeline/types.js";

export interface ValidatedUrl {
  record: UrlRecord;
  failure?: FetchFailure;
}

export interface ReachabilityOptions {
  timeoutMs: number;
  maxRedirects: number;
}

const ALLOWED_PROTOCOLS = new Set(["http:", "https:"]);

export function validateUrlLine(raw: string, index: number): ValidatedUrl {
  const candidate = raw.trim();
  try {
    const url = parseHttpUrl(candidate);
    emitAgentEvent({
      level: "debug",
      eventType: "url.validation",
      message: "URL accepted",
      index,
      url,
    });
    return {
      record: { index, raw, url, valid: true, reachability: "unchecked" },
    };
  } catch (error) {
    if (!(error instanceof InvalidUrlError)) {
      throw error;
    }
    emitAgentEvent({
      level: "warn",
      eventType: "url.validation",
      message: "URL rejected",
      phase: "fail",
      index,
      raw: candidate,
      errorCode: error.code,
      reason: error.message,
    });
    return {
      record: { index, raw, valid: false, invalidReason: error.message, reachability: "unchecked" },
      failure: error.toFailure(),
    };
  }
}

function parseHttpUrl(candidate: string): string {
  if (!candidate) {
    throw new InvalidUrlError("Empty line");
  }

  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    throw new InvalidUrlError("Not an absolute URL");
  }

  if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
    throw new InvalidUrlError(`Unsupported scheme "${parsed.protocol.replace(/:$/, "")}"`);
  }
  if (!parsed.hostname) {
    throw new InvalidUrlError("Missing host");
  }
  return candidate;
}

/**
 * HEAD request for a syntactically valid record. Returns a new record with its
 * reachability settled; failures use the fetch taxonomy.
 */
export async function checkUrlReachability(
  validated: ValidatedUrl,
  options: ReachabilityOptions
): Promise<ValidatedUrl> {
  const { record } = validated;
  if (!record.valid || !record.url) {
    return validated;
  }

  const result = await fetchPage(record.url, {
    method: "HEAD",
    timeoutMs: options.timeoutMs,
    maxBytes: 0,
    maxRedirects: options.maxRedirects,
  });

  if (result.ok) {
    return { record: { ...record, reachability: "reachable" } };
  }
  return {
    record: { ...record, reachability: "unreachable" },
    failure: result.failure,
  };
}
