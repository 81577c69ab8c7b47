import { extractBlocks } from "../extract/blocks.js";
import { fetchPage } from "../lib/http.js";
import { ParseError } from "../pipeline/errors.js";
import { emitAgentEvent } from "../pipeline/events.js";
import type { ExtractedBlock, FetchResult, TagKind, UrlRecord } from "../pipeline/types.js";

export interface ScrapePageOptions {
  timeoutMs: number;
  maxBytes: number;
  maxRedirects: number;
  tags: readonly TagKind[];
}

export interface ScrapedPage {
  fetch: FetchResult;
  blocks: ExtractedBlock[];
}

export async function scrapePage(record: UrlRecord, options: ScrapePageOptions): Promise<ScrapedPage> {
  if (!record.valid || !record.url) {
    throw new Error(`scrapePage called with an invalid record at index ${record.index}`);
  }
  const url = record.url;

  const response = await fetchPage(url, {
    timeoutMs: options.timeoutMs,
    maxBytes: options.maxBytes,
    maxRedirects: options.maxRedirects,
  });

  const fetched: FetchResult = {
    record,
    ok: response.ok,
    status: response.status,
    statusText: response.statusText,
    finalUrl: response.finalUrl,
    contentType: response.contentType,
    bytesRead: response.bytesRead,
    durationMs: response.durationMs,
    failure: response.failure,
  };

  if (!response.ok) {
    return { fetch: fetched, blocks: [] };
  }

  // The raw body is only held for extraction; results keep blocks alone.
  try {
    const blocks = extractBlocks(response.body ?? "", { tags: options.tags, sourceUrl: url });
    emitAgentEvent({
      level: "info",
      eventType: "extract.result",
      message: "Extracted text blocks",
      url,
      blocks: blocks.length,
    });
    return { fetch: fetched, blocks };
  } catch (error) {
    if (!(error instanceof ParseError)) {
      throw error;
    }
    emitAgentEvent({
      level: "warn",
      eventType: "extract.result",
      message: "HTML parse failed",
      phase: "fail",
      url,
      errorCode: error.code,
      errorMessage: error.message,
    });
    return {
      fetch: { ...fetched, ok: false, failure: error.toFailure() },
      blocks: [],
    };
  }
}
