export const STAGE_ORDER = ["read-input", "validate", "scrape", "assemble", "write"] as const;

export type StageName = (typeof STAGE_ORDER)[number];

export const TAG_KINDS = ["title", "h1", "h2", "h3", "p", "li"] as const;

export type TagKind = (typeof TAG_KINDS)[number];

export const DEFAULT_TAGS: readonly TagKind[] = ["h1", "h2", "p", "li"];

export type Reachability = "unchecked" | "reachable" | "unreachable";

export interface UrlRecord {
  index: number;
  raw: string;
  url?: string;
  valid: boolean;
  invalidReason?: string;
  reachability: Reachability;
}

export type FailureKind =
  | "InvalidURL"
  | "FetchTimeout"
  | "FetchConnectionError"
  | "FetchHTTPError"
  | "ParseError";

export interface FetchFailure {
  kind: FailureKind;
  message: string;
  status?: number;
}

export interface ExtractedBlock {
  tag: TagKind;
  text: string;
  sourceUrl: string;
}

export interface FetchResult {
  record: UrlRecord;
  ok: boolean;
  status?: number;
  statusText?: string;
  finalUrl?: string;
  contentType?: string;
  bytesRead: number;
  durationMs: number;
  failure?: FetchFailure;
}

/**
 * Everything known about one input line after the run. `fetch` is absent for
 * lines that never reached the fetcher (invalid or unreachable).
 */
export interface UrlOutcome {
  record: UrlRecord;
  failure?: FetchFailure;
  fetch?: FetchResult;
  blocks: ExtractedBlock[];
}

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
}

export interface ReportSection {
  url: string;
  ok: boolean;
  lines: string[];
}

export interface RunReport {
  summary: RunSummary;
  sections: ReportSection[];
  logLines: string[];
  document: string;
  log: string;
}

export interface ExportOptions {
  inputPath: string;
  outputRoot: string;
  runId: string;
  concurrency: number;
  httpTimeoutMs: number;
  maxDownloadBytes: number;
  maxRedirects: number;
  checkReachability: boolean;
  reachabilityTimeoutMs: number;
  tags: TagKind[];
  verbose: boolean;
  agentLogs: boolean;
  eventFile?: string;
  logFormat: LogFormat;
}

export interface ExportOutcome {
  outputDir: string;
  documentPath: string;
  logPath: string;
  report: RunReport;
}

export type LogFormat = "pretty" | "json";
export type EventType =
  | "stage.lifecycle"
  | "http.request"
  | "http.response"
  | "url.validation"
  | "extract.result"
  | "progress"
  | "file.read"
  | "file.write"
  | "summary";

export interface AgentEvent {
  ts: string;
  runId: string;
  level: "debug" | "info" | "warn" | "error";
  stage: StageName | "system";
  index?: number;
  eventType: EventType;
  message: string;
  phase?: "start" | "end" | "fail" | "progress";
  action?: string;
  url?: string;
  durationMs?: number;
  statusCode?: number;
  bytes?: number;
  path?: string;
  errorCode?: string;
  [key: string]: unknown;
}

export interface LogRuntimeConfig {
  runId: string;
  format: LogFormat;
  verbose: boolean;
  agentLogs: boolean;
  eventFilePath?: string;
}
