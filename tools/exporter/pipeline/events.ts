import { appendFileSync } from "fs";
import { dirname } from "path";
import { ensureDir } from "../lib/files.js";
import { getTelemetryContext } from "./telemetry-context.js";
import type { AgentEvent, EventType, LogRuntimeConfig } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EmitInput {
  level: LogLevel;
  message: string;
  eventType?: EventType;
  stage?: AgentEvent["stage"];
  index?: number;
  phase?: AgentEvent["phase"];
  action?: string;
  url?: string;
  durationMs?: number;
  statusCode?: number;
  bytes?: number;
  path?: string;
  errorCode?: string;
  [key: string]: unknown;
}

const MAX_TEXT_LENGTH = 240;
const MAX_URL_LENGTH = 2048;

const PRETTY_OMITTED_KEYS = new Set(["ts", "runId", "level", "stage", "index", "eventType", "message"]);
const CONDENSED_KEYS = ["url", "statusCode", "durationMs", "completed", "total", "errorCode"] as const;

const failedOrWarned = (event: AgentEvent) => event.phase === "fail" || event.level === "warn";

// Non-verbose terminal policy per event type; errors always print and debug never does.
const TERMINAL_POLICY: Record<EventType, (event: AgentEvent) => boolean> = {
  "stage.lifecycle": (event) => event.phase !== "progress",
  "http.request": () => false,
  "http.response": failedOrWarned,
  "url.validation": failedOrWarned,
  "extract.result": () => false,
  progress: () => true,
  "file.read": () => false,
  "file.write": () => false,
  summary: () => true,
};

class EventSink {
  constructor(private readonly config: LogRuntimeConfig) {}

  emit(input: EmitInput): void {
    const ctx = getTelemetryContext();
    const { level, message, ...extras } = input;
    const event = sanitizeEvent({
      ...extras,
      ts: new Date().toISOString(),
      runId: this.config.runId,
      level,
      stage: input.stage ?? ctx.stage,
      index: input.index ?? ctx.index,
      eventType: input.eventType ?? "stage.lifecycle",
      message,
    });

    if (this.config.agentLogs && shouldPrintToTerminal(event, this.config.verbose)) {
      this.print(event);
    }
    if (this.config.eventFilePath) {
      ensureDir(dirname(this.config.eventFilePath));
      appendFileSync(this.config.eventFilePath, `${JSON.stringify(event)}\n`);
    }
  }

  private print(event: AgentEvent): void {
    const line =
      this.config.format === "json"
        ? JSON.stringify(event)
        : this.config.verbose
          ? renderPretty(event)
          : renderCondensed(event);

    if (event.level === "error") {
      console.error(line);
    } else if (event.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

let sink: EventSink | null = null;

export function initializeEventEmitter(config: LogRuntimeConfig): void {
  sink = new EventSink(config);
}

export function resetEventEmitter(): void {
  sink = null;
}

export function emitAgentEvent(input: EmitInput): void {
  sink?.emit(input);
}

export function shouldPrintToTerminal(event: AgentEvent, verbose: boolean): boolean {
  if (verbose || event.level === "error") {
    return true;
  }
  if (event.level === "debug") {
    return false;
  }
  return TERMINAL_POLICY[event.eventType](event);
}

/** `<ts> [stage/index] [eventType] message key=value ...` with every extra field. */
export function renderPretty(event: AgentEvent): string {
  const where = event.index === undefined ? event.stage : `${event.stage}/${event.index}`;
  const extras = Object.entries(event)
    .filter(([key, value]) => !PRETTY_OMITTED_KEYS.has(key) && isPresent(value))
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return joinLine(`${event.ts} [${where}] [${event.eventType}] ${event.message}`, extras);
}

/** `[HH:MM:SS] stage#index phase message` followed by the few fields worth a glance. */
export function renderCondensed(event: AgentEvent): string {
  const time = /T(\d{2}:\d{2}:\d{2})/.exec(event.ts)?.[1] ?? event.ts;
  const where = event.index === undefined ? event.stage : `${event.stage}#${event.index}`;
  const phase = event.phase ? ` ${event.phase}` : "";
  const extras = CONDENSED_KEYS.filter((key) => isPresent(event[key])).map(
    (key) => `${key}=${JSON.stringify(event[key])}`
  );
  return joinLine(`[${time}] ${where}${phase} ${event.message}`, extras);
}

/**
 * Strips credentials from URLs and truncates long text. URLs keep their path
 * and query, which is what tells two sitemap entries apart.
 */
export function sanitizeEvent(event: AgentEvent): AgentEvent {
  const sanitized: AgentEvent = { ...event };
  for (const [key, value] of Object.entries(event)) {
    sanitized[key] = sanitizeValue(value);
  }
  return sanitized;
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === "string") {
    return /^https?:\/\//i.test(value) ? sanitizeUrl(value) : truncate(value, MAX_TEXT_LENGTH);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, sanitizeValue(item)]));
  }
  return value;
}

function sanitizeUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return truncate(value, MAX_TEXT_LENGTH);
  }
  if (!url.username && !url.password) {
    return truncate(value, MAX_URL_LENGTH);
  }
  url.username = "";
  url.password = "";
  return truncate(url.toString(), MAX_URL_LENGTH);
}

function truncate(value: string, max: number): string {
  return value.length <= max ? value : `${value.slice(0, max)}...[truncated]`;
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== "";
}

function joinLine(head: string, extras: string[]): string {
  return extras.length > 0 ? `${head} ${extras.join(" ")}` : head;
}
