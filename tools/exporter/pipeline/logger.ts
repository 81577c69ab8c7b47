import type { EventType, StageName } from "./types.js";
import { emitAgentEvent, type LogLevel } from "./events.js";

export interface LogMeta {
  stage?: StageName | "system";
  index?: number;
  eventType?: EventType;
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

export class Logger {
  debug(message: string, meta: LogMeta = {}): void {
    this.emit("debug", message, meta);
  }

  info(message: string, meta: LogMeta = {}): void {
    this.emit("info", message, meta);
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.emit("warn", message, meta);
  }

  error(message: string, meta: LogMeta = {}): void {
    this.emit("error", message, meta);
  }

  private emit(level: LogLevel, message: string, meta: LogMeta): void {
    emitAgentEvent({
      level,
      message,
      eventType: meta.eventType ?? "stage.lifecycle",
      ...meta,
    });
  }
}
