import { mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { dirname } from "path";
import { emitAgentEvent } from "../pipeline/events.js";

export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true });
}

export function readTextFile(path: string): string {
  emitAgentEvent({
    level: "debug",
    eventType: "file.read",
    message: "Reading text file",
    path,
  });
  return readFileSync(path, "utf-8");
}

export function writeTextAtomic(path: string, content: string): void {
  ensureDir(dirname(path));
  emitAgentEvent({
    level: "debug",
    eventType: "file.write",
    message: "Writing text file atomically",
    path,
    bytes: Buffer.byteLength(content, "utf-8"),
  });
  const tmpPath = `${path}.tmp-${process.pid}-${Date.now()}`;
  writeFileSync(tmpPath, content);
  renameSync(tmpPath, path);
}

/**
 * Splits file content into lines. A single trailing line terminator does not
 * produce an extra empty line; blank lines elsewhere are kept.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const withoutBom = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const lines = withoutBom.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}
