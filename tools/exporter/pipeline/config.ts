import { z } from "zod";
import { inputBaseName } from "../lib/paths.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_TAGS, TAG_KINDS, type ExportOptions, type TagKind } from "./types.js";

export const DEFAULT_CONCURRENCY = 5;
export const MAX_CONCURRENCY = 32;
export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;
export const DEFAULT_REACHABILITY_TIMEOUT_MS = 5_000;
export const DEFAULT_MAX_DOWNLOAD_BYTES = 5 * 1024 * 1024;
export const DEFAULT_MAX_REDIRECTS = 1;

const tagListSchema = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((entry) => entry.trim().toLowerCase())
      .filter(Boolean)
  )
  .pipe(z.array(z.enum(TAG_KINDS)).min(1, "at least one tag is required"))
  .transform((tags): TagKind[] => [...new Set(tags)]);

export const exportOptionsSchema = z.object({
  inputPath: z.string({ required_error: "--input is required" }).min(1, "--input is required"),
  outputRoot: z.string().min(1).optional(),
  runId: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().min(1).max(MAX_CONCURRENCY).default(DEFAULT_CONCURRENCY),
  httpTimeoutMs: z.coerce.number().int().min(100).default(DEFAULT_HTTP_TIMEOUT_MS),
  maxDownloadBytes: z.coerce.number().int().min(1).default(DEFAULT_MAX_DOWNLOAD_BYTES),
  maxRedirects: z.coerce.number().int().min(0).max(5).default(DEFAULT_MAX_REDIRECTS),
  checkReachability: z.boolean().default(false),
  reachabilityTimeoutMs: z.coerce.number().int().min(100).default(DEFAULT_REACHABILITY_TIMEOUT_MS),
  tags: tagListSchema.optional().transform((tags) => tags ?? [...DEFAULT_TAGS]),
  verbose: z.boolean().default(false),
  agentLogs: z.boolean().default(true),
  eventFile: z.string().min(1).optional(),
  logFormat: z.enum(["pretty", "json"]).default("pretty"),
});

/**
 * Validates raw option values (CLI strings or already-typed values) and fills
 * in defaults. Throws {@link ConfigError} listing every rejected field.
 */
export function resolveExportOptions(
  raw: Record<string, unknown>,
  now: Date = new Date(),
  cwd: string = process.cwd()
): ExportOptions {
  const result = exportOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    ...parsed,
    outputRoot: parsed.outputRoot ?? cwd,
    runId: parsed.runId ?? createRunId(parsed.inputPath, now),
  };
}

export function createRunId(inputPath: string, now: Date): string {
  const stamp = now.toISOString().replace(/[.:]/g, "-");
  const slug = toSlug(inputBaseName(inputPath));
  return slug ? `${slug}-${stamp}` : stamp;
}

function toSlug(input: string): string {
  return input
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 40);
}
