import { parseArgs } from "util";
import { ConfigError } from "../pipeline/errors.js";

export const USAGE =
  "Usage: export-sitemap --input <sitemap.txt> [--output-dir <dir>] [--concurrency <n>] [--http-timeout-ms <ms>] [--max-download-bytes <n>] [--max-redirects <n>] [--check-reachability] [--reachability-timeout-ms <ms>] [--tags h1,h2,p,li] [--run-id <id>] [--verbose] [--quiet] [--event-file <path>] [--log-format pretty|json]";

const CLI_OPTIONS = {
  input: { type: "string", short: "i" },
  "output-dir": { type: "string", short: "o" },
  concurrency: { type: "string" },
  "http-timeout-ms": { type: "string" },
  "max-download-bytes": { type: "string" },
  "max-redirects": { type: "string" },
  "check-reachability": { type: "boolean" },
  "reachability-timeout-ms": { type: "string" },
  tags: { type: "string" },
  "run-id": { type: "string" },
  verbose: { type: "boolean" },
  quiet: { type: "boolean", short: "q" },
  "event-file": { type: "string" },
  "log-format": { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

function readArgs(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: true, options: CLI_OPTIONS });
}

/** Maps argv onto the raw option object that `resolveExportOptions` validates. */
export function parseCliArgs(argv: string[]): Record<string, unknown> {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    throw new ConfigError([error instanceof Error ? error.message : String(error)]);
  }

  const values = parsed.values;
  return {
    help: values.help ?? false,
    inputPath: values.input ?? parsed.positionals[0],
    outputRoot: values["output-dir"],
    runId: values["run-id"],
    concurrency: values.concurrency,
    httpTimeoutMs: values["http-timeout-ms"],
    maxDownloadBytes: values["max-download-bytes"],
    maxRedirects: values["max-redirects"],
    checkReachability: values["check-reachability"],
    reachabilityTimeoutMs: values["reachability-timeout-ms"],
    tags: values.tags,
    verbose: values.verbose,
    agentLogs: values.quiet === true ? false : undefined,
    eventFile: values["event-file"],
    logFormat: values["log-format"],
  };
}
