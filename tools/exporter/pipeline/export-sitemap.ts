import { basename } from "path";
import { ensureDir, readTextFile, splitLines, writeTextAtomic } from "../lib/files.js";
import { runOutputPaths } from "../lib/paths.js";
import { assembleReport } from "../report/assemble.js";
import { scrapePage } from "../steps/scrape-page.js";
import { checkUrlReachability, validateUrlLine, type ValidatedUrl } from "../steps/validate-urls.js";
import { RunFatalError } from "./errors.js";
import { initializeEventEmitter } from "./events.js";
import { Logger } from "./logger.js";
import { runPool } from "./pool.js";
import { runStage } from "./stage-runner.js";
import { runWithTelemetryContext } from "./telemetry-context.js";
import type { ExportOptions, ExportOutcome, UrlOutcome } from "./types.js";

export async function runExportPipeline(
  options: ExportOptions,
  startedAt: Date = new Date()
): Promise<ExportOutcome> {
  initializeEventEmitter({
    runId: options.runId,
    format: options.logFormat,
    verbose: options.verbose,
    agentLogs: options.agentLogs,
    eventFilePath: options.eventFile,
  });
  const logger = new Logger();

  logger.info("Export start", {
    eventType: "summary",
    inputPath: options.inputPath,
    outputRoot: options.outputRoot,
    concurrency: options.concurrency,
    httpTimeoutMs: options.httpTimeoutMs,
    maxDownloadBytes: options.maxDownloadBytes,
    maxRedirects: options.maxRedirects,
    checkReachability: options.checkReachability,
    tags: options.tags,
  });

  const lines = await runStage("read-input", logger, async () => readInputLines(options.inputPath));

  const validated = await runStage("validate", logger, async () => {
    const checked = lines.map((line, index) => validateUrlLine(line, index));
    if (!options.checkReachability) {
      return checked;
    }
    return runPool(checked, options.concurrency, (entry, index) =>
      runWithTelemetryContext({ stage: "validate", index }, () =>
        checkUrlReachability(entry, {
          timeoutMs: options.reachabilityTimeoutMs,
          maxRedirects: options.maxRedirects,
        })
      )
    );
  });

  const outcomes = await runStage("scrape", logger, () => scrapeAll(validated, options, logger));

  const report = await runStage("assemble", logger, async () =>
    assembleReport({
      outcomes,
      inputName: basename(options.inputPath),
      generatedAt: startedAt,
    })
  );

  const paths = runOutputPaths(options.outputRoot, options.inputPath, startedAt);
  await runStage("write", logger, async () => {
    try {
      ensureDir(paths.outputDir);
      writeTextAtomic(paths.documentPath, report.document);
      writeTextAtomic(paths.logPath, report.log);
    } catch (error) {
      throw new RunFatalError(
        `Cannot write output folder ${paths.outputDir}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  });

  logger.info("Export completed", {
    eventType: "summary",
    total: report.summary.total,
    succeeded: report.summary.succeeded,
    failed: report.summary.failed,
    path: paths.outputDir,
  });

  return { ...paths, report };
}

function readInputLines(inputPath: string): string[] {
  try {
    return splitLines(readTextFile(inputPath));
  } catch (error) {
    throw new RunFatalError(
      `Cannot read input file ${inputPath}: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}

async function scrapeAll(
  validated: readonly ValidatedUrl[],
  options: ExportOptions,
  logger: Logger
): Promise<UrlOutcome[]> {
  const outcomes: UrlOutcome[] = validated.map(({ record, failure }) => ({
    record,
    failure,
    blocks: [],
  }));

  const pending = validated.filter((entry) => entry.record.valid && !entry.failure);
  let completed = 0;

  const pages = await runPool(
    pending,
    options.concurrency,
    ({ record }) =>
      runWithTelemetryContext({ stage: "scrape", index: record.index }, () =>
        scrapePage(record, {
          timeoutMs: options.httpTimeoutMs,
          maxBytes: options.maxDownloadBytes,
          maxRedirects: options.maxRedirects,
          tags: options.tags,
        })
      ),
    (_, page) => {
      completed += 1;
      logger.info("URL processed", {
        eventType: "progress",
        phase: "progress",
        index: page.fetch.record.index,
        url: page.fetch.record.url,
        completed,
        total: pending.length,
      });
    }
  );

  // Joined: fold page results back into their input slots.
  for (const page of pages) {
    outcomes[page.fetch.record.index] = {
      record: page.fetch.record,
      failure: page.fetch.failure,
      fetch: page.fetch,
      blocks: page.blocks,
    };
  }

  return outcomes;
}
