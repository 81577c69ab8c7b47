import { PipelineError } from "./errors.js";
import type { Logger } from "./logger.js";
import { runWithTelemetryContext } from "./telemetry-context.js";
import type { StageName } from "./types.js";

const PROGRESS_HEARTBEAT_MS = 15_000;

/**
 * Runs one pipeline stage inside its telemetry context, with start/end/fail
 * lifecycle events and a debug heartbeat for long stages. Stages run once.
 */
export async function runStage<T>(name: StageName, logger: Logger, fn: () => Promise<T>): Promise<T> {
  const startedAt = Date.now();
  logger.info("Stage started", {
    stage: name,
    eventType: "stage.lifecycle",
    phase: "start",
  });

  const heartbeat = setInterval(() => {
    logger.debug("Stage still running", {
      stage: name,
      eventType: "stage.lifecycle",
      phase: "progress",
      elapsedSec: Math.floor((Date.now() - startedAt) / 1000),
    });
  }, PROGRESS_HEARTBEAT_MS);

  try {
    const result = await runWithTelemetryContext({ stage: name }, fn);
    logger.info("Stage completed", {
      stage: name,
      eventType: "stage.lifecycle",
      phase: "end",
      durationMs: Date.now() - startedAt,
    });
    return result;
  } catch (error) {
    logger.error("Stage failed", {
      stage: name,
      eventType: "stage.lifecycle",
      phase: "fail",
      durationMs: Date.now() - startedAt,
      errorCode: error instanceof PipelineError ? error.code : "STAGE_ERROR",
      errorMessage: error instanceof Error ? error.message : String(error),
    });
    throw error;
  } finally {
    clearInterval(heartbeat);
  }
}
