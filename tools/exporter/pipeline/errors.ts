import type { FailureKind, FetchFailure } from "./types.js";

export class PipelineError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, options: { code: string; retryable?: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
  }
}

/** Errors scoped to a single URL. They end up in the log, never abort the run. */
export abstract class UrlError extends PipelineError {
  abstract readonly kind: FailureKind;

  toFailure(): FetchFailure {
    return { kind: this.kind, message: this.message };
  }
}

export class InvalidUrlError extends UrlError {
  readonly kind = "InvalidURL";

  constructor(message: string) {
    super(message, { code: "INVALID_URL" });
  }
}

export class FetchTimeoutError extends UrlError {
  readonly kind = "FetchTimeout";

  constructor(url: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms: ${url}`, { code: "FETCH_TIMEOUT" });
  }
}

export class FetchConnectionError extends UrlError {
  readonly kind = "FetchConnectionError";

  constructor(message: string, cause?: unknown) {
    super(message, { code: "FETCH_CONNECTION", cause });
  }
}

export class FetchHttpError extends UrlError {
  readonly kind = "FetchHTTPError";

  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message, { code: "FETCH_HTTP" });
  }

  override toFailure(): FetchFailure {
    return { kind: this.kind, message: this.message, status: this.status };
  }
}

export class ParseError extends UrlError {
  readonly kind = "ParseError";

  constructor(message: string, cause?: unknown) {
    super(message, { code: "PARSE_ERROR", cause });
  }
}

export class ConfigError extends PipelineError {
  constructor(public readonly issues: string[]) {
    super(`Invalid options: ${issues.join("; ")}`, { code: "CONFIG_INVALID" });
  }
}

export class RunFatalError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "RUN_FATAL", cause });
  }
}
