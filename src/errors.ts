export type PipelineStage = "config" | "collect" | "summarize" | "notify";

export type Dependency = "github" | "anthropic" | "webhook";

export interface PipelineErrorOptions {
  dependency?: Dependency;
  status?: number;
  cause?: unknown;
}

/**
 * Base class for every failure that aborts a digest run. Carries the stage
 * and the external dependency involved so the run log can name both.
 */
export class PipelineError extends Error {
  readonly stage: PipelineStage;
  readonly dependency?: Dependency;
  readonly status?: number;

  constructor(
    message: string,
    stage: PipelineStage,
    public readonly code: string = "PIPELINE_FAILED",
    options: PipelineErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "PipelineError";
    this.stage = stage;
    this.dependency = options.dependency;
    this.status = options.status;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super(message, "config", "CONFIG_INVALID");
    this.name = "ConfigurationError";
  }
}

export class AuthenticationError extends PipelineError {
  constructor(message: string, stage: PipelineStage, options: PipelineErrorOptions = {}) {
    super(message, stage, "AUTH_FAILED", options);
    this.name = "AuthenticationError";
  }
}

export class NetworkError extends PipelineError {
  constructor(message: string, stage: PipelineStage, options: PipelineErrorOptions = {}) {
    super(message, stage, "NETWORK", options);
    this.name = "NetworkError";
  }
}

export class QuotaExceededError extends PipelineError {
  constructor(message: string, stage: PipelineStage, options: PipelineErrorOptions = {}) {
    super(message, stage, "QUOTA_EXCEEDED", options);
    this.name = "QuotaExceededError";
  }
}

export class MalformedResponseError extends PipelineError {
  constructor(message: string, stage: PipelineStage, options: PipelineErrorOptions = {}) {
    super(message, stage, "MALFORMED_RESPONSE", options);
    this.name = "MalformedResponseError";
  }
}

// "[collect/github] AuthenticationError: ..." for pipeline errors
export function formatDiagnostic(error: unknown): string {
  if (error instanceof PipelineError) {
    const where = error.dependency
      ? `${error.stage}/${error.dependency}`
      : error.stage;
    return `[${where}] ${error.name}: ${error.message}`;
  }
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
