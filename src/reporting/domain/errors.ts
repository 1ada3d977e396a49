export type ReportErrorCode =
  | "CONFIGURATION"
  | "INVALID_INPUT"
  | "SOURCE_UNAVAILABLE"
  | "SECTION_GENERATION_FAILED"
  | "RENDER_FAILURE"
  | "PIPELINE_TIMEOUT";

export class ReportError extends Error {
  constructor(
    message: string,
    public readonly code: ReportErrorCode,
    public readonly fatal: boolean,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ReportError";
  }
}

/** Missing or malformed settings; raised once at startup. */
export class ConfigurationError extends ReportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIGURATION", true, details);
    this.name = "ConfigurationError";
  }
}

export class InputError extends ReportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "INVALID_INPUT", true, details);
    this.name = "InputError";
  }
}

export class SourceUnavailable extends ReportError {
  constructor(source: string, reason: string) {
    super(`${source} unavailable: ${reason}`, "SOURCE_UNAVAILABLE", false, {
      source,
    });
    this.name = "SourceUnavailable";
  }
}

export class SectionGenerationFailed extends ReportError {
  constructor(
    public readonly sectionName: string,
    public readonly reason: string,
    public readonly attempts: number
  ) {
    super(
      `Section "${sectionName}" failed after ${attempts} attempt(s): ${reason}`,
      "SECTION_GENERATION_FAILED",
      false,
      { sectionName, attempts }
    );
    this.name = "SectionGenerationFailed";
  }
}

export class RenderFailure extends ReportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "RENDER_FAILURE", true, details);
    this.name = "RenderFailure";
  }
}

export class PipelineTimeoutError extends ReportError {
  constructor(timeoutMs: number) {
    super(
      `Report generation exceeded ${timeoutMs}ms and was aborted`,
      "PIPELINE_TIMEOUT",
      true,
      { timeoutMs }
    );
    this.name = "PipelineTimeoutError";
  }
}
