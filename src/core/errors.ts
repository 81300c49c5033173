// src/core/errors.ts
export enum ErrorCode {
  CONFIGURATION_ERROR = 'configuration_error',
  MISSING_CREDENTIALS = 'missing_credentials',
  TRANSIENT_EXTERNAL_FAILURE = 'transient_external_failure',
  PERMANENT_RESOLUTION_FAILURE = 'permanent_resolution_failure',
  PARTIAL_RECORD_FAILURE = 'partial_record_failure',
  SINK_WRITE_FAILED = 'sink_write_failed',
}

export type PipelineStage = 'scrape' | 'resolve' | 'analyze' | 'write';

export class PipelineError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function configurationError(
  message: string,
  issues: string[] = [],
  suggestion?: string
): PipelineError {
  const detail = issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message;
  return new PipelineError(ErrorCode.CONFIGURATION_ERROR, detail, false, suggestion, { issues });
}

export function isConfigurationError(error: unknown): error is PipelineError {
  return (
    error instanceof PipelineError &&
    (error.code === ErrorCode.CONFIGURATION_ERROR || error.code === ErrorCode.MISSING_CREDENTIALS)
  );
}

export interface StageFailure {
  stage: PipelineStage;
  code: ErrorCode;
  message: string;
  retryable: boolean;
  /** Post id, config name or destination the failure belongs to */
  subject: string;
}

export function toFailure(error: unknown, stage: PipelineStage, subject: string): StageFailure {
  if (error instanceof PipelineError) {
    return {
      stage,
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      subject,
    };
  }

  return {
    stage,
    code: ErrorCode.PARTIAL_RECORD_FAILURE,
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
    subject,
  };
}
