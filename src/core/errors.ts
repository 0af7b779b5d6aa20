export type PipelineErrorCode =
  | 'MALFORMED_DOCUMENT'
  | 'SECTION_NOT_FOUND'
  | 'ANALYSIS_UNAVAILABLE'
  | 'RETRIEVAL_FAILURE';

/**
 * Base class for every condition the pipeline can recover from.
 * None of these end the process; the orchestrator maps them to outcomes.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.context = context;
  }
}

export class MalformedDocumentError extends PipelineError {
  readonly code = 'MALFORMED_DOCUMENT' as const;
}

export class SectionNotFoundError extends PipelineError {
  readonly code = 'SECTION_NOT_FOUND' as const;
}

export class AnalysisUnavailableError extends PipelineError {
  readonly code = 'ANALYSIS_UNAVAILABLE' as const;
}

export type RetrievalFailureKind = 'not_found' | 'rate_limited' | 'transient';

export class RetrievalFailureError extends PipelineError {
  readonly code = 'RETRIEVAL_FAILURE' as const;
  readonly kind: RetrievalFailureKind;

  constructor(
    kind: RetrievalFailureKind,
    message: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, context, cause);
    this.kind = kind;
  }

  /** Rate limits and transient faults may succeed if the caller tries again later. */
  get retryable(): boolean {
    return this.kind !== 'not_found';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
