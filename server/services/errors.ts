export type PipelineErrorCode =
  | 'BLOCKED'
  | 'SESSION_EXPIRED'
  | 'EXTRACTION_ERROR'
  | 'TRANSPORT_ERROR';

/**
 * Stage-level failure. Anything carrying one of these codes aborts the
 * current stage; record-level anomalies are never thrown.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

/** The target site answered with an access-denial status. */
export class BlockedError extends PipelineError {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string) {
    super('BLOCKED', `Access denied (HTTP ${status}) for ${url}`);
    this.name = 'BlockedError';
    this.status = status;
    this.url = url;
  }
}

export class SessionExpiredError extends PipelineError {
  constructor(message: string) {
    super('SESSION_EXPIRED', message);
    this.name = 'SessionExpiredError';
  }
}

/** Expected page structure missing; usually a challenge page, not data. */
export class ExtractionError extends PipelineError {
  readonly url: string;

  constructor(message: string, url: string) {
    super('EXTRACTION_ERROR', message);
    this.name = 'ExtractionError';
    this.url = url;
  }
}

export class TransportError extends PipelineError {
  readonly url: string;

  constructor(message: string, url: string, cause?: unknown) {
    super('TRANSPORT_ERROR', message, { cause });
    this.name = 'TransportError';
    this.url = url;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
