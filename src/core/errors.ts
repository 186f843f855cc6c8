/**
 * Error taxonomy shared by the store, parser, pipeline and control surfaces.
 */

export type ErrorCode =
  | 'INVALID_PATTERN'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'MALFORMED_CAPTURE'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

export interface ErrorBody {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class TrafficsmithError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = 'INTERNAL_ERROR',
    status: number = 500,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;
  }

  toJSON(): ErrorBody {
    const body: ErrorBody = { code: this.code, message: this.message };
    if (Object.keys(this.details).length > 0) {
      body.details = this.details;
    }
    return body;
  }
}

/** A rule pattern that does not compile as a regular expression */
export class InvalidPatternError extends TrafficsmithError {
  constructor(pattern: string, reason: string) {
    super(`Invalid pattern "${pattern}": ${reason}`, 'INVALID_PATTERN', 400, { pattern });
  }
}

export class NotFoundError extends TrafficsmithError {
  constructor(kind: 'filter rule' | 'host rule' | 'preset', id: string) {
    super(`Unknown ${kind}: ${id}`, 'NOT_FOUND', 404, { kind, id });
  }
}

export class ValidationError extends TrafficsmithError {
  constructor(message: string, issues: string[] = []) {
    super(message, 'VALIDATION_ERROR', 400, issues.length > 0 ? { issues } : {});
  }
}

/** The capture file is not a recognizable archive of exchanges */
export class MalformedCaptureError extends TrafficsmithError {
  constructor(source: string, reason: string) {
    super(`Malformed capture ${source}: ${reason}`, 'MALFORMED_CAPTURE', 400, { source });
  }
}

export class CancelledError extends TrafficsmithError {
  constructor(stage: string) {
    super(`Cancelled during ${stage}`, 'CANCELLED', 499, { stage });
  }
}

/**
 * Throw CancelledError when the signal has fired
 */
export function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new CancelledError(stage);
  }
}

/**
 * Normalize anything thrown into a TrafficsmithError
 */
export function toTrafficsmithError(error: unknown): TrafficsmithError {
  if (error instanceof TrafficsmithError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TrafficsmithError(message);
}
