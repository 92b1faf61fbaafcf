// ---------------------------------------------------------------------------
// Ingest error taxonomy
// ---------------------------------------------------------------------------

export enum IngestErrorCode {
  INVALID_RECORD = "INVALID_RECORD",
  CLOCK_REGRESSION = "CLOCK_REGRESSION",
  SEQUENCE_EXHAUSTED = "SEQUENCE_EXHAUSTED",
  SUBMISSION_TIMEOUT = "SUBMISSION_TIMEOUT",
  WRITE_FAILED = "WRITE_FAILED",
  PRIMARY_WRITE_FAILED = "PRIMARY_WRITE_FAILED",
  INVALID_PREDICATE = "INVALID_PREDICATE",
  INVALID_CONFIGURATION = "INVALID_CONFIGURATION",
  INTERNAL = "INTERNAL",
}

/** HTTP status used by the server when an error reaches a route. */
export const ERROR_HTTP_STATUS: Record<IngestErrorCode, number> = {
  [IngestErrorCode.INVALID_RECORD]: 400,
  [IngestErrorCode.INVALID_PREDICATE]: 400,
  [IngestErrorCode.SUBMISSION_TIMEOUT]: 504,
  [IngestErrorCode.CLOCK_REGRESSION]: 503,
  [IngestErrorCode.SEQUENCE_EXHAUSTED]: 503,
  [IngestErrorCode.WRITE_FAILED]: 503,
  [IngestErrorCode.PRIMARY_WRITE_FAILED]: 503,
  [IngestErrorCode.INVALID_CONFIGURATION]: 500,
  [IngestErrorCode.INTERNAL]: 500,
};

export class IngestError extends Error {
  readonly code: IngestErrorCode;

  constructor(code: IngestErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  get httpStatus(): number {
    return ERROR_HTTP_STATUS[this.code];
  }

  toJSON(): { code: IngestErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

export class InvalidRecordError extends IngestError {
  constructor(message: string) {
    super(IngestErrorCode.INVALID_RECORD, message);
  }
}

export class ClockRegressionError extends IngestError {
  constructor(readonly lastTimestampMs: number, readonly observedMs: number) {
    super(
      IngestErrorCode.CLOCK_REGRESSION,
      `Clock moved backwards by ${lastTimestampMs - observedMs}ms`,
    );
  }
}

export class SequenceExhaustedError extends IngestError {
  constructor(readonly timestampMs: number, readonly capacity: number) {
    super(
      IngestErrorCode.SEQUENCE_EXHAUSTED,
      `Sequence capacity of ${capacity} exhausted at ${timestampMs}`,
    );
  }
}

export class SubmissionTimeoutError extends IngestError {
  constructor(message = "Submission timed out before primary commit") {
    super(IngestErrorCode.SUBMISSION_TIMEOUT, message);
  }
}

export class WriteError extends IngestError {
  constructor(readonly storeId: string, message: string, options?: ErrorOptions) {
    super(IngestErrorCode.WRITE_FAILED, `[${storeId}] ${message}`, options);
  }
}

export class PrimaryWriteError extends IngestError {
  constructor(readonly recordId: string, readonly storeId: string, cause: unknown) {
    super(
      IngestErrorCode.PRIMARY_WRITE_FAILED,
      `Primary ${storeId} rejected record ${recordId}`,
      { cause },
    );
  }
}

export class InvalidPredicateError extends IngestError {
  constructor(message: string) {
    super(IngestErrorCode.INVALID_PREDICATE, message);
  }
}

export class ConfigurationError extends IngestError {
  constructor(message: string) {
    super(IngestErrorCode.INVALID_CONFIGURATION, message);
  }
}

/** Wrap anything thrown by a collaborator into the taxonomy. */
export function toIngestError(err: unknown): IngestError {
  if (err instanceof IngestError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new IngestError(IngestErrorCode.INTERNAL, message, { cause: err });
}

export function isIngestError(err: unknown): err is IngestError {
  return err instanceof IngestError;
}
