/**
 * Error taxonomy shared by every subsystem.
 *
 * Configuration errors are fatal and never retried. Expected operational
 * states (disabled, gate not passed, queue empty) are not errors and are
 * never thrown; they are written as `skipped` decisions instead.
 */

export class ConfigurationError extends Error {
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, { cause });
    this.name = 'ConfigurationError';
    this.cause = cause;
  }
}

export class UnknownHandlerError extends ConfigurationError {
  readonly handlerKey: string;
  readonly stepId: string;

  constructor(handlerKey: string, stepId: string) {
    super(`Handler not registered: ${handlerKey} (step ${stepId})`);
    this.name = 'UnknownHandlerError';
    this.handlerKey = handlerKey;
    this.stepId = stepId;
  }
}

export class PathEscapeError extends ConfigurationError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Unsafe path "${path}": ${reason}`);
    this.name = 'PathEscapeError';
    this.path = path;
  }
}

export class StepFailedError<TSummary = unknown> extends Error {
  readonly stepId: string;
  /** Summary of the run up to and including the failed step. */
  readonly summary: TSummary;
  override readonly cause?: Error;

  constructor(stepId: string, summary: TSummary, cause?: Error) {
    super(`Step ${stepId} failed: ${cause?.message ?? 'unknown error'}`, { cause });
    this.name = 'StepFailedError';
    this.stepId = stepId;
    this.summary = summary;
    this.cause = cause;
  }
}

export class QualityGateFailedError extends Error {
  readonly runId: string;
  readonly codes: string[];

  constructor(runId: string, codes: string[]) {
    super(`Quality gate failed for run_id=${runId}; reasons=${codes.slice(0, 3).join(', ')}`);
    this.name = 'QualityGateFailedError';
    this.runId = runId;
    this.codes = codes;
  }
}

export class PublishFailedError extends Error {
  readonly runId: string;
  readonly code: string;
  readonly attemptCount: number;
  override readonly cause?: Error;

  constructor(runId: string, code: string, attemptCount: number, cause?: Error) {
    super(`Publish failed for run_id=${runId}; code=${code}`, { cause });
    this.name = 'PublishFailedError';
    this.runId = runId;
    this.code = code;
    this.attemptCount = attemptCount;
    this.cause = cause;
  }
}

export class QueueStateError extends Error {
  readonly filename: string;

  constructor(message: string, filename: string) {
    super(message);
    this.name = 'QueueStateError';
    this.filename = filename;
  }
}

export class SchedulePlanError extends Error {
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, { cause });
    this.name = 'SchedulePlanError';
    this.cause = cause;
  }
}

// Upload taxonomy

export class UploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UploadError';
  }
}

export class UploadDepsMissingError extends UploadError {
  constructor(message: string) {
    super(message);
    this.name = 'UploadDepsMissingError';
  }
}

export class UploadAuthMissingError extends UploadError {
  readonly variable: string;

  constructor(variable: string) {
    super(`Missing required upload auth environment variable: ${variable}`);
    this.name = 'UploadAuthMissingError';
    this.variable = variable;
  }
}

export class UploadApiError extends UploadError {
  /** HTTP status of the failed response, when one was received. */
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'UploadApiError';
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
