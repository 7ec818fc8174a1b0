export type PipelineStage = 'capture' | 'decide' | 'gate' | 'execute';

export abstract class PipelineError extends Error {
  abstract readonly stage: PipelineStage;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CaptureError extends PipelineError {
  readonly stage = 'capture';
}

export type InferenceErrorKind =
  | 'transport'
  | 'timeout'
  | 'http_status'
  | 'malformed';

/**
 * The inference service could not be reached, answered with a non-2xx
 * status, timed out, or replied with no parseable JSON object.
 */
export class InferenceError extends PipelineError {
  readonly stage = 'decide';

  constructor(
    readonly kind: InferenceErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * The reply contained JSON that breaks the decision schema.
 */
export class ValidationError extends PipelineError {
  readonly stage = 'decide';

  constructor(readonly issues: string[]) {
    super(`Invalid decision: ${issues.join('; ')}`);
  }
}

export class SafetyViolation extends PipelineError {
  readonly stage = 'gate';

  constructor(readonly reason: string) {
    super(`Safety violation: ${reason}`);
  }
}

export class ExecutionError extends PipelineError {
  readonly stage = 'execute';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}

/** The `code` of a Node system error such as `ENOENT`, if any. */
export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}
