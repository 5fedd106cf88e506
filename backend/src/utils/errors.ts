// Error taxonomy for the content generation stage
// Every per-slide error carries the failure reason recorded in its GenerationResult
import type { FailureReason } from '../models';

/**
 * Base class for errors that fail a single slide without aborting the run
 */
export abstract class SlideGenerationError extends Error {
  abstract readonly reason: FailureReason;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised before any slide is processed when the strawman itself is malformed.
 * This is the only error that escapes the stage.
 */
export class StageInputError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'StageInputError';
  }
}

export class SlideValidationError extends SlideGenerationError {
  readonly reason = 'missing_required_field';

  constructor(message: string, public readonly field: string) {
    super(message);
  }
}

/**
 * No known mapping for a variant: a catalog/configuration problem, not a service fault
 */
export class TransformError extends SlideGenerationError {
  readonly reason = 'transform_failed';

  constructor(message: string, public readonly variantId: string) {
    super(message);
  }
}

export class ServiceUnavailableError extends SlideGenerationError {
  readonly reason = 'service_unavailable';
}

export class ServiceError extends SlideGenerationError {
  readonly reason = 'service_error';

  constructor(message: string, public readonly status: number, public readonly body: unknown) {
    super(message);
  }
}

export class ContentTooLongError extends SlideGenerationError {
  readonly reason = 'content_too_long';

  constructor(
    public readonly field: 'title' | 'subtitle',
    public readonly length: number,
    public readonly maxLength: number
  ) {
    super(`Generated ${field} is ${length} characters (max ${maxLength})`);
  }
}

export class InvalidResponseError extends SlideGenerationError {
  readonly reason = 'invalid_response';
}

export class TimeoutError extends SlideGenerationError {
  readonly reason = 'timeout';
}

/**
 * Converts anything thrown inside a slide pipeline into a failure record
 */
export const toSlideFailure = (error: unknown): { reason: FailureReason; message: string } => {
  if (error instanceof SlideGenerationError) {
    return { reason: error.reason, message: error.message };
  }
  if (error instanceof Error) {
    return { reason: 'service_error', message: error.message };
  }
  return { reason: 'service_error', message: String(error) };
};
