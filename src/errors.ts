/**
 * Cleanroom error types.
 *
 * Only window inference raises to the caller. Data problems inside rows are
 * reported as counts and exclusions, never thrown out of the pipeline.
 */

export class CleanroomError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    statusCode: number = 500,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CleanroomError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

/**
 * No raw transaction carries a usable created_at, so no analysis window exists
 */
export class EmptyInputError extends CleanroomError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('EMPTY_INPUT', message, 422, details);
    this.name = 'EmptyInputError';
  }
}

/**
 * A timestamp value is present but cannot be parsed
 */
export class MalformedTimestampError extends CleanroomError {
  public readonly value: string;

  constructor(value: string) {
    super('MALFORMED_TIMESTAMP', `Malformed timestamp: "${value}"`, 400, { value });
    this.name = 'MalformedTimestampError';
    this.value = value;
  }
}

export function isCleanroomError(error: unknown): error is CleanroomError {
  return error instanceof CleanroomError;
}
