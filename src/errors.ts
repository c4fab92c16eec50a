/**
 * Exam Engine Error Hierarchy
 *
 * Typed error classes for each failure mode of the exam flow. The HTTP layer
 * maps them to a status code and a user message, so a client can tell
 * "your time ran out" from "this looks tampered" from "try again later".
 */

export type ExamErrorCode =
  | 'INSUFFICIENT_QUESTIONS'
  | 'MALFORMED_TOKEN'
  | 'INVALID_SIGNATURE'
  | 'TOKEN_EXPIRED'
  | 'SESSION_MISMATCH'
  | 'PERSISTENCE_FAILED'
  | 'VALIDATION_ERROR'
  | 'AUTH_REQUIRED';

/**
 * Base error class for all exam engine errors
 */
export abstract class ExamError extends Error {
  constructor(
    message: string,
    public readonly code: ExamErrorCode,
    public readonly statusCode: number,
    public readonly retryable: boolean = false,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get user-friendly error message
   */
  abstract getUserMessage(): string;
}

/**
 * The bank holds fewer eligible questions than the exam needs
 */
export class InsufficientQuestionsError extends ExamError {
  constructor(
    public readonly requested: number,
    public readonly available: number,
    public readonly kind?: string
  ) {
    super(
      `Requested ${requested} ${kind ?? 'any'} questions but only ${available} are available`,
      'INSUFFICIENT_QUESTIONS',
      422
    );
  }

  getUserMessage(): string {
    return 'Not enough questions are available to build this exam. Please try again later.';
  }
}

/**
 * Token could not be parsed at all
 */
export class MalformedTokenError extends ExamError {
  constructor(message: string = 'Exam token is malformed') {
    super(message, 'MALFORMED_TOKEN', 400);
  }

  getUserMessage(): string {
    return 'The exam token is not valid. Please restart the exam.';
  }
}

/**
 * Token parsed but its signature, audience or claims do not check out
 */
export class InvalidSignatureError extends ExamError {
  constructor(message: string = 'Exam token signature is invalid', cause?: Error) {
    super(message, 'INVALID_SIGNATURE', 400, false, cause);
  }

  getUserMessage(): string {
    return 'This exam session could not be verified and may have been tampered with. Please restart the exam.';
  }
}

/**
 * Token is authentic but its time window has passed
 */
export class ExpiredTokenError extends ExamError {
  constructor(public readonly expiredAt: number) {
    super(`Exam token expired at ${new Date(expiredAt * 1000).toISOString()}`, 'TOKEN_EXPIRED', 400);
  }

  getUserMessage(): string {
    return 'Your time for this exam ran out. Please start a new exam.';
  }
}

/**
 * Token is valid but was issued for another user or another kind of exam
 */
export class SessionMismatchError extends ExamError {
  constructor(message: string) {
    super(message, 'SESSION_MISMATCH', 403);
  }

  getUserMessage(): string {
    return 'This exam session does not belong to you or to this exam.';
  }
}

/**
 * Storage failure while saving a graded result
 */
export class PersistenceFailedError extends ExamError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_FAILED', 500, true, cause);
  }

  getUserMessage(): string {
    return 'Your answers were graded but could not be saved. Please try again later.';
  }
}

/**
 * Validation errors (bad request data)
 */
export class ValidationError extends ExamError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, 'VALIDATION_ERROR', 400);
  }

  getUserMessage(): string {
    if (this.field) {
      return `Invalid value for ${this.field}: ${this.message}`;
    }
    return `Validation failed: ${this.message}`;
  }
}

/**
 * Missing or invalid login credentials
 */
export class AuthenticationError extends ExamError {
  constructor(message: string = 'Authentication required') {
    super(message, 'AUTH_REQUIRED', 401);
  }

  getUserMessage(): string {
    return 'Authentication required. Please log in again.';
  }
}

export function isExamError(value: unknown): value is ExamError {
  return value instanceof ExamError;
}

/**
 * Normalize an unknown thrown value to an Error, for use as a cause.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
