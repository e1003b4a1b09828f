/**
 * Error taxonomy for tutoring sessions.
 *
 * Every error carries a machine-readable code and the HTTP status the API
 * answers with. ValidationError, NotFoundError, InvalidStateError and
 * OutOfSequenceError are caused by the client; CollaboratorError means the
 * content provider failed.
 */

export const ErrorCodes = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  NOT_FOUND: "NOT_FOUND",
  INVALID_STATE: "INVALID_STATE",
  OUT_OF_SEQUENCE: "OUT_OF_SEQUENCE",
  COLLABORATOR_ERROR: "COLLABORATOR_ERROR",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class TutorError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;

  constructor(code: ErrorCode, message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TutorError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends TutorError {
  constructor(message: string) {
    super(ErrorCodes.VALIDATION_ERROR, message, 400);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends TutorError {
  constructor(sessionId: string) {
    super(ErrorCodes.NOT_FOUND, `Session ${sessionId} not found`, 404);
    this.name = "NotFoundError";
  }
}

export class InvalidStateError extends TutorError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_STATE, message, 409);
    this.name = "InvalidStateError";
  }
}

export class OutOfSequenceError extends TutorError {
  constructor(message: string) {
    super(ErrorCodes.OUT_OF_SEQUENCE, message, 409);
    this.name = "OutOfSequenceError";
  }
}

export class CollaboratorError extends TutorError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCodes.COLLABORATOR_ERROR, message, 502, { cause });
    this.name = "CollaboratorError";
  }
}
