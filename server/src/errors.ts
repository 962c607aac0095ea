export abstract class AppError extends Error {
  abstract readonly status: number;
}

/** Missing, unknown or expired session. */
export class UnauthorizedError extends AppError {
  readonly status = 401;

  constructor(message = "Authentication required") {
    super(message);
    this.name = "UnauthorizedError";
  }
}

/** The assistant provider rejected the credential. */
export class InvalidCredentialError extends AppError {
  readonly status = 401;

  constructor(message = "Invalid token") {
    super(message);
    this.name = "InvalidCredentialError";
  }
}

/** Absent, or owned by someone else; the two are not told apart. */
export class NotFoundError extends AppError {
  readonly status = 404;

  constructor(message = "Conversation not found") {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends AppError {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class AssistantTimeoutError extends AppError {
  readonly status = 504;

  constructor(message = "Request timed out") {
    super(message);
    this.name = "AssistantTimeoutError";
  }
}

export class UpstreamError extends AppError {
  readonly status = 502;

  constructor(message: string) {
    super(message);
    this.name = "UpstreamError";
  }
}
