import type { ErrorRequestHandler, RequestHandler } from "express";
import { AppError } from "../errors.js";
import { describeError, type Logger } from "../observability/logger.js";

export interface ErrorBody {
  readonly success: false;
  readonly error: string;
}

export function createNotFoundHandler(): RequestHandler {
  return (_req, res) => {
    const body: ErrorBody = { success: false, error: "Not found" };
    res.status(404).json(body);
  };
}

/** Every failure leaves the API as `{ success: false, error }`. */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const { status, message } = resolveFailure(error);
    if (status >= 500 && !(error instanceof AppError)) {
      logger.error("unhandled request error", {
        method: req.method,
        path: req.originalUrl,
        ...describeError(error),
      });
    }

    const body: ErrorBody = { success: false, error: message };
    res.status(status).json(body);
  };
}

function resolveFailure(error: unknown): { status: number; message: string } {
  if (error instanceof AppError) {
    return { status: error.status, message: error.message };
  }
  if (isBodyParseError(error)) {
    return { status: 400, message: "Malformed JSON body" };
  }
  const rejected = asRejectedBody(error);
  if (rejected) {
    return rejected;
  }
  return { status: 500, message: "Internal server error" };
}

function isBodyParseError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}

/** body-parser's client errors: oversized bodies, bad charsets, bad encodings. */
function asRejectedBody(error: unknown): { status: number; message: string } | null {
  if (
    !(error instanceof Error) ||
    !("status" in error) ||
    typeof error.status !== "number" ||
    error.status < 400 ||
    error.status >= 500 ||
    !("expose" in error) ||
    error.expose !== true
  ) {
    return null;
  }
  if (error.status === 413) {
    return { status: 413, message: "Request body too large" };
  }
  return { status: error.status, message: error.message };
}
