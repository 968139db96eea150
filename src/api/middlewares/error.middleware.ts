/**
 * Error Middleware
 *
 * Global error handler for the Express API.
 * Maps portal errors to HTTP statuses and returns structured JSON responses.
 */
import type { Request, Response, NextFunction } from "express";
import { ERROR_CODES, type ErrorCode } from "../../config/constants";
import { ApplicationError, PortalError } from "../../shared/errors/portal.errors";
import { logger } from "../../monitoring/logger";

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ERROR_CODES.CREDENTIAL_INVALID]: 500,
  [ERROR_CODES.PORTAL_UNREACHABLE]: 502,
  [ERROR_CODES.ENCODING_FAILED]: 422,
  [ERROR_CODES.PAGE_STRUCTURE_CHANGED]: 502,
  [ERROR_CODES.APPLICATION_REJECTED]: 422,
  [ERROR_CODES.CANCELLED]: 499,
  [ERROR_CODES.VALIDATION_FAILED]: 400,
  [ERROR_CODES.NOT_CONFIGURED]: 503,
};

export function statusForError(err: Error): number {
  return err instanceof PortalError ? STATUS_BY_CODE[err.code] : 500;
}

/**
 * Global error handler.
 * Logs the error and returns a structured JSON response.
 */
export function errorMiddleware(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = statusForError(err);

  if (err instanceof PortalError) {
    logger.warn(
      { errorCode: err.code, error: err.message, method: req.method, path: req.path, status },
      "Portal workflow failed"
    );
    res.status(status).json({
      error: err.name,
      code: err.code,
      message: err.message,
      retryable: err.retryable,
      messages: err instanceof ApplicationError ? err.messages : undefined,
      outcome: err instanceof ApplicationError ? err.outcome : undefined,
    });
    return;
  }

  logger.error(
    {
      error: err.message,
      stack: err.stack,
      method: req.method,
      path: req.path,
    },
    "Unhandled API error"
  );

  res.status(500).json({
    error: "Internal Server Error",
    message: process.env.NODE_ENV === "development" ? err.message : undefined,
  });
}
