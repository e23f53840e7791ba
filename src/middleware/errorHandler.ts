/**
 * Global error handling middleware.
 *
 * Centralized error processing and HTTP response formatting:
 * - AppError subclasses carry their own status and stable `code`
 * - Framework errors (malformed JSON bodies and the like) keep their 4xx status
 * - Anything else becomes a 500 INTERNAL_ERROR
 *
 * Every error is logged with its metadata and answered as
 * `{ error: { message, code, details } }`.
 */
import type { NextFunction, Request, Response } from "express";

import {
  AppError,
  InfrastructureError,
  NotFoundError,
  ValidationError,
  isAppError,
} from "@domain/errors";
import { logger } from "@infrastructure/logging/Logger";

function clientStatus(err: unknown): number | undefined {
  if (!err || typeof err !== "object") {
    return undefined;
  }
  const status =
    "statusCode" in err ? err.statusCode : "status" in err ? err.status : undefined;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

export function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }

  const message = err instanceof Error ? err.message : "Internal Server Error";
  const status = clientStatus(err);

  if (status !== undefined) {
    return new ValidationError(message, status);
  }

  return new InfrastructureError(message || "Internal Server Error", 500, undefined, "INTERNAL_ERROR", err);
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError("Endpoint not found", { path: req.originalUrl }));
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = toAppError(err);
  const status = appError.statusCode ?? 500;

  logger.log(status >= 500 ? "error" : "warn", "Request failed", {
    method: req.method,
    path: req.originalUrl,
    type: appError.type,
    code: appError.code,
    statusCode: status,
    message: appError.message,
    metadata: appError.metadata ? JSON.stringify(appError.metadata) : undefined,
    originalError: appError === err ? undefined : String(err),
  });

  res.status(status).json({
    error: {
      message: status >= 500 && appError.code === "INTERNAL_ERROR" ? "Internal Server Error" : appError.message,
      code: appError.code,
      details: appError.metadata ?? {},
    },
  });
}
