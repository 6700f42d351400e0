import { Request, Response, NextFunction } from "express";
import { logger } from "./utils/logger";

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class TooManyRequestsError extends HttpError {
  constructor() {
    super(429, "RATE_LIMIT_EXCEEDED", "Rate limit exceeded");
  }
}

/** The counting store could not complete a transaction. */
export class CountingStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CountingStoreError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (error instanceof HttpError) {
    res.status(error.status).json({
      error: { code: error.code, message: error.message },
    });
    return;
  }

  const clientStatus = clientErrorStatus(error);
  if (clientStatus !== undefined) {
    res.status(clientStatus).json({
      error: { code: "INVALID_REQUEST", message: "Invalid request" },
    });
    return;
  }

  logger.error({ err: error, path: req.path }, "Unhandled request error");
  res.status(500).json({
    error: { code: "INTERNAL_ERROR", message: "Internal server error" },
  });
}

// body-parser and http-errors put the response status on the error itself.
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;

  const status =
    "status" in error
      ? error.status
      : "statusCode" in error
        ? error.statusCode
        : undefined;

  return typeof status === "number" && status >= 400 && status < 500
    ? status
    : undefined;
}
