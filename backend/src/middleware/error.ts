import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { logger } from "../utils/logger.js";

export const RETRY_LATER_MESSAGE =
  "I apologize, but I encountered an error while processing your request. Please try again later.";

export const UNAUTHORIZED_MESSAGE = "Sorry, you are not authorized to use this bot.";

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code?: string;

  constructor(message: string, statusCode: number, code?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export function upstreamUnavailable(cause: unknown): AppError {
  return new AppError(RETRY_LATER_MESSAGE, 502, "upstream_unavailable", { cause });
}

export function unauthorized(): AppError {
  return new AppError(UNAUTHORIZED_MESSAGE, 403, "unauthorized");
}

const bodyParserCodes: Record<string, string> = {
  "entity.parse.failed": "invalid_json",
  "entity.too.large": "payload_too_large",
};

/** 4xx status attached by the body parser (and other http-errors producers). */
function readClientStatus(err: Error): number | undefined {
  const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  if (typeof status === "number" && status >= 400 && status < 500) {
    return status;
  }
  return undefined;
}

function readType(err: Error): string {
  return "type" in err && typeof err.type === "string" ? err.type : "";
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  if (err instanceof ZodError) {
    logger.warn({
      msg: "Validation error",
      errors: err.errors,
    });

    return res.status(400).json({
      error: "validation_error",
      message: "Invalid request data",
      details: err.errors.map((e) => ({
        path: e.path.join("."),
        message: e.message,
      })),
    });
  }

  if (err instanceof AppError) {
    logger.warn({
      msg: "Operational error",
      code: err.code,
      statusCode: err.statusCode,
      message: err.message,
      cause: err.cause instanceof Error ? err.cause.message : undefined,
    });

    return res.status(err.statusCode).json({
      error: err.code ?? "error",
      message: err.message,
    });
  }

  const clientStatus = readClientStatus(err);
  if (clientStatus !== undefined) {
    const code = bodyParserCodes[readType(err)] ?? "bad_request";
    logger.warn({
      msg: "Rejected request body",
      code,
      statusCode: clientStatus,
      message: err.message,
    });

    return res.status(clientStatus).json({
      error: code,
      message: clientStatus === 413 ? "Request body is too large" : "Request body could not be read",
    });
  }

  logger.error({
    msg: "Internal server error",
    error: err.message,
    stack: err.stack,
  });

  res.status(500).json({
    error: "internal_error",
    message: "An unexpected error occurred",
  });
}

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({
    error: "not_found",
    message: "The requested resource was not found",
  });
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
