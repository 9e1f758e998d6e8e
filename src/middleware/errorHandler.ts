import type { ErrorRequestHandler, RequestHandler } from "express";
import { ErrorCode, isAppError } from "../utils/appError";
import { logger } from "../utils/logger";

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({
    error: {
      code: "NOT_FOUND",
      message: `No route for ${req.method} ${req.path}`,
    },
  });
};

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (!isAppError(err)) {
    logger.error("Unexpected error", { err, path: req.path });
    res.status(500).json({
      error: {
        code: ErrorCode.Internal,
        message: "An unexpected error occurred",
      },
    });
    return;
  }

  const level = err.statusCode >= 500 ? "error" : "warn";
  logger.log(level, err.message, {
    code: err.code,
    statusCode: err.statusCode,
    details: err.details,
    path: req.path,
  });

  res.status(err.statusCode).json({
    error: {
      code: err.code,
      message: err.message,
      ...(err.details ? { details: err.details } : {}),
    },
  });
};
