import type {
  ErrorRequestHandler,
  NextFunction,
  Request,
  Response,
} from "express";

import { serverLogger } from "../config/logger";
import {
  ExternalSourceError,
  NotFoundError,
  StorageError,
  ValidationError,
} from "../utils/errors";

// express.json() rejects an unparsable body with a tagged SyntaxError
function isBodyParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  _next: NextFunction
) => {
  if (err instanceof ExternalSourceError) {
    serverLogger.warn(
      { code: err.code, source: err.source, path: req.path },
      err.message
    );
    res.status(err.statusCode).json({
      error: "External data source unavailable",
      details: err.message,
    });
    return;
  }

  if (err instanceof StorageError) {
    serverLogger.error({ err, path: req.path }, "Storage failure");
    res.status(err.statusCode).json({
      error: "Storage unavailable",
      details: err.message,
    });
    return;
  }

  if (err instanceof NotFoundError) {
    res.status(err.statusCode).json({ detail: err.message });
    return;
  }

  if (err instanceof ValidationError) {
    res.status(err.statusCode).json({
      error: "Validation failed",
      details: err.details,
    });
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({
      error: "Validation failed",
      details: { body: "must be valid JSON" },
    });
    return;
  }

  serverLogger.error({ err, method: req.method, path: req.path }, "Unhandled error");
  res.status(500).json({ error: "Internal server error" });
};

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: "Not found" });
}
