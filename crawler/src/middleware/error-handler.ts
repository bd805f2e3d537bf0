import type { NextFunction, Request, Response } from "express";
import { ApiError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";

interface ErrorBody {
  status: "error";
  message: string;
  code: string;
}

function isBodyParseError(err: Error): boolean {
  return (
    err instanceof SyntaxError ||
    ("type" in err && err.type === "entity.parse.failed")
  );
}

export function createErrorHandler(logger: Logger) {
  return (err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      const body: ErrorBody = {
        status: "error",
        code: "INVALID_JSON",
        message: "Request body must be valid JSON",
      };
      logger.warn({ path: req.path, error: err.message }, "Malformed request body");
      res.status(400).json({ ...body, results: [] });
      return;
    }

    if (err instanceof ApiError) {
      logger.warn(
        { code: err.code, error: err.message, path: req.path },
        "API error"
      );
      const body: ErrorBody = {
        status: "error",
        code: err.code,
        message: err.message,
      };
      res.status(err.statusCode).json(body);
      return;
    }

    logger.error(
      { error: err.message, stack: err.stack, path: req.path },
      "Unhandled error"
    );

    const body: ErrorBody = {
      status: "error",
      code: "INTERNAL_ERROR",
      message: "An unexpected error occurred",
    };
    res.status(500).json(body);
  };
}
