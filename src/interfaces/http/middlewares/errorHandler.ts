import { NextFunction, Request, Response } from "express";
import { AppError } from "../../../core/errors";

interface BodyParserError extends Error {
  type: string;
  status: number;
}

// body-parser tags the errors it raises with `type` and `status`.
function isBodyParserClientError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  );
}

export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) return next(err);

  if (isBodyParserClientError(err)) {
    if (err.type === "entity.parse.failed") {
      return res.status(400).json({ error: "Invalid JSON body" });
    }
    return res.status(err.status).json({ error: err.message });
  }
  if (err instanceof AppError) {
    switch (err.code) {
      case "VALIDATION_ERROR":
        return res.status(400).json({ error: err.message });
      case "TODO_NOT_FOUND":
        return res.status(404).json({ error: "Todo not found" });
    }
  }

  console.error(err);
  return res.status(500).json({ error: "Internal Server Error" });
}
