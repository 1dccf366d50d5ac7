import type { ErrorRequestHandler, RequestHandler } from "express";
import { AppError } from "../../../core/errors";

interface HttpError {
  status: number;
  type?: string;
  expose?: boolean;
  message: string;
}

// Shape of the errors body-parser raises for bad request bodies.
function isHttpError(err: unknown): err is HttpError {
  return (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  );
}

export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({ error: "Endpoint not found" });
};

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof AppError) {
    res.status(err.status).json({ error: err.message });
    return;
  }

  if (isHttpError(err)) {
    const message =
      err.type === "entity.parse.failed"
        ? "Malformed JSON body"
        : err.expose
          ? err.message
          : "Bad request";
    res.status(err.status).json({ error: message });
    return;
  }

  console.error("[http] unhandled error", err);
  res.status(500).json({ error: "Internal server error" });
};
