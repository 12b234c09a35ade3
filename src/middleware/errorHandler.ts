import type { Request, Response, NextFunction } from "express";
import { AppError } from "../utils/appError";

// Shape of the http-errors instances raised by the body parsers
interface HttpClientError extends Error {
  status: number;
  expose: boolean;
  type?: string;
}

const isHttpClientError = (err: unknown): err is HttpClientError =>
  err instanceof Error &&
  "status" in err &&
  typeof err.status === "number" &&
  err.status >= 400 &&
  err.status < 500 &&
  "expose" in err &&
  err.expose === true;

const toAppError = (err: unknown): AppError | null => {
  if (err instanceof AppError) return err;
  if (isHttpClientError(err)) {
    return err.type === "entity.too.large"
      ? new AppError("Note is too large", 413)
      : new AppError(err.message, err.status);
  }
  return null;
};

export const notFound = (
  _req: Request,
  _res: Response,
  next: NextFunction
): void => {
  next(new AppError("Page not found", 404));
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  // Operational, trusted error: show its message
  const known = toAppError(err);
  const statusCode = known ? known.statusCode : 500;
  const message = known ? known.message : "Something went very wrong!";

  if (!known) {
    console.error("[server] unhandled error:", err);
  }

  res.status(statusCode).render("error", {
    title: statusCode === 404 ? "Not found" : "Error",
    statusCode,
    message,
    currentUser: req.context?.currentUser ?? null,
    flashes: [],
  });
};
