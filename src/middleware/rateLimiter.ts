import { rateLimit } from "express-rate-limit";
import type { RequestHandler } from "express";

/** Throttles credential form posts per client address. */
export const createAuthRateLimiter = (options: {
  windowMs: number;
  max: number;
}): RequestHandler =>
  rateLimit({
    windowMs: options.windowMs,
    limit: options.max,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    message: "Too many attempts, please try again later.",
  });
