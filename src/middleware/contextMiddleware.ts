import type { CookieOptions, RequestHandler, Response } from "express";
import type { UserRepository } from "../repositories/types";
import type { ContextHandler, CurrentUser } from "../types/context";
import { decodeSession, encodeSession, type Session } from "../utils/session";

export interface SessionCookieOptions {
  name: string;
  secret: string;
  maxAgeDays: number;
  secure: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export const writeSessionCookie = (
  res: Response,
  session: Session,
  options: SessionCookieOptions
): void => {
  if (!session.isModified) return;

  const base: CookieOptions = {
    httpOnly: true,
    secure: options.secure,
    sameSite: "lax",
    path: "/",
  };

  if (session.isEmpty) {
    res.clearCookie(options.name, base);
    return;
  }
  res.cookie(
    options.name,
    encodeSession(session, options.secret, options.maxAgeDays),
    { ...base, maxAge: options.maxAgeDays * DAY_MS }
  );
};

/**
 * Resolves the session cookie and the logged-in user into `req.context`.
 * A session naming a user that no longer exists is treated as anonymous.
 */
export const loadRequestContext = (
  users: UserRepository,
  cookie: SessionCookieOptions
): RequestHandler => {
  return async (req, res, next) => {
    try {
      const token: unknown = req.cookies?.[cookie.name];
      const session = decodeSession(
        typeof token === "string" ? token : undefined,
        cookie.secret
      );

      let currentUser: CurrentUser | null = null;
      if (session.userId) {
        const user = await users.findById(session.userId);
        if (user) {
          currentUser = { id: user.id, username: user.username };
        }
      }

      req.context = {
        session,
        currentUser,
        commitSession: () => writeSessionCookie(res, session, cookie),
      };
      next();
    } catch (err) {
      next(err);
    }
  };
};

/** Adapts a context-aware handler to Express, forwarding rejections. */
export const withContext = (handler: ContextHandler): RequestHandler => {
  return (req, res, next) => {
    const ctx = req.context;
    if (!ctx) {
      next(new Error("Request context middleware is not mounted"));
      return;
    }
    handler(ctx, req, res).catch(next);
  };
};
