import type { RequestHandler } from "express";
import type { AuthenticatedContext, ContextHandler } from "../types/context";
import { redirectTo } from "../utils/respond";
import { withContext } from "./contextMiddleware";

export const LOG_IN_PATH = "/log_in";

/**
 * Guards a handler behind authentication. Anonymous requests are redirected
 * to the log-in page and the handler never runs.
 */
export const requireLogin = (
  handler: ContextHandler<AuthenticatedContext>
): RequestHandler =>
  withContext(async (ctx, req, res) => {
    const { currentUser } = ctx;
    if (!currentUser) {
      ctx.session.flash("info", "Please log in to access this page.");
      redirectTo(res, ctx, LOG_IN_PATH);
      return;
    }
    await handler({ ...ctx, currentUser }, req, res);
  });
