import type { Response } from "express";
import type { RequestContext } from "../types/context";
import type { FlashMessage } from "./session";

export interface PageLocals {
  title: string;
  /** Messages for this response only, shown after any pending flashes. */
  flashes?: FlashMessage[];
  [key: string]: unknown;
}

export const renderPage = (
  res: Response,
  ctx: RequestContext,
  view: string,
  locals: PageLocals,
  status = 200
): void => {
  const flashes = [...ctx.session.consumeFlashes(), ...(locals.flashes ?? [])];
  ctx.commitSession();
  res.status(status).render(view, {
    ...locals,
    currentUser: ctx.currentUser,
    flashes,
  });
};

export const redirectTo = (
  res: Response,
  ctx: RequestContext,
  path: string,
  status = 302
): void => {
  ctx.commitSession();
  res.redirect(status, path);
};

export const errorFlash = (message: string): FlashMessage[] => [
  { category: "error", message },
];
