import type { Request, Response } from "express";
import type { Session } from "../utils/session";

export interface CurrentUser {
  id: string;
  username: string;
}

/** Per-request state resolved once by the context middleware. */
export interface RequestContext {
  session: Session;
  currentUser: CurrentUser | null;
  /** Writes the session cookie if the session changed; call before responding. */
  commitSession(): void;
}

export interface AuthenticatedContext extends RequestContext {
  currentUser: CurrentUser;
}

export type ContextHandler<C extends RequestContext = RequestContext> = (
  ctx: C,
  req: Request,
  res: Response
) => Promise<void>;
