import {
  DuplicateUsernameError,
  type UserRepository,
} from "../repositories/types";
import type { Response } from "express";
import type { ContextHandler, RequestContext } from "../types/context";
import { LOG_IN_PATH } from "../middleware/authMiddleware";
import { hashPassword, verifyPassword } from "../utils/password";
import { errorFlash, redirectTo, renderPage } from "../utils/respond";
import { logInSchema, signUpSchema, validationOptions } from "./validation";

export const USERNAME_TAKEN = "Username is already taken";
export const INVALID_CREDENTIALS = "Username or password are incorrect";

export interface AuthControllerDeps {
  users: UserRepository;
  bcryptRounds: number;
}

export const createAuthController = ({
  users,
  bcryptRounds,
}: AuthControllerDeps) => {
  // Submitted values are not echoed back, only the error
  const renderForm =
    (view: string, title: string) =>
    (res: Response, ctx: RequestContext, error?: string): void => {
      renderPage(
        res,
        ctx,
        view,
        { title, flashes: error ? errorFlash(error) : [] },
        error ? 400 : 200
      );
    };

  const renderSignUp = renderForm("sign_up", "Sign up");
  const renderLogIn = renderForm("log_in", "Log in");

  const showSignUp: ContextHandler = async (ctx, _req, res) => {
    renderSignUp(res, ctx);
  };

  const signUp: ContextHandler = async (ctx, req, res) => {
    const { error, value } = signUpSchema.validate(req.body, validationOptions);
    if (error) {
      renderSignUp(res, ctx, error.details[0].message);
      return;
    }

    const { username, password } = value;

    const existing = await users.findByUsername(username);
    if (existing) {
      renderSignUp(res, ctx, USERNAME_TAKEN);
      return;
    }

    try {
      await users.create({
        username,
        passwordHash: await hashPassword(password, bcryptRounds),
      });
    } catch (err) {
      if (err instanceof DuplicateUsernameError) {
        renderSignUp(res, ctx, USERNAME_TAKEN);
        return;
      }
      throw err;
    }

    ctx.session.flash("success", "Account created. Please log in.");
    redirectTo(res, ctx, LOG_IN_PATH);
  };

  const showLogIn: ContextHandler = async (ctx, _req, res) => {
    renderLogIn(res, ctx);
  };

  const logIn: ContextHandler = async (ctx, req, res) => {
    const { error, value } = logInSchema.validate(req.body, validationOptions);
    if (error) {
      renderLogIn(res, ctx, INVALID_CREDENTIALS);
      return;
    }

    const user = await users.findByUsername(value.username);
    const valid =
      user !== null && (await verifyPassword(value.password, user.passwordHash));
    if (!user || !valid) {
      // Same message whichever field was wrong
      renderLogIn(res, ctx, INVALID_CREDENTIALS);
      return;
    }

    ctx.session.logIn(user.id);
    redirectTo(res, ctx, "/");
  };

  const logOut: ContextHandler = async (ctx, req, res) => {
    ctx.session.clear();
    ctx.session.flash("success", "You have been logged out.");
    // 303 so a DELETE is followed up with a GET
    redirectTo(res, ctx, LOG_IN_PATH, req.method === "GET" ? 302 : 303);
  };

  return { showSignUp, signUp, showLogIn, logIn, logOut };
};

export type AuthController = ReturnType<typeof createAuthController>;
