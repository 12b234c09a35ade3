import express, { type RequestHandler } from "express";
import type { AuthController } from "../controllers/authController";
import { withContext } from "../middleware/contextMiddleware";

export const createAuthRoutes = (
  controller: AuthController,
  rateLimiter: RequestHandler
) => {
  const router = express.Router();

  router
    .route("/sign_up")
    .get(withContext(controller.showSignUp))
    .post(rateLimiter, withContext(controller.signUp));

  router
    .route("/log_in")
    .get(withContext(controller.showLogIn))
    .post(rateLimiter, withContext(controller.logIn));

  // Public: logging out works whether or not anyone is logged in
  router
    .route("/log_out")
    .get(withContext(controller.logOut))
    .delete(withContext(controller.logOut));

  return router;
};
