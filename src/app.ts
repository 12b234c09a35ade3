import express, { type Express } from "express";
import { fileURLToPath } from "node:url";
import morgan from "morgan";
import helmet from "helmet";
import cookieParser from "cookie-parser";
import type { AppConfig } from "./config";
import type { NoteRepository, UserRepository } from "./repositories/types";
import { createAuthController } from "./controllers/authController";
import { createNoteController } from "./controllers/noteController";
import { showIndex } from "./controllers/homeController";
import { loadRequestContext, withContext } from "./middleware/contextMiddleware";
import { createAuthRateLimiter } from "./middleware/rateLimiter";
import { errorHandler, notFound } from "./middleware/errorHandler";
import { createAuthRoutes } from "./routes/authRoutes";
import { createNoteRoutes } from "./routes/noteRoutes";

export interface AppDependencies {
  config: AppConfig;
  users: UserRepository;
  notes: NoteRepository;
}

const viewsDir = fileURLToPath(new URL("../views", import.meta.url));
const publicDir = fileURLToPath(new URL("../public", import.meta.url));

export const createApp = ({ config, users, notes }: AppDependencies): Express => {
  const app = express();

  app.set("views", viewsDir);
  app.set("view engine", "ejs");

  // Middleware
  app.use(helmet());
  if (config.nodeEnv !== "test") {
    app.use(morgan(config.nodeEnv === "development" ? "dev" : "combined"));
  }
  app.use(express.static(publicDir));
  app.use(express.urlencoded({ limit: "1mb", extended: false }));
  app.use(cookieParser());
  app.use(
    loadRequestContext(users, {
      name: config.sessionCookieName,
      secret: config.sessionSecret,
      maxAgeDays: config.sessionMaxAgeDays,
      secure: config.nodeEnv === "production",
    })
  );

  // Routes
  app.get("/", withContext(showIndex));
  app.use(
    "/",
    createAuthRoutes(
      createAuthController({ users, bcryptRounds: config.bcryptRounds }),
      createAuthRateLimiter(config.authRateLimit)
    )
  );
  app.use("/notes", createNoteRoutes(createNoteController({ notes })));

  // Global error handling
  app.use(notFound);
  app.use(errorHandler);

  return app;
};
