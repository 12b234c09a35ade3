import dotenv from "dotenv";

dotenv.config();

export interface AppConfig {
  port: number;
  mongoURI: string;
  nodeEnv: string;
  sessionSecret: string;
  sessionCookieName: string;
  sessionMaxAgeDays: number;
  bcryptRounds: number;
  authRateLimit: {
    windowMs: number;
    max: number;
  };
}

type Env = Record<string, string | undefined>;

const DEV_SESSION_SECRET = "dev-session-secret";

const readInt = (env: Env, name: string, fallback: number): number => {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Env var ${name} must be an integer, got "${raw}"`);
  }
  return parsed;
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const nodeEnv = env.NODE_ENV || "development";

  const sessionSecret = env.SESSION_SECRET;
  if (!sessionSecret && nodeEnv === "production") {
    throw new Error("Missing required env var: SESSION_SECRET");
  }

  return {
    port: readInt(env, "PORT", 5001),
    mongoURI: env.MONGO_URI || "mongodb://localhost:27017/notebook",
    nodeEnv,
    sessionSecret: sessionSecret || DEV_SESSION_SECRET,
    sessionCookieName: env.SESSION_COOKIE_NAME || "session",
    sessionMaxAgeDays: readInt(env, "SESSION_MAX_AGE_DAYS", 7),
    bcryptRounds: readInt(env, "BCRYPT_ROUNDS", 10),
    authRateLimit: {
      windowMs: readInt(env, "AUTH_RATE_LIMIT_WINDOW_MINUTES", 15) * 60 * 1000,
      max: readInt(env, "AUTH_RATE_LIMIT_MAX", 20),
    },
  };
};

const config = loadConfig();

export default config;
