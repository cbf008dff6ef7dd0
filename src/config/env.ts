import { LogLevel, isLogLevel } from "./logger";
import { parseDuration } from "../utils/duration";

export interface Config {
  env: string;
  port: number;
  databaseUrl: string;
  /** milliseconds */
  tokenTTL: number;
  /** milliseconds */
  refreshTokenTTL: number;
  sessionPruneCron: string;
  /** how long revoked sessions are kept before pruning, milliseconds */
  sessionRetention: number;
  logLevel: LogLevel;
  corsOrigins: string[];
}

const DEFAULTS = {
  env: "local",
  port: 5000,
  tokenTTL: "1h",
  refreshTokenTTL: "24h",
  sessionPruneCron: "0 * * * *",
  sessionRetention: "168h",
} as const;

const parseOrigins = (raw?: string): string[] =>
  (raw || "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

const readDuration = (name: string, raw: string): number => {
  try {
    return parseDuration(raw);
  } catch (error) {
    throw new Error(`${name}: ${error instanceof Error ? error.message : String(error)}`);
  }
};

/**
 * Build the service config from environment variables. Call `dotenv.config()`
 * before this when a .env file should be honoured.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const databaseUrl = env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error("DATABASE_URL missing");
  }

  const port = Number(env.PORT ?? DEFAULTS.port);
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`PORT: invalid port "${env.PORT}"`);
  }

  const nodeEnv = env.NODE_ENV || DEFAULTS.env;
  const logLevel = env.LOG_LEVEL ?? (nodeEnv === "production" ? "info" : "debug");
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL: unknown level "${logLevel}"`);
  }

  return {
    env: nodeEnv,
    port,
    databaseUrl,
    tokenTTL: readDuration("TOKEN_TTL", env.TOKEN_TTL || DEFAULTS.tokenTTL),
    refreshTokenTTL: readDuration("REFRESH_TTL", env.REFRESH_TTL || DEFAULTS.refreshTokenTTL),
    sessionPruneCron: env.SESSION_PRUNE_CRON || DEFAULTS.sessionPruneCron,
    sessionRetention: readDuration(
      "SESSION_RETENTION",
      env.SESSION_RETENTION || DEFAULTS.sessionRetention
    ),
    logLevel,
    corsOrigins: Array.from(
      new Set([env.FRONTEND_URL, ...parseOrigins(env.CORS_ORIGINS)].filter(
        (origin): origin is string => Boolean(origin)
      ))
    ),
  };
};
