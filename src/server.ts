import dotenv from "dotenv";
dotenv.config();

import { createServer } from "http";
import * as cron from "node-cron";
import { createApp } from "./index";
import { loadConfig } from "./config/env";
import { createLogger, errorField } from "./config/logger";
import { createDatabase } from "./config/databaseConnection";
import { createAccountStore } from "./models/account.model";
import { createAppStore } from "./models/app.model";
import { createSessionStore } from "./models/session.model";
import { createAuthService } from "./services/auth.service";
import { createPasswordHasher } from "./utils/password";
import { generateRefreshToken, jwtTokenSigner } from "./utils/token";

const config = loadConfig();
const isProduction = config.env === "production";

const logger = createLogger({ level: config.logLevel, bindings: { env: config.env } });

const { db, pool, checkDbConnection } = createDatabase(config.databaseUrl, logger);

const accountStore = createAccountStore(db);
const sessionStore = createSessionStore(db);

const authService = createAuthService({
  logger,
  accountSaver: accountStore,
  accountProvider: accountStore,
  appProvider: createAppStore(db),
  sessionSaver: sessionStore,
  sessionProvider: sessionStore,
  hasher: createPasswordHasher(),
  signer: jwtTokenSigner,
  generateRefreshToken,
  tokenTTL: config.tokenTTL,
  refreshTokenTTL: config.refreshTokenTTL,
  sessionRetention: config.sessionRetention,
});

const app = createApp({
  authService,
  logger,
  checkDbConnection,
  isProduction,
  corsOrigins: config.corsOrigins,
  tokenTTL: config.tokenTTL,
  refreshTokenTTL: config.refreshTokenTTL,
});

const httpServer = createServer(app);

/* ================================
   SESSION PRUNING
================================ */

// refresh adds a row per call, so dead rows are removed on a schedule
const pruneTask = cron.schedule(
  config.sessionPruneCron,
  () => {
    authService.pruneSessions().catch((error: unknown) => {
      logger.error("session pruning failed", errorField(error));
    });
  },
  { scheduled: false, timezone: process.env.TZ || "UTC" }
);

/* ================================
   LIFECYCLE
================================ */

const shutdown = async (signal: string) => {
  try {
    logger.warn(`🛑 Received ${signal}. Shutting down gracefully...`);

    pruneTask.stop();

    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
    });

    try {
      await pool.end();
    } catch (e) {
      logger.warn("⚠️ Error closing DB pool", errorField(e));
    }

    logger.info("✅ Shutdown complete.");
    process.exit(0);
  } catch (e) {
    logger.error("❌ Shutdown error", errorField(e));
    process.exit(1);
  }
};

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("unhandledRejection", (reason) => {
  logger.error("❌ Unhandled Promise Rejection", errorField(reason));
});
process.on("uncaughtException", (err) => {
  logger.error("❌ Uncaught Exception", errorField(err));
  void shutdown("uncaughtException");
});

httpServer.listen(config.port, "0.0.0.0", () => {
  logger.info(`🚀 Server running on port ${config.port}`);

  checkDbConnection()
    .then(() => {
      logger.info("✅ Database connection verified");

      pruneTask.start();
      logger.info(`🧹 Session pruning scheduled (cron: ${config.sessionPruneCron})`);
    })
    .catch((error: unknown) => {
      logger.error("❌ Database connection failed", errorField(error));
      process.exit(1); // stop app if DB fails
    });
});
