/// <reference path="./types/express.d.ts" />
import express, { Application, NextFunction, Request, Response } from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import helmet from "helmet";
import compression from "compression";
import { Logger, errorField } from "./config/logger";
import { AuthService } from "./services/auth.service";
import { createAuthMiddleware } from "./middlewares/auth.middleware";
import { createRequestLogger } from "./middlewares/requestLogger.middleware";
import { createAuthRoutes } from "./routes/auth.routes";
import { createSessionRoutes } from "./routes/session.routes";
import { createAccountRoutes } from "./routes/account.routes";
import { createHealthController } from "./controllers/health.controller";
import { isAuthError, publicMessage } from "./utils/errors";

export interface AppOptions {
  authService: AuthService;
  logger: Logger;
  checkDbConnection: () => Promise<void>;
  isProduction: boolean;
  corsOrigins: string[];
  /** milliseconds */
  tokenTTL: number;
  /** milliseconds */
  refreshTokenTTL: number;
}

// status carried by errors raised inside express itself, e.g. body-parser's 400/413
const httpStatusOf = (err: unknown): number | undefined => {
  if (err === null || typeof err !== "object") return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return undefined;
};

export const createApp = ({
  authService,
  logger,
  checkDbConnection,
  isProduction,
  corsOrigins,
  tokenTTL,
  refreshTokenTTL,
}: AppOptions): Application => {
  const app: Application = express();

  // behind a reverse proxy, req.ip and secure cookies need the forwarded headers
  if (isProduction) {
    app.set("trust proxy", 1);
  }

  // ✅ CORS MUST be FIRST middleware
  app.use(
    cors({
      origin: (origin, callback) => {
        // server-to-server and tooling requests carry no origin
        if (!origin) return callback(null, true);

        if (!isProduction) return callback(null, true);

        if (corsOrigins.includes(origin)) return callback(null, true);

        callback(new Error("CORS policy: origin not allowed"));
      },
      credentials: true,
      methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
      optionsSuccessStatus: 200,
    })
  );

  app.disable("x-powered-by");
  app.use(helmet());
  app.use(compression());

  app.use(express.json({ limit: "1mb" }));
  app.use(cookieParser());
  app.use(createRequestLogger(logger));

  app.get("/health", createHealthController(checkDbConnection));

  const auth = createAuthMiddleware(authService);

  app.use("/api/auth", createAuthRoutes(authService, auth, { isProduction, tokenTTL, refreshTokenTTL }));
  app.use("/api/sessions", createSessionRoutes(authService, auth));
  app.use("/api/accounts", createAccountRoutes(authService, auth));

  // 404
  app.use((_req, res) => {
    res.status(404).json({ message: "Route not found" });
  });

  // Error handler; also the recovery point for anything a handler threw
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);

    if (isAuthError(err)) {
      if (err.status >= 500) {
        logger.error("request failed", { path: req.path, kind: err.kind, ...errorField(err) });
      }
      return res.status(err.status).json({ code: err.kind, message: publicMessage(err) });
    }

    const status = httpStatusOf(err) ?? 500;
    if (status >= 500) {
      logger.error("unhandled error", { path: req.path, ...errorField(err) });
      return res.status(500).json({ message: "Internal server error" });
    }

    res.status(status).json({ message: err instanceof Error ? err.message : "Request failed" });
  });

  return app;
};

export default createApp;
