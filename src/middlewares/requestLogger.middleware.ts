import { Request, Response, NextFunction } from "express";
import { Logger, maskSensitiveFields } from "../config/logger";

/**
 * Logs every request payload on arrival and the status once the response is
 * sent. Passwords and tokens are masked before anything is written.
 */
export const createRequestLogger = (logger: Logger) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    const fields = { method: req.method, path: req.path };

    logger.debug("payload received", {
      ...fields,
      body: maskSensitiveFields(req.body ?? {}),
    });

    res.on("finish", () => {
      logger.info("payload sent", {
        ...fields,
        status: res.statusCode,
        duration_ms: Date.now() - startedAt,
      });
    });

    next();
  };
};
