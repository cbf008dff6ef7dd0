import { Request, Response } from "express";

export const createHealthController = (checkDbConnection: () => Promise<void>) => {
  return async (_req: Request, res: Response) => {
    try {
      // verify DB connectivity with a lightweight check
      await checkDbConnection();

      res.json({ status: "ok", db: "connected", timestamp: new Date().toISOString() });
    } catch (err) {
      res.status(500).json({
        status: "error",
        db: "disconnected",
        message: err instanceof Error ? err.message : String(err),
      });
    }
  };
};
