import { Request, Response, NextFunction } from "express";
import { AuthService } from "../services/auth.service";
import { Session } from "../types/auth";
import { isAuthenticated } from "../types/express-auth";
import { toUnixSeconds } from "../utils/duration";
import { getAccessToken, nonEmptyString, requestSignal } from "../utils/request";

// tokens never leave the service in a listing
const toSessionView = (session: Session) => ({
  sessionId: session.sessionId,
  userAgent: session.userAgent,
  ipAddress: session.ipAddress,
  createdAt: toUnixSeconds(session.createdAt),
  expiresAt: toUnixSeconds(session.expiresAt),
  refreshExpiresAt: toUnixSeconds(session.refreshExpiresAt),
});

export const createSessionController = (authService: AuthService) => {
  const listActive = async (req: Request, res: Response, next: NextFunction) => {
    if (!isAuthenticated(req)) {
      return res.status(401).json({ message: "Authentication required" });
    }

    const { id, sessionId } = req.account;

    try {
      const active = await authService.getActiveAccountSessions(id, requestSignal(res));
      res.json({
        success: true,
        count: active.length,
        data: active.map((session) => ({
          ...toSessionView(session),
          current: session.sessionId === sessionId,
        })),
      });
    } catch (error) {
      next(error);
    }
  };

  const validate = async (req: Request, res: Response, next: NextFunction) => {
    const token = getAccessToken(req);
    if (!token) {
      return res.status(401).json({ message: "Authentication required" });
    }

    try {
      const { valid, expiresAt } = await authService.validateAccountSession(token, requestSignal(res));
      res.json({ valid, expiresAt });
    } catch (error) {
      next(error);
    }
  };

  const revoke = async (req: Request, res: Response, next: NextFunction) => {
    const token = nonEmptyString(req.body?.token);
    if (!token) {
      return res.status(400).json({ message: "token is required" });
    }

    try {
      await authService.revokeAccountSession(token, requestSignal(res));
      res.json({ success: true, message: "Session revoked" });
    } catch (error) {
      next(error);
    }
  };

  return { listActive, validate, revoke };
};
