import { Request, Response, NextFunction } from "express";
import { AuthService } from "../services/auth.service";
import { isAuthenticated } from "../types/express-auth";
import { ErrorKinds, isAuthError } from "../utils/errors";
import { getAccessToken, requestSignal } from "../utils/request";

const isRejectedToken = (error: unknown): boolean =>
  isAuthError(error, ErrorKinds.SESSION_NOT_FOUND) || isAuthError(error, ErrorKinds.TOKEN_EXPIRED);

export const createAuthMiddleware = (authService: AuthService) => {
  const resolveAccount = async (req: Request, res: Response, token: string) => {
    const session = await authService.authenticate(token, requestSignal(res));
    req.account = { id: session.accountId, sessionId: session.sessionId, token };
  };

  const requireAuth = async (req: Request, res: Response, next: NextFunction) => {
    const token = getAccessToken(req);

    if (!token) {
      return res.status(401).json({ message: "Authentication required" });
    }

    try {
      await resolveAccount(req, res, token);
      next();
    } catch (error) {
      if (isRejectedToken(error)) {
        return res.status(401).json({ message: "Invalid or expired token" });
      }
      next(error);
    }
  };

  /**
   * Attaches the account when a valid token is present; anonymous requests
   * and rejected tokens pass through without one.
   */
  const optionalAuth = async (req: Request, res: Response, next: NextFunction) => {
    const token = getAccessToken(req);
    if (!token) return next();

    try {
      await resolveAccount(req, res, token);
      next();
    } catch (error) {
      if (isRejectedToken(error)) return next();
      next(error);
    }
  };

  // must run after requireAuth
  const requireAdmin = async (req: Request, res: Response, next: NextFunction) => {
    if (!isAuthenticated(req)) {
      return res.status(401).json({ message: "Authentication required" });
    }

    try {
      const admin = await authService.isAdmin(req.account.id, requestSignal(res));
      if (!admin) {
        return res.status(403).json({ message: "Forbidden: insufficient role" });
      }
      next();
    } catch (error) {
      next(error);
    }
  };

  return { requireAuth, optionalAuth, requireAdmin };
};

export type AuthMiddleware = ReturnType<typeof createAuthMiddleware>;
