import { Request, Response, NextFunction, CookieOptions } from "express";
import { AuthService } from "../services/auth.service";
import { isAuthenticated } from "../types/express-auth";
import { Role, isRole } from "../types/role";
import {
  getIpAddress,
  getUserAgent,
  nonEmptyString,
  parseId,
  requestSignal,
} from "../utils/request";

export interface AuthControllerOptions {
  isProduction: boolean;
  /** milliseconds */
  tokenTTL: number;
  /** milliseconds */
  refreshTokenTTL: number;
}

export const createAuthController = (authService: AuthService, options: AuthControllerOptions) => {
  const cookieOptions: CookieOptions = {
    httpOnly: true,
    secure: options.isProduction,
    sameSite: options.isProduction ? "none" : "lax",
    path: "/",
  };

  const setTokenCookies = (res: Response, accessToken: string, refreshToken: string) => {
    res.cookie("accessToken", accessToken, { ...cookieOptions, maxAge: options.tokenTTL });
    res.cookie("refreshToken", refreshToken, { ...cookieOptions, maxAge: options.refreshTokenTTL });
  };

  /* ================================
     REGISTER
  ================================ */

  const register = async (req: Request, res: Response, next: NextFunction) => {
    const body = req.body || {};
    const email = nonEmptyString(body.email);
    const password = nonEmptyString(body.password);
    const appId = parseId(body.appId ?? body.app_id);

    if (!email || !password) {
      return res.status(400).json({ message: "email and password are required" });
    }
    if (appId === null) {
      return res.status(400).json({ message: "appId must be a positive integer" });
    }

    let role: Role = "user";
    if (body.role !== undefined && body.role !== null && body.role !== "") {
      if (!isRole(body.role)) {
        return res.status(400).json({ message: "role is invalid" });
      }
      role = body.role;
    }

    try {
      const signal = requestSignal(res);

      // only an admin may hand out a role other than the default
      if (role !== "user") {
        if (!isAuthenticated(req) || !(await authService.isAdmin(req.account.id, signal))) {
          return res.status(403).json({ message: "Forbidden: insufficient role" });
        }
      }

      const accountId = await authService.registerNewAccount(
        email.toLowerCase().trim(),
        password,
        role,
        appId,
        signal
      );

      res.status(201).json({ message: "Account registered", accountId });
    } catch (error) {
      next(error);
    }
  };

  /* ================================
     LOGIN
  ================================ */

  const login = async (req: Request, res: Response, next: NextFunction) => {
    const body = req.body || {};
    const email = nonEmptyString(body.email);
    const password = nonEmptyString(body.password);
    const appId = parseId(body.appId ?? body.app_id);

    if (!email || !password) {
      return res.status(400).json({ message: "email and password are required" });
    }
    if (appId === null) {
      return res.status(400).json({ message: "appId must be a positive integer" });
    }

    try {
      const { accessToken, refreshToken } = await authService.login(
        email.toLowerCase().trim(),
        password,
        getUserAgent(req),
        getIpAddress(req),
        appId,
        requestSignal(res)
      );

      setTokenCookies(res, accessToken, refreshToken);
      res.json({ message: "Login successful", accessToken, refreshToken });
    } catch (error) {
      next(error);
    }
  };

  /* ================================
     REFRESH TOKEN
  ================================ */

  const refresh = async (req: Request, res: Response, next: NextFunction) => {
    const body = req.body || {};
    const accountId = parseId(body.accountId ?? body.account_id);
    const refreshToken = nonEmptyString(req.cookies?.refreshToken) ?? nonEmptyString(body.refreshToken);

    if (accountId === null) {
      return res.status(400).json({ message: "accountId must be a positive integer" });
    }
    if (!refreshToken) {
      return res.status(401).json({ message: "Refresh token missing" });
    }

    try {
      const refreshed = await authService.refreshAccountSession(
        accountId,
        refreshToken.trim(),
        getUserAgent(req),
        getIpAddress(req),
        requestSignal(res)
      );

      setTokenCookies(res, refreshed.accessToken, refreshed.refreshToken);
      res.json({
        message: "Token refreshed successfully",
        accessToken: refreshed.accessToken,
        refreshToken: refreshed.refreshToken,
        expiresAt: refreshed.expiresAt,
      });
    } catch (error) {
      next(error);
    }
  };

  /* ================================
     LOGOUT
  ================================ */

  const logout = async (req: Request, res: Response, next: NextFunction) => {
    if (!isAuthenticated(req)) {
      return res.status(401).json({ message: "Authentication required" });
    }

    try {
      await authService.logout(req.account.id, requestSignal(res));

      res.clearCookie("accessToken", cookieOptions);
      res.clearCookie("refreshToken", cookieOptions);
      res.json({ message: "Logged out successfully" });
    } catch (error) {
      next(error);
    }
  };

  /* ================================
     CHANGE PASSWORD
  ================================ */

  const changePassword = async (req: Request, res: Response, next: NextFunction) => {
    if (!isAuthenticated(req)) {
      return res.status(401).json({ message: "Authentication required" });
    }

    const body = req.body || {};
    const oldPassword = nonEmptyString(body.oldPassword);
    const newPassword = nonEmptyString(body.newPassword);

    if (!oldPassword || !newPassword) {
      return res.status(400).json({ message: "Old password and new password are required" });
    }

    try {
      await authService.changePassword(req.account.id, oldPassword, newPassword, requestSignal(res));
      res.json({ success: true, message: "Password changed successfully" });
    } catch (error) {
      next(error);
    }
  };

  return { register, login, refresh, logout, changePassword };
};
