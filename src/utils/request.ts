import { Request, Response } from "express";
import { IP_ADDRESS_MAX_LENGTH, USER_AGENT_MAX_LENGTH } from "../schemas/sessions.schema";

/**
 * Extract IP address from request. Clients can send any forwarded header, so
 * the value is clipped to what the sessions table stores.
 */
export const getIpAddress = (req: Request): string => {
  const forwarded = req.headers["x-forwarded-for"];
  const first = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(",")[0]?.trim();
  const realIp = req.headers["x-real-ip"];

  const address =
    first ||
    (typeof realIp === "string" ? realIp : undefined) ||
    req.socket.remoteAddress ||
    req.ip ||
    "";

  return address.slice(0, IP_ADDRESS_MAX_LENGTH);
};

/**
 * Extract user agent from request
 */
export const getUserAgent = (req: Request): string => {
  return (req.headers["user-agent"] ?? "").slice(0, USER_AGENT_MAX_LENGTH);
};

/**
 * Bearer token from the Authorization header, falling back to the cookie.
 */
export const getAccessToken = (req: Request): string | null => {
  const header = req.headers.authorization;
  if (header?.startsWith("Bearer ")) {
    const token = header.slice("Bearer ".length).trim();
    if (token) return token;
  }

  const cookie: unknown = req.cookies?.accessToken;
  return typeof cookie === "string" && cookie ? cookie : null;
};

/**
 * Signal that aborts when the client goes away before the response is sent.
 */
export const requestSignal = (res: Response): AbortSignal => {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort(new Error("client closed request"));
    }
  });
  return controller.signal;
};

/**
 * Positive integer from a body or path value; numeric strings are accepted.
 */
export const parseId = (value: unknown): number | null => {
  const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof parsed === "number" && Number.isSafeInteger(parsed) && parsed > 0 ? parsed : null;
};

export const nonEmptyString = (value: unknown): string | null => {
  return typeof value === "string" && value.trim() !== "" ? value : null;
};
