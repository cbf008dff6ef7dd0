/// <reference path="./express.d.ts" />
import { Request } from "express";

export interface AuthenticatedRequest extends Request {
  account: Express.AuthAccount; // guaranteed by requireAuth
}

export const isAuthenticated = (req: Request): req is AuthenticatedRequest => {
  return req.account !== undefined;
};
