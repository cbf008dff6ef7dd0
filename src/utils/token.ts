import jwt from "jsonwebtoken";
import crypto from "crypto";
import { RefreshTokenGenerator, TokenSigner } from "../types/auth";
import { toUnixSeconds } from "./duration";

export const REFRESH_TOKEN_BYTES = 32;

export interface AccessTokenClaims {
  uid: number;
  email: string;
  app_id: number;
  jti: string;
  iat: number;
  exp: number;
}

/**
 * Access tokens are HS256 JWTs keyed with the app secret, so each registered
 * app can verify the tokens issued for it. The random `jti` keeps two tokens
 * minted in the same second for the same account distinct.
 */
export const jwtTokenSigner: TokenSigner = {
  sign: (account, app, issuedAt, expiresAt) => {
    const iat = toUnixSeconds(issuedAt);
    const claims: AccessTokenClaims = {
      uid: account.id,
      email: account.email,
      app_id: app.id,
      jti: crypto.randomUUID(),
      iat,
      exp: toUnixSeconds(expiresAt),
    };

    return jwt.sign(claims, app.secret, { algorithm: "HS256" });
  },
};

export const generateRefreshToken: RefreshTokenGenerator = () => {
  return crypto.randomBytes(REFRESH_TOKEN_BYTES).toString("base64url");
};
