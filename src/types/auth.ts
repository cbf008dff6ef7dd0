import { AccountStatus, Role } from "./role";

/* ================================
   ENTITIES
================================ */

export interface Account {
  id: number;
  email: string;
  passHash: string;
  role: Role;
  status: AccountStatus;
  appId: number;
}

export interface App {
  id: number;
  name: string;
  secret: string;
  tokenTTL: number; // seconds
  refreshTokenTTL: number; // seconds
  redirectURL: string | null;
}

export interface Session {
  sessionId: string;
  accountId: number;
  userAgent: string;
  ipAddress: string;
  token: string;
  refreshToken: string;
  expiresAt: Date;
  refreshExpiresAt: Date;
  createdAt: Date;
}

/* ================================
   STORE INPUTS
================================ */

export interface NewAccount {
  email: string;
  passHash: string;
  role: Role;
  status: AccountStatus;
  appId: number;
}

export interface NewSession {
  accountId: number;
  userAgent: string;
  ipAddress: string;
  token: string;
  refreshToken: string;
  expiresAt: Date;
  refreshExpiresAt: Date;
}

/* ================================
   COLLABORATORS
================================ */

export interface AccountSaver {
  saveAccount(input: NewAccount, signal?: AbortSignal): Promise<number>;
  updatePassword(accountId: number, passHash: string, signal?: AbortSignal): Promise<void>;
  updateStatus(accountId: number, status: AccountStatus, signal?: AbortSignal): Promise<void>;
}

export interface AccountProvider {
  accountByEmail(email: string, signal?: AbortSignal): Promise<Account>;
  accountById(accountId: number, signal?: AbortSignal): Promise<Account>;
  isAdmin(accountId: number, signal?: AbortSignal): Promise<boolean>;
}

export interface AppProvider {
  app(appId: number, signal?: AbortSignal): Promise<App>;
}

export interface SessionSaver {
  saveSession(input: NewSession, signal?: AbortSignal): Promise<string>;
  /** Revoking an unknown or already revoked token is not an error. */
  revokeSession(token: string, signal?: AbortSignal): Promise<void>;
  /**
   * Delete sessions whose access and refresh deadlines both fall before
   * `expiredBefore`, and sessions revoked before `revokedBefore`.
   */
  pruneSessions(
    expiredBefore: Date,
    revokedBefore: Date,
    signal?: AbortSignal
  ): Promise<number>;
}

export interface SessionProvider {
  /** Un-revoked sessions of the account, oldest first. */
  sessions(accountId: number, signal?: AbortSignal): Promise<Session[]>;
  session(token: string, signal?: AbortSignal): Promise<Session>;
  sessionByRefreshToken(refreshToken: string, signal?: AbortSignal): Promise<Session>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(passHash: string, password: string): Promise<boolean>;
}

export interface TokenSigner {
  /** `exp` must not fall after `expiresAt`, the deadline stored with the session. */
  sign(account: Account, app: App, issuedAt: Date, expiresAt: Date): string;
}

export type RefreshTokenGenerator = () => string;

export type Clock = () => Date;

/* ================================
   RESULTS
================================ */

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

export interface RefreshedTokenPair extends TokenPair {
  /** Unix seconds */
  expiresAt: number;
}

export interface SessionValidation {
  valid: boolean;
  /** Unix seconds */
  expiresAt: number;
}

export interface AuthenticatedSession {
  accountId: number;
  sessionId: string;
  /** Unix seconds */
  expiresAt: number;
}
