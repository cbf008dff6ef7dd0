import {
  Account,
  AccountProvider,
  AccountSaver,
  App,
  AppProvider,
  AuthenticatedSession,
  Clock,
  PasswordHasher,
  RefreshTokenGenerator,
  RefreshedTokenPair,
  Session,
  SessionProvider,
  SessionSaver,
  SessionValidation,
  TokenPair,
  TokenSigner,
} from "../types/auth";
import { AccountStatus, Role } from "../types/role";
import { Logger, LogFields, errorField } from "../config/logger";
import { AuthError, ErrorKind, ErrorKinds, isAuthError, wrapError } from "../utils/errors";
import { toUnixSeconds } from "../utils/duration";

/* ================================
   TYPES
================================ */

export interface AuthServiceDeps {
  logger: Logger;
  accountSaver: AccountSaver;
  accountProvider: AccountProvider;
  appProvider: AppProvider;
  sessionSaver: SessionSaver;
  sessionProvider: SessionProvider;
  hasher: PasswordHasher;
  signer: TokenSigner;
  generateRefreshToken: RefreshTokenGenerator;
  /** access token lifetime, milliseconds */
  tokenTTL: number;
  /** refresh token lifetime, milliseconds */
  refreshTokenTTL: number;
  /** how long revoked sessions survive pruning, milliseconds */
  sessionRetention?: number;
  now?: Clock;
}

export interface AuthService {
  registerNewAccount(
    email: string,
    password: string,
    role: Role,
    appId: number,
    signal?: AbortSignal
  ): Promise<number>;
  login(
    email: string,
    password: string,
    userAgent: string,
    ipAddress: string,
    appId: number,
    signal?: AbortSignal
  ): Promise<TokenPair>;
  logout(accountId: number, signal?: AbortSignal): Promise<boolean>;
  changePassword(
    accountId: number,
    oldPassword: string,
    newPassword: string,
    signal?: AbortSignal
  ): Promise<boolean>;
  changeStatus(accountId: number, status: AccountStatus, signal?: AbortSignal): Promise<AccountStatus>;
  getActiveAccountSessions(accountId: number, signal?: AbortSignal): Promise<Session[]>;
  refreshAccountSession(
    accountId: number,
    refreshToken: string,
    userAgent: string,
    ipAddress: string,
    signal?: AbortSignal
  ): Promise<RefreshedTokenPair>;
  validateAccountSession(token: string, signal?: AbortSignal): Promise<SessionValidation>;
  revokeAccountSession(token: string, signal?: AbortSignal): Promise<boolean>;
  isAdmin(accountId: number, signal?: AbortSignal): Promise<boolean>;
  authenticate(token: string, signal?: AbortSignal): Promise<AuthenticatedSession>;
  pruneSessions(signal?: AbortSignal): Promise<number>;
}

interface OpContext {
  op: string;
  log: Logger;
  signal?: AbortSignal;
}

interface IssuedSession extends TokenPair {
  sessionId: string;
  expiresAt: Date;
  refreshExpiresAt: Date;
}

const DEFAULT_SESSION_RETENTION = 7 * 24 * 60 * 60 * 1000;

/* ================================
   SERVICE
================================ */

/**
 * Credential and session lifecycle.
 *
 * Holds no state besides its collaborators and TTLs: accounts, apps and
 * sessions are re-read from their stores on every call. Every failure leaves
 * as an AuthError tagged with the operation name.
 */
export const createAuthService = ({
  logger,
  accountSaver,
  accountProvider,
  appProvider,
  sessionSaver,
  sessionProvider,
  hasher,
  signer,
  generateRefreshToken,
  tokenTTL,
  refreshTokenTTL,
  sessionRetention = DEFAULT_SESSION_RETENTION,
  now = () => new Date(),
}: AuthServiceDeps): AuthService => {
  const begin = (op: string, fields: LogFields, signal?: AbortSignal): OpContext => ({
    op,
    log: logger.child({ op, ...fields }),
    signal,
  });

  const fail = (ctx: OpContext, failure: string, fallback: ErrorKind, error: unknown): AuthError => {
    const wrapped = wrapError(ctx.op, error, fallback, ctx.signal);
    if (wrapped.kind === ErrorKinds.CANCELLED) {
      ctx.log.warn("operation cancelled", errorField(error));
    } else {
      ctx.log.error(failure, { kind: wrapped.kind, ...errorField(error) });
    }
    return wrapped;
  };

  /**
   * Run one collaborator call. The signal is checked first; a failure is
   * logged with `failure` and rethrown wrapped, keeping the collaborator's
   * kind or falling back to `fallback`.
   */
  const attempt = async <T>(
    ctx: OpContext,
    failure: string,
    fallback: ErrorKind,
    call: () => Promise<T> | T
  ): Promise<T> => {
    try {
      ctx.signal?.throwIfAborted();
      return await call();
    } catch (error) {
      throw fail(ctx, failure, fallback, error);
    }
  };

  const issueSession = async (
    ctx: OpContext,
    account: Account,
    app: App,
    userAgent: string,
    ipAddress: string
  ): Promise<IssuedSession> => {
    const issuedAt = now();
    const expiresAt = new Date(issuedAt.getTime() + tokenTTL);
    const refreshExpiresAt = new Date(issuedAt.getTime() + refreshTokenTTL);

    const accessToken = await attempt(
      ctx,
      "failed to generate token",
      ErrorKinds.TOKEN_GENERATION_FAILURE,
      () => signer.sign(account, app, issuedAt, expiresAt)
    );

    const refreshToken = await attempt(
      ctx,
      "failed to generate refresh token",
      ErrorKinds.TOKEN_GENERATION_FAILURE,
      () => generateRefreshToken()
    );

    const sessionId = await attempt(ctx, "failed to save session", ErrorKinds.PERSISTENCE_FAILURE, () =>
      sessionSaver.saveSession(
        {
          accountId: account.id,
          userAgent,
          ipAddress,
          token: accessToken,
          refreshToken,
          expiresAt,
          refreshExpiresAt,
        },
        ctx.signal
      )
    );

    ctx.log.info("session created", { session_id: sessionId });

    return { sessionId, accessToken, refreshToken, expiresAt, refreshExpiresAt };
  };

  return {
    registerNewAccount: async (email, password, role, appId, signal) => {
      const ctx = begin("Auth.RegisterNewAccount", { email, app_id: appId }, signal);

      ctx.log.info("registering account");

      const passHash = await attempt(
        ctx,
        "failed to generate password hash",
        ErrorKinds.HASHING_FAILURE,
        () => hasher.hash(password)
      );

      const accountId = await attempt(ctx, "failed to save account", ErrorKinds.PERSISTENCE_FAILURE, () =>
        accountSaver.saveAccount({ email, passHash, role, status: "ACTIVE", appId }, signal)
      );

      ctx.log.info("account registered", { account_id: accountId });
      return accountId;
    },

    login: async (email, password, userAgent, ipAddress, appId, signal) => {
      const ctx = begin("Auth.Login", { email, app_id: appId }, signal);

      ctx.log.info("attempting to login account");

      let account: Account;
      try {
        signal?.throwIfAborted();
        account = await accountProvider.accountByEmail(email, signal);
      } catch (error) {
        // never tell the caller whether the email exists
        if (!signal?.aborted && isAuthError(error, ErrorKinds.ACCOUNT_NOT_FOUND)) {
          ctx.log.warn("account not found");
          throw new AuthError(ErrorKinds.INVALID_CREDENTIALS, ctx.op);
        }
        throw fail(ctx, "failed to get account", ErrorKinds.PERSISTENCE_FAILURE, error);
      }

      const matches = await attempt(ctx, "failed to verify password", ErrorKinds.HASHING_FAILURE, () =>
        hasher.verify(account.passHash, password)
      );
      if (!matches) {
        ctx.log.info("invalid credentials");
        throw new AuthError(ErrorKinds.INVALID_CREDENTIALS, ctx.op);
      }

      const app = await attempt(ctx, "failed to get app", ErrorKinds.PERSISTENCE_FAILURE, () =>
        appProvider.app(appId, signal)
      );

      const issued = await issueSession(ctx, account, app, userAgent, ipAddress);

      ctx.log.info("account logged in successfully", { account_id: account.id });
      return { accessToken: issued.accessToken, refreshToken: issued.refreshToken };
    },

    logout: async (accountId, signal) => {
      const ctx = begin("Auth.Logout", { account_id: accountId }, signal);

      ctx.log.info("logging out account");

      const live = await attempt(ctx, "failed to get sessions", ErrorKinds.PERSISTENCE_FAILURE, () =>
        sessionProvider.sessions(accountId, signal)
      );

      // Sequential and fail-fast: sessions after a failed revoke stay live.
      for (const session of live) {
        await attempt(ctx, "failed to revoke session", ErrorKinds.PERSISTENCE_FAILURE, () =>
          sessionSaver.revokeSession(session.token, signal)
        );
        ctx.log.debug("session revoked", { session_id: session.sessionId });
      }

      ctx.log.info("account logged out successfully", { revoked: live.length });
      return true;
    },

    changePassword: async (accountId, oldPassword, newPassword, signal) => {
      const ctx = begin("Auth.ChangePassword", { account_id: accountId }, signal);

      ctx.log.info("attempting to change password");

      const account = await attempt(ctx, "failed to get account", ErrorKinds.PERSISTENCE_FAILURE, () =>
        accountProvider.accountById(accountId, signal)
      );

      const matches = await attempt(ctx, "failed to verify password", ErrorKinds.HASHING_FAILURE, () =>
        hasher.verify(account.passHash, oldPassword)
      );
      if (!matches) {
        ctx.log.info("invalid old password");
        throw new AuthError(ErrorKinds.INVALID_CREDENTIALS, ctx.op);
      }

      const newPassHash = await attempt(
        ctx,
        "failed to hash new password",
        ErrorKinds.HASHING_FAILURE,
        () => hasher.hash(newPassword)
      );

      await attempt(ctx, "failed to update password", ErrorKinds.PERSISTENCE_FAILURE, () =>
        accountSaver.updatePassword(accountId, newPassHash, signal)
      );

      ctx.log.info("password changed successfully");
      return true;
    },

    changeStatus: async (accountId, status, signal) => {
      const ctx = begin("Auth.ChangeStatus", { account_id: accountId, new_status: status }, signal);

      ctx.log.info("attempting to change account status");

      await attempt(ctx, "failed to change status", ErrorKinds.PERSISTENCE_FAILURE, () =>
        accountSaver.updateStatus(accountId, status, signal)
      );

      ctx.log.info("status changed successfully");
      return status;
    },

    getActiveAccountSessions: async (accountId, signal) => {
      const ctx = begin("Auth.GetActiveAccountSessions", { account_id: accountId }, signal);

      ctx.log.info("retrieving active sessions");

      const live = await attempt(ctx, "failed to retrieve sessions", ErrorKinds.PERSISTENCE_FAILURE, () =>
        sessionProvider.sessions(accountId, signal)
      );

      const current = now().getTime();
      const active = live.filter((session) => session.expiresAt.getTime() > current);

      ctx.log.info("sessions retrieved successfully", { count: active.length });
      return active;
    },

    refreshAccountSession: async (accountId, refreshToken, userAgent, ipAddress, signal) => {
      const ctx = begin("Auth.RefreshAccountSession", { account_id: accountId }, signal);

      const account = await attempt(ctx, "invalid account id", ErrorKinds.PERSISTENCE_FAILURE, () =>
        accountProvider.accountById(accountId, signal)
      );

      const app = await attempt(ctx, "invalid app id", ErrorKinds.PERSISTENCE_FAILURE, () =>
        appProvider.app(account.appId, signal)
      );

      const session = await attempt(ctx, "invalid refresh token", ErrorKinds.PERSISTENCE_FAILURE, () =>
        sessionProvider.sessionByRefreshToken(refreshToken, signal)
      );

      if (session.accountId !== accountId) {
        ctx.log.warn("refresh token belongs to another account", { session_id: session.sessionId });
        throw new AuthError(ErrorKinds.SESSION_NOT_FOUND, ctx.op);
      }

      if (session.refreshExpiresAt.getTime() <= now().getTime()) {
        ctx.log.info("refresh token expired", { session_id: session.sessionId });
        throw new AuthError(ErrorKinds.REFRESH_TOKEN_EXPIRED, ctx.op);
      }

      const issued = await issueSession(ctx, account, app, userAgent, ipAddress);

      return {
        accessToken: issued.accessToken,
        refreshToken: issued.refreshToken,
        expiresAt: toUnixSeconds(issued.refreshExpiresAt),
      };
    },

    validateAccountSession: async (token, signal) => {
      const ctx = begin("Auth.ValidateAccountSession", {}, signal);

      ctx.log.debug("validating session");

      const session = await attempt(ctx, "invalid token", ErrorKinds.PERSISTENCE_FAILURE, () =>
        sessionProvider.session(token, signal)
      );

      const expiresAt = toUnixSeconds(session.expiresAt);

      if (session.expiresAt.getTime() <= now().getTime()) {
        ctx.log.info("session expired", { session_id: session.sessionId });
        return { valid: false, expiresAt };
      }

      return { valid: true, expiresAt };
    },

    revokeAccountSession: async (token, signal) => {
      const ctx = begin("Auth.RevokeAccountSession", {}, signal);

      ctx.log.info("revoking session");

      await attempt(ctx, "failed to revoke session", ErrorKinds.PERSISTENCE_FAILURE, () =>
        sessionSaver.revokeSession(token, signal)
      );

      ctx.log.info("session revoked successfully");
      return true;
    },

    isAdmin: async (accountId, signal) => {
      const ctx = begin("Auth.IsAdmin", { account_id: accountId }, signal);

      return attempt(ctx, "failed to check admin role", ErrorKinds.PERSISTENCE_FAILURE, () =>
        accountProvider.isAdmin(accountId, signal)
      );
    },

    authenticate: async (token, signal) => {
      const ctx = begin("Auth.Authenticate", {}, signal);

      const session = await attempt(ctx, "invalid token", ErrorKinds.PERSISTENCE_FAILURE, () =>
        sessionProvider.session(token, signal)
      );

      if (session.expiresAt.getTime() <= now().getTime()) {
        throw new AuthError(ErrorKinds.TOKEN_EXPIRED, ctx.op);
      }

      return {
        accountId: session.accountId,
        sessionId: session.sessionId,
        expiresAt: toUnixSeconds(session.expiresAt),
      };
    },

    pruneSessions: async (signal) => {
      const ctx = begin("Auth.PruneSessions", {}, signal);

      const current = now();
      const revokedBefore = new Date(current.getTime() - sessionRetention);

      const pruned = await attempt(ctx, "failed to prune sessions", ErrorKinds.PERSISTENCE_FAILURE, () =>
        sessionSaver.pruneSessions(current, revokedBefore, signal)
      );

      ctx.log.info("sessions pruned", { count: pruned });
      return pruned;
    },
  };
};
